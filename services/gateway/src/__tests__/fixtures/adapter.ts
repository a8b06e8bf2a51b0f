import { FakeUpstreamClient } from "../helpers/fake-upstream.js";
import type { UpstreamClientFactory } from "../../upstream/types.js";

export const createUpstreamClient: UpstreamClientFactory = (tokens) => new FakeUpstreamClient(tokens);
