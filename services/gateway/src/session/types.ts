import type { Logger } from "../logger.js";
import type { IdentityTokens, UpstreamClient, UpstreamClientFactory } from "../upstream/types.js";

export interface SessionCacheOptions {
  createClient: UpstreamClientFactory;
  /** Upper bound handed to the upstream `init` call. */
  initTimeoutMs?: number;
  logger?: Logger;
}

export interface SessionProvider {
  acquire(tokens: IdentityTokens): Promise<UpstreamClient>;
}
