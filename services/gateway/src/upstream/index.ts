export * from "./types.js";
export { RemoteImage, cookieHeader } from "./remote-image.js";
export type { RemoteImageOptions } from "./remote-image.js";
export { loadUpstreamFactory } from "./adapter.js";
