export type { SessionCacheOptions, SessionProvider } from "./types.js";
export { SessionCache } from "./cache.js";
