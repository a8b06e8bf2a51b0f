import { cacheKey, fingerprint } from "../auth.js";
import { GatewayError, errorMessage } from "../errors.js";
import { createLogger } from "../logger.js";
import type { Logger } from "../logger.js";
import type { IdentityTokens, UpstreamClient, UpstreamClientFactory } from "../upstream/types.js";
import type { SessionCacheOptions, SessionProvider } from "./types.js";

/**
 * Live upstream sessions keyed by caller identity.
 *
 * The cache owns each session's lifetime: clients are initialized with
 * auto-close and auto-refresh off, dropped (not closed) once the upstream
 * reports them dead, and closed only by {@link SessionCache.shutdownAll}.
 * Creation is single-flight per key, so a burst of first requests for one
 * identity opens exactly one upstream session.
 */
export class SessionCache implements SessionProvider {
  private readonly entries = new Map<string, UpstreamClient>();
  private readonly pending = new Map<string, Promise<UpstreamClient>>();
  private readonly createClient: UpstreamClientFactory;
  private readonly initTimeoutMs: number;
  private readonly logger: Logger;

  constructor(options: SessionCacheOptions) {
    this.createClient = options.createClient;
    this.initTimeoutMs = options.initTimeoutMs ?? 30_000;
    this.logger = options.logger ?? createLogger({ level: "warn" });
  }

  get size(): number {
    return this.entries.size;
  }

  has(tokens: IdentityTokens): boolean {
    return this.entries.has(cacheKey(tokens));
  }

  async acquire(tokens: IdentityTokens): Promise<UpstreamClient> {
    const key = cacheKey(tokens);

    const existing = this.entries.get(key);
    if (existing) {
      if (existing.running) return existing;
      this.entries.delete(key);
      this.logger.info("evicted dead session", { session: fingerprint(tokens) });
    }

    const inFlight = this.pending.get(key);
    if (inFlight) return inFlight;

    const creation = this.create(key, tokens).finally(() => {
      this.pending.delete(key);
    });
    this.pending.set(key, creation);
    return creation;
  }

  private async create(key: string, tokens: IdentityTokens): Promise<UpstreamClient> {
    const session = fingerprint(tokens);
    let client: UpstreamClient;
    try {
      client = this.createClient(tokens);
      await client.init({ timeoutMs: this.initTimeoutMs, autoClose: false, autoRefresh: false });
    } catch (error) {
      this.logger.warn("session init failed", { session, error: errorMessage(error) });
      throw new GatewayError(
        "AUTH_REJECTED",
        `Failed to initialize upstream client with provided cookies: ${errorMessage(error)}`,
        error
      );
    }
    this.entries.set(key, client);
    this.logger.info("session created", { session, sessions: this.entries.size });
    return client;
  }

  /** Closes every live session once and empties the cache. Run after the server has drained. */
  async shutdownAll(): Promise<void> {
    const clients = [...this.entries.values()];
    this.entries.clear();

    let closed = 0;
    for (const client of clients) {
      if (!client.running) continue;
      try {
        await client.close();
        closed++;
      } catch (error) {
        this.logger.warn("session close failed", { error: errorMessage(error) });
      }
    }
    this.logger.info("sessions shut down", { closed, total: clients.length });
  }
}
