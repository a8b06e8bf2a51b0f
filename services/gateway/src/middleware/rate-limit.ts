import type { Context, MiddlewareHandler } from "hono";

export interface RateLimitOptions {
  /** Requests per minute (default 60) */
  rpm?: number;
  /** Burst allowance on top of the window (default 10) */
  burst?: number;
  /** How to extract the client key from the request */
  keyFn?: (c: Context) => string;
}

interface WindowEntry {
  count: number;
  windowStart: number;
}

const MAX_TRACKED_KEYS = 10_000;

export function createRateLimiter(options: RateLimitOptions = {}): MiddlewareHandler {
  const { rpm = 60, burst = 10, keyFn = clientAddress } = options;
  const windowMs = 60_000;
  const limit = rpm + burst;

  const counters = new Map<string, WindowEntry>();

  return async (c, next) => {
    const key = keyFn(c);
    const now = Date.now();

    if (counters.size >= MAX_TRACKED_KEYS) {
      for (const [k, e] of counters) {
        if (now - e.windowStart >= windowMs) counters.delete(k);
      }
    }

    let entry = counters.get(key);
    if (!entry || now - entry.windowStart >= windowMs) {
      entry = { count: 0, windowStart: now };
    }

    entry.count += 1;
    counters.set(key, entry);

    if (entry.count > limit) {
      const retryAfter = Math.ceil((windowMs - (now - entry.windowStart)) / 1000);
      c.header("Retry-After", String(retryAfter));
      return c.json({ detail: "Too Many Requests", code: "RATE_LIMITED" }, 429);
    }

    return next();
  };
}

export function clientAddress(c: Context): string {
  return (
    c.req.header("x-forwarded-for")?.split(",")[0]?.trim() ??
    c.req.header("x-real-ip") ??
    "unknown"
  );
}
