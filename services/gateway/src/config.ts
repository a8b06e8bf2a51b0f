import { z } from "zod";

const ConfigSchema = z.object({
  server: z.object({
    host: z.string().default("0.0.0.0"),
    port: z.number().int().min(1).max(65535).default(8000),
  }),

  // Names of the two cookies that carry the caller's upstream identity
  cookies: z.object({
    primary: z.string().min(1).default("__Secure-1PSID"),
    secondary: z.string().min(1).default("__Secure-1PSIDTS"),
  }),

  session: z.object({
    initTimeoutMs: z.number().int().positive().default(30_000),
  }),

  // rpm = 0 disables the limiter
  rateLimit: z.object({
    rpm: z.number().int().min(0).default(0),
    burst: z.number().int().min(0).default(10),
  }),

  upstream: z.object({
    adapter: z.string().min(1, "UPSTREAM_ADAPTER must name a module exporting createUpstreamClient"),
  }),

  logLevel: z.enum(["debug", "info", "warn", "error"]).default("info"),
});

export type Config = z.infer<typeof ConfigSchema>;

function int(value: string | undefined, fallback: number): number {
  return value === undefined || value === "" ? fallback : Number(value);
}

export function loadConfig(): Config {
  return ConfigSchema.parse({
    server: {
      host: process.env.HOST || undefined,
      port: int(process.env.PORT, 8000),
    },
    cookies: {
      primary: process.env.PRIMARY_COOKIE || undefined,
      secondary: process.env.SECONDARY_COOKIE || undefined,
    },
    session: {
      initTimeoutMs: int(process.env.SESSION_INIT_TIMEOUT_MS, 30_000),
    },
    rateLimit: {
      rpm: int(process.env.RATE_LIMIT_RPM, 0),
      burst: int(process.env.RATE_LIMIT_BURST, 10),
    },
    upstream: {
      adapter: process.env.UPSTREAM_ADAPTER ?? "",
    },
    logLevel: process.env.LOG_LEVEL || undefined,
  });
}
