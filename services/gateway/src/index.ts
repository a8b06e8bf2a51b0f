import { serve } from "@hono/node-server";
import { loadConfig } from "./config.js";
import { errorMessage } from "./errors.js";
import { createLogger } from "./logger.js";
import { createApp, SERVICE_NAME } from "./server.js";
import { SessionCache } from "./session/index.js";
import { initTracing } from "./tracing.js";
import { loadUpstreamFactory } from "./upstream/index.js";

async function main() {
  const config = loadConfig();
  const logger = createLogger({ level: config.logLevel });

  await initTracing();

  const createClient = await loadUpstreamFactory(config.upstream.adapter);
  const sessions = new SessionCache({
    createClient,
    initTimeoutMs: config.session.initTimeoutMs,
    logger: logger.child({ component: "sessions" }),
  });

  const app = createApp({
    sessions,
    logger,
    cookieNames: config.cookies,
    rateLimit: config.rateLimit,
  });

  const server = serve(
    { fetch: app.fetch, port: config.server.port, hostname: config.server.host },
    (info) => {
      logger.info(`${SERVICE_NAME} listening`, { address: info.address, port: info.port });
    }
  );

  let shuttingDown = false;
  const shutdown = (signal: string) => {
    if (shuttingDown) return;
    shuttingDown = true;
    logger.info("shutting down", { signal });

    // Stop accepting connections and let in-flight requests finish before closing sessions
    server.close((err) => {
      if (err) logger.warn("server close reported an error", { error: errorMessage(err) });
      sessions
        .shutdownAll()
        .then(() => process.exit(0))
        .catch((error: unknown) => {
          logger.error("session shutdown failed", { error: errorMessage(error) });
          process.exit(1);
        });
    });
  };

  process.on("SIGINT", () => shutdown("SIGINT"));
  process.on("SIGTERM", () => shutdown("SIGTERM"));
}

main().catch((error: unknown) => {
  console.error("Failed to start:", error);
  process.exit(1);
});
