/**
 * @ledgerpair/node — Entry point.
 *
 * Bootstraps the Hono app, loads config, starts the HTTP server,
 * and handles graceful shutdown.
 */

import { serve } from "@hono/node-server";
import pino from "pino";
import { loadConfig, toReconcilerConfig } from "./config.js";
import { createApp } from "./app.js";

// =============================================================================
// Bootstrap
// =============================================================================

async function main(): Promise<void> {
  const config = loadConfig();
  const logger = pino({
    level: config.LOG_LEVEL,
    ...(config.NODE_ENV === "development"
      ? { transport: { target: "pino-pretty" } }
      : {}),
  });

  const reconcilerConfig = toReconcilerConfig(config);

  const { app } = createApp({
    reconciler: reconcilerConfig,
    logger: logger.child({ component: "reconciliation" }),
    logFn: (entry) => {
      const level =
        entry.outcome === "server_error" ? "error" : entry.outcome === "client_error" ? "warn" : "info";
      logger[level](entry, `${entry.method} ${entry.path} ${entry.status}`);
    },
    maxBodyBytes: config.MAX_BODY_BYTES,
  });

  const server = serve({
    fetch: app.fetch,
    port: config.PORT,
    hostname: config.HOST,
  });

  logger.info(
    {
      port: config.PORT,
      host: config.HOST,
      currency: config.RECON_CURRENCY,
      decimals: config.RECON_DECIMALS,
    },
    "Reconciliation node started",
  );

  // Graceful shutdown
  const shutdown = (signal: string): void => {
    logger.info({ signal }, "Shutdown signal received");
    server.close(() => {
      logger.info("Shutdown complete");
      process.exit(0);
    });
  };

  process.on("SIGTERM", () => shutdown("SIGTERM"));
  process.on("SIGINT", () => shutdown("SIGINT"));
}

main().catch((err: unknown) => {
  // eslint-disable-next-line no-console
  console.error("Fatal startup error:", err);
  process.exit(1);
});
