/**
 * Hono application factory.
 *
 * Creates the Hono app with middleware and routes.
 * Tests create the app from here without starting the HTTP server.
 */

import { Hono } from "hono";
import type { Logger } from "pino";
import type { ReconcilerConfig } from "@ledgerpair/reconciler";
import type { AppEnv } from "./types/api-contract.js";
import { createErrorEnvelope } from "./types/error.js";
import { ReconciliationService } from "./services/reconciliation-service.js";
import { handleError } from "./middleware/error-handler.js";
import { requestIdMiddleware } from "./middleware/request-id.js";
import { loggerMiddleware } from "./middleware/logger.js";
import type { RequestLogEntry } from "./middleware/logger.js";
import { bodyLimitMiddleware } from "./middleware/body-limit.js";
import {
  metricsMiddleware,
  MetricsCollector,
} from "./middleware/metrics.js";
import { createHealthRoutes } from "./routes/health.js";
import { createReconcileRoutes } from "./routes/reconcile.js";
import { createMetricsRoute } from "./routes/metrics.js";

// =============================================================================
// App Config
// =============================================================================

export interface CreateAppOptions {
  /** Currency, decimals and default tolerance for every run */
  readonly reconciler?: ReconcilerConfig | undefined;
  /** Service logger; run summaries at info, rejected records at warn */
  readonly logger?: Logger | undefined;
  /** Request log sink */
  readonly logFn?: ((entry: RequestLogEntry) => void) | undefined;
  /** Largest accepted request body. Default: 10 MiB */
  readonly maxBodyBytes?: number | undefined;
  /** Enable metrics collection. Default: true */
  readonly enableMetrics?: boolean | undefined;
}

// =============================================================================
// Factory
// =============================================================================

export interface AppInstance {
  readonly app: Hono<AppEnv>;
  readonly service: ReconciliationService;
  readonly metricsCollector: MetricsCollector;
}

/**
 * Create the Hono application with all middleware and routes.
 *
 * @throws {ReconcilerError} INVALID_CONFIG when the reconciler configuration is unusable
 */
export function createApp(options: CreateAppOptions = {}): AppInstance {
  const metricsCollector = new MetricsCollector();
  const enableMetrics = options.enableMetrics !== false;

  const service = new ReconciliationService(options.reconciler, {
    logger: options.logger,
    metrics: enableMetrics ? metricsCollector : undefined,
  });

  const app = new Hono<AppEnv>();

  // ─── Global Middleware ───────────────────────────────────────────
  app.use("*", requestIdMiddleware());

  if (options.logFn !== undefined) {
    app.use("*", loggerMiddleware(options.logFn));
  }

  if (enableMetrics) {
    app.use("*", metricsMiddleware(metricsCollector));
  }

  // ─── Error Handling ─────────────────────────────────────────────
  app.onError(handleError);
  app.notFound((c) =>
    c.json(
      createErrorEnvelope("NOT_FOUND", `No route for ${c.req.method} ${c.req.path}`),
      404,
    ),
  );

  // ─── Health Routes ──────────────────────────────────────────────
  app.route("/", createHealthRoutes(service));

  // ─── Metrics Route (Prometheus scraping) ────────────────────────
  if (enableMetrics) {
    app.route("/", createMetricsRoute(metricsCollector));
  }

  // ─── API Routes ─────────────────────────────────────────────────
  app.use("/api/*", bodyLimitMiddleware(options.maxBodyBytes));
  app.use("/api/*", async (c, next) => {
    c.set("service", service);
    await next();
  });

  app.route("/api/v1", createReconcileRoutes());

  return { app, service, metricsCollector };
}
