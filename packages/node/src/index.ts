/**
 * @ledgerpair/node — HTTP service for POS ↔ processor reconciliation.
 *
 * Package public API. The server itself starts from main.ts.
 */

export { ReconciliationService, RUNS_METRIC, PAIRS_METRIC } from "./services/reconciliation-service.js";
export type {
  ReconciliationServiceDeps,
  ReconcileOptions,
} from "./services/reconciliation-service.js";
export { loadConfig, toReconcilerConfig, ConfigSchema } from "./config.js";
export type { AppConfig } from "./config.js";
export { createApp } from "./app.js";
export type { CreateAppOptions, AppInstance } from "./app.js";
export * from "./middleware/index.js";
export * from "./routes/index.js";
export * from "./types/index.js";
