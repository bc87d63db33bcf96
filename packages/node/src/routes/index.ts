/**
 * Route barrel — re-exports all route modules.
 */

export { createHealthRoutes } from "./health.js";
export { createReconcileRoutes, DIGEST_HEADER } from "./reconcile.js";
export { createMetricsRoute, PROMETHEUS_CONTENT_TYPE } from "./metrics.js";
