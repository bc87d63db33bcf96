/**
 * Middleware barrel — re-exports all middleware.
 */

export { handleError } from "./error-handler.js";
export { requestIdMiddleware, REQUEST_ID_HEADER } from "./request-id.js";
export { loggerMiddleware, outcomeOf } from "./logger.js";
export type { RequestLogEntry, RequestOutcome } from "./logger.js";
export { validateBody, validateQuery, formatZodErrors } from "./validate.js";
export { bodyLimitMiddleware, DEFAULT_MAX_BODY_BYTES } from "./body-limit.js";
export { metricsMiddleware, MetricsCollector } from "./metrics.js";
