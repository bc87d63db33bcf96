/**
 * Hono application environment type.
 *
 * Defines the typed context variables available in all route handlers.
 * These are set by middleware and consumed by route handlers.
 */

import type { ReconciliationService } from "../services/reconciliation-service.js";

/**
 * Hono environment type for the reconciliation app.
 *
 * Middleware populates Variables; route handlers read them via c.get().
 */
export interface AppEnv {
  Variables: {
    /** Unique request identifier (set by request-id middleware) */
    requestId: string;

    /** Reconciliation service shared by all requests (set in createApp) */
    service: ReconciliationService;
  };
}

/**
 * Environment of a handler placed after `validateBody(schema)`.
 */
export interface ValidatedEnv<T> {
  Variables: AppEnv["Variables"] & {
    /** Parsed request body (set by validate middleware) */
    validatedBody: T;
  };
}

/**
 * Environment of a handler placed after `validateQuery(schema)`.
 */
export interface ValidatedQueryEnv<Q> {
  Variables: AppEnv["Variables"] & {
    /** Parsed query string (set by validate middleware) */
    validatedQuery: Q;
  };
}
