/**
 * Request logging middleware.
 *
 * Hands one entry per finished request to a sink; main.ts routes it to
 * pino at a level chosen from `outcome`.
 */

import type { MiddlewareHandler } from "hono";
import type { AppEnv } from "../types/api-contract.js";

export type RequestOutcome = "ok" | "client_error" | "server_error";

export interface RequestLogEntry {
  readonly requestId: string;
  readonly method: string;
  readonly path: string;
  readonly status: number;
  readonly outcome: RequestOutcome;
  readonly durationMs: number;
}

export function outcomeOf(status: number): RequestOutcome {
  if (status >= 500) return "server_error";
  if (status >= 400) return "client_error";
  return "ok";
}

export function loggerMiddleware(
  log: (entry: RequestLogEntry) => void,
): MiddlewareHandler<AppEnv> {
  return async (c, next) => {
    const start = performance.now();
    await next();

    const status = c.res.status;
    log({
      requestId: c.get("requestId"),
      method: c.req.method,
      path: c.req.path,
      status,
      outcome: outcomeOf(status),
      durationMs: Math.round(performance.now() - start),
    });
  };
}
