/**
 * GET /health: liveness, plus the reconciliation defaults this instance
 * applies when a request does not override them.
 */

import { Hono } from "hono";
import { formatAmount } from "@ledgerpair/money";
import type { AppEnv } from "../types/api-contract.js";
import type { ReconciliationService } from "../services/reconciliation-service.js";

export function createHealthRoutes(service: ReconciliationService): Hono<AppEnv> {
  const routes = new Hono<AppEnv>();
  const { currency, decimals, tolerance } = service.reconciler;

  routes.get("/health", (c) =>
    c.json({
      status: "ok",
      timestamp: new Date().toISOString(),
      reconciler: {
        currency,
        decimals,
        tolerance: formatAmount(tolerance, decimals),
      },
    }),
  );

  return routes;
}
