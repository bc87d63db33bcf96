/**
 * Reconciliation routes.
 *
 * POST /api/v1/reconcile               — Reconcile a POS ledger against a processor ledger
 * POST /api/v1/reconcile?format=csv    — Same, result table as CSV
 * POST /api/v1/reconcile?format=text   — Same, plain-text summary
 */

import { Hono } from "hono";
import { renderResultsCsv, renderSummaryText } from "@ledgerpair/reconciler";
import type { AppEnv } from "../types/api-contract.js";
import { ReconcileSchema, ReconcileQuerySchema } from "../types/dto.js";
import { validateBody, validateQuery } from "../middleware/validate.js";

export const DIGEST_HEADER = "X-Report-Digest";

export function createReconcileRoutes(): Hono<AppEnv> {
  const routes = new Hono<AppEnv>();

  routes.post(
    "/reconcile",
    validateQuery(ReconcileQuerySchema),
    validateBody(ReconcileSchema),
    (c) => {
      const service = c.get("service");
      const body = c.get("validatedBody");

      const report = service.reconcile(
        { pos: body.pos, processor: body.processor },
        { tolerance: body.tolerance },
      );

      c.header(DIGEST_HEADER, report.digest);

      switch (c.get("validatedQuery").format) {
        case "csv":
          return c.body(renderResultsCsv(report.rows), 200, {
            "Content-Type": "text/csv; charset=utf-8",
          });
        case "text":
          return c.text(renderSummaryText(report.summary, report.decimals));
        case "json":
          return c.json({ data: report });
      }
    },
  );

  return routes;
}
