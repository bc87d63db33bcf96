/**
 * Request DTOs with Zod validation schemas.
 *
 * Each DTO has a Zod schema and a derived TypeScript type.
 * Route handlers use these for body/query validation.
 */

import { z } from "zod";

// =============================================================================
// Reconciliation DTOs
// =============================================================================

/**
 * Ledger records are deliberately loose here: each record is screened by
 * the reconciler's intake, which reports bad records instead of failing
 * the whole request.
 */
export const ReconcileSchema = z.object({
  pos: z.array(z.unknown()),
  processor: z.array(z.unknown()),
  tolerance: z
    .string()
    .regex(/^\d+(\.\d+)?$/, "Tolerance must be a non-negative decimal string")
    .optional(),
});

export type ReconcileDto = z.infer<typeof ReconcileSchema>;

export const ReconcileQuerySchema = z.object({
  format: z.enum(["json", "csv", "text"]).default("json"),
});

export type ReconcileQuery = z.infer<typeof ReconcileQuerySchema>;
