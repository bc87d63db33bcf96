/**
 * @ledgerpair/reconciler domain types.
 *
 * Two-ledger reconciliation types for matching:
 * - POS transactions ↔ Processor transactions (joined on referenceId)
 *
 * Plus the classified result rows, summary statistics and the
 * report handed to exporters.
 */

import type { PosTransaction, ProcessorTransaction } from "@ledgerpair/types";

// =============================================================================
// Classification
// =============================================================================

export type DiscrepancyType =
  | "NONE"                   // Both sides present, amounts within tolerance
  | "MISSING_IN_PROCESSOR"   // POS record, no processor record references it
  | "MISSING_IN_POS"         // Processor record references no POS record
  | "DECIMAL_SHIFT"          // Amounts differ by a factor of ten
  | "AMOUNT_DISCREPANCY";    // Amounts differ for any other reason

/** All classifications, in precedence order. */
export const DISCREPANCY_TYPES = [
  "MISSING_IN_PROCESSOR",
  "MISSING_IN_POS",
  "DECIMAL_SHIFT",
  "AMOUNT_DISCREPANCY",
  "NONE",
] as const satisfies readonly DiscrepancyType[];

export type LedgerSide = "pos" | "processor";

// =============================================================================
// Priced Records (intake output)
// =============================================================================

/** An accepted record with its amount converted to minor units. */
export interface PricedRecord<T> {
  readonly record: T;
  /** Amount in minor units of the configured currency */
  readonly amount: bigint;
  /** Zero-based position in the source ledger */
  readonly index: number;
}

export type PricedPos = PricedRecord<PosTransaction>;
export type PricedProcessor = PricedRecord<ProcessorTransaction>;

// =============================================================================
// Match Results
// =============================================================================

/**
 * One row of the outer join. At least one side is present.
 */
export interface MatchedPair {
  readonly pos?: PricedPos | undefined;
  readonly processor?: PricedProcessor | undefined;

  /** posAmount - processorAmount in minor units; set when both sides exist */
  readonly amountDifference?: bigint | undefined;

  /** Either side takes part in more than one pair (duplicate keys) */
  readonly fanOut: boolean;

  /**
   * This pair carries the POS record's contribution to ledger totals.
   * True on exactly one pair per POS record.
   */
  readonly countsPos: boolean;

  /** Same as countsPos, for the processor record. */
  readonly countsProcessor: boolean;
}

export interface ClassifiedPair extends MatchedPair {
  readonly discrepancyType: DiscrepancyType;
}

// =============================================================================
// Intake
// =============================================================================

export type RejectionReason =
  | "NOT_AN_OBJECT"
  | "MISSING_TRANSACTION_ID"
  | "MISSING_REFERENCE_ID"
  | "INVALID_AMOUNT";

/** A record excluded from matching, kept for the report. */
export interface RejectedRecord {
  readonly side: LedgerSide;
  /** Zero-based position in the source ledger */
  readonly index: number;
  readonly transactionId: string | null;
  readonly reason: RejectionReason;
  readonly message: string;
}

export interface IntakeResult<T> {
  readonly accepted: readonly PricedRecord<T>[];
  readonly rejected: readonly RejectedRecord[];
}

// =============================================================================
// Reconciliation Report
// =============================================================================

/** One exported result row. Amounts are fixed-decimal strings. */
export interface ResultRow {
  readonly posTransactionId: string | null;
  readonly processorTransactionId: string | null;
  readonly referenceId: string | null;
  readonly posAmount: string | null;
  readonly processorAmount: string | null;
  readonly amountDifference: string | null;
  readonly discrepancyType: DiscrepancyType;
  readonly fanOut: boolean;
}

export interface ReconciliationSummary {
  readonly totalPosCount: number;
  readonly totalProcessorCount: number;

  /** Pairs with both sides present (fan-out pairs counted individually) */
  readonly matchedCount: number;

  readonly counts: Readonly<Record<DiscrepancyType, number>>;

  readonly posAmountTotal: string;
  readonly processorAmountTotal: string;
  readonly netAmountDifference: string;

  readonly fanOutPairCount: number;
  readonly unparseablePosCount: number;
  readonly unparseableProcessorCount: number;

  /** Every pair is NONE, nothing fanned out, nothing rejected */
  readonly allReconciled: boolean;
}

/** Full reconciliation report. */
export interface ReconciliationReport {
  readonly id: string;
  readonly generatedAt: string;

  readonly currency: string;
  readonly decimals: number;
  readonly tolerance: string;

  readonly rows: readonly ResultRow[];
  readonly summary: ReconciliationSummary;
  readonly rejected: readonly RejectedRecord[];

  /** SHA-256 of the canonical rows + summary + rejected; equal input, equal digest */
  readonly digest: string;
}

// =============================================================================
// Errors
// =============================================================================

export type ReconcilerErrorCode =
  | "INVARIANT_VIOLATION"
  | "INVALID_CONFIG";

/**
 * Structured error from the reconciliation engine.
 * Thrown for configuration mistakes and internal-consistency failures;
 * data problems in the ledgers are reported, not thrown.
 */
export class ReconcilerError extends Error {
  public readonly code: ReconcilerErrorCode;

  constructor(code: ReconcilerErrorCode, message: string) {
    super(message);
    this.name = "ReconcilerError";
    this.code = code;
  }
}
