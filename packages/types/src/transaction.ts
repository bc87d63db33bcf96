/**
 * Transaction Types
 *
 * The two record shapes that meet during reconciliation: what the
 * point-of-sale terminal wrote down, and what the payment processor
 * settled.
 *
 * Rules:
 * - Only the join key and the amount are required
 * - Every other field may be absent or null and never affects matching
 * - Amounts arrive either as decimal strings or as numbers from
 *   float-based sources; the reconciler converts both to minor units
 */

/**
 * A monetary amount as it appears in a source ledger.
 * "19.99" or 19.99: both mean nineteen dollars ninety-nine.
 */
export type Amount = string | number;

/**
 * Known transaction kinds recorded by gift-card POS systems.
 * Sources may emit others; those are carried through untouched.
 */
export type KnownTransactionType =
  | "PURCHASE"
  | "REFUND"
  | "BALANCE_CHECK"
  | "ACTIVATION"
  | "RELOAD";

/** A transaction kind; open-ended so unknown kinds survive a round trip. */
export type TransactionType = KnownTransactionType | (string & {});

/**
 * A transaction as recorded by the point-of-sale system.
 */
export interface PosTransaction {
  /** POS-assigned identifier. The join key. */
  readonly transactionId: string;

  /** Signed amount; refunds are negative. */
  readonly amount: Amount;

  readonly cardId?: string | null | undefined;
  readonly transactionType?: TransactionType | null | undefined;

  /** ISO 8601 time the sale was rung up */
  readonly timestamp?: string | null | undefined;

  readonly storeId?: string | null | undefined;
  readonly terminalId?: string | null | undefined;
  readonly batchId?: string | null | undefined;
  readonly authorizationCode?: string | null | undefined;
  readonly status?: string | null | undefined;
}

/**
 * A transaction as recorded by the payment processor.
 */
export interface ProcessorTransaction {
  /** Processor-assigned identifier. Not the join key; may be absent. */
  readonly transactionId?: string | null | undefined;

  /** Expected to equal the originating POS transactionId. The join key. */
  readonly referenceId: string;

  readonly amount: Amount;

  readonly cardId?: string | null | undefined;
  readonly transactionType?: TransactionType | null | undefined;

  /** ISO 8601 settlement time; usually later than the POS timestamp */
  readonly processedAt?: string | null | undefined;

  readonly merchantId?: string | null | undefined;
  readonly terminalId?: string | null | undefined;
  readonly batchId?: string | null | undefined;
  readonly authorizationCode?: string | null | undefined;
  readonly status?: string | null | undefined;
}
