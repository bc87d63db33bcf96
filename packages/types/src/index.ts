/**
 * @ledgerpair/types — Shared record types for POS ↔ processor reconciliation.
 *
 * Design rules:
 * - All types are immutable (readonly)
 * - No runtime dependencies
 * - No semantic interpretation in types; meaning lives in consuming code
 */

// Transaction records
export type {
  Amount,
  KnownTransactionType,
  TransactionType,
  PosTransaction,
  ProcessorTransaction,
} from "./transaction.js";

// Runtime type guards
export {
  isRecordObject,
  isNonEmptyString,
  isAmount,
  isPosTransaction,
  isProcessorTransaction,
} from "./guards.js";
