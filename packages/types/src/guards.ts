/**
 * Runtime Type Guards
 *
 * Narrowing functions for ledger records.
 * Used at system boundaries (request bodies, loaded files)
 * before records reach the matcher.
 */

import type {
  Amount,
  PosTransaction,
  ProcessorTransaction,
} from "./transaction.js";

// =============================================================================
// Primitives
// =============================================================================

export function isRecordObject(value: unknown): value is Record<string, unknown> {
  return value !== null && typeof value === "object" && !Array.isArray(value);
}

export function isNonEmptyString(value: unknown): value is string {
  return typeof value === "string" && value.length > 0;
}

/**
 * Shape check only: a finite number or a string.
 * Whether the string parses as a decimal is decided by the money package.
 */
export function isAmount(value: unknown): value is Amount {
  return (typeof value === "number" && Number.isFinite(value)) || typeof value === "string";
}

// =============================================================================
// Records
// =============================================================================

export function isPosTransaction(value: unknown): value is PosTransaction {
  if (!isRecordObject(value)) return false;
  return isNonEmptyString(value.transactionId) && isAmount(value.amount);
}

export function isProcessorTransaction(value: unknown): value is ProcessorTransaction {
  if (!isRecordObject(value)) return false;
  return isNonEmptyString(value.referenceId) && isAmount(value.amount);
}
