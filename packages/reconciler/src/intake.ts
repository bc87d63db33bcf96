/**
 * Intake
 *
 * Screens raw ledger records before they reach the matcher.
 * Records without a usable join key or amount are excluded and
 * reported; everything else is priced in minor units.
 *
 * Non-key fields are never inspected.
 */

import {
  isNonEmptyString,
  isPosTransaction,
  isProcessorTransaction,
  isRecordObject,
} from "@ledgerpair/types";
import type { Amount, PosTransaction, ProcessorTransaction } from "@ledgerpair/types";
import { MoneyError, toMinorUnits } from "@ledgerpair/money";
import type {
  IntakeResult,
  LedgerSide,
  PricedRecord,
  RejectedRecord,
} from "./types.js";

/**
 * Screen POS records. Requires a non-empty transactionId and an amount.
 */
export function intakePos(
  records: readonly unknown[],
  decimals: number,
): IntakeResult<PosTransaction> {
  return screen(records, "pos", decimals, isPosTransaction);
}

/**
 * Screen processor records. Requires a non-empty referenceId and an
 * amount; the processor's own transactionId is optional.
 */
export function intakeProcessor(
  records: readonly unknown[],
  decimals: number,
): IntakeResult<ProcessorTransaction> {
  return screen(records, "processor", decimals, isProcessorTransaction);
}

// =============================================================================
// Internals
// =============================================================================

function screen<T extends { readonly amount: Amount }>(
  records: readonly unknown[],
  side: LedgerSide,
  decimals: number,
  guard: (value: unknown) => value is T,
): IntakeResult<T> {
  const accepted: PricedRecord<T>[] = [];
  const rejected: RejectedRecord[] = [];

  records.forEach((value, index) => {
    if (!guard(value)) {
      rejected.push(describeRejection(value, index, side));
      return;
    }

    try {
      accepted.push({ record: value, amount: toMinorUnits(value.amount, decimals), index });
    } catch (err: unknown) {
      if (!(err instanceof MoneyError)) throw err;
      rejected.push({
        side,
        index,
        transactionId: readTransactionId(value),
        reason: "INVALID_AMOUNT",
        message: err.message,
      });
    }
  });

  return { accepted, rejected };
}

/**
 * Work out why a record failed its guard. Checks run in field order
 * so the first missing piece is the one reported.
 */
function describeRejection(
  value: unknown,
  index: number,
  side: LedgerSide,
): RejectedRecord {
  const base = { side, index, transactionId: readTransactionId(value) };

  if (!isRecordObject(value)) {
    return { ...base, reason: "NOT_AN_OBJECT", message: `Record at index ${String(index)} is not an object` };
  }

  if (side === "pos" && !isNonEmptyString(value.transactionId)) {
    return {
      ...base,
      reason: "MISSING_TRANSACTION_ID",
      message: `Record at index ${String(index)} has no transactionId`,
    };
  }

  const label = base.transactionId ?? `at index ${String(index)}`;

  if (side === "processor" && !isNonEmptyString(value.referenceId)) {
    return {
      ...base,
      reason: "MISSING_REFERENCE_ID",
      message: `Processor record ${label} has no referenceId`,
    };
  }

  return {
    ...base,
    reason: "INVALID_AMOUNT",
    message: `Record ${label} has no finite numeric or string amount`,
  };
}

function readTransactionId(value: unknown): string | null {
  if (!isRecordObject(value)) return null;
  const transactionId = value.transactionId;
  return isNonEmptyString(transactionId) ? transactionId : null;
}
