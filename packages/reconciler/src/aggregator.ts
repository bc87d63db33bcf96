/**
 * Aggregator
 *
 * Folds classified pairs into ledger-wide statistics.
 *
 * The tally is a commutative monoid: `emptyTally()` is the identity and
 * `mergeTallies` is associative and commutative, so pairs may be tallied
 * in shards and merged in any order with the same result.
 *
 * Ledger totals are taken from the `countsPos` / `countsProcessor` flags,
 * so a record that fans out into several pairs is summed once.
 */

import { formatAmount } from "@ledgerpair/money";
import { DISCREPANCY_TYPES } from "./types.js";
import type {
  ClassifiedPair,
  DiscrepancyType,
  RejectedRecord,
  ReconciliationSummary,
} from "./types.js";

// =============================================================================
// Tally
// =============================================================================

export interface SummaryTally {
  readonly posCount: number;
  readonly processorCount: number;
  readonly matchedCount: number;
  readonly fanOutPairCount: number;
  readonly counts: Readonly<Record<DiscrepancyType, number>>;
  /** Minor units */
  readonly posTotal: bigint;
  /** Minor units */
  readonly processorTotal: bigint;
}

function zeroCounts(): Record<DiscrepancyType, number> {
  return {
    NONE: 0,
    MISSING_IN_PROCESSOR: 0,
    MISSING_IN_POS: 0,
    DECIMAL_SHIFT: 0,
    AMOUNT_DISCREPANCY: 0,
  };
}

export function emptyTally(): SummaryTally {
  return {
    posCount: 0,
    processorCount: 0,
    matchedCount: 0,
    fanOutPairCount: 0,
    counts: zeroCounts(),
    posTotal: 0n,
    processorTotal: 0n,
  };
}

/**
 * Add one classified pair to a tally.
 */
export function tallyPair(tally: SummaryTally, pair: ClassifiedPair): SummaryTally {
  const counts = { ...tally.counts };
  counts[pair.discrepancyType] += 1;

  const posAmount = pair.countsPos ? pair.pos?.amount : undefined;
  const processorAmount = pair.countsProcessor ? pair.processor?.amount : undefined;

  return {
    posCount: tally.posCount + (posAmount !== undefined ? 1 : 0),
    processorCount: tally.processorCount + (processorAmount !== undefined ? 1 : 0),
    matchedCount:
      tally.matchedCount + (pair.pos !== undefined && pair.processor !== undefined ? 1 : 0),
    fanOutPairCount: tally.fanOutPairCount + (pair.fanOut ? 1 : 0),
    counts,
    posTotal: tally.posTotal + (posAmount ?? 0n),
    processorTotal: tally.processorTotal + (processorAmount ?? 0n),
  };
}

/**
 * Combine two tallies. Order of arguments does not matter.
 */
export function mergeTallies(a: SummaryTally, b: SummaryTally): SummaryTally {
  const counts = zeroCounts();
  for (const type of DISCREPANCY_TYPES) {
    counts[type] = a.counts[type] + b.counts[type];
  }

  return {
    posCount: a.posCount + b.posCount,
    processorCount: a.processorCount + b.processorCount,
    matchedCount: a.matchedCount + b.matchedCount,
    fanOutPairCount: a.fanOutPairCount + b.fanOutPairCount,
    counts,
    posTotal: a.posTotal + b.posTotal,
    processorTotal: a.processorTotal + b.processorTotal,
  };
}

// =============================================================================
// Summary
// =============================================================================

export interface FinalizeOptions {
  readonly decimals: number;
  readonly rejected?: readonly RejectedRecord[];
}

/**
 * Turn a tally into the presentable summary.
 * netAmountDifference is computed on full ledger totals.
 */
export function finalizeSummary(
  tally: SummaryTally,
  options: FinalizeOptions,
): ReconciliationSummary {
  const rejected = options.rejected ?? [];
  const unparseablePosCount = rejected.filter((r) => r.side === "pos").length;
  const unparseableProcessorCount = rejected.length - unparseablePosCount;

  const pairCount = DISCREPANCY_TYPES.reduce((sum, type) => sum + tally.counts[type], 0);

  return {
    totalPosCount: tally.posCount,
    totalProcessorCount: tally.processorCount,
    matchedCount: tally.matchedCount,
    counts: { ...tally.counts },
    posAmountTotal: formatAmount(tally.posTotal, options.decimals),
    processorAmountTotal: formatAmount(tally.processorTotal, options.decimals),
    netAmountDifference: formatAmount(tally.posTotal - tally.processorTotal, options.decimals),
    fanOutPairCount: tally.fanOutPairCount,
    unparseablePosCount,
    unparseableProcessorCount,
    allReconciled:
      tally.counts.NONE === pairCount &&
      tally.fanOutPairCount === 0 &&
      rejected.length === 0,
  };
}

/**
 * Single-pass summary over a complete classified set.
 */
export function summarize(
  pairs: readonly ClassifiedPair[],
  options: FinalizeOptions,
): ReconciliationSummary {
  return finalizeSummary(pairs.reduce(tallyPair, emptyTally()), options);
}
