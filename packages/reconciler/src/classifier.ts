/**
 * Discrepancy Classifier
 *
 * Assigns exactly one DiscrepancyType to a matched pair.
 * Rules are tried in order and the first that fires wins:
 *
 * 1. MISSING_IN_PROCESSOR — only the POS side is present
 * 2. MISSING_IN_POS       — only the processor side is present
 * 3. DECIMAL_SHIFT        — amounts differ, and one is ten times the other
 * 4. AMOUNT_DISCREPANCY   — amounts differ
 * 5. NONE                 — amounts agree within tolerance
 *
 * All comparisons are on bigint minor units.
 */

import { absMinor, withinTolerance } from "@ledgerpair/money";
import { ReconcilerError } from "./types.js";
import type { ClassifiedPair, DiscrepancyType, MatchedPair } from "./types.js";

/**
 * True when one amount looks like the other with its decimal point moved
 * one place: |pos×10 − proc| ≤ tol, or |pos÷10 − proc| ≤ tol.
 *
 * The ÷10 side is scaled up by ten so it stays in integers:
 * |pos÷10 − proc| ≤ tol  ⇔  |pos − proc×10| ≤ tol×10.
 */
export function isDecimalShift(
  posAmount: bigint,
  processorAmount: bigint,
  tolerance: bigint,
): boolean {
  return (
    absMinor(posAmount * 10n - processorAmount) <= tolerance ||
    absMinor(posAmount - processorAmount * 10n) <= tolerance * 10n
  );
}

export class DiscrepancyClassifier {
  private readonly tolerance: bigint;

  /**
   * @param tolerance - Largest difference, in minor units, still treated as agreement
   */
  constructor(tolerance: bigint) {
    if (tolerance < 0n) {
      throw new ReconcilerError("INVALID_CONFIG", `Tolerance must not be negative, got: ${tolerance.toString()}`);
    }
    this.tolerance = tolerance;
  }

  /**
   * Classify one pair.
   *
   * @throws {ReconcilerError} INVARIANT_VIOLATION when neither side is present
   */
  classify(pair: MatchedPair): DiscrepancyType {
    const { pos, processor } = pair;

    if (pos === undefined && processor === undefined) {
      throw new ReconcilerError(
        "INVARIANT_VIOLATION",
        "Matched pair has neither a POS nor a processor record",
      );
    }

    if (processor === undefined) return "MISSING_IN_PROCESSOR";
    if (pos === undefined) return "MISSING_IN_POS";

    const exceedsTolerance = !withinTolerance(pos.amount, processor.amount, this.tolerance);

    if (exceedsTolerance && isDecimalShift(pos.amount, processor.amount, this.tolerance)) {
      return "DECIMAL_SHIFT";
    }
    if (exceedsTolerance) return "AMOUNT_DISCREPANCY";
    return "NONE";
  }

  /**
   * Classify every pair, keeping order.
   */
  classifyAll(pairs: readonly MatchedPair[]): readonly ClassifiedPair[] {
    return pairs.map((pair) => ({ ...pair, discrepancyType: this.classify(pair) }));
  }
}
