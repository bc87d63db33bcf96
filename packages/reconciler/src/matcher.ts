/**
 * POS ↔ Processor Matcher
 *
 * Outer-joins the two ledgers on POS.transactionId == Processor.referenceId.
 *
 * Produces:
 * - One pair per (POS, processor) combination sharing a key
 * - A POS-only pair for every POS record nothing references
 * - A processor-only pair for every processor record whose key matches no POS record
 *
 * Keys are compared with exact string equality: "tx-1" and "TX-1" do not match.
 */

import type { MatchedPair, PricedPos, PricedProcessor } from "./types.js";

export class TransactionMatcher {
  /**
   * Match POS records against processor records.
   *
   * Strategy:
   * 1. Index processor records by referenceId (ledger order kept per key)
   * 2. Count POS records per transactionId, to spot processor-side fan-out
   * 3. Look up each POS record, in POS ledger order
   * 4. Append processor leftovers, in processor ledger order
   *
   * Ambiguous keys fan out rather than fail: every combination is
   * returned and flagged, so duplicate rows stay visible downstream.
   */
  match(
    posRecords: readonly PricedPos[],
    processorRecords: readonly PricedProcessor[],
  ): readonly MatchedPair[] {
    const results: MatchedPair[] = [];

    // Index processor records by referenceId
    const byReference = new Map<string, PricedProcessor[]>();
    for (const proc of processorRecords) {
      const list = byReference.get(proc.record.referenceId) ?? [];
      list.push(proc);
      byReference.set(proc.record.referenceId, list);
    }

    // POS records per key
    const posPerKey = new Map<string, number>();
    for (const pos of posRecords) {
      const key = pos.record.transactionId;
      posPerKey.set(key, (posPerKey.get(key) ?? 0) + 1);
    }

    // Processor records that have already contributed to totals
    const countedProcessor = new Set<PricedProcessor>();

    for (const pos of posRecords) {
      const key = pos.record.transactionId;
      const processors = byReference.get(key);

      if (processors === undefined) {
        results.push({
          pos,
          fanOut: false,
          countsPos: true,
          countsProcessor: false,
        });
        continue;
      }

      const fanOut = processors.length > 1 || (posPerKey.get(key) ?? 0) > 1;

      processors.forEach((processor, position) => {
        const countsProcessor = !countedProcessor.has(processor);
        countedProcessor.add(processor);

        results.push({
          pos,
          processor,
          amountDifference: pos.amount - processor.amount,
          fanOut,
          countsPos: position === 0,
          countsProcessor,
        });
      });
    }

    // Processor records referencing no POS record
    for (const processor of processorRecords) {
      if (posPerKey.has(processor.record.referenceId)) continue;

      results.push({
        processor,
        fanOut: false,
        countsPos: false,
        countsProcessor: true,
      });
    }

    return results;
  }
}
