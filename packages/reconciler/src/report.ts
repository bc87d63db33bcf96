/**
 * Report
 *
 * Shapes classified pairs into the exported result table, renders the
 * table as CSV and the summary as labelled key → value pairs or a plain
 * text document, and fingerprints the result for run-to-run diffing.
 */

import { createHash } from "node:crypto";
import { canonicalize } from "json-canonicalize";
import { formatAmount, formatCurrency, parseAmount } from "@ledgerpair/money";
import type {
  ClassifiedPair,
  RejectedRecord,
  ReconciliationSummary,
  ResultRow,
} from "./types.js";

// =============================================================================
// Result Rows
// =============================================================================

/**
 * One row per pair, amounts as fixed-decimal strings.
 */
export function toResultRows(
  pairs: readonly ClassifiedPair[],
  decimals: number,
): readonly ResultRow[] {
  return pairs.map((pair) => ({
    posTransactionId: pair.pos?.record.transactionId ?? null,
    processorTransactionId: pair.processor?.record.transactionId ?? null,
    referenceId: pair.processor?.record.referenceId ?? null,
    posAmount: pair.pos !== undefined ? formatAmount(pair.pos.amount, decimals) : null,
    processorAmount:
      pair.processor !== undefined ? formatAmount(pair.processor.amount, decimals) : null,
    amountDifference:
      pair.amountDifference !== undefined ? formatAmount(pair.amountDifference, decimals) : null,
    discrepancyType: pair.discrepancyType,
    fanOut: pair.fanOut,
  }));
}

// =============================================================================
// CSV
// =============================================================================

export const RESULT_COLUMNS = [
  "posTransactionId",
  "processorTransactionId",
  "referenceId",
  "posAmount",
  "processorAmount",
  "amountDifference",
  "discrepancyType",
  "fanOut",
] as const satisfies readonly (keyof ResultRow)[];

function csvCell(value: string | boolean | null): string {
  if (value === null) return "";
  const text = String(value);
  return /[",\r\n]/.test(text) ? `"${text.replace(/"/g, '""')}"` : text;
}

/**
 * Render rows as CSV: header line, one line per row, trailing newline.
 * Null renders as an empty cell.
 */
export function renderResultsCsv(rows: readonly ResultRow[]): string {
  const lines = [RESULT_COLUMNS.join(",")];
  for (const row of rows) {
    lines.push(RESULT_COLUMNS.map((column) => csvCell(row[column])).join(","));
  }
  return lines.join("\n") + "\n";
}

// =============================================================================
// Summary
// =============================================================================

export const SUMMARY_TITLE = "Transaction Reconciliation Summary";

/**
 * Labelled summary values in display order. Currency values carry the
 * symbol and the currency's fixed decimals.
 */
export function summaryEntries(
  summary: ReconciliationSummary,
  decimals: number,
  symbol = "$",
): readonly (readonly [string, string])[] {
  const money = (amount: string): string =>
    formatCurrency(parseAmount(amount, decimals), decimals, symbol);

  return [
    ["Total POS Transactions", String(summary.totalPosCount)],
    ["Total Processor Transactions", String(summary.totalProcessorCount)],
    ["Matched Pairs", String(summary.matchedCount)],
    ["POS Amount Total", money(summary.posAmountTotal)],
    ["Processor Amount Total", money(summary.processorAmountTotal)],
    ["Net Amount Difference", money(summary.netAmountDifference)],
    ["Missing in Processor", String(summary.counts.MISSING_IN_PROCESSOR)],
    ["Missing in POS", String(summary.counts.MISSING_IN_POS)],
    ["Decimal Shift Errors", String(summary.counts.DECIMAL_SHIFT)],
    ["Other Amount Discrepancies", String(summary.counts.AMOUNT_DISCREPANCY)],
    ["Perfectly Matched", String(summary.counts.NONE)],
    ["Fan-out Pairs", String(summary.fanOutPairCount)],
    ["Unparseable POS Records", String(summary.unparseablePosCount)],
    ["Unparseable Processor Records", String(summary.unparseableProcessorCount)],
  ];
}

/**
 * Plain-text summary document.
 */
export function renderSummaryText(
  summary: ReconciliationSummary,
  decimals: number,
  symbol = "$",
): string {
  const lines = [SUMMARY_TITLE, "=".repeat(SUMMARY_TITLE.length), ""];
  for (const [label, value] of summaryEntries(summary, decimals, symbol)) {
    lines.push(`${label}: ${value}`);
  }
  return lines.join("\n") + "\n";
}

// =============================================================================
// Digest
// =============================================================================

export interface DigestInput {
  readonly rows: readonly ResultRow[];
  readonly summary: ReconciliationSummary;
  readonly rejected: readonly RejectedRecord[];
}

/**
 * SHA-256 over the RFC 8785 canonical JSON of the run's outcome.
 * Excludes the report id and timestamp, so identical input yields an
 * identical digest.
 */
export function digestReport(input: DigestInput): string {
  const content = canonicalize({
    rows: input.rows,
    summary: input.summary,
    rejected: input.rejected,
  });
  return createHash("sha256").update(content).digest("hex");
}
