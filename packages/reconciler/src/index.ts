/**
 * @ledgerpair/reconciler — POS ↔ processor reconciliation engine.
 *
 * Joins a point-of-sale ledger to a payment processor ledger on
 * referenceId, classifies every pair, and summarises the result:
 *
 * 1. Intake — screen and price raw records
 * 2. Match — outer join with fan-out on duplicate keys
 * 3. Classify — one DiscrepancyType per pair, fixed precedence
 * 4. Aggregate — counts and ledger totals in one mergeable pass
 */

// Reconciler (top-level coordinator)
export { Reconciler, DEFAULT_CURRENCY, DEFAULT_DECIMALS } from "./reconciler.js";
export type { ReconcilerConfig, ReconciliationInput } from "./reconciler.js";

// Stages
export { intakePos, intakeProcessor } from "./intake.js";
export { TransactionMatcher } from "./matcher.js";
export { DiscrepancyClassifier, isDecimalShift } from "./classifier.js";
export {
  emptyTally,
  tallyPair,
  mergeTallies,
  finalizeSummary,
  summarize,
} from "./aggregator.js";
export type { SummaryTally, FinalizeOptions } from "./aggregator.js";

// Report rendering
export {
  toResultRows,
  renderResultsCsv,
  summaryEntries,
  renderSummaryText,
  digestReport,
  RESULT_COLUMNS,
  SUMMARY_TITLE,
} from "./report.js";
export type { DigestInput } from "./report.js";

// Types
export { DISCREPANCY_TYPES, ReconcilerError } from "./types.js";
export type {
  // Classification
  DiscrepancyType,
  LedgerSide,

  // Pairs
  PricedRecord,
  PricedPos,
  PricedProcessor,
  MatchedPair,
  ClassifiedPair,

  // Intake
  RejectionReason,
  RejectedRecord,
  IntakeResult,

  // Report
  ResultRow,
  ReconciliationSummary,
  ReconciliationReport,

  // Errors
  ReconcilerErrorCode,
} from "./types.js";
