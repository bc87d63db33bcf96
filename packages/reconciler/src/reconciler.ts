/**
 * Reconciler — Top-level coordinator
 *
 * Runs one batch reconciliation of a POS ledger against a processor ledger:
 * intake → match → classify → aggregate → report.
 *
 * Usage:
 *   const reconciler = new Reconciler({ currency: "USD", decimals: 2, tolerance: "0.01" });
 *   const report = reconciler.reconcile({ pos, processor });
 */

import {
  MoneyError,
  assertDecimals,
  formatAmount,
  parseTolerance,
} from "@ledgerpair/money";
import { intakePos, intakeProcessor } from "./intake.js";
import { TransactionMatcher } from "./matcher.js";
import { DiscrepancyClassifier } from "./classifier.js";
import { summarize } from "./aggregator.js";
import { digestReport, toResultRows } from "./report.js";
import { ReconcilerError } from "./types.js";
import type {
  DiscrepancyType,
  MatchedPair,
  ReconciliationReport,
} from "./types.js";

// =============================================================================
// Configuration
// =============================================================================

export interface ReconcilerConfig {
  /** Currency code shown in the report. Default: "USD" */
  readonly currency?: string;
  /** Fractional digits of the currency. Default: 2 */
  readonly decimals?: number;
  /**
   * Largest difference still treated as agreement, as a decimal string.
   * Default: one minor unit ("0.01" at 2 decimals).
   */
  readonly tolerance?: string;
}

export const DEFAULT_CURRENCY = "USD";
export const DEFAULT_DECIMALS = 2;

// =============================================================================
// Input
// =============================================================================

/**
 * Both ledgers as loaded. Records are screened before matching, so
 * anything deserialised from a file or request body may be passed as is.
 */
export interface ReconciliationInput {
  readonly pos: readonly unknown[];
  readonly processor: readonly unknown[];
}

// =============================================================================
// Reconciler
// =============================================================================

let reportCounter = 0;

/** Validate decimals and parse the tolerance, mapping money errors to config errors. */
function resolveTolerance(tolerance: string | undefined, decimals: number): bigint {
  try {
    assertDecimals(decimals);
    return tolerance !== undefined ? parseTolerance(tolerance, decimals) : 1n;
  } catch (err: unknown) {
    if (err instanceof MoneyError) {
      throw new ReconcilerError("INVALID_CONFIG", err.message);
    }
    throw err;
  }
}

export class Reconciler {
  private readonly matcher = new TransactionMatcher();
  private readonly classifier: DiscrepancyClassifier;

  readonly currency: string;
  readonly decimals: number;
  /** Minor units */
  readonly tolerance: bigint;

  /**
   * @throws {ReconcilerError} INVALID_CONFIG for an empty currency,
   *   unusable decimals, or a malformed or negative tolerance
   */
  constructor(config: ReconcilerConfig = {}) {
    const currency = config.currency ?? DEFAULT_CURRENCY;
    if (currency.trim() === "") {
      throw new ReconcilerError("INVALID_CONFIG", "Currency must be a non-empty string");
    }

    const decimals = config.decimals ?? DEFAULT_DECIMALS;
    this.currency = currency;
    this.decimals = decimals;

    this.tolerance = resolveTolerance(config.tolerance, decimals);

    this.classifier = new DiscrepancyClassifier(this.tolerance);
  }

  /**
   * Run a full reconciliation of both ledgers.
   *
   * Empty ledgers are valid input. Malformed records are excluded from
   * matching and listed in `report.rejected`.
   *
   * @throws {ReconcilerError} INVARIANT_VIOLATION if matching produced an empty pair
   */
  reconcile(input: ReconciliationInput): ReconciliationReport {
    const pos = intakePos(input.pos, this.decimals);
    const processor = intakeProcessor(input.processor, this.decimals);
    const rejected = [...pos.rejected, ...processor.rejected];

    const pairs = this.matcher.match(pos.accepted, processor.accepted);
    const classified = this.classifier.classifyAll(pairs);

    const summary = summarize(classified, { decimals: this.decimals, rejected });
    const rows = toResultRows(classified, this.decimals);

    reportCounter += 1;

    return {
      id: `recon:${Date.now()}:${reportCounter}`,
      generatedAt: new Date().toISOString(),
      currency: this.currency,
      decimals: this.decimals,
      tolerance: formatAmount(this.tolerance, this.decimals),
      rows,
      summary,
      rejected,
      digest: digestReport({ rows, summary, rejected }),
    };
  }

  /**
   * Classify a single pair with this reconciler's tolerance.
   */
  classify(pair: MatchedPair): DiscrepancyType {
    return this.classifier.classify(pair);
  }
}
