/**
 * ReconciliationService — Composition root for the reconciliation engine.
 *
 * Route handlers delegate to this service; they never import the
 * reconciler directly. The service owns the configured Reconciler, logs
 * each run and feeds the business metrics.
 */

import type { Logger } from "pino";
import { DISCREPANCY_TYPES, Reconciler } from "@ledgerpair/reconciler";
import type {
  ReconcilerConfig,
  ReconciliationInput,
  ReconciliationReport,
} from "@ledgerpair/reconciler";
import type { MetricsCollector } from "../middleware/metrics.js";

// =============================================================================
// Configuration
// =============================================================================

export interface ReconciliationServiceDeps {
  readonly logger?: Logger | undefined;
  readonly metrics?: MetricsCollector | undefined;
}

export interface ReconcileOptions {
  /** Per-run tolerance override, as a decimal string */
  readonly tolerance?: string | undefined;
}

export const RUNS_METRIC = "reconciliation_runs_total";
export const PAIRS_METRIC = "reconciliation_pairs_total";

// =============================================================================
// Service
// =============================================================================

export class ReconciliationService {
  readonly reconciler: Reconciler;

  private readonly _config: ReconcilerConfig;
  private readonly _logger: Logger | undefined;
  private readonly _metrics: MetricsCollector | undefined;

  /**
   * @throws {ReconcilerError} INVALID_CONFIG when the default configuration is unusable
   */
  constructor(config: ReconcilerConfig = {}, deps: ReconciliationServiceDeps = {}) {
    this._config = config;
    this._logger = deps.logger;
    this._metrics = deps.metrics;
    this.reconciler = new Reconciler(config);
  }

  /**
   * Reconcile both ledgers.
   *
   * A tolerance override builds a one-off Reconciler with the same
   * currency and decimals.
   *
   * @throws {ReconcilerError} INVALID_CONFIG for an unusable tolerance override
   */
  reconcile(
    input: ReconciliationInput,
    options: ReconcileOptions = {},
  ): ReconciliationReport {
    const reconciler =
      options.tolerance !== undefined
        ? new Reconciler({ ...this._config, tolerance: options.tolerance })
        : this.reconciler;

    const report = reconciler.reconcile(input);

    this._record(report);
    return report;
  }

  private _record(report: ReconciliationReport): void {
    const { summary } = report;

    for (const rejected of report.rejected) {
      this._logger?.warn(
        {
          reportId: report.id,
          side: rejected.side,
          index: rejected.index,
          transactionId: rejected.transactionId,
          reason: rejected.reason,
        },
        rejected.message,
      );
    }

    this._logger?.info(
      {
        reportId: report.id,
        digest: report.digest,
        pairs: report.rows.length,
        counts: summary.counts,
        netAmountDifference: summary.netAmountDifference,
        rejected: report.rejected.length,
        allReconciled: summary.allReconciled,
      },
      "Reconciliation complete",
    );

    if (this._metrics === undefined) return;

    this._metrics.incrementCounter(RUNS_METRIC, {}, 1, "Reconciliation runs completed");
    for (const type of DISCREPANCY_TYPES) {
      const count = summary.counts[type];
      if (count > 0) {
        this._metrics.incrementCounter(
          PAIRS_METRIC,
          { discrepancy_type: type },
          count,
          "Reconciled pairs by discrepancy type",
        );
      }
    }
  }
}
