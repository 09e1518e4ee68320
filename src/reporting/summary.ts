/**
 * Read-only reporting over the ledger and metrics
 */

import type { Logger } from "../utils/logger.util";
import type { CircuitBreakerRegistry } from "../core/circuit-breaker";
import type { MetricsRecorder } from "../core/metrics-recorder";
import type { PositionLedger } from "../core/position-ledger";
import type { RiskGate } from "../core/risk-gate";
import type { MetricSnapshot } from "../core/types";

const pct = (fraction: number): string => `${(fraction * 100).toFixed(1)}%`;

export function formatSummary(snapshot: MetricSnapshot): string {
  const { trades, scan, pnl } = snapshot;
  const lines = [
    `=== Performance Summary (${snapshot.timestamp}) ===`,
    `Balance: $${snapshot.balance.toFixed(2)} (peak $${snapshot.peakBalance.toFixed(2)}, drawdown ${pct(snapshot.drawdown)})`,
    `P&L: total $${pnl.total.toFixed(2)} | daily $${pnl.daily.toFixed(2)} | weekly $${pnl.weekly.toFixed(2)}`,
    `Win Rate: ${pct(snapshot.winRate)} (${trades.wins}W / ${trades.losses}L / ${trades.breakeven}BE)`,
    `Sharpe: ${snapshot.sharpeRatio === null ? "n/a" : snapshot.sharpeRatio.toFixed(2)}`,
    `Trades: executed ${trades.executed}, failed ${trades.failed}, open ${trades.openPositions}`,
    `Scan: ${scan.cycles} cycles, ${scan.marketsScanned} markets, ${scan.opportunitiesFound} opportunities`,
  ];

  const rejected = Object.entries(scan.rejected);
  if (rejected.length > 0) {
    lines.push(`Rejected: ${rejected.map(([reason, n]) => `${reason}=${n}`).join(", ")}`);
  }

  const apiCalls = Object.entries(snapshot.apiCalls);
  if (apiCalls.length > 0) {
    lines.push(`--- API Calls ---`);
    for (const [dependency, stats] of apiCalls) {
      lines.push(
        `  ${dependency}: ${stats.calls} calls, ${stats.errors} errors, avg ${Math.round(stats.avgLatencyMs)}ms`,
      );
    }
  }

  lines.push(`Status: ${snapshot.halted ? "🛑 HALTED" : "✅ ACTIVE"}`);
  return lines.join("\n");
}

export interface PerformanceSummary {
  latest: MetricSnapshot;
  snapshots: number;
  maxTotalPnl: number;
  minTotalPnl: number;
  /** Null before any API call */
  apiSuccessRate: number | null;
  /** Null before any execution attempt */
  executionSuccessRate: number | null;
}

/**
 * Aggregate a snapshot history. Counters are cumulative, so rates come
 * from the latest snapshot.
 */
export function performanceSummary(
  history: readonly MetricSnapshot[],
): PerformanceSummary | null {
  const latest = history[history.length - 1];
  if (!latest) return null;

  const totals = history.map((s) => s.pnl.total);

  let calls = 0;
  let errors = 0;
  for (const stats of Object.values(latest.apiCalls)) {
    calls += stats.calls;
    errors += stats.errors;
  }

  const attempts = latest.trades.executed + latest.trades.failed;

  return {
    latest,
    snapshots: history.length,
    maxTotalPnl: Math.max(...totals),
    minTotalPnl: Math.min(...totals),
    apiSuccessRate: calls > 0 ? (calls - errors) / calls : null,
    executionSuccessRate: attempts > 0 ? latest.trades.executed / attempts : null,
  };
}

export interface SummaryReporterDeps {
  ledger: PositionLedger;
  metrics: MetricsRecorder;
  riskGate: RiskGate;
  breakers?: CircuitBreakerRegistry;
  logger: Logger;
}

/**
 * Periodic summary log. Only reads: snapshot() and portfolioSummary()
 * return copies and change nothing.
 */
export class SummaryReporter {
  private timer?: NodeJS.Timeout;

  constructor(private readonly deps: SummaryReporterDeps) {}

  start(intervalMs: number): void {
    if (this.timer || intervalMs <= 0) return;
    this.timer = setInterval(() => this.logSummary(), intervalMs);
  }

  stop(): void {
    if (this.timer) {
      clearInterval(this.timer);
      this.timer = undefined;
    }
  }

  logSummary(): void {
    const { ledger, metrics, riskGate, breakers, logger } = this.deps;
    const snapshot = metrics.snapshot(ledger.portfolioSummary(), riskGate.isHalted());
    logger.info(`[Summary]\n${formatSummary(snapshot)}`);

    for (const state of breakers?.states() ?? []) {
      if (state.status !== "CLOSED") {
        logger.warn(
          `[Summary] ⚡ ${state.dependency} circuit ${state.status} (${state.consecutiveFailures} consecutive failures)`,
        );
      }
    }
  }
}
