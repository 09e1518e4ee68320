/**
 * Metrics Recorder - running performance aggregates and durable snapshots
 *
 * Tracks:
 * - Win / loss / breakeven counts over closed trades (each trade id once)
 * - Per-trade return series for the annualized Sharpe ratio
 * - Execution and scan counters, rejections by reason
 * - Per-dependency API call counts, errors and rolling mean latency
 */

import type { Logger } from "../utils/logger.util";
import type { SnapshotStore } from "../infra/persistence/snapshot-store";
import { systemClock, type Clock } from "./clock";
import type {
  ApiCallStats,
  MetricSnapshot,
  PortfolioState,
  RiskRejectReason,
  Trade,
} from "./types";

export interface MetricsRecorderOptions {
  /** Annualization factor for the Sharpe ratio (default: 365) */
  periodsPerYear?: number;
  /** Successful calls kept for the rolling latency mean (default: 100) */
  latencyWindow?: number;
  store?: SnapshotStore;
  clock?: Clock;
  logger: Logger;
}

interface DependencyStats {
  calls: number;
  errors: number;
  latencies: number[];
}

export class MetricsRecorder {
  private readonly periodsPerYear: number;
  private readonly latencyWindow: number;
  private readonly store: SnapshotStore | undefined;
  private readonly clock: Clock;
  private readonly logger: Logger;

  // Trade outcomes
  private recordedTradeIds: Set<string> = new Set();
  private wins = 0;
  private losses = 0;
  private breakeven = 0;
  private returns: number[] = [];

  // Execution / scan counters
  private executed = 0;
  private failed = 0;
  private cycles = 0;
  private marketsScanned = 0;
  private opportunitiesFound = 0;
  private rejected: Map<RiskRejectReason, number> = new Map();

  private apiStats: Map<string, DependencyStats> = new Map();

  constructor(options: MetricsRecorderOptions) {
    this.periodsPerYear = options.periodsPerYear ?? 365;
    this.latencyWindow = options.latencyWindow ?? 100;
    this.store = options.store;
    this.clock = options.clock ?? systemClock;
    this.logger = options.logger;
  }

  /**
   * Record a closed trade. A trade id seen before is ignored.
   *
   * @returns false when the trade was a duplicate delivery
   */
  record(trade: Trade): boolean {
    if (this.recordedTradeIds.has(trade.id)) {
      this.logger.debug(`[Metrics] Ignoring duplicate trade ${trade.id}`);
      return false;
    }
    this.recordedTradeIds.add(trade.id);

    switch (trade.outcome) {
      case "WIN":
        this.wins++;
        break;
      case "LOSS":
        this.losses++;
        break;
      case "BREAKEVEN":
        this.breakeven++;
        break;
    }

    if (trade.size > 0) {
      this.returns.push(trade.realizedPnl / trade.size);
    }
    return true;
  }

  recordApiCall(dependency: string, latencyMs: number, success: boolean): void {
    let stats = this.apiStats.get(dependency);
    if (!stats) {
      stats = { calls: 0, errors: 0, latencies: [] };
      this.apiStats.set(dependency, stats);
    }

    stats.calls++;
    if (!success) {
      stats.errors++;
      return;
    }

    stats.latencies.push(latencyMs);
    if (stats.latencies.length > this.latencyWindow) {
      stats.latencies.splice(0, stats.latencies.length - this.latencyWindow);
    }
  }

  recordExecution(success: boolean): void {
    if (success) {
      this.executed++;
    } else {
      this.failed++;
    }
  }

  recordScan(marketsScanned: number, opportunitiesFound: number): void {
    this.cycles++;
    this.marketsScanned += marketsScanned;
    this.opportunitiesFound += opportunitiesFound;
  }

  recordRejection(reason: RiskRejectReason): void {
    this.rejected.set(reason, (this.rejected.get(reason) ?? 0) + 1);
  }

  winRate(): number {
    const decided = this.wins + this.losses + this.breakeven;
    return decided > 0 ? this.wins / decided : 0;
  }

  /**
   * Mean per-trade return over its population standard deviation,
   * scaled by sqrt(periodsPerYear). Null until it is defined.
   */
  sharpeRatio(): number | null {
    const n = this.returns.length;
    if (n < 2) return null;

    const mean = this.returns.reduce((sum, r) => sum + r, 0) / n;
    const variance =
      this.returns.reduce((sum, r) => sum + (r - mean) ** 2, 0) / n;
    const stdDev = Math.sqrt(variance);
    if (stdDev === 0) return null;

    return (mean / stdDev) * Math.sqrt(this.periodsPerYear);
  }

  apiCallStats(): Record<string, ApiCallStats> {
    const result: Record<string, ApiCallStats> = {};
    for (const [dependency, stats] of this.apiStats) {
      const avgLatencyMs =
        stats.latencies.length > 0
          ? stats.latencies.reduce((sum, l) => sum + l, 0) / stats.latencies.length
          : 0;
      result[dependency] = {
        calls: stats.calls,
        errors: stats.errors,
        avgLatencyMs,
      };
    }
    return result;
  }

  /**
   * Capture current aggregates alongside the ledger's portfolio state
   */
  snapshot(portfolio: PortfolioState, halted: boolean): MetricSnapshot {
    const rejected: Partial<Record<RiskRejectReason, number>> = {};
    for (const [reason, count] of this.rejected) {
      rejected[reason] = count;
    }

    return Object.freeze({
      timestamp: new Date(this.clock.now()).toISOString(),
      balance: portfolio.balance,
      peakBalance: portfolio.peakBalance,
      drawdown: portfolio.drawdown,
      pnl: {
        total: portfolio.realizedPnlTotal,
        daily: portfolio.dailyPnl,
        weekly: portfolio.weeklyPnl,
      },
      winRate: this.winRate(),
      sharpeRatio: this.sharpeRatio(),
      trades: {
        closed: this.wins + this.losses + this.breakeven,
        wins: this.wins,
        losses: this.losses,
        breakeven: this.breakeven,
        executed: this.executed,
        failed: this.failed,
        openPositions: portfolio.openPositions,
      },
      scan: {
        cycles: this.cycles,
        marketsScanned: this.marketsScanned,
        opportunitiesFound: this.opportunitiesFound,
        rejected,
      },
      apiCalls: this.apiCallStats(),
      halted,
    });
  }

  /**
   * Append a snapshot to durable storage. A no-op without a store.
   */
  persist(snapshot: MetricSnapshot): void {
    if (!this.store) return;
    this.store.append(snapshot);
    this.logger.debug(`[Metrics] Snapshot ${snapshot.timestamp} persisted`);
  }
}
