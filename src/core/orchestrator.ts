/**
 * Orchestrator - drives the trading cycle
 *
 * One cycle, strictly sequential:
 * 1. Scan: pull opportunities through the scanner's circuit breaker
 * 2. Exits: only after a successful scan, so quotes are fresh. Mark to
 *    market, then sell what the exit policy flags through the executor
 * 3. Entries: for the best opportunities, RiskGate -> breaker-wrapped
 *    executor (bounded timeout) -> PositionLedger
 * 4. Persist one metric snapshot
 *
 * A rejection, an open circuit or a failed order skips that opportunity
 * or exit only. The ledger changes after the venue confirms a fill, never
 * before. Consecutive venue orders are spaced by `tradeDelayMs`.
 */

import type { Logger } from "../utils/logger.util";
import {
  CircuitOpenError,
  ExecutionFailedError,
  InvalidValueError,
  LimitExceededError,
  formatError,
} from "../errors/app.errors";
import { interruptibleSleep } from "../utils/timeout.util";
import type { Executor } from "../execution/executor";
import type { OpportunitySet, OpportunitySource } from "../scanner/types";
import type { CircuitBreakerRegistry } from "./circuit-breaker";
import { systemClock, type Clock } from "./clock";
import type { ExitPolicy, ExitSignal, PriceQuote } from "./exit-policy";
import type { MetricsRecorder } from "./metrics-recorder";
import type { PositionLedger } from "./position-ledger";
import type { RiskGate } from "./risk-gate";
import type {
  CircuitBreakerState,
  ExecutionResult,
  Opportunity,
  PortfolioState,
  Trade,
} from "./types";

export interface OrchestratorConfig {
  /** Opportunities attempted per cycle, best expected value first */
  maxTradesPerCycle: number;
  /** Time budget for one executor call */
  executorTimeoutMs: number;
  /** Sleep between cycles */
  cycleIntervalMs: number;
  /** Pause between consecutive venue orders within a cycle (default: 0) */
  tradeDelayMs?: number;
}

export interface OrchestratorDeps {
  source: OpportunitySource;
  riskGate: RiskGate;
  ledger: PositionLedger;
  metrics: MetricsRecorder;
  executor: Executor;
  breakers: CircuitBreakerRegistry;
  exitPolicy?: ExitPolicy;
  /** Current token prices for mark-to-market */
  priceQuote?: PriceQuote;
  clock?: Clock;
  logger: Logger;
  config: OrchestratorConfig;
}

export interface CycleReport {
  cycle: number;
  scanned: number;
  approved: number;
  rejected: number;
  executed: number;
  failed: number;
  closed: number;
  exitsFailed: number;
}

export class Orchestrator {
  private readonly source: OpportunitySource;
  private readonly riskGate: RiskGate;
  private readonly ledger: PositionLedger;
  private readonly metrics: MetricsRecorder;
  private readonly executor: Executor;
  private readonly breakers: CircuitBreakerRegistry;
  private readonly exitPolicy: ExitPolicy | undefined;
  private readonly priceQuote: PriceQuote | undefined;
  private readonly clock: Clock;
  private readonly logger: Logger;
  private readonly config: OrchestratorConfig;

  private cycleCount = 0;
  private cycleInFlight = false;
  private ordersThisCycle = 0;
  private running = false;
  private abortController: AbortController | undefined;

  constructor(deps: OrchestratorDeps) {
    this.source = deps.source;
    this.riskGate = deps.riskGate;
    this.ledger = deps.ledger;
    this.metrics = deps.metrics;
    this.executor = deps.executor;
    this.breakers = deps.breakers;
    this.exitPolicy = deps.exitPolicy;
    this.priceQuote = deps.priceQuote;
    this.clock = deps.clock ?? systemClock;
    this.logger = deps.logger;
    this.config = deps.config;
  }

  /**
   * Run one full cycle. Returns null when a cycle is already in flight.
   */
  async runCycle(): Promise<CycleReport | null> {
    if (this.cycleInFlight) {
      this.logger.warn("[Orchestrator] Cycle already in progress, skipping");
      return null;
    }
    this.cycleInFlight = true;
    this.ordersThisCycle = 0;

    const report: CycleReport = {
      cycle: ++this.cycleCount,
      scanned: 0,
      approved: 0,
      rejected: 0,
      executed: 0,
      failed: 0,
      closed: 0,
      exitsFailed: 0,
    };

    try {
      // === 1. SCAN ===
      const set = await this.scan();
      if (set) {
        report.scanned = set.marketsScanned;
        this.metrics.recordScan(set.marketsScanned, set.opportunities.length);

        // === 2. EXITS ===
        this.markToMarket();
        for (const signal of this.exitSignals()) {
          if (await this.exit(signal)) {
            report.closed++;
          } else {
            report.exitsFailed++;
          }
        }

        // === 3. ENTRIES ===
        const candidates = set.opportunities.slice(0, this.config.maxTradesPerCycle);
        for (const opportunity of candidates) {
          const decision = this.riskGate.evaluate(opportunity);
          if (!decision.approved) {
            report.rejected++;
            this.metrics.recordRejection(decision.reason);
            continue;
          }

          report.approved++;
          if (await this.enter(opportunity, decision.size)) {
            report.executed++;
          } else {
            report.failed++;
          }
        }
      }

      // === 4. SNAPSHOT ===
      const snapshot = this.metrics.snapshot(
        this.ledger.portfolioSummary(),
        this.riskGate.isHalted(),
      );
      this.metrics.persist(snapshot);

      this.logger.info(
        `[Orchestrator] Cycle #${report.cycle}: scanned=${report.scanned} approved=${report.approved} ` +
          `rejected=${report.rejected} executed=${report.executed} failed=${report.failed} ` +
          `closed=${report.closed} exitsFailed=${report.exitsFailed}`,
      );
      return report;
    } finally {
      this.cycleInFlight = false;
    }
  }

  /**
   * Book a close at `exitPrice` and record the trade. No order is sent;
   * use it for fills that happened elsewhere.
   */
  closePosition(positionId: string, exitPrice: number): Trade {
    const trade = this.ledger.close(positionId, exitPrice);
    this.metrics.record(trade);
    return trade;
  }

  /**
   * Loop cycles until stop() or the signal aborts. The sleep between
   * cycles ends as soon as either happens.
   */
  async run(signal?: AbortSignal): Promise<void> {
    if (this.running) {
      this.logger.warn("[Orchestrator] Already running");
      return;
    }

    const controller = new AbortController();
    const onAbort = (): void => controller.abort();
    if (signal?.aborted) {
      controller.abort();
    }
    signal?.addEventListener("abort", onAbort, { once: true });

    this.abortController = controller;
    this.running = true;
    this.logger.info(
      `[Orchestrator] 🚀 Starting: executor=${this.executor.name}, every ${this.config.cycleIntervalMs / 1000}s`,
    );

    try {
      while (!controller.signal.aborted) {
        try {
          await this.runCycle();
        } catch (err) {
          this.logger.error(
            `[Orchestrator] Cycle failed: ${formatError(err)}`,
            err instanceof Error ? err : undefined,
          );
        }

        if (controller.signal.aborted) break;
        await interruptibleSleep(this.config.cycleIntervalMs, controller.signal);
      }
    } finally {
      signal?.removeEventListener("abort", onAbort);
      this.running = false;
      this.abortController = undefined;
      this.logger.info("[Orchestrator] 🛑 Stopped");
    }
  }

  stop(): void {
    this.abortController?.abort();
  }

  isRunning(): boolean {
    return this.running;
  }

  circuitState(dependency: string): CircuitBreakerState {
    return this.breakers.circuitState(dependency);
  }

  portfolioSummary(): PortfolioState {
    return this.ledger.portfolioSummary();
  }

  private markToMarket(): void {
    if (!this.priceQuote) return;

    const prices = new Map<string, number>();
    for (const position of this.ledger.openPositions()) {
      const price = this.priceQuote(position.tokenId);
      if (price !== undefined) prices.set(position.tokenId, price);
    }
    this.ledger.markToMarket(prices);
  }

  private exitSignals(): ExitSignal[] {
    return this.exitPolicy ? this.exitPolicy.exitsFor(this.ledger.openPositions()) : [];
  }

  /**
   * Sell a flagged position through the executor and book the fill
   *
   * @returns true when the position was closed
   */
  private async exit(signal: ExitSignal): Promise<boolean> {
    const position = this.ledger.getPosition(signal.positionId);
    if (!position || position.status !== "OPEN") return false;

    const result = await this.placeOrder(`exit ${position.id}`, position.marketId, () =>
      this.executor.sell({
        positionId: position.id,
        marketId: position.marketId,
        tokenId: position.tokenId,
        side: position.side,
        shares: position.size / position.entryPrice,
        price: signal.exitPrice,
      }),
    );
    if (!result) return false;

    let trade: Trade;
    try {
      trade = this.closePosition(position.id, result.fillPrice);
    } catch (err) {
      if (!(err instanceof InvalidValueError)) throw err;
      this.logger.error(
        `[Orchestrator] Sell ${result.orderId ?? "?"} for ${position.id} could not be booked: ${err.message}`,
        err,
      );
      return false;
    }

    this.logger.info(
      `[Orchestrator] ${signal.reason === "TAKE_PROFIT" ? "💰" : "🛑"} ${signal.reason} ${trade.positionId}: ` +
        `$${trade.realizedPnl.toFixed(2)}`,
    );
    return true;
  }

  private async scan(): Promise<OpportunitySet | null> {
    const name = this.source.name;
    const started = this.clock.now();
    try {
      const set = await this.breakers.get(name).execute(() => this.source.scan());
      this.metrics.recordApiCall(name, this.clock.now() - started, true);
      return set;
    } catch (err) {
      if (err instanceof CircuitOpenError) {
        this.logger.warn(`[Orchestrator] ⚡ Scanner unavailable: ${err.message}`);
      } else {
        this.metrics.recordApiCall(name, this.clock.now() - started, false);
        this.logger.warn(`[Orchestrator] Scan failed: ${formatError(err)}`);
      }
      return null;
    }
  }

  /**
   * Execute an approved entry and commit it to the ledger
   *
   * @returns true when the position was opened
   */
  private async enter(opportunity: Opportunity, size: number): Promise<boolean> {
    const result = await this.placeOrder(
      `${opportunity.side} $${size.toFixed(2)}`,
      opportunity.marketId,
      () =>
        this.executor.execute({
          marketId: opportunity.marketId,
          tokenId: opportunity.tokenId,
          side: opportunity.side,
          sizeUsd: size,
          price: opportunity.currentPrice,
          liquidity: opportunity.liquidity,
        }),
    );
    if (!result) {
      this.metrics.recordExecution(false);
      return false;
    }

    try {
      this.ledger.open(
        opportunity.marketId,
        opportunity.side,
        size,
        result.fillPrice,
        opportunity.tokenId,
      );
    } catch (err) {
      if (!(err instanceof LimitExceededError)) throw err;
      this.metrics.recordExecution(false);
      this.logger.error(
        `[Orchestrator] Filled order ${result.orderId ?? "?"} could not be booked: ${err.message}`,
        err,
      );
      return false;
    }

    this.metrics.recordExecution(true);
    return true;
  }

  /**
   * Send one order through the executor's breaker with the executor time
   * budget. A `success: false` result counts as a breaker failure.
   *
   * @returns the filled result, or null when nothing was filled
   */
  private async placeOrder(
    label: string,
    marketId: string,
    submit: () => Promise<ExecutionResult>,
  ): Promise<ExecutionResult | null> {
    await this.pace();

    const name = this.executor.name;
    const started = this.clock.now();
    try {
      const result = await this.breakers.get(name).execute(
        async () => {
          const outcome = await submit();
          if (!outcome.success) {
            throw new ExecutionFailedError(outcome.error ?? "Executor reported failure", marketId);
          }
          return outcome;
        },
        { timeoutMs: this.config.executorTimeoutMs },
      );
      this.metrics.recordApiCall(name, this.clock.now() - started, true);
      return result;
    } catch (err) {
      if (!(err instanceof CircuitOpenError)) {
        this.metrics.recordApiCall(name, this.clock.now() - started, false);
      }
      this.logger.warn(`[Orchestrator] ❌ ${marketId} ${label} not executed: ${formatError(err)}`);
      return null;
    }
  }

  private async pace(): Promise<void> {
    const delayMs = this.config.tradeDelayMs ?? 0;
    if (this.ordersThisCycle++ > 0 && delayMs > 0) {
      await interruptibleSleep(delayMs, this.abortController?.signal);
    }
  }
}
