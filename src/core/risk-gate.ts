/**
 * Risk Gate - Pre-trade approval and sizing
 *
 * Every opportunity passes through evaluate() before it reaches an executor.
 * Checks run in a fixed order and stop at the first failure:
 *
 *   1. HALTED            global halt flag or kill-switch file
 *   2. DAILY_LOSS        daily P&L at or below -dailyLossLimit (sticky for the day)
 *   3. WEEKLY_LOSS       weekly P&L at or below -weeklyLossLimit (sticky for the week)
 *   4. DRAWDOWN          drawdown at or above maxDrawdownPct (sticky until cleared)
 *   5. MAX_POSITIONS     open positions at maxPositionsTotal
 *   6. PER_MARKET_LIMIT  open positions in the market at maxPositionsPerMarket
 *   7. INVALID_INPUT     non-finite edge or confidence, price outside (0, 1)
 *   8. CONCENTRATION     post-trade market exposure above maxConcentrationPct
 *
 * Sizing runs between 7 and 8: fractional Kelly, clipped to [minSize, maxSize],
 * then shrunk to the concentration room. A shrunk size under minSize is
 * rejected as BELOW_MIN_SIZE; it is never rounded up.
 */

import * as fs from "fs";
import type { Logger } from "../utils/logger.util";
import { systemClock, type Clock } from "./clock";
import { dayKey, weekKey } from "./periods";
import type { PositionLedger } from "./position-ledger";
import { clip, computeKellySize, roundDownToCents } from "./sizing";
import type {
  Opportunity,
  RiskDecision,
  RiskLimits,
  RiskRejectReason,
} from "./types";

export type HaltKind = "daily" | "weekly";

export interface RiskGateState {
  halted: boolean;
  haltReason?: string;
  killSwitchActive: boolean;
  /** Day key the daily halt tripped in */
  dailyHaltedFor?: string;
  /** Week key the weekly halt tripped in */
  weeklyHaltedFor?: string;
  drawdownHalted: boolean;
}

export interface RiskGateOptions {
  limits: RiskLimits;
  ledger: PositionLedger;
  clock?: Clock;
  logger: Logger;
}

export class RiskGate {
  private readonly limits: RiskLimits;
  private readonly ledger: PositionLedger;
  private readonly clock: Clock;
  private readonly logger: Logger;

  private haltReason: string | undefined;
  private dailyHaltedFor: string | undefined;
  private weeklyHaltedFor: string | undefined;
  private drawdownHalted = false;

  constructor(options: RiskGateOptions) {
    this.limits = options.limits;
    this.ledger = options.ledger;
    this.clock = options.clock ?? systemClock;
    this.logger = options.logger;

    this.logger.info(
      `[RiskGate] Initialized: dailyLoss=$${this.limits.dailyLossLimit}, ` +
        `weeklyLoss=$${this.limits.weeklyLossLimit}, ` +
        `maxDrawdown=${(this.limits.maxDrawdownPct * 100).toFixed(1)}%, ` +
        `size=[$${this.limits.minSize}, $${this.limits.maxSize}], ` +
        `kelly×${this.limits.kellyFraction}`,
    );
  }

  /**
   * Decide whether and at what size an opportunity may trade
   */
  evaluate(
    opportunity: Opportunity,
    edge: number = opportunity.edge,
    confidence: number = opportunity.confidence,
  ): RiskDecision {
    const now = this.clock.now();
    const portfolio = this.ledger.portfolioSummary();
    const { limits } = this;

    // === 1. GLOBAL HALT ===
    if (this.haltReason !== undefined) {
      return this.reject("HALTED", `Trading halted: ${this.haltReason}`);
    }
    if (this.isKillSwitchActive()) {
      return this.reject(
        "HALTED",
        `Kill switch file present: ${limits.killSwitchFile}`,
      );
    }

    // === 2. DAILY LOSS (sticky until rollover or reset) ===
    const today = dayKey(now);
    if (this.dailyHaltedFor !== undefined && this.dailyHaltedFor !== today) {
      this.logger.info(
        `[RiskGate] Daily halt from ${this.dailyHaltedFor} lifted at rollover`,
      );
      this.dailyHaltedFor = undefined;
    }
    if (this.dailyHaltedFor === undefined && portfolio.dailyPnl <= -limits.dailyLossLimit) {
      this.dailyHaltedFor = today;
      this.logger.warn(
        `[RiskGate] 🛑 Daily loss limit hit: $${portfolio.dailyPnl.toFixed(2)} <= -$${limits.dailyLossLimit}`,
      );
    }
    if (this.dailyHaltedFor !== undefined) {
      return this.reject(
        "DAILY_LOSS",
        `Daily loss limit reached for ${today}: $${portfolio.dailyPnl.toFixed(2)}`,
      );
    }

    // === 3. WEEKLY LOSS (sticky until rollover or reset) ===
    const week = weekKey(now);
    if (this.weeklyHaltedFor !== undefined && this.weeklyHaltedFor !== week) {
      this.logger.info(
        `[RiskGate] Weekly halt from ${this.weeklyHaltedFor} lifted at rollover`,
      );
      this.weeklyHaltedFor = undefined;
    }
    if (this.weeklyHaltedFor === undefined && portfolio.weeklyPnl <= -limits.weeklyLossLimit) {
      this.weeklyHaltedFor = week;
      this.logger.warn(
        `[RiskGate] 🛑 Weekly loss limit hit: $${portfolio.weeklyPnl.toFixed(2)} <= -$${limits.weeklyLossLimit}`,
      );
    }
    if (this.weeklyHaltedFor !== undefined) {
      return this.reject(
        "WEEKLY_LOSS",
        `Weekly loss limit reached for ${week}: $${portfolio.weeklyPnl.toFixed(2)}`,
      );
    }

    // === 4. DRAWDOWN (sticky until cleared) ===
    if (!this.drawdownHalted && portfolio.drawdown >= limits.maxDrawdownPct) {
      this.drawdownHalted = true;
      this.logger.warn(
        `[RiskGate] 🛑 Max drawdown hit: ${(portfolio.drawdown * 100).toFixed(2)}% ` +
          `(peak $${portfolio.peakBalance.toFixed(2)}, balance $${portfolio.balance.toFixed(2)})`,
      );
    }
    if (this.drawdownHalted) {
      return this.reject(
        "DRAWDOWN",
        `Drawdown halt active: ${(portfolio.drawdown * 100).toFixed(2)}% ` +
          `>= ${(limits.maxDrawdownPct * 100).toFixed(2)}%`,
      );
    }

    // === 5. TOTAL POSITIONS ===
    if (portfolio.openPositions >= limits.maxPositionsTotal) {
      return this.reject(
        "MAX_POSITIONS",
        `Max total positions reached: ${portfolio.openPositions}`,
      );
    }

    // === 6. PER-MARKET POSITIONS ===
    const inMarket = this.ledger.openCountInMarket(opportunity.marketId);
    if (inMarket >= limits.maxPositionsPerMarket) {
      return this.reject(
        "PER_MARKET_LIMIT",
        `Max positions per market reached for ${opportunity.marketId}: ${inMarket}`,
      );
    }

    // === 7. INPUTS ===
    const price = opportunity.currentPrice;
    if (!Number.isFinite(edge) || !Number.isFinite(confidence) || !(price > 0 && price < 1)) {
      return this.reject(
        "INVALID_INPUT",
        `Unusable inputs for ${opportunity.marketId}: edge=${edge} confidence=${confidence} price=${price}`,
      );
    }

    // === SIZING ===
    const adjustments: string[] = [];
    const rawSize = computeKellySize({
      edge,
      price,
      confidence,
      balance: portfolio.balance,
      kellyMultiplier: limits.kellyFraction,
    });
    if (rawSize <= 0) {
      return this.reject(
        "NO_EDGE",
        `Kelly size is zero (edge=${edge.toFixed(4)}, price=${price.toFixed(3)})`,
      );
    }

    let size = clip(rawSize, limits.minSize, limits.maxSize);
    if (size !== rawSize) {
      adjustments.push(`kelly $${rawSize.toFixed(2)} clipped to $${size.toFixed(2)}`);
    }

    // === 8. CONCENTRATION (post-trade exposure) ===
    const exposure = this.ledger.exposure(opportunity.marketId);
    const room = roundDownToCents(
      limits.maxConcentrationPct * portfolio.balance - exposure,
    );
    if (!(room > 0)) {
      return this.reject(
        "CONCENTRATION",
        `Market ${opportunity.marketId} at concentration cap: exposure $${exposure.toFixed(2)}`,
      );
    }
    if (size > room) {
      adjustments.push(`shrunk $${size.toFixed(2)} to concentration room $${room.toFixed(2)}`);
      size = room;
      if (size < limits.minSize) {
        return this.reject(
          "BELOW_MIN_SIZE",
          `Concentration room $${room.toFixed(2)} is below min size $${limits.minSize}`,
        );
      }
    }

    if (!Number.isFinite(size) || size < limits.minSize || size > limits.maxSize) {
      return this.reject(
        "INVALID_INPUT",
        `Sized $${size} outside [$${limits.minSize}, $${limits.maxSize}] for ${opportunity.marketId}`,
      );
    }

    this.logger.debug(
      `[RiskGate] ✅ ${opportunity.marketId} ${opportunity.side} approved at $${size.toFixed(2)}` +
        (adjustments.length > 0 ? ` (${adjustments.join("; ")})` : ""),
    );
    return { approved: true, size, reason: "OK", adjustments };
  }

  /** Stop all new trades until resume() */
  halt(reason: string): void {
    this.haltReason = reason;
    this.logger.warn(`[RiskGate] 🛑 Global halt: ${reason}`);
  }

  resume(): void {
    if (this.haltReason === undefined) return;
    this.logger.info(`[RiskGate] Global halt lifted (was: ${this.haltReason})`);
    this.haltReason = undefined;
  }

  /**
   * Manually clear a daily or weekly halt before the period rolls over.
   * If the period P&L is still past its limit the halt re-trips on the next evaluation.
   */
  resetHalt(kind: HaltKind): void {
    if (kind === "daily") {
      this.dailyHaltedFor = undefined;
    } else {
      this.weeklyHaltedFor = undefined;
    }
    this.logger.info(`[RiskGate] ${kind} halt reset manually`);
  }

  /** Drawdown halts are never time-bound; only this lifts them */
  clearDrawdownHalt(): void {
    this.drawdownHalted = false;
    this.logger.info("[RiskGate] Drawdown halt cleared manually");
  }

  isHalted(): boolean {
    const today = dayKey(this.clock.now());
    const week = weekKey(this.clock.now());
    return (
      this.haltReason !== undefined ||
      this.isKillSwitchActive() ||
      this.dailyHaltedFor === today ||
      this.weeklyHaltedFor === week ||
      this.drawdownHalted
    );
  }

  getState(): RiskGateState {
    return {
      halted: this.haltReason !== undefined,
      haltReason: this.haltReason,
      killSwitchActive: this.isKillSwitchActive(),
      dailyHaltedFor: this.dailyHaltedFor,
      weeklyHaltedFor: this.weeklyHaltedFor,
      drawdownHalted: this.drawdownHalted,
    };
  }

  private isKillSwitchActive(): boolean {
    return (
      this.limits.killSwitchFile !== undefined &&
      this.limits.killSwitchFile !== "" &&
      fs.existsSync(this.limits.killSwitchFile)
    );
  }

  private reject(reason: RiskRejectReason, detail: string): RiskDecision {
    this.logger.debug(`[RiskGate] ❌ ${reason}: ${detail}`);
    return { approved: false, size: 0, reason, detail };
  }
}
