/**
 * Position Ledger - Open positions and realized P&L
 *
 * Owns the only mutable copy of positions, closed trades and portfolio
 * aggregates. A closed position is kept with status CLOSED, its exit
 * price and close time; it no longer counts toward any cap.
 *
 * Every method is synchronous: on a single event loop two writers can
 * never interleave, and readers always receive frozen copies taken
 * between mutations.
 */

import type { Logger } from "../utils/logger.util";
import {
  InvalidValueError,
  LimitExceededError,
  PositionNotFoundError,
} from "../errors/app.errors";
import { systemClock, type Clock } from "./clock";
import { dayKey, weekKey } from "./periods";
import type {
  PortfolioState,
  Position,
  RiskLimits,
  Side,
  Trade,
  TradeOutcome,
} from "./types";

// Float noise allowed when re-checking caps the risk gate already sized to
const EPSILON = 1e-9;

interface PeriodPnl {
  key: string;
  pnl: number;
}

export interface LedgerOptions {
  limits: RiskLimits;
  initialBalance: number;
  clock?: Clock;
  logger: Logger;
}

export class PositionLedger {
  private readonly limits: RiskLimits;
  private readonly clock: Clock;
  private readonly logger: Logger;

  private positions: Map<string, Position> = new Map();
  private closedPositions: Map<string, Position> = new Map();
  private closedTrades: Trade[] = [];
  private sequence = 0;

  private balance: number;
  private peakBalance: number;
  private realizedPnlTotal = 0;
  private consecutiveLosses = 0;
  private daily: PeriodPnl;
  private weekly: PeriodPnl;

  constructor(options: LedgerOptions) {
    this.limits = options.limits;
    this.clock = options.clock ?? systemClock;
    this.logger = options.logger;
    this.balance = options.initialBalance;
    this.peakBalance = options.initialBalance;

    const now = this.clock.now();
    this.daily = { key: dayKey(now), pnl: 0 };
    this.weekly = { key: weekKey(now), pnl: 0 };
  }

  /**
   * Commit a filled order as an open position.
   * Re-checks the hard caps; the risk gate should already have sized within them.
   */
  open(
    marketId: string,
    side: Side,
    size: number,
    price: number,
    tokenId: string = marketId,
  ): string {
    if (!(Number.isFinite(size) && size > 0) || !(price > 0 && price < 1)) {
      throw new LimitExceededError(
        `Invalid order for ${marketId}: size=${size} price=${price}`,
        "INVALID_ORDER",
      );
    }

    if (this.positions.size >= this.limits.maxPositionsTotal) {
      throw new LimitExceededError(
        `Total open positions at cap (${this.limits.maxPositionsTotal})`,
        "MAX_POSITIONS",
      );
    }

    if (this.openCountInMarket(marketId) >= this.limits.maxPositionsPerMarket) {
      throw new LimitExceededError(
        `Open positions in ${marketId} at cap (${this.limits.maxPositionsPerMarket})`,
        "PER_MARKET_LIMIT",
      );
    }

    const cap = this.limits.maxConcentrationPct * this.balance;
    const projected = this.exposure(marketId) + size;
    if (projected > cap + EPSILON) {
      throw new LimitExceededError(
        `Exposure in ${marketId} would be $${projected.toFixed(2)} > cap $${cap.toFixed(2)}`,
        "CONCENTRATION",
      );
    }

    const id = `pos-${++this.sequence}`;
    this.positions.set(id, {
      id,
      marketId,
      tokenId,
      side,
      size,
      entryPrice: price,
      openedAt: this.clock.now(),
      status: "OPEN",
      unrealizedPnl: 0,
    });

    this.logger.info(
      `[PositionLedger] Opened ${id}: ${side} $${size.toFixed(2)} in ${marketId} @ ${price.toFixed(3)}`,
    );
    return id;
  }

  /**
   * Close a position, realize its P&L and append the trade record.
   * The exit price is checked before any state changes.
   */
  close(id: string, exitPrice: number): Trade {
    const position = this.positions.get(id);
    if (!position) {
      throw new PositionNotFoundError(id);
    }
    if (!(exitPrice >= 0 && exitPrice <= 1)) {
      throw new InvalidValueError("exitPrice", exitPrice, `closing ${id}, must be in [0, 1]`);
    }

    const now = this.clock.now();
    this.rollPeriods(now);

    const realizedPnl = realizedPnlFor(position.size, position.entryPrice, exitPrice);

    this.balance += realizedPnl;
    if (this.balance > this.peakBalance) {
      this.peakBalance = this.balance;
    }
    this.realizedPnlTotal += realizedPnl;
    this.daily.pnl += realizedPnl;
    this.weekly.pnl += realizedPnl;
    this.consecutiveLosses = realizedPnl < 0 ? this.consecutiveLosses + 1 : 0;

    const trade: Trade = Object.freeze({
      id: position.id,
      positionId: position.id,
      marketId: position.marketId,
      side: position.side,
      size: position.size,
      entryPrice: position.entryPrice,
      price: exitPrice,
      realizedPnl,
      timestamp: now,
      outcome: outcomeOf(realizedPnl),
    });

    this.positions.delete(id);
    this.closedPositions.set(id, {
      ...position,
      status: "CLOSED",
      closedAt: now,
      exitPrice,
      unrealizedPnl: 0,
    });
    this.closedTrades.push(trade);

    this.logger.info(
      `[PositionLedger] Closed ${id} @ ${exitPrice.toFixed(3)}: P&L $${realizedPnl.toFixed(2)} (${trade.outcome})`,
    );
    return trade;
  }

  /**
   * External balance sync (e.g. wallet collateral at startup)
   */
  syncBalance(balance: number): void {
    if (!Number.isFinite(balance)) {
      throw new InvalidValueError("balance", balance);
    }
    this.balance = balance;
    if (balance > this.peakBalance) {
      this.peakBalance = balance;
    }
    this.logger.info(`[PositionLedger] Balance synced to $${balance.toFixed(2)}`);
  }

  /**
   * Refresh unrealized P&L from current token prices. Prices outside
   * [0, 1] are ignored.
   */
  markToMarket(prices: Map<string, number>): void {
    for (const position of this.positions.values()) {
      const price = prices.get(position.tokenId);
      if (price === undefined || !(price >= 0 && price <= 1)) continue;
      position.unrealizedPnl = realizedPnlFor(
        position.size,
        position.entryPrice,
        price,
      );
    }
  }

  /** Sum of open stakes in one market */
  exposure(marketId: string): number {
    let total = 0;
    for (const position of this.positions.values()) {
      if (position.marketId === marketId) total += position.size;
    }
    return total;
  }

  totalExposure(): number {
    let total = 0;
    for (const position of this.positions.values()) {
      total += position.size;
    }
    return total;
  }

  openCount(): number {
    return this.positions.size;
  }

  openCountInMarket(marketId: string): number {
    let count = 0;
    for (const position of this.positions.values()) {
      if (position.marketId === marketId) count++;
    }
    return count;
  }

  /** Open or closed position by id */
  getPosition(id: string): Position | undefined {
    const position = this.positions.get(id) ?? this.closedPositions.get(id);
    return position ? Object.freeze({ ...position }) : undefined;
  }

  openPositions(): Position[] {
    return Array.from(this.positions.values(), (p) =>
      Object.freeze({ ...p }),
    );
  }

  trades(): readonly Trade[] {
    return [...this.closedTrades];
  }

  portfolioSummary(): PortfolioState {
    this.rollPeriods(this.clock.now());

    return Object.freeze({
      balance: this.balance,
      peakBalance: this.peakBalance,
      realizedPnlTotal: this.realizedPnlTotal,
      dailyPnl: this.daily.pnl,
      weeklyPnl: this.weekly.pnl,
      drawdown: drawdownOf(this.peakBalance, this.balance),
      openPositions: this.positions.size,
      totalExposure: this.totalExposure(),
      closedTrades: this.closedTrades.length,
      consecutiveLosses: this.consecutiveLosses,
    });
  }

  /**
   * Restart daily / weekly P&L when the clock crosses a period boundary
   */
  private rollPeriods(now: number): void {
    const day = dayKey(now);
    if (day !== this.daily.key) {
      this.logger.debug(
        `[PositionLedger] Day rollover ${this.daily.key} -> ${day} (closed at $${this.daily.pnl.toFixed(2)})`,
      );
      this.daily = { key: day, pnl: 0 };
    }

    const week = weekKey(now);
    if (week !== this.weekly.key) {
      this.logger.debug(
        `[PositionLedger] Week rollover ${this.weekly.key} -> ${week} (closed at $${this.weekly.pnl.toFixed(2)})`,
      );
      this.weekly = { key: week, pnl: 0 };
    }
  }
}

/**
 * P&L of a dollar stake bought at `entryPrice` and valued at `exitPrice`
 */
export function realizedPnlFor(
  size: number,
  entryPrice: number,
  exitPrice: number,
): number {
  return size * (exitPrice / entryPrice - 1);
}

export function drawdownOf(peakBalance: number, balance: number): number {
  if (peakBalance <= 0) return 0;
  return Math.max(0, (peakBalance - balance) / peakBalance);
}

function outcomeOf(pnl: number): TradeOutcome {
  if (pnl > 0) return "WIN";
  if (pnl < 0) return "LOSS";
  return "BREAKEVEN";
}
