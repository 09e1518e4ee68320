import type { Position } from "./types";

export type ExitReason = "TAKE_PROFIT" | "STOP_LOSS";

export interface ExitSignal {
  positionId: string;
  exitPrice: number;
  reason: ExitReason;
}

/**
 * Decides which open positions should be closed this cycle
 */
export interface ExitPolicy {
  exitsFor(positions: readonly Position[]): ExitSignal[];
}

export interface ThresholdExitConfig {
  /** Fractional gain over entry that takes profit; 0 disables */
  takeProfitPct: number;
  /** Fractional loss from entry that stops out; 0 disables */
  stopLossPct: number;
}

/** Current price of a token, undefined when unknown */
export type PriceQuote = (tokenId: string) => number | undefined;

/**
 * Take-profit / stop-loss on the token's price move since entry.
 * Positions without a quote are left alone.
 */
export class ThresholdExitPolicy implements ExitPolicy {
  constructor(
    private readonly quote: PriceQuote,
    private readonly config: ThresholdExitConfig,
  ) {}

  exitsFor(positions: readonly Position[]): ExitSignal[] {
    const { takeProfitPct, stopLossPct } = this.config;
    const signals: ExitSignal[] = [];

    for (const position of positions) {
      const price = this.quote(position.tokenId);
      if (price === undefined) continue;

      const move = price / position.entryPrice - 1;
      if (takeProfitPct > 0 && move >= takeProfitPct) {
        signals.push({ positionId: position.id, exitPrice: price, reason: "TAKE_PROFIT" });
      } else if (stopLossPct > 0 && move <= -stopLossPct) {
        signals.push({ positionId: position.id, exitPrice: price, reason: "STOP_LOSS" });
      }
    }

    return signals;
  }
}
