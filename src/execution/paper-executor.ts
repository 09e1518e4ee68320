/**
 * Paper Executor - simulated fills, no network
 */

import type { Logger } from "../utils/logger.util";
import type { ExecutionResult, OrderIntent, SellIntent } from "../core/types";
import type { Executor } from "./executor";

export interface PaperExecutorConfig {
  /** Adverse slippage applied to the fill price, in basis points (default: 0) */
  slippageBps?: number;
}

// Outcome tokens never fill at or above $1
const MAX_FILL_PRICE = 0.99;

export class PaperExecutor implements Executor {
  readonly name = "paper";
  private readonly slippageBps: number;
  private orderSeq = 0;

  constructor(
    config: PaperExecutorConfig,
    private readonly logger: Logger,
  ) {
    this.slippageBps = config.slippageBps ?? 0;
  }

  async execute(order: OrderIntent): Promise<ExecutionResult> {
    if (order.liquidity !== undefined && order.sizeUsd > order.liquidity) {
      this.logger.warn(
        `[PAPER] Rejected ${order.marketId}: $${order.sizeUsd.toFixed(2)} exceeds liquidity $${order.liquidity.toFixed(2)}`,
      );
      return {
        success: false,
        fillPrice: 0,
        error: "INSUFFICIENT_LIQUIDITY",
      };
    }

    const fillPrice = Math.min(
      MAX_FILL_PRICE,
      order.price * (1 + this.slippageBps / 10_000),
    );
    const orderId = `paper-${++this.orderSeq}`;

    this.logger.info(
      `[PAPER] ${orderId} BUY ${order.side} $${order.sizeUsd.toFixed(2)} in ${order.marketId} @ ${fillPrice.toFixed(3)}`,
    );
    return { success: true, fillPrice, orderId };
  }

  async sell(order: SellIntent): Promise<ExecutionResult> {
    const fillPrice = Math.max(0, order.price * (1 - this.slippageBps / 10_000));
    const orderId = `paper-${++this.orderSeq}`;

    this.logger.info(
      `[PAPER] ${orderId} SELL ${order.shares.toFixed(2)} ${order.side} of ${order.marketId} @ ${fillPrice.toFixed(3)}`,
    );
    return { success: true, fillPrice, orderId };
  }
}
