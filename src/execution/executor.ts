import type { ExecutionResult, OrderIntent, SellIntent } from "../core/types";

/**
 * Order execution capability. Simulated and live variants share this
 * interface and are chosen once at construction.
 */
export interface Executor {
  /** Dependency name used for its circuit breaker and API metrics */
  readonly name: string;
  execute(order: OrderIntent): Promise<ExecutionResult>;
  /** Sell every token of an open position at market */
  sell(order: SellIntent): Promise<ExecutionResult>;
  /** Collateral balance in USD, where the venue can report it */
  fetchBalance?(): Promise<number>;
}
