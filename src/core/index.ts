/**
 * Core Module Index
 *
 * Risk gating and execution safety:
 * - PositionLedger: open positions, realized P&L, period P&L (position-ledger.ts)
 * - RiskGate: ordered pre-trade checks and Kelly sizing (risk-gate.ts, sizing.ts)
 * - CircuitBreaker: per-dependency failure isolation (circuit-breaker.ts)
 * - MetricsRecorder: win rate, Sharpe, API stats, snapshots (metrics-recorder.ts)
 * - Orchestrator: the trading cycle (orchestrator.ts)
 */

export * from "./types";
export { systemClock, ManualClock, type Clock } from "./clock";
export { dayKey, weekKey } from "./periods";
export {
  PositionLedger,
  realizedPnlFor,
  drawdownOf,
  type LedgerOptions,
} from "./position-ledger";
export {
  kellyFraction,
  computeKellySize,
  roundDownToCents,
  clip,
  type KellySizeParams,
} from "./sizing";
export {
  RiskGate,
  type RiskGateOptions,
  type RiskGateState,
  type HaltKind,
} from "./risk-gate";
export {
  CircuitBreaker,
  CircuitBreakerRegistry,
  type CircuitBreakerConfig,
  type ExecuteOptions,
} from "./circuit-breaker";
export { MetricsRecorder, type MetricsRecorderOptions } from "./metrics-recorder";
export {
  ThresholdExitPolicy,
  type ExitPolicy,
  type ExitSignal,
  type ExitReason,
  type PriceQuote,
  type ThresholdExitConfig,
} from "./exit-policy";
export {
  Orchestrator,
  type OrchestratorConfig,
  type OrchestratorDeps,
  type CycleReport,
} from "./orchestrator";
