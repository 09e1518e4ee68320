/**
 * Configuration Schema
 *
 * Type definitions for the application configuration.
 * One immutable AgentConfig is built at startup and passed explicitly to
 * every component; nothing reads configuration from ambient state.
 */

import type { RiskLimits } from "../core/types";

export interface ScanConfig {
  gammaApiUrl: string;
  /** Seconds between cycles */
  intervalSeconds: number;
  /** Markets requested per scan */
  marketsFetchLimit: number;
  /** Minimum market liquidity in USD */
  minLiquidity: number;
  /** Minimum edge for a market to become an opportunity (0-1) */
  minEdge: number;
  /** Opportunities attempted per cycle, best expected value first */
  maxTradesPerCycle: number;
  /** Retries for a transient Gamma failure */
  httpMaxRetries: number;
  /** Base delay for exponential backoff between retries */
  httpRetryDelayMs: number;
}

export interface ExecutionConfig {
  /** Time budget for one executor call */
  timeoutMs: number;
  /** Simulated slippage for paper fills */
  paperSlippageBps: number;
  /** Pause between consecutive venue orders within a cycle */
  rateLimitDelayMs: number;
}

export interface CircuitBreakerSettings {
  failureThreshold: number;
  cooldownSeconds: number;
}

export interface MetricsConfig {
  /** JSON Lines snapshot history */
  file: string;
  sharpePeriodsPerYear: number;
  /** Periodic summary log; 0 disables */
  summaryIntervalSeconds: number;
}

export interface ExitConfig {
  /** Close when the token gained this fraction over entry; 0 disables */
  takeProfitPct: number;
  /** Close when the token lost this fraction from entry; 0 disables */
  stopLossPct: number;
}

export interface ClobConfig {
  host: string;
  /** 137 (Polygon) or 80002 (Amoy) */
  chainId: number;
  /** 0 = EOA, 1 = Polymarket proxy, 2 = Gnosis Safe */
  signatureType: number;
  /** Proxy or Safe address holding the funds; required for signature types 1 and 2 */
  funderAddress?: string;
  privateKey: string;
  apiKey?: string;
  apiSecret?: string;
  apiPassphrase?: string;
}

export interface AgentConfig {
  paperTrading: boolean;
  /** Starting bankroll in paper mode; live mode syncs from the wallet */
  initialBalance: number;
  scan: ScanConfig;
  execution: ExecutionConfig;
  risk: RiskLimits;
  circuitBreaker: CircuitBreakerSettings;
  metrics: MetricsConfig;
  exits: ExitConfig;
  clob: ClobConfig;
}
