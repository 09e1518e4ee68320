/**
 * Trading Engine Types
 *
 * Core type definitions shared by the ledger, risk gate, circuit breakers,
 * metrics recorder and orchestrator.
 */

/**
 * Outcome token being bought
 */
export type Side = "YES" | "NO";

export type PositionStatus = "OPEN" | "CLOSED";

export type TradeOutcome = "WIN" | "LOSS" | "BREAKEVEN";

/**
 * Candidate trade produced by a scanner, already validated
 */
export interface Opportunity {
  marketId: string;
  question: string;
  /** CLOB token id of the outcome being bought */
  tokenId: string;
  side: Side;
  /** Estimated probability of `side` minus `currentPrice` */
  edge: number;
  /** 0-1 */
  confidence: number;
  /** Price of the token being bought (0-1) */
  currentPrice: number;
  /** Market liquidity in USD */
  liquidity: number;
  /** Expected profit per dollar staked */
  expectedValue: number;
}

export interface Position {
  id: string;
  marketId: string;
  tokenId: string;
  side: Side;
  /** Dollar stake */
  size: number;
  entryPrice: number;
  openedAt: number;
  status: PositionStatus;
  closedAt?: number;
  exitPrice?: number;
  unrealizedPnl: number;
}

/**
 * Closed-position record. Immutable once created.
 */
export interface Trade {
  /** Equal to the closed position's id; metrics dedup key */
  id: string;
  positionId: string;
  marketId: string;
  side: Side;
  size: number;
  entryPrice: number;
  /** Exit price */
  price: number;
  realizedPnl: number;
  timestamp: number;
  outcome: TradeOutcome;
}

export interface PortfolioState {
  balance: number;
  peakBalance: number;
  realizedPnlTotal: number;
  dailyPnl: number;
  weeklyPnl: number;
  /** (peak - balance) / peak, never negative */
  drawdown: number;
  openPositions: number;
  totalExposure: number;
  closedTrades: number;
  consecutiveLosses: number;
}

export interface RiskLimits {
  dailyLossLimit: number;
  weeklyLossLimit: number;
  /** 0-1 */
  maxDrawdownPct: number;
  minSize: number;
  maxSize: number;
  maxPositionsTotal: number;
  maxPositionsPerMarket: number;
  /** Max fraction of balance committed to one market (0-1) */
  maxConcentrationPct: number;
  /** Multiplier on full Kelly (0-1) */
  kellyFraction: number;
  /** Trading stops while this file exists */
  killSwitchFile?: string;
}

export type RiskRejectReason =
  | "HALTED"
  | "DAILY_LOSS"
  | "WEEKLY_LOSS"
  | "DRAWDOWN"
  | "MAX_POSITIONS"
  | "PER_MARKET_LIMIT"
  | "CONCENTRATION"
  | "BELOW_MIN_SIZE"
  | "NO_EDGE"
  | "INVALID_INPUT";

export interface RiskApproved {
  approved: true;
  size: number;
  reason: "OK";
  /** Sizing steps that changed the raw Kelly size */
  adjustments: string[];
}

export interface RiskRejected {
  approved: false;
  size: 0;
  reason: RiskRejectReason;
  detail: string;
}

export type RiskDecision = RiskApproved | RiskRejected;

export type CircuitStatus = "CLOSED" | "OPEN" | "HALF_OPEN";

export interface CircuitBreakerState {
  dependency: string;
  status: CircuitStatus;
  consecutiveFailures: number;
  openedAt: number | null;
  cooldownUntil: number | null;
  totalFailures: number;
  totalSuccesses: number;
}

export interface OrderIntent {
  marketId: string;
  tokenId: string;
  side: Side;
  sizeUsd: number;
  price: number;
  /** Available liquidity, used by the simulated executor */
  liquidity?: number;
}

/**
 * Market SELL of every token a position holds
 */
export interface SellIntent {
  positionId: string;
  marketId: string;
  tokenId: string;
  side: Side;
  /** Outcome tokens held: stake / entry price */
  shares: number;
  /** Quoted token price */
  price: number;
}

export interface ExecutionResult {
  success: boolean;
  fillPrice: number;
  orderId?: string;
  error?: string;
}

export interface ApiCallStats {
  calls: number;
  errors: number;
  avgLatencyMs: number;
}

/**
 * Durable, fixed-shape record written once per cycle
 */
export interface MetricSnapshot {
  timestamp: string;
  balance: number;
  peakBalance: number;
  drawdown: number;
  pnl: {
    total: number;
    daily: number;
    weekly: number;
  };
  winRate: number;
  sharpeRatio: number | null;
  trades: {
    closed: number;
    wins: number;
    losses: number;
    breakeven: number;
    executed: number;
    failed: number;
    openPositions: number;
  };
  scan: {
    cycles: number;
    marketsScanned: number;
    opportunitiesFound: number;
    rejected: Partial<Record<RiskRejectReason, number>>;
  };
  apiCalls: Record<string, ApiCallStats>;
  halted: boolean;
}
