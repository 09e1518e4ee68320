import { ConfigInvalidError } from "../errors/app.errors";
import type { AgentConfig } from "./schema";

export const DEFAULT_CLOB_HOST = "https://clob.polymarket.com";
export const DEFAULT_GAMMA_API_URL = "https://gamma-api.polymarket.com";

/**
 * Documented defaults, applied only when a variable is absent
 */
export const CONFIG_DEFAULTS = {
  PAPER_TRADING: true,
  INITIAL_BALANCE: 1000,
  SCAN_INTERVAL_SECONDS: 300,
  MARKETS_FETCH_LIMIT: 100,
  MIN_LIQUIDITY: 10000,
  MIN_EDGE: 0.1,
  MAX_TRADES_PER_CYCLE: 5,
  HTTP_MAX_RETRIES: 3,
  HTTP_RETRY_DELAY_MS: 1000,
  EXECUTOR_TIMEOUT_MS: 30000,
  PAPER_SLIPPAGE_BPS: 0,
  RATE_LIMIT_DELAY_MS: 2000,
  DAILY_LOSS_LIMIT: 500,
  WEEKLY_LOSS_LIMIT: 2000,
  MAX_DRAWDOWN_PCT: 0.2,
  MIN_POSITION_SIZE: 10,
  MAX_POSITION_SIZE: 100,
  MAX_TOTAL_POSITIONS: 10,
  MAX_POSITIONS_PER_MARKET: 1,
  MAX_CONCENTRATION_PCT: 0.3,
  KELLY_FRACTION: 0.25,
  CIRCUIT_BREAKER_THRESHOLD: 5,
  CIRCUIT_BREAKER_COOLDOWN_SECONDS: 300,
  METRICS_FILE: "./data/metrics.jsonl",
  SHARPE_PERIODS_PER_YEAR: 365,
  SUMMARY_INTERVAL_SECONDS: 300,
  TAKE_PROFIT_PCT: 0,
  STOP_LOSS_PCT: 0,
  CHAIN_ID: 137,
  CLOB_SIGNATURE_TYPE: 0,
} as const;

export const SUPPORTED_CHAIN_IDS: readonly number[] = [137, 80002];

const TRUE_VALUES = new Set(["true", "1", "yes"]);
const FALSE_VALUES = new Set(["false", "0", "no"]);

/**
 * Collects every parse failure instead of stopping at the first
 */
class EnvReader {
  readonly errors: string[] = [];

  constructor(private readonly env: NodeJS.ProcessEnv) {}

  raw(key: string): string | undefined {
    const value = this.env[key] ?? this.env[key.toLowerCase()];
    if (value === undefined) return undefined;
    const trimmed = value.trim();
    return trimmed === "" ? undefined : trimmed;
  }

  string(key: string, fallback: string): string {
    return this.raw(key) ?? fallback;
  }

  number(key: string, fallback: number): number {
    const raw = this.raw(key);
    if (raw === undefined) return fallback;
    const parsed = Number(raw);
    if (!Number.isFinite(parsed)) {
      this.errors.push(`${key} must be a number (got "${raw}")`);
      return fallback;
    }
    return parsed;
  }

  integer(key: string, fallback: number): number {
    const raw = this.raw(key);
    if (raw === undefined) return fallback;
    const parsed = Number(raw);
    if (!Number.isInteger(parsed)) {
      this.errors.push(`${key} must be an integer (got "${raw}")`);
      return fallback;
    }
    return parsed;
  }

  boolean(key: string, fallback: boolean): boolean {
    const raw = this.raw(key);
    if (raw === undefined) return fallback;
    const lower = raw.toLowerCase();
    if (TRUE_VALUES.has(lower)) return true;
    if (FALSE_VALUES.has(lower)) return false;
    this.errors.push(`${key} must be true or false (got "${raw}")`);
    return fallback;
  }
}

/**
 * Build the agent configuration from environment variables.
 *
 * @throws ConfigInvalidError listing every invalid field
 */
export function loadAgentConfig(
  env: NodeJS.ProcessEnv = process.env,
): AgentConfig {
  const r = new EnvReader(env);
  const d = CONFIG_DEFAULTS;

  const killSwitchFile = r.raw("KILL_SWITCH_FILE");
  const apiKey = r.raw("POLYMARKET_API_KEY");
  const apiSecret = r.raw("POLYMARKET_API_SECRET");
  const apiPassphrase = r.raw("POLYMARKET_API_PASSPHRASE");
  const funderAddress = r.raw("CLOB_FUNDER_ADDRESS") ?? r.raw("POLYMARKET_PROXY_ADDRESS");

  const config: AgentConfig = {
    paperTrading: r.boolean("PAPER_TRADING", d.PAPER_TRADING),
    initialBalance: r.number("INITIAL_BALANCE", d.INITIAL_BALANCE),
    scan: {
      gammaApiUrl: r.string("GAMMA_API_URL", DEFAULT_GAMMA_API_URL),
      intervalSeconds: r.number("SCAN_INTERVAL_SECONDS", d.SCAN_INTERVAL_SECONDS),
      marketsFetchLimit: r.integer("MARKETS_FETCH_LIMIT", d.MARKETS_FETCH_LIMIT),
      minLiquidity: r.number("MIN_LIQUIDITY", d.MIN_LIQUIDITY),
      minEdge: r.number("MIN_EDGE", d.MIN_EDGE),
      maxTradesPerCycle: r.integer("MAX_TRADES_PER_CYCLE", d.MAX_TRADES_PER_CYCLE),
      httpMaxRetries: r.integer("HTTP_MAX_RETRIES", d.HTTP_MAX_RETRIES),
      httpRetryDelayMs: r.number("HTTP_RETRY_DELAY_MS", d.HTTP_RETRY_DELAY_MS),
    },
    execution: {
      timeoutMs: r.integer("EXECUTOR_TIMEOUT_MS", d.EXECUTOR_TIMEOUT_MS),
      paperSlippageBps: r.number("PAPER_SLIPPAGE_BPS", d.PAPER_SLIPPAGE_BPS),
      rateLimitDelayMs: r.number("RATE_LIMIT_DELAY_MS", d.RATE_LIMIT_DELAY_MS),
    },
    risk: {
      dailyLossLimit: r.number("DAILY_LOSS_LIMIT", d.DAILY_LOSS_LIMIT),
      weeklyLossLimit: r.number("WEEKLY_LOSS_LIMIT", d.WEEKLY_LOSS_LIMIT),
      maxDrawdownPct: r.number("MAX_DRAWDOWN_PCT", d.MAX_DRAWDOWN_PCT),
      minSize: r.number("MIN_POSITION_SIZE", d.MIN_POSITION_SIZE),
      maxSize: r.number("MAX_POSITION_SIZE", d.MAX_POSITION_SIZE),
      maxPositionsTotal: r.integer("MAX_TOTAL_POSITIONS", d.MAX_TOTAL_POSITIONS),
      maxPositionsPerMarket: r.integer("MAX_POSITIONS_PER_MARKET", d.MAX_POSITIONS_PER_MARKET),
      maxConcentrationPct: r.number("MAX_CONCENTRATION_PCT", d.MAX_CONCENTRATION_PCT),
      kellyFraction: r.number("KELLY_FRACTION", d.KELLY_FRACTION),
      ...(killSwitchFile !== undefined ? { killSwitchFile } : {}),
    },
    circuitBreaker: {
      failureThreshold: r.integer("CIRCUIT_BREAKER_THRESHOLD", d.CIRCUIT_BREAKER_THRESHOLD),
      cooldownSeconds: r.number("CIRCUIT_BREAKER_COOLDOWN_SECONDS", d.CIRCUIT_BREAKER_COOLDOWN_SECONDS),
    },
    metrics: {
      file: r.string("METRICS_FILE", d.METRICS_FILE),
      sharpePeriodsPerYear: r.number("SHARPE_PERIODS_PER_YEAR", d.SHARPE_PERIODS_PER_YEAR),
      summaryIntervalSeconds: r.number("SUMMARY_INTERVAL_SECONDS", d.SUMMARY_INTERVAL_SECONDS),
    },
    exits: {
      takeProfitPct: r.number("TAKE_PROFIT_PCT", d.TAKE_PROFIT_PCT),
      stopLossPct: r.number("STOP_LOSS_PCT", d.STOP_LOSS_PCT),
    },
    clob: {
      host: r.string("CLOB_HOST", DEFAULT_CLOB_HOST),
      chainId: r.integer("CHAIN_ID", d.CHAIN_ID),
      signatureType: r.integer("CLOB_SIGNATURE_TYPE", d.CLOB_SIGNATURE_TYPE),
      ...(funderAddress !== undefined ? { funderAddress } : {}),
      privateKey: r.string("PRIVATE_KEY", ""),
      ...(apiKey !== undefined ? { apiKey } : {}),
      ...(apiSecret !== undefined ? { apiSecret } : {}),
      ...(apiPassphrase !== undefined ? { apiPassphrase } : {}),
    },
  };

  const errors = [...r.errors, ...validateAgentConfig(config)];
  if (errors.length > 0) {
    throw new ConfigInvalidError(errors);
  }

  return deepFreeze(config);
}

/**
 * Every rule that a parsed configuration must satisfy
 */
export function validateAgentConfig(config: AgentConfig): string[] {
  const errors: string[] = [];
  const check = (ok: boolean, message: string): void => {
    if (!ok) errors.push(message);
  };
  const { scan, execution, risk, circuitBreaker, metrics, exits, clob } = config;

  if (config.paperTrading) {
    check(config.initialBalance > 0, "INITIAL_BALANCE must be positive");
  } else {
    check(clob.privateKey !== "", "PRIVATE_KEY is required for live trading");
    check(
      clob.signatureType === 0 || clob.funderAddress !== undefined,
      "CLOB_FUNDER_ADDRESS is required for live trading with CLOB_SIGNATURE_TYPE 1 or 2",
    );
  }
  check(SUPPORTED_CHAIN_IDS.includes(clob.chainId), "CHAIN_ID must be 137 (Polygon) or 80002 (Amoy)");
  check([0, 1, 2].includes(clob.signatureType), "CLOB_SIGNATURE_TYPE must be 0, 1 or 2");

  check(scan.intervalSeconds > 0, "SCAN_INTERVAL_SECONDS must be positive");
  check(scan.marketsFetchLimit > 0, "MARKETS_FETCH_LIMIT must be positive");
  check(scan.minLiquidity > 0, "MIN_LIQUIDITY must be positive");
  check(scan.minEdge > 0 && scan.minEdge < 1, "MIN_EDGE must be between 0 and 1");
  check(scan.maxTradesPerCycle > 0, "MAX_TRADES_PER_CYCLE must be positive");
  check(scan.httpMaxRetries >= 0, "HTTP_MAX_RETRIES must be non-negative");
  check(scan.httpRetryDelayMs >= 0, "HTTP_RETRY_DELAY_MS must be non-negative");

  check(execution.timeoutMs > 0, "EXECUTOR_TIMEOUT_MS must be positive");
  check(execution.paperSlippageBps >= 0, "PAPER_SLIPPAGE_BPS must be non-negative");
  check(execution.rateLimitDelayMs >= 0, "RATE_LIMIT_DELAY_MS must be non-negative");

  check(risk.minSize > 0, "MIN_POSITION_SIZE must be positive");
  check(risk.maxSize > risk.minSize, "MAX_POSITION_SIZE must be greater than MIN_POSITION_SIZE");
  check(risk.dailyLossLimit > 0, "DAILY_LOSS_LIMIT must be positive");
  check(risk.weeklyLossLimit >= risk.dailyLossLimit, "WEEKLY_LOSS_LIMIT must be >= DAILY_LOSS_LIMIT");
  check(risk.maxDrawdownPct > 0 && risk.maxDrawdownPct < 1, "MAX_DRAWDOWN_PCT must be between 0 and 1");
  check(risk.maxPositionsTotal > 0, "MAX_TOTAL_POSITIONS must be positive");
  check(risk.maxPositionsPerMarket > 0, "MAX_POSITIONS_PER_MARKET must be positive");
  check(
    risk.maxConcentrationPct > 0 && risk.maxConcentrationPct <= 1,
    "MAX_CONCENTRATION_PCT must be in (0, 1]",
  );
  check(risk.kellyFraction > 0 && risk.kellyFraction <= 1, "KELLY_FRACTION must be in (0, 1]");

  check(circuitBreaker.failureThreshold > 0, "CIRCUIT_BREAKER_THRESHOLD must be positive");
  check(circuitBreaker.cooldownSeconds > 0, "CIRCUIT_BREAKER_COOLDOWN_SECONDS must be positive");

  check(metrics.file !== "", "METRICS_FILE must not be empty");
  check(metrics.sharpePeriodsPerYear > 0, "SHARPE_PERIODS_PER_YEAR must be positive");
  check(metrics.summaryIntervalSeconds >= 0, "SUMMARY_INTERVAL_SECONDS must be non-negative");

  check(exits.takeProfitPct >= 0, "TAKE_PROFIT_PCT must be non-negative");
  check(exits.stopLossPct >= 0 && exits.stopLossPct < 1, "STOP_LOSS_PCT must be in [0, 1)");

  return errors;
}

function deepFreeze<T extends object>(value: T): Readonly<T> {
  const children: unknown[] = Object.values(value);
  for (const child of children) {
    if (typeof child === "object" && child !== null && !Object.isFrozen(child)) {
      deepFreeze(child);
    }
  }
  return Object.freeze(value);
}

/**
 * Human-readable config dump for the startup log (secrets masked)
 */
export function formatAgentConfig(config: AgentConfig): string {
  const { risk, scan } = config;
  return [
    `mode=${config.paperTrading ? "PAPER" : "LIVE"}`,
    `scan: every ${scan.intervalSeconds}s, limit=${scan.marketsFetchLimit}, minLiquidity=$${scan.minLiquidity}, minEdge=${scan.minEdge}, top=${scan.maxTradesPerCycle}, retries=${scan.httpMaxRetries}`,
    `execution: timeout=${config.execution.timeoutMs}ms, orderDelay=${config.execution.rateLimitDelayMs}ms`,
    `risk: daily=$${risk.dailyLossLimit} weekly=$${risk.weeklyLossLimit} drawdown=${risk.maxDrawdownPct} size=[$${risk.minSize}, $${risk.maxSize}]`,
    `      positions=${risk.maxPositionsTotal} perMarket=${risk.maxPositionsPerMarket} concentration=${risk.maxConcentrationPct} kelly=${risk.kellyFraction}`,
    `breaker: threshold=${config.circuitBreaker.failureThreshold} cooldown=${config.circuitBreaker.cooldownSeconds}s`,
    `metrics: ${config.metrics.file}`,
    `clob: ${config.clob.host} chain=${config.clob.chainId} signatureType=${config.clob.signatureType} key=${config.clob.privateKey ? "***" : "(none)"}`,
  ].join("\n");
}
