/**
 * GammaMarketScanner - binary markets from the Gamma API as opportunities
 *
 * The Gamma payload is loosely typed (JSON arrays encoded as strings,
 * numbers as strings). It is validated here, at the boundary; anything
 * past parseGammaMarket() is a typed BinaryMarket.
 */

import axios from "axios";
import type { Logger } from "../utils/logger.util";
import { AppError } from "../errors/app.errors";
import { withRetry, type RetryConfig } from "../utils/retry.util";
import type { Opportunity, Side } from "../core/types";
import type {
  BinaryMarket,
  OpportunitySet,
  OpportunitySource,
  ProbabilityEstimator,
} from "./types";

export type MarketRejectReason =
  | "NOT_AN_OBJECT"
  | "CLOSED"
  | "INACTIVE"
  | "MISSING_ID"
  | "NOT_BINARY"
  | "BAD_TOKEN_IDS"
  | "BAD_PRICES"
  | "BAD_LIQUIDITY";

export type ParseResult =
  | { ok: true; market: BinaryMarket }
  | { ok: false; reason: MarketRejectReason };

const isRecord = (value: unknown): value is Record<string, unknown> =>
  typeof value === "object" && value !== null && !Array.isArray(value);

/** Gamma encodes arrays either natively or as a JSON string */
const readArray = (value: unknown): unknown[] | undefined => {
  if (Array.isArray(value)) return value;
  if (typeof value !== "string") return undefined;
  try {
    const parsed: unknown = JSON.parse(value);
    return Array.isArray(parsed) ? parsed : undefined;
  } catch {
    return undefined;
  }
};

const readNumber = (value: unknown): number | undefined => {
  const n = typeof value === "string" && value.trim() !== "" ? Number(value) : value;
  return typeof n === "number" && Number.isFinite(n) ? n : undefined;
};

const reject = (reason: MarketRejectReason): ParseResult => ({ ok: false, reason });

/**
 * Validate one raw Gamma market into a typed binary market
 */
export function parseGammaMarket(raw: unknown): ParseResult {
  if (!isRecord(raw)) return reject("NOT_AN_OBJECT");
  if (raw.closed === true) return reject("CLOSED");
  if (raw.active === false) return reject("INACTIVE");

  const marketId = raw.conditionId;
  if (typeof marketId !== "string" || marketId === "") return reject("MISSING_ID");

  const outcomes = raw.outcomes === undefined ? undefined : readArray(raw.outcomes);
  if (raw.outcomes !== undefined) {
    const labels = (outcomes ?? []).map((o) => String(o).toLowerCase());
    if (labels.length !== 2 || labels[0] !== "yes" || labels[1] !== "no") {
      return reject("NOT_BINARY");
    }
  }

  const tokenIds = readArray(raw.clobTokenIds);
  if (
    !tokenIds ||
    tokenIds.length !== 2 ||
    !tokenIds.every((t): t is string => typeof t === "string" && t !== "")
  ) {
    return reject("BAD_TOKEN_IDS");
  }

  const prices = (readArray(raw.outcomePrices) ?? []).map(readNumber);
  const [yesPrice, noPrice] = prices;
  if (
    prices.length !== 2 ||
    yesPrice === undefined ||
    noPrice === undefined ||
    !(yesPrice > 0 && yesPrice < 1) ||
    !(noPrice > 0 && noPrice < 1)
  ) {
    return reject("BAD_PRICES");
  }

  const liquidity = readNumber(raw.liquidityNum) ?? readNumber(raw.liquidity);
  if (liquidity === undefined || liquidity < 0) return reject("BAD_LIQUIDITY");

  return {
    ok: true,
    market: {
      marketId,
      question: typeof raw.question === "string" ? raw.question : "Unknown",
      yesTokenId: tokenIds[0],
      noTokenId: tokenIds[1],
      yesPrice,
      noPrice,
      liquidity,
    },
  };
}

/**
 * Placeholder forecast: the market price itself, i.e. no edge anywhere.
 * Forecasting lives outside this engine; plug a real estimator in.
 */
export class MarketPriceEstimator implements ProbabilityEstimator {
  estimateYes(market: BinaryMarket): number {
    return market.yesPrice;
  }
}

export interface OpportunityFilter {
  minEdge: number;
  minLiquidity: number;
}

/**
 * Turn markets into opportunities on the side with the larger edge,
 * best expected value first
 */
export function buildOpportunities(
  markets: BinaryMarket[],
  estimator: ProbabilityEstimator,
  filter: OpportunityFilter,
): Opportunity[] {
  const opportunities: Opportunity[] = [];

  for (const market of markets) {
    if (market.liquidity < filter.minLiquidity) continue;

    const forecast = estimator.estimateYes(market);
    if (!Number.isFinite(forecast)) continue;

    const estimate = Math.min(1, Math.max(0, forecast));
    const yesEdge = estimate - market.yesPrice;
    const noEdge = 1 - estimate - market.noPrice;

    const side: Side = yesEdge >= noEdge ? "YES" : "NO";
    const edge = side === "YES" ? yesEdge : noEdge;
    if (edge <= filter.minEdge) continue;

    const currentPrice = side === "YES" ? market.yesPrice : market.noPrice;
    opportunities.push({
      marketId: market.marketId,
      question: market.question,
      tokenId: side === "YES" ? market.yesTokenId : market.noTokenId,
      side,
      edge,
      confidence: Math.min(edge * 2, 1),
      currentPrice,
      liquidity: market.liquidity,
      expectedValue: edge / currentPrice,
    });
  }

  return opportunities.sort((a, b) => b.expectedValue - a.expectedValue);
}

export interface GammaScannerConfig extends OpportunityFilter {
  baseUrl: string;
  limit: number;
  /** HTTP timeout (default: 10000) */
  timeoutMs?: number;
  /** Backoff for transient Gamma failures (default: 3 retries from 1s) */
  retry?: Partial<RetryConfig>;
}

export class GammaMarketScanner implements OpportunitySource {
  readonly name = "gamma";
  private lastPrices: Map<string, number> = new Map();

  constructor(
    private readonly config: GammaScannerConfig,
    private readonly estimator: ProbabilityEstimator,
    private readonly logger: Logger,
  ) {}

  async scan(): Promise<OpportunitySet> {
    const result = await withRetry(
      () =>
        axios.get<unknown>(`${this.config.baseUrl}/markets`, {
          params: { active: true, closed: false, limit: this.config.limit },
          timeout: this.config.timeoutMs ?? 10000,
        }),
      this.config.retry,
      (attempt, error, delayMs) =>
        this.logger.warn(
          `[Scanner] Gamma request failed (${error.message}), retry ${attempt} in ${delayMs}ms`,
        ),
    );
    if (!result.success) {
      throw result.error;
    }
    const { data } = result.data;

    if (!Array.isArray(data)) {
      throw new AppError("Invalid response from Gamma markets API", "BAD_RESPONSE");
    }

    const markets: BinaryMarket[] = [];
    const rejected = new Map<MarketRejectReason, number>();
    for (const raw of data) {
      const result = parseGammaMarket(raw);
      if (result.ok) {
        markets.push(result.market);
        this.lastPrices.set(result.market.yesTokenId, result.market.yesPrice);
        this.lastPrices.set(result.market.noTokenId, result.market.noPrice);
      } else {
        rejected.set(result.reason, (rejected.get(result.reason) ?? 0) + 1);
      }
    }

    if (rejected.size > 0) {
      const summary = Array.from(rejected, ([reason, n]) => `${reason}=${n}`).join(", ");
      this.logger.debug(`[Scanner] Skipped malformed markets: ${summary}`);
    }

    const opportunities = buildOpportunities(markets, this.estimator, this.config);
    this.logger.info(
      `[Scanner] 📊 ${markets.length}/${data.length} markets valid, ${opportunities.length} opportunities`,
    );
    return { marketsScanned: data.length, opportunities };
  }

  /** Last price seen for a token, for exit decisions */
  lastPrice(tokenId: string): number | undefined {
    return this.lastPrices.get(tokenId);
  }
}
