import type { Opportunity } from "../core/types";

/**
 * Produces validated opportunities, best expected value first
 */
export interface OpportunitySource {
  /** Dependency name used for its circuit breaker and API metrics */
  readonly name: string;
  scan(): Promise<OpportunitySet>;
}

export interface OpportunitySet {
  marketsScanned: number;
  opportunities: Opportunity[];
}

/**
 * Binary market after boundary validation
 */
export interface BinaryMarket {
  marketId: string;
  question: string;
  yesTokenId: string;
  noTokenId: string;
  yesPrice: number;
  noPrice: number;
  liquidity: number;
}

/**
 * Forecast of the YES outcome's true probability
 */
export interface ProbabilityEstimator {
  estimateYes(market: BinaryMarket): number;
}
