/**
 * Full Kelly fraction for buying a binary outcome token.
 *
 * Buying at `price` pays (1 - price) / price per dollar on a win, and the
 * estimated win probability is price + edge. Kelly f = (b*p - q) / b then
 * reduces to edge / (1 - price).
 */
export function kellyFraction(edge: number, price: number): number {
  if (!(price > 0 && price < 1) || !Number.isFinite(edge)) return 0;

  const winProb = Math.min(1, Math.max(0, price + edge));
  const odds = (1 - price) / price;
  const kelly = (odds * winProb - (1 - winProb)) / odds;
  return Math.max(0, kelly);
}

/** Truncate to whole cents so a size never rounds up past a limit */
export function roundDownToCents(amount: number): number {
  // The nudge absorbs binary noise such as 40 -> 39.99999999999999
  return Math.floor(amount * 100 + 1e-7) / 100;
}

export interface KellySizeParams {
  edge: number;
  price: number;
  confidence: number;
  balance: number;
  kellyMultiplier: number;
}

/**
 * Scaled (fractional) Kelly stake in dollars, before clipping.
 * Any non-finite input sizes to 0.
 */
export function computeKellySize(params: KellySizeParams): number {
  const full = kellyFraction(params.edge, params.price);
  const confidence = Math.min(1, Math.max(0, params.confidence));
  const stake =
    full * params.kellyMultiplier * confidence * Math.max(0, params.balance);
  return Number.isFinite(stake) ? roundDownToCents(stake) : 0;
}

export function clip(value: number, min: number, max: number): number {
  return Math.min(max, Math.max(min, value));
}
