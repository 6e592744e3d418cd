import {
  AlertTier,
  CompositeSignal,
  QuoteSnapshot,
  TrendLabel,
  TrendResult,
} from "../domain/types";

export const DEFAULT_PRICE_THRESHOLD = 1.0;

/**
 * Fuses the instantaneous price move with the trend label.
 * Either input may be absent after an upstream retrieval failure.
 *
 * STRONG: price spike confirmed by an aligned bullish trend.
 * WATCH: price spike without trend confirmation (higher risk, not higher confidence).
 */
export function fuseSignal(
  quote: QuoteSnapshot | undefined,
  trend: TrendResult | undefined,
  priceThreshold: number = DEFAULT_PRICE_THRESHOLD
): CompositeSignal {
  const priceBullish =
    quote !== undefined && quote.percentChange > priceThreshold;
  const trendBullish =
    trend !== undefined && trend.label === TrendLabel.BullishAligned;

  let alertTier = AlertTier.None;
  if (priceBullish && trendBullish) alertTier = AlertTier.Strong;
  else if (priceBullish) alertTier = AlertTier.Watch;

  return { priceBullish, trendBullish, alertTier };
}
