/**
 * Trend classification from simple moving averages.
 *
 * The reference price is the latest close. Only strict `>` / `<` comparisons
 * are used; any equality that no branch covers lands on FLAT.
 */
import {
  MovingAverageWindows,
  PriceSeries,
  TrendLabel,
  TrendResult,
} from "../domain/types";

export const DEFAULT_WINDOWS: MovingAverageWindows = {
  short: 5,
  medium: 20,
  long: 60,
};

export function classifyTrend(
  series: PriceSeries,
  windows: MovingAverageWindows = DEFAULT_WINDOWS
): TrendResult {
  assertWindows(windows);

  if (series.length < windows.long) {
    return {
      label: TrendLabel.InsufficientData,
      required: windows.long,
      available: series.length,
      windows,
    };
  }

  const closes = series.map(p => p.close);
  const referencePrice = closes[closes.length - 1];
  const shortMa = trailingMean(closes, windows.short);
  const mediumMa = trailingMean(closes, windows.medium);
  const longMa = trailingMean(closes, windows.long);

  return {
    label: labelFor(referencePrice, mediumMa, longMa),
    shortMa,
    mediumMa,
    longMa,
    referencePrice,
    windows,
  };
}

/**
 * Ordered by specificity; the first matching branch wins.
 */
export function labelFor(
  referencePrice: number,
  mediumMa: number,
  longMa: number
): Exclude<TrendLabel, TrendLabel.InsufficientData> {
  if (referencePrice > mediumMa && mediumMa > longMa) {
    return TrendLabel.BullishAligned;
  }
  if (referencePrice > mediumMa && mediumMa <= longMa) {
    return TrendLabel.Rebound;
  }
  if (referencePrice < mediumMa && mediumMa < longMa) {
    return TrendLabel.BearishAligned;
  }
  if (referencePrice < mediumMa && mediumMa >= longMa) {
    return TrendLabel.Pullback;
  }
  return TrendLabel.Flat;
}

/**
 * Arithmetic mean of the last `window` values. Caller guarantees length.
 */
export function trailingMean(values: readonly number[], window: number): number {
  let sum = 0;
  for (let i = values.length - window; i < values.length; i++) {
    sum += values[i];
  }
  return sum / window;
}

function assertWindows(windows: MovingAverageWindows): void {
  const { short, medium, long } = windows;
  for (const w of [short, medium, long]) {
    if (!Number.isInteger(w) || w <= 0) {
      throw new RangeError(`Moving-average window must be a positive integer: ${w}`);
    }
  }
  if (!(short < medium && medium < long)) {
    throw new RangeError(
      `Moving-average windows must increase: ${short}/${medium}/${long}`
    );
  }
}
