/**
 * Domain types for the nickel bulletin.
 */

export interface QuoteSnapshot {
  symbol: string;
  displayName: string;
  price: number;
  /** Signed percent, e.g. 2.3 for +2.3% */
  percentChange: number;
  asOf: string; // YYYY-MM-DD
  tag?: string;
}

export interface PricePoint {
  date: string; // YYYY-MM-DD
  close: number;
  volume?: number;
}

/** Ordered oldest → newest. */
export type PriceSeries = readonly PricePoint[];

export enum TrendLabel {
  BullishAligned = "BULLISH_ALIGNED",
  Rebound = "REBOUND",
  BearishAligned = "BEARISH_ALIGNED",
  Pullback = "PULLBACK",
  Flat = "FLAT",
  InsufficientData = "INSUFFICIENT_DATA",
}

export interface MovingAverageWindows {
  short: number;
  medium: number;
  long: number;
}

export interface ClassifiedTrend {
  label: Exclude<TrendLabel, TrendLabel.InsufficientData>;
  shortMa: number;
  mediumMa: number;
  longMa: number;
  referencePrice: number;
  windows: MovingAverageWindows;
}

export interface InsufficientTrend {
  label: TrendLabel.InsufficientData;
  required: number;
  available: number;
  windows: MovingAverageWindows;
}

export type TrendResult = ClassifiedTrend | InsufficientTrend;

export enum AlertTier {
  None = "NONE",
  Watch = "WATCH",
  Strong = "STRONG",
}

export interface CompositeSignal {
  priceBullish: boolean;
  trendBullish: boolean;
  alertTier: AlertTier;
}

export interface Bulletin {
  header: string;
  sections: readonly string[];
  mentionPrefix?: string;
}

/** One configured basket member. */
export interface BasketAsset {
  symbol: string;
  name: string;
  tag?: string;
}
