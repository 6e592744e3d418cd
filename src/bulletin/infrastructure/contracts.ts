import type { Result } from "@src/util/result";
import type { DeliveryFailure } from "../domain/errors";
import type { PriceSeries, QuoteSnapshot } from "../domain/types";

/**
 * Primary commodity quote source. Implementations throw RetrievalFailure.
 */
export interface QuoteSource {
  /** Stable identifier used in logs, e.g. "markets-insider" */
  readonly id: string;
  /** Human-facing page for manual lookup when retrieval fails */
  readonly url: string;
  fetchQuote(): Promise<QuoteSnapshot>;
}

/**
 * Daily close history provider. Implementations throw RetrievalFailure.
 * Returns at most `lookback` observations, oldest → newest.
 */
export interface SeriesProvider {
  readonly id: string;
  fetchSeries(ticker: string, lookback: number): Promise<PriceSeries>;
}

/**
 * Outbound notification channel. Never throws.
 */
export interface DeliverySink {
  readonly id: string;
  deliver(message: string): Promise<Result<void, DeliveryFailure>>;
}
