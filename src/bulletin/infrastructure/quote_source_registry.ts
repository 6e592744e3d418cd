import type { FetchLike } from "@src/util/http";
import type { QuoteSourceConfig } from "../config";
import type { QuoteSource, SeriesProvider } from "./contracts";
import { createMarketsInsiderSource } from "./markets_insider_source";
import { createYahooChartQuoteSource } from "./yahoo_chart_provider";

export interface QuoteSourceDependencies {
  seriesProvider: SeriesProvider;
  timeoutMs: number;
  timeZone: string;
  fetchFn?: FetchLike;
  now?: () => Date;
}

/**
 * Maps a configured source kind to its adapter.
 */
export function createQuoteSource(
  config: QuoteSourceConfig,
  deps: QuoteSourceDependencies
): QuoteSource {
  switch (config.kind) {
    case "markets-insider":
      return createMarketsInsiderSource({
        url: config.url,
        timeoutMs: deps.timeoutMs,
        timeZone: deps.timeZone,
        fetchFn: deps.fetchFn,
        now: deps.now,
      });
    case "yahoo-chart":
      return createYahooChartQuoteSource({
        ticker: config.ticker,
        provider: deps.seriesProvider,
        displayName: config.displayName,
        url: config.url,
      });
  }
}

export function createQuoteSources(
  configs: readonly QuoteSourceConfig[],
  deps: QuoteSourceDependencies
): QuoteSource[] {
  return configs.map(c => createQuoteSource(c, deps));
}
