/**
 * Yahoo Finance chart API: daily closes and volume for a ticker.
 */
import { z } from "zod";
import { formatDate } from "@src/util/format";
import { BROWSER_HEADERS, FetchLike, fetchText } from "@src/util/http";
import { getLogger } from "@src/util/logger";
import { RetrievalFailure, describeError } from "../domain/errors";
import type { PricePoint, PriceSeries, QuoteSnapshot } from "../domain/types";
import type { QuoteSource, SeriesProvider } from "./contracts";

export const YAHOO_CHART_BASE_URL = "https://query1.finance.yahoo.com";

const chartSchema = z.object({
  chart: z.object({
    result: z
      .array(
        z.object({
          meta: z.object({
            symbol: z.string().optional(),
            gmtoffset: z.number().optional(),
          }),
          timestamp: z.array(z.number()).optional(),
          indicators: z.object({
            quote: z.array(
              z.object({
                close: z.array(z.number().nullable()).optional(),
                volume: z.array(z.number().nullable()).optional(),
              })
            ),
          }),
        })
      )
      .nullable(),
    error: z
      .object({ code: z.string(), description: z.string().nullable().optional() })
      .nullable()
      .optional(),
  }),
});

export interface YahooChartProviderOptions {
  baseUrl?: string;
  timeoutMs?: number;
  fetchFn?: FetchLike;
}

export function createYahooChartProvider(
  options: YahooChartProviderOptions = {}
): SeriesProvider {
  const id = "yahoo-chart";
  const baseUrl = options.baseUrl ?? YAHOO_CHART_BASE_URL;
  const logger = getLogger("bulletin/yahoo_chart_provider");

  return {
    id,
    async fetchSeries(ticker: string, lookback: number): Promise<PriceSeries> {
      if (!Number.isInteger(lookback) || lookback <= 0) {
        throw new RangeError(`lookback must be a positive integer: ${lookback}`);
      }
      const url = `${baseUrl}/v8/finance/chart/${encodeURIComponent(ticker)}?range=${rangeFor(lookback)}&interval=1d`;

      let body: string;
      try {
        body = await fetchText(url, {
          headers: { ...BROWSER_HEADERS, Accept: "application/json" },
          timeoutMs: options.timeoutMs ?? 10_000,
          fetchFn: options.fetchFn,
        });
      } catch (err) {
        throw new RetrievalFailure(id, `${ticker}: ${describeError(err)}`, { cause: err });
      }

      const points = parseChartSeries(ticker, body).slice(-lookback);
      logger.debug({ ticker, lookback, count: points.length }, "chart series fetched");
      return points;
    },
  };
}

/**
 * Parses a chart payload into daily points, oldest → newest.
 * Null closes (halted sessions) are dropped.
 */
export function parseChartSeries(ticker: string, body: string): PricePoint[] {
  let json: unknown;
  try {
    json = JSON.parse(body);
  } catch (err) {
    throw new RetrievalFailure("yahoo-chart", `${ticker}: invalid JSON`, { cause: err });
  }

  const parsed = chartSchema.safeParse(json);
  if (!parsed.success) {
    throw new RetrievalFailure("yahoo-chart", `${ticker}: unexpected payload shape`, {
      cause: parsed.error,
    });
  }

  const { result, error } = parsed.data.chart;
  if (error) {
    throw new RetrievalFailure(
      "yahoo-chart",
      `${ticker}: ${error.code}${error.description ? ` ${error.description}` : ""}`
    );
  }
  const entry = result?.[0];
  if (!entry) return [];

  const timestamps = entry.timestamp ?? [];
  const quote = entry.indicators.quote[0];
  const closes = quote?.close ?? [];
  const volumes = quote?.volume ?? [];
  const offset = entry.meta.gmtoffset ?? 0;

  const points: PricePoint[] = [];
  timestamps.forEach((ts, i) => {
    const close = closes[i];
    if (close == null || !Number.isFinite(close)) return;
    const volume = volumes[i];
    points.push({
      date: formatDate(new Date((ts + offset) * 1000)),
      close,
      ...(volume != null ? { volume } : {}),
    });
  });
  return points;
}

/** Calendar range wide enough to hold `lookback` trading sessions. */
export function rangeFor(lookback: number): string {
  if (lookback <= 15) return "1mo";
  if (lookback <= 45) return "3mo";
  if (lookback <= 90) return "6mo";
  if (lookback <= 180) return "1y";
  if (lookback <= 360) return "2y";
  return "5y";
}

export interface YahooChartQuoteSourceOptions {
  ticker: string;
  provider: SeriesProvider;
  displayName?: string;
  url?: string;
}

/**
 * Quote source derived from the two most recent daily closes.
 */
export function createYahooChartQuoteSource(
  options: YahooChartQuoteSourceOptions
): QuoteSource {
  const { ticker, provider } = options;
  const id = `yahoo-chart:${ticker}`;

  return {
    id,
    url: options.url ?? `https://finance.yahoo.com/quote/${encodeURIComponent(ticker)}`,
    async fetchQuote(): Promise<QuoteSnapshot> {
      const series = await provider.fetchSeries(ticker, 2);
      const latest = series[series.length - 1];
      if (!latest) throw new RetrievalFailure(id, "no observations");
      const previous = series.length >= 2 ? series[series.length - 2] : undefined;
      const percentChange =
        previous && previous.close !== 0
          ? ((latest.close - previous.close) / previous.close) * 100
          : 0;

      return {
        symbol: ticker,
        displayName: options.displayName ?? "Yahoo Finance",
        price: latest.close,
        percentChange,
        asOf: latest.date,
      };
    },
  };
}
