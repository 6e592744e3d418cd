/**
 * Markets Insider (Business Insider) commodity page scraper.
 *
 * Price comes from the price-section span, else the first `push-data` span.
 * A missing percent change reads as 0; a missing price is a retrieval failure.
 */
import { formatDate } from "@src/util/format";
import { BROWSER_HEADERS, FetchLike, fetchText } from "@src/util/http";
import { getLogger } from "@src/util/logger";
import { RetrievalFailure, describeError } from "../domain/errors";
import type { QuoteSnapshot } from "../domain/types";
import type { QuoteSource } from "./contracts";

export const MARKETS_INSIDER_NICKEL_URL =
  "https://markets.businessinsider.com/commodities/nickel-price";

export interface MarketsInsiderSourceOptions {
  url?: string;
  symbol?: string;
  timeoutMs?: number;
  timeZone?: string;
  fetchFn?: FetchLike;
  now?: () => Date;
}

export interface ParsedInsiderQuote {
  price: number;
  percentChange: number;
}

export function createMarketsInsiderSource(
  options: MarketsInsiderSourceOptions = {}
): QuoteSource {
  const id = "markets-insider";
  const url = options.url ?? MARKETS_INSIDER_NICKEL_URL;
  const logger = getLogger("bulletin/markets_insider_source");
  const now = options.now ?? (() => new Date());

  return {
    id,
    url,
    async fetchQuote(): Promise<QuoteSnapshot> {
      let html: string;
      try {
        html = await fetchText(url, {
          headers: { ...BROWSER_HEADERS },
          timeoutMs: options.timeoutMs ?? 10_000,
          fetchFn: options.fetchFn,
        });
      } catch (err) {
        throw new RetrievalFailure(id, describeError(err), { cause: err });
      }

      const parsed = parseMarketsInsiderQuote(html);
      if (!parsed) {
        throw new RetrievalFailure(id, "price element not found (page layout may have changed)");
      }
      logger.debug({ url, ...parsed }, "markets insider quote parsed");

      return {
        symbol: options.symbol ?? "NICKEL",
        displayName: "Markets Insider",
        price: parsed.price,
        percentChange: parsed.percentChange,
        asOf: formatDate(now(), options.timeZone),
      };
    },
  };
}

export function parseMarketsInsiderQuote(html: string): ParsedInsiderQuote | undefined {
  const priceText =
    findSpanText(html, "price-section__current-value") ??
    findSpanText(html, "push-data");
  if (priceText === undefined) return undefined;

  const price = Number(priceText.replace(/,/g, ""));
  if (!Number.isFinite(price) || priceText === "") return undefined;

  return { price, percentChange: parsePercent(findSpanText(html, "price-section__relative-value")) };
}

/** "-0.45%", "−0.45%", "+0.45%", "(-0.45%)"; anything unreadable becomes 0 */
function parsePercent(text: string | undefined): number {
  if (text === undefined) return 0;
  const cleaned = text.replace(/\u2212/g, "-").replace(/[%+()\s]/g, "");
  if (cleaned === "") return 0;
  const value = Number(cleaned);
  return Number.isFinite(value) ? value : 0;
}

function findSpanText(html: string, className: string): string | undefined {
  const re = new RegExp(
    `<span[^>]*\\bclass="(?:[^"]*\\s)?${className}(?:\\s[^"]*)?"[^>]*>([\\s\\S]*?)</span>`,
    "i"
  );
  const m = html.match(re);
  if (!m) return undefined;
  return decodeEntities(m[1].replace(/<[^>]+>/g, "")).trim();
}

function decodeEntities(text: string): string {
  return text
    .replace(/&nbsp;/g, " ")
    .replace(/&#43;/g, "+")
    .replace(/&minus;/g, "-")
    .replace(/&amp;/g, "&");
}
