import type { SeriesProvider } from "@src/bulletin/infrastructure/contracts";
import {
  createQuoteSource,
  createQuoteSources,
} from "@src/bulletin/infrastructure/quote_source_registry";
import { MARKETS_INSIDER_NICKEL_URL } from "@src/bulletin/infrastructure/markets_insider_source";

const seriesProvider: SeriesProvider = {
  id: "stub",
  fetchSeries: jest.fn(async () => [{ date: "2024-06-03", close: 16000 }]),
};
const deps = { seriesProvider, timeoutMs: 1000, timeZone: "UTC" };

describe("quote source registry", () => {
  it("selects the markets insider scraper", () => {
    const source = createQuoteSource({ kind: "markets-insider" }, deps);
    expect(source.id).toBe("markets-insider");
    expect(source.url).toBe(MARKETS_INSIDER_NICKEL_URL);
  });

  it("selects a chart-backed source that reads through the series provider", async () => {
    const source = createQuoteSource(
      { kind: "yahoo-chart", ticker: "NI=F", displayName: "COMEX Nickel" },
      deps
    );
    expect(source.id).toBe("yahoo-chart:NI=F");
    const quote = await source.fetchQuote();
    expect(quote.displayName).toBe("COMEX Nickel");
    expect(quote.price).toBe(16000);
  });

  it("keeps configuration order", () => {
    const sources = createQuoteSources(
      [
        { kind: "yahoo-chart", ticker: "NI=F" },
        { kind: "markets-insider", url: "https://mirror.example.com/nickel" },
      ],
      deps
    );
    expect(sources.map(s => s.id)).toEqual(["yahoo-chart:NI=F", "markets-insider"]);
    expect(sources[1].url).toBe("https://mirror.example.com/nickel");
  });
});
