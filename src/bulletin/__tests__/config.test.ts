import {
  DEFAULT_BULLETIN_CONFIG,
  loadBulletinConfig,
  resolveBulletinConfig,
} from "@src/bulletin/config";
import { ConfigError } from "@src/bulletin/domain/errors";

describe("bulletin config", () => {
  const originalEnv = process.env;
  beforeEach(() => {
    process.env = { ...originalEnv };
    for (const key of [
      "QUOTE_SOURCES",
      "TREND_TICKER",
      "ASSET_BASKET",
      "PRICE_THRESHOLD",
      "MA_WINDOWS",
      "ASSET_LOOKBACK",
      "DISCORD_WEBHOOK",
      "BULLETIN_USERNAME",
      "BULLETIN_MENTION",
      "BULLETIN_TABLE_TITLE",
      "HTTP_TIMEOUT_MS",
      "BULLETIN_TIME_ZONE",
    ]) {
      delete process.env[key];
    }
  });
  afterAll(() => {
    process.env = originalEnv;
  });

  test("defaults match the production basket and thresholds", () => {
    const config = loadBulletinConfig();
    expect(config).toEqual(DEFAULT_BULLETIN_CONFIG);
    expect(config.windows).toEqual({ short: 5, medium: 20, long: 60 });
    expect(config.priceThreshold).toBe(1.0);
    expect(config.basket.map(a => a.symbol)).toEqual([
      "2027.TW",
      "2034.TW",
      "2030.TW",
      "2015.TW",
      "2025.TW",
    ]);
  });

  test("env overrides are parsed and validated", () => {
    process.env.MA_WINDOWS = "3,10,30";
    process.env.PRICE_THRESHOLD = "1.5";
    process.env.DISCORD_WEBHOOK = "https://discord.example.com/api/webhooks/1/test-token";
    process.env.QUOTE_SOURCES = JSON.stringify([
      { kind: "yahoo-chart", ticker: "NI=F" },
      { kind: "markets-insider" },
    ]);
    process.env.ASSET_BASKET = JSON.stringify([
      { symbol: "2027.TW", name: "大成鋼", tag: "core" },
    ]);

    const config = loadBulletinConfig();

    expect(config.windows).toEqual({ short: 3, medium: 10, long: 30 });
    expect(config.priceThreshold).toBe(1.5);
    expect(config.webhookUrl).toBe("https://discord.example.com/api/webhooks/1/test-token");
    expect(config.quoteSources.map(s => s.kind)).toEqual(["yahoo-chart", "markets-insider"]);
    expect(config.basket).toEqual([{ symbol: "2027.TW", name: "大成鋼", tag: "core" }]);
  });

  test("stage-specific values win over plain ones", () => {
    process.env.STAGE = "prod";
    process.env.TREND_TICKER = "NI=F";
    process.env.TREND_TICKER__prod = "NICKEL.L";
    expect(loadBulletinConfig().trendTicker).toBe("NICKEL.L");
  });

  test("non-increasing windows are rejected", () => {
    process.env.MA_WINDOWS = "20,5,60";
    expect(() => loadBulletinConfig()).toThrow(ConfigError);
  });

  test("a malformed number is a ConfigError", () => {
    process.env.PRICE_THRESHOLD = "abc";
    expect(() => loadBulletinConfig()).toThrow(ConfigError);
  });

  test("unknown source kinds are listed in the error issues", () => {
    try {
      resolveBulletinConfig({ quoteSources: [{ kind: "moneydj" }] });
      throw new Error("expected ConfigError");
    } catch (err) {
      expect(err).toBeInstanceOf(ConfigError);
      if (!(err instanceof ConfigError)) return;
      expect(err.issues[0]).toMatch(/^quoteSources\.0\.kind: /);
    }
  });

  test("an empty source list is rejected", () => {
    expect(() => resolveBulletinConfig({ quoteSources: [] })).toThrow(
      "Invalid bulletin configuration"
    );
  });
});
