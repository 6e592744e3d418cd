/**
 * Bulletin configuration: one explicit struct handed to the engine.
 * Defaults mirror the production setup; `loadBulletinConfig` layers env vars on top.
 */
import { z } from "zod";
import { getJson, getList, getNumber, getString } from "@src/util/env";
import { ConfigError } from "./domain/errors";

export const quoteSourceConfigSchema = z.discriminatedUnion("kind", [
  z.object({
    kind: z.literal("markets-insider"),
    url: z.string().url().optional(),
  }),
  z.object({
    kind: z.literal("yahoo-chart"),
    ticker: z.string().min(1),
    url: z.string().url().optional(),
    displayName: z.string().optional(),
  }),
]);

export type QuoteSourceConfig = z.infer<typeof quoteSourceConfigSchema>;

export const basketAssetSchema = z.object({
  symbol: z.string().min(1),
  name: z.string().min(1),
  tag: z.string().min(1).optional(),
});

const windowsSchema = z
  .object({
    short: z.number().int().positive(),
    medium: z.number().int().positive(),
    long: z.number().int().positive(),
  })
  .refine(w => w.short < w.medium && w.medium < w.long, {
    message: "windows must be strictly increasing (short < medium < long)",
  });

export const bulletinConfigSchema = z.object({
  quoteSources: z.array(quoteSourceConfigSchema).min(1),
  trendTicker: z.string().min(1),
  basket: z.array(basketAssetSchema),
  priceThreshold: z.number().finite(),
  windows: windowsSchema,
  assetLookback: z.number().int().positive(),
  webhookUrl: z.string().url().optional(),
  botUsername: z.string().min(1),
  mention: z.string().min(1),
  tableTitle: z.string().min(1),
  httpTimeoutMs: z.number().int().positive(),
  timeZone: z.string().min(1),
});

export type BulletinConfig = z.infer<typeof bulletinConfigSchema>;

export const DEFAULT_BULLETIN_CONFIG: BulletinConfig = {
  quoteSources: [
    {
      kind: "markets-insider",
      url: "https://markets.businessinsider.com/commodities/nickel-price",
    },
  ],
  trendTicker: "NI=F",
  basket: [
    { symbol: "2027.TW", name: "大成鋼" },
    { symbol: "2034.TW", name: "允強" },
    { symbol: "2030.TW", name: "彰源" },
    { symbol: "2015.TW", name: "豐興" },
    { symbol: "2025.TW", name: "千興" },
  ],
  priceThreshold: 1.0,
  windows: { short: 5, medium: 20, long: 60 },
  assetLookback: 5,
  webhookUrl: undefined,
  botUsername: "Stainless Strategy Bot",
  mention: "@here",
  tableTitle: "Taiwan Stainless Steel Group",
  httpTimeoutMs: 10_000,
  timeZone: "Asia/Taipei",
};

/**
 * Validates a partial config over the defaults.
 */
export function resolveBulletinConfig(
  overrides: Partial<Record<keyof BulletinConfig, unknown>> = {}
): BulletinConfig {
  const merged: Record<string, unknown> = { ...DEFAULT_BULLETIN_CONFIG };
  for (const [key, value] of Object.entries(overrides)) {
    if (value !== undefined) merged[key] = value;
  }

  const parsed = bulletinConfigSchema.safeParse(merged);
  if (!parsed.success) {
    const issues = parsed.error.issues.map(
      i => `${i.path.join(".") || "(root)"}: ${i.message}`
    );
    throw new ConfigError(`Invalid bulletin configuration: ${issues.join("; ")}`, issues);
  }
  return parsed.data;
}

/**
 * Reads overrides from the environment (stage-aware, see util/env).
 */
export function loadBulletinConfig(): BulletinConfig {
  let overrides: Partial<Record<keyof BulletinConfig, unknown>>;
  try {
    overrides = {
      quoteSources: getJson("QUOTE_SOURCES"),
      trendTicker: getString("TREND_TICKER"),
      basket: getJson("ASSET_BASKET"),
      priceThreshold: getNumber("PRICE_THRESHOLD"),
      windows: parseWindows(getList("MA_WINDOWS")),
      assetLookback: getNumber("ASSET_LOOKBACK"),
      webhookUrl: getString("DISCORD_WEBHOOK"),
      botUsername: getString("BULLETIN_USERNAME"),
      mention: getString("BULLETIN_MENTION"),
      tableTitle: getString("BULLETIN_TABLE_TITLE"),
      httpTimeoutMs: getNumber("HTTP_TIMEOUT_MS"),
      timeZone: getString("BULLETIN_TIME_ZONE"),
    };
  } catch (err) {
    throw new ConfigError(err instanceof Error ? err.message : String(err));
  }
  return resolveBulletinConfig(overrides);
}

/** "5,20,60" → { short: 5, medium: 20, long: 60 } */
function parseWindows(
  parts: string[] | undefined
): { short: number; medium: number; long: number } | undefined {
  if (!parts) return undefined;
  if (parts.length !== 3) {
    throw new Error(`MA_WINDOWS needs three values, got ${parts.length}`);
  }
  const [short, medium, long] = parts.map(Number);
  return { short, medium, long };
}
