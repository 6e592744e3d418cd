/**
 * Bulletin composition. Pure: identical inputs give byte-identical output.
 *
 * Sections render independently from whatever data is present; the asset
 * table is always appended.
 */
import {
  formatHeadlinePercent,
  formatHeadlinePrice,
} from "@src/util/format";
import {
  AlertTier,
  Bulletin,
  CompositeSignal,
  MovingAverageWindows,
  QuoteSnapshot,
  TrendLabel,
  TrendResult,
} from "../domain/types";
import { DEFAULT_WINDOWS } from "./classify_trend";

export const DEFAULT_MENTION = "@here";
export const DEFAULT_TABLE_TITLE = "Taiwan Stainless Steel Group";

export interface ComposeInput {
  quote?: QuoteSnapshot;
  trend?: TrendResult;
  composite: CompositeSignal;
  tableText: string;
  /** Manual fallback link when the primary quote is unavailable */
  sourceUrl: string;
  mention?: string;
  tableTitle?: string;
  /** Used for the trend heading when no trend result exists */
  windows?: MovingAverageWindows;
}

export function composeBulletin(input: ComposeInput): Bulletin {
  const { quote, composite } = input;

  const header = quote
    ? `${composite.priceBullish ? "🔥" : "⚖️"} **Nickel & Stainless Steel Daily** (${quote.asOf})`
    : "⚠️ **Stainless Steel Daily** (nickel price unavailable)";

  const sections = [
    quote ? quoteSection(quote, input.sourceUrl) : degradedQuoteSection(input.sourceUrl),
    trendSection(input.trend, input.windows ?? DEFAULT_WINDOWS),
    tableSection(input.tableText, input.tableTitle ?? DEFAULT_TABLE_TITLE),
  ];

  return {
    header,
    sections,
    mentionPrefix: escalationLine(composite.alertTier, input.mention ?? DEFAULT_MENTION),
  };
}

export function renderBulletin(bulletin: Bulletin): string {
  const body = [bulletin.header, ...bulletin.sections].join("\n\n");
  return bulletin.mentionPrefix ? `${bulletin.mentionPrefix}\n${body}` : body;
}

export function compose(input: ComposeInput): string {
  return renderBulletin(composeBulletin(input));
}

/**
 * Sent instead of the normal bulletin when no section has usable data.
 */
export function composeErrorBulletin(sourceUrl: string): Bulletin {
  return {
    header: "⚠️ **Nickel & Stainless Steel Daily** (no data available)",
    sections: [
      [
        "> Every source failed this run: nickel price, trend history and the equity basket.",
        `> Check manually: [Nickel price](${sourceUrl})`,
      ].join("\n"),
    ],
  };
}

/**
 * Thresholds are checked from the strongest move down.
 */
export function momentumLabel(percentChange: number): string {
  if (percentChange > 2.0) return "🔥 Surge";
  if (percentChange > 1.0) return "📈 Strengthening";
  if (percentChange < -1.0) return "📉 Weakening";
  return "➖ Flat";
}

const TREND_TEXT: Record<Exclude<TrendLabel, TrendLabel.InsufficientData>, string> = {
  [TrendLabel.BullishAligned]: "🟢 Bullish aligned",
  [TrendLabel.Rebound]: "🟡 Rebound",
  [TrendLabel.BearishAligned]: "🔴 Bearish aligned",
  [TrendLabel.Pullback]: "🟠 Pullback",
  [TrendLabel.Flat]: "⚪ Flat",
};

export function escalationLine(tier: AlertTier, mention: string): string | undefined {
  switch (tier) {
    case AlertTier.Strong:
      return `${mention} **🔔 Nickel aligned breakout, act: price spike confirmed by a bullish trend**`;
    case AlertTier.Watch:
      return `${mention} **⚠️ Nickel spike without trend confirmation, caution**`;
    case AlertTier.None:
      return undefined;
  }
}

function quoteSection(quote: QuoteSnapshot, sourceUrl: string): string {
  return [
    `**🔩 LME Nickel (${quote.displayName})**`,
    `> Price: \`${formatHeadlinePrice(quote.price)}\` USD`,
    `> Change: \`${formatHeadlinePercent(quote.percentChange)}\``,
    `> Status: **${momentumLabel(quote.percentChange)}**`,
    `> [Source](${sourceUrl})`,
  ].join("\n");
}

function degradedQuoteSection(sourceUrl: string): string {
  return [
    "**🔩 LME Nickel**",
    "> Status: `Temporarily unavailable` (the source may be blocking requests)",
    `> Check manually: [Nickel price](${sourceUrl})`,
  ].join("\n");
}

function trendSection(
  trend: TrendResult | undefined,
  fallbackWindows: MovingAverageWindows
): string {
  const w = trend?.windows ?? fallbackWindows;
  const heading = `**📊 Nickel Trend (MA${w.short}/MA${w.medium}/MA${w.long})**`;

  if (!trend) {
    return `${heading}\n> Signal: \`Unavailable\` (history retrieval failed)`;
  }
  if (trend.label === TrendLabel.InsufficientData) {
    return `${heading}\n> Signal: \`Insufficient data\` (need ${trend.required} closes, have ${trend.available})`;
  }
  return [
    heading,
    `> Signal: **${TREND_TEXT[trend.label]}**`,
    `> Close \`${formatHeadlinePrice(trend.referencePrice)}\`` +
      ` | MA${w.short} \`${formatHeadlinePrice(trend.shortMa)}\`` +
      ` | MA${w.medium} \`${formatHeadlinePrice(trend.mediumMa)}\`` +
      ` | MA${w.long} \`${formatHeadlinePrice(trend.longMa)}\``,
  ].join("\n");
}

function tableSection(tableText: string, title: string): string {
  return `**🏭 ${title}**\n\`\`\`yaml\n${tableText}\n\`\`\``;
}
