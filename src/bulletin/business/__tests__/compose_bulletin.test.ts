import {
  compose,
  composeBulletin,
  composeErrorBulletin,
  escalationLine,
  momentumLabel,
  renderBulletin,
} from "@src/bulletin/business/compose_bulletin";
import { fuseSignal } from "@src/bulletin/business/fuse_signal";
import {
  AlertTier,
  QuoteSnapshot,
  TrendLabel,
  TrendResult,
} from "@src/bulletin/domain/types";

const SOURCE = "https://markets.example.com/commodities/nickel-price";
const TABLE = "Code   Name    Price    Change   Lots\n2027.TW read error";

const quote: QuoteSnapshot = {
  symbol: "NICKEL",
  displayName: "Markets Insider",
  price: 19500,
  percentChange: 2.3,
  asOf: "2024-06-03",
};

const bullish: TrendResult = {
  label: TrendLabel.BullishAligned,
  shortMa: 19320.4,
  mediumMa: 18900,
  longMa: 18100.6,
  referencePrice: 19500,
  windows: { short: 5, medium: 20, long: 60 },
};

describe("composeBulletin", () => {
  it("renders the headline with grouped price, percent and surge icon", () => {
    const message = compose({
      quote,
      composite: fuseSignal(quote, undefined),
      tableText: TABLE,
      sourceUrl: SOURCE,
    });

    expect(message).toBe(
      [
        "@here **⚠️ Nickel spike without trend confirmation, caution**",
        "🔥 **Nickel & Stainless Steel Daily** (2024-06-03)",
        "",
        "**🔩 LME Nickel (Markets Insider)**",
        "> Price: `19,500` USD",
        "> Change: `+2.3%`",
        "> Status: **🔥 Surge**",
        `> [Source](${SOURCE})`,
        "",
        "**📊 Nickel Trend (MA5/MA20/MA60)**",
        "> Signal: `Unavailable` (history retrieval failed)",
        "",
        "**🏭 Taiwan Stainless Steel Group**",
        "```yaml",
        TABLE,
        "```",
      ].join("\n")
    );
    expect(message).toContain("19,500");
    expect(message).toContain("2.3%");
  });

  it("prepends the STRONG escalation and renders the trend averages", () => {
    const bulletin = composeBulletin({
      quote,
      trend: bullish,
      composite: fuseSignal(quote, bullish),
      tableText: TABLE,
      sourceUrl: SOURCE,
      mention: "@channel",
    });

    expect(bulletin.mentionPrefix).toBe(
      "@channel **🔔 Nickel aligned breakout, act: price spike confirmed by a bullish trend**"
    );
    expect(bulletin.sections[1]).toBe(
      [
        "**📊 Nickel Trend (MA5/MA20/MA60)**",
        "> Signal: **🟢 Bullish aligned**",
        "> Close `19,500` | MA5 `19,320` | MA20 `18,900` | MA60 `18,101`",
      ].join("\n")
    );
    expect(renderBulletin(bulletin).startsWith(`${bulletin.mentionPrefix}\n🔥 `)).toBe(true);
  });

  it("omits the mention when no alert applies", () => {
    const calm = { ...quote, percentChange: 0.4 };
    const bulletin = composeBulletin({
      quote: calm,
      trend: bullish,
      composite: fuseSignal(calm, bullish),
      tableText: TABLE,
      sourceUrl: SOURCE,
    });
    expect(bulletin.mentionPrefix).toBeUndefined();
    expect(bulletin.header).toBe("⚖️ **Nickel & Stainless Steel Daily** (2024-06-03)");
    expect(renderBulletin(bulletin).startsWith("⚖️")).toBe(true);
  });

  it("degrades the headline but keeps trend and table when the quote is missing", () => {
    const bulletin = composeBulletin({
      trend: bullish,
      composite: fuseSignal(undefined, bullish),
      tableText: TABLE,
      sourceUrl: SOURCE,
    });

    expect(bulletin.header).toBe("⚠️ **Stainless Steel Daily** (nickel price unavailable)");
    expect(bulletin.sections[0]).toBe(
      [
        "**🔩 LME Nickel**",
        "> Status: `Temporarily unavailable` (the source may be blocking requests)",
        `> Check manually: [Nickel price](${SOURCE})`,
      ].join("\n")
    );
    expect(bulletin.sections[1]).toContain("Bullish aligned");
    expect(bulletin.sections[2]).toBe(
      `**🏭 Taiwan Stainless Steel Group**\n\`\`\`yaml\n${TABLE}\n\`\`\``
    );
  });

  it("explains an insufficient trend series", () => {
    const bulletin = composeBulletin({
      quote,
      trend: {
        label: TrendLabel.InsufficientData,
        required: 60,
        available: 42,
        windows: { short: 5, medium: 20, long: 60 },
      },
      composite: fuseSignal(quote, undefined),
      tableText: TABLE,
      sourceUrl: SOURCE,
    });
    expect(bulletin.sections[1]).toBe(
      "**📊 Nickel Trend (MA5/MA20/MA60)**\n> Signal: `Insufficient data` (need 60 closes, have 42)"
    );
  });

  it("is idempotent", () => {
    const input = {
      quote,
      trend: bullish,
      composite: fuseSignal(quote, bullish),
      tableText: TABLE,
      sourceUrl: SOURCE,
    };
    expect(compose(input)).toBe(compose(input));
  });
});

describe("momentumLabel", () => {
  it.each([
    [2.3, "🔥 Surge"],
    [2.0, "📈 Strengthening"],
    [1.5, "📈 Strengthening"],
    [1.0, "➖ Flat"],
    [-1.0, "➖ Flat"],
    [-1.2, "📉 Weakening"],
  ])("%p%% → %s", (pct, label) => {
    expect(momentumLabel(pct)).toBe(label);
  });
});

describe("escalationLine", () => {
  it("keeps STRONG and WATCH guidance distinct", () => {
    const strong = escalationLine(AlertTier.Strong, "@here");
    const watch = escalationLine(AlertTier.Watch, "@here");
    expect(strong).toContain("act");
    expect(watch).toContain("caution");
    expect(strong).not.toBe(watch);
    expect(escalationLine(AlertTier.None, "@here")).toBeUndefined();
  });
});

describe("composeErrorBulletin", () => {
  it("builds the minimal bulletin with the manual link", () => {
    expect(renderBulletin(composeErrorBulletin(SOURCE))).toBe(
      [
        "⚠️ **Nickel & Stainless Steel Daily** (no data available)",
        "",
        "> Every source failed this run: nickel price, trend history and the equity basket.",
        `> Check manually: [Nickel price](${SOURCE})`,
      ].join("\n")
    );
  });
});
