/**
 * One bulletin run: primary quote → trend → fusion → asset table → compose → deliver.
 *
 * Steps run sequentially. Adapter failures never escape this class; each is
 * logged and downgraded to absence so the remaining sections still render.
 */
import type { Logger } from "pino";
import { getLogger } from "@src/util/logger";
import type { FetchLike } from "@src/util/http";
import type { Result } from "@src/util/result";
import type { BulletinConfig } from "../config";
import { renderAssetTable } from "../business/asset_table";
import type { AssetTable } from "../business/asset_table";
import { classifyTrend } from "../business/classify_trend";
import {
  composeBulletin,
  composeErrorBulletin,
  renderBulletin,
} from "../business/compose_bulletin";
import { fuseSignal } from "../business/fuse_signal";
import { DeliveryFailure, describeError } from "../domain/errors";
import {
  Bulletin,
  CompositeSignal,
  PriceSeries,
  QuoteSnapshot,
  TrendLabel,
  TrendResult,
} from "../domain/types";
import type {
  DeliverySink,
  QuoteSource,
  SeriesProvider,
} from "../infrastructure/contracts";
import { createDiscordWebhookSink } from "../infrastructure/discord_webhook_sink";
import { createQuoteSources } from "../infrastructure/quote_source_registry";
import { createYahooChartProvider } from "../infrastructure/yahoo_chart_provider";

export interface BulletinEngineDependencies {
  /** Tried in order; the first success is the primary quote */
  quoteSources: readonly QuoteSource[];
  seriesProvider: SeriesProvider;
  sink: DeliverySink;
  logger?: Logger;
}

export interface BulletinBuild {
  message: string;
  bulletin: Bulletin;
  quote?: QuoteSnapshot;
  /** Source that produced the primary quote */
  quoteSourceId?: string;
  trend?: TrendResult;
  composite: CompositeSignal;
  table: AssetTable;
  /** True when no section had usable data and the error bulletin was built */
  degradedToError: boolean;
}

export interface BulletinRunResult extends BulletinBuild {
  delivery: Result<void, DeliveryFailure>;
}

export class BulletinEngine {
  private readonly logger: Logger;

  constructor(
    private readonly config: BulletinConfig,
    private readonly deps: BulletinEngineDependencies
  ) {
    if (deps.quoteSources.length === 0) {
      throw new RangeError("BulletinEngine needs at least one quote source");
    }
    this.logger = deps.logger ?? getLogger("bulletin/engine");
  }

  /**
   * Builds the message without delivering it.
   */
  async build(): Promise<BulletinBuild> {
    const primary = await this.fetchPrimaryQuote();
    const trend = await this.fetchTrend();
    const composite = fuseSignal(primary?.quote, trend, this.config.priceThreshold);
    const table = await renderAssetTable(this.config.basket, this.deps.seriesProvider, {
      lookback: this.config.assetLookback,
    });

    const sourceUrl = this.deps.quoteSources[0].url;
    const trendUsable = trend !== undefined && trend.label !== TrendLabel.InsufficientData;
    const degradedToError = !primary && !trendUsable && table.okCount === 0;

    const bulletin = degradedToError
      ? composeErrorBulletin(sourceUrl)
      : composeBulletin({
          quote: primary?.quote,
          trend,
          composite,
          tableText: table.text,
          sourceUrl: primary?.url ?? sourceUrl,
          mention: this.config.mention,
          tableTitle: this.config.tableTitle,
          windows: this.config.windows,
        });

    return {
      message: renderBulletin(bulletin),
      bulletin,
      quote: primary?.quote,
      quoteSourceId: primary?.sourceId,
      trend,
      composite,
      table,
      degradedToError,
    };
  }

  /**
   * Builds and hands the message to the sink. Delivery failure is logged, not retried.
   */
  async run(): Promise<BulletinRunResult> {
    const built = await this.build();
    const delivery = await this.deps.sink.deliver(built.message);

    const summary = {
      alertTier: built.composite.alertTier,
      quoteSource: built.quoteSourceId ?? null,
      trend: built.trend?.label ?? null,
      assetsOk: built.table.okCount,
      assetsTotal: built.table.rows.length,
      degradedToError: built.degradedToError,
      delivered: delivery.ok,
    };
    if (delivery.ok) {
      this.logger.info(summary, "bulletin run complete");
    } else {
      this.logger.warn(
        { ...summary, sink: this.deps.sink.id, error: delivery.error.message },
        "bulletin run complete, delivery failed"
      );
    }
    return { ...built, delivery };
  }

  private async fetchPrimaryQuote(): Promise<
    { quote: QuoteSnapshot; sourceId: string; url: string } | undefined
  > {
    for (const source of this.deps.quoteSources) {
      try {
        const quote = await source.fetchQuote();
        this.logger.debug({ source: source.id, price: quote.price }, "primary quote retrieved");
        return { quote, sourceId: source.id, url: source.url };
      } catch (err) {
        this.logger.warn(
          { source: source.id, error: describeError(err) },
          "primary quote retrieval failed"
        );
      }
    }
    return undefined;
  }

  /**
   * A retrieval failure skips classification entirely.
   */
  private async fetchTrend(): Promise<TrendResult | undefined> {
    const { trendTicker, windows } = this.config;
    let series: PriceSeries;
    try {
      series = await this.deps.seriesProvider.fetchSeries(trendTicker, windows.long);
    } catch (err) {
      this.logger.warn(
        { ticker: trendTicker, provider: this.deps.seriesProvider.id, error: describeError(err) },
        "trend series retrieval failed"
      );
      return undefined;
    }
    if (series.length === 0) {
      this.logger.warn(
        { ticker: trendTicker, provider: this.deps.seriesProvider.id },
        "trend series retrieval returned no observations"
      );
      return undefined;
    }

    const trend = classifyTrend(series, windows);
    if (trend.label === TrendLabel.InsufficientData) {
      this.logger.warn(
        { ticker: trendTicker, required: trend.required, available: trend.available },
        "trend series too short to classify"
      );
    }
    return trend;
  }
}

export interface CreateBulletinEngineOptions {
  fetchFn?: FetchLike;
  now?: () => Date;
  logger?: Logger;
  /** Replaces the Discord sink, e.g. for dry runs */
  sink?: DeliverySink;
}

/**
 * Wires the production adapters selected by `config`.
 */
export function createBulletinEngine(
  config: BulletinConfig,
  options: CreateBulletinEngineOptions = {}
): BulletinEngine {
  const seriesProvider = createYahooChartProvider({
    timeoutMs: config.httpTimeoutMs,
    fetchFn: options.fetchFn,
  });
  const quoteSources = createQuoteSources(config.quoteSources, {
    seriesProvider,
    timeoutMs: config.httpTimeoutMs,
    timeZone: config.timeZone,
    fetchFn: options.fetchFn,
    now: options.now,
  });
  const sink =
    options.sink ??
    createDiscordWebhookSink({
      webhookUrl: config.webhookUrl,
      username: config.botUsername,
      timeoutMs: config.httpTimeoutMs,
      fetchFn: options.fetchFn,
    });

  return new BulletinEngine(config, {
    quoteSources,
    seriesProvider,
    sink,
    logger: options.logger,
  });
}
