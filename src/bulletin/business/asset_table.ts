/**
 * Per-asset status table: one row per basket member, in basket order.
 * A failing asset becomes a placeholder row and never aborts the table.
 */
import { getLogger } from "@src/util/logger";
import { formatSignedPercent, formatTablePrice } from "@src/util/format";
import { describeError } from "../domain/errors";
import type { BasketAsset, PriceSeries } from "../domain/types";
import type { SeriesProvider } from "../infrastructure/contracts";

export const DEFAULT_ASSET_LOOKBACK = 5;

export type AssetRow =
  | {
      status: "ok";
      asset: BasketAsset;
      price: number;
      /** undefined when only one observation was available */
      percentChange: number | undefined;
      /** volume / 1000, truncated */
      lots: number;
    }
  | { status: "empty"; asset: BasketAsset }
  | { status: "error"; asset: BasketAsset; error: string };

export interface AssetTable {
  text: string;
  rows: AssetRow[];
  /** Rows that rendered real data */
  okCount: number;
}

export async function renderAssetTable(
  basket: readonly BasketAsset[],
  provider: SeriesProvider,
  options: { lookback?: number } = {}
): Promise<AssetTable> {
  const logger = getLogger("bulletin/asset_table");
  const lookback = options.lookback ?? DEFAULT_ASSET_LOOKBACK;
  const rows: AssetRow[] = [];

  for (const asset of basket) {
    try {
      const series = await provider.fetchSeries(asset.symbol, lookback);
      const row = buildAssetRow(asset, series);
      if (row.status === "empty") {
        logger.warn({ symbol: asset.symbol }, "asset history empty");
      }
      rows.push(row);
    } catch (err) {
      logger.warn(
        { symbol: asset.symbol, provider: provider.id, error: describeError(err) },
        "asset retrieval failed"
      );
      rows.push({ status: "error", asset, error: describeError(err) });
    }
  }

  return {
    text: formatAssetTable(rows),
    rows,
    okCount: rows.filter(r => r.status === "ok").length,
  };
}

export function buildAssetRow(asset: BasketAsset, series: PriceSeries): AssetRow {
  const latest = series[series.length - 1];
  if (!latest) return { status: "empty", asset };

  const previous = series.length >= 2 ? series[series.length - 2] : undefined;
  const percentChange =
    previous && previous.close !== 0
      ? ((latest.close - previous.close) / previous.close) * 100
      : undefined;

  return {
    status: "ok",
    asset,
    price: latest.close,
    percentChange,
    lots: Math.trunc((latest.volume ?? 0) / 1000),
  };
}

const COLUMN = { code: 6, name: 4, price: 8, change: 9, lots: 6 } as const;

export function formatAssetTable(rows: readonly AssetRow[]): string {
  const withTag = rows.some(r => r.asset.tag);
  const header = joinCells(
    [
      "Code".padEnd(COLUMN.code),
      "Name".padEnd(COLUMN.name),
      "Price".padStart(COLUMN.price),
      "Change".padStart(COLUMN.change),
      "Lots".padStart(COLUMN.lots),
    ],
    withTag ? "Tag" : undefined
  );

  const lines = [header, "-".repeat(header.length)];
  for (const row of rows) {
    lines.push(formatRow(row, withTag));
  }
  return lines.join("\n");
}

function formatRow(row: AssetRow, withTag: boolean): string {
  switch (row.status) {
    case "empty":
      return `${row.asset.symbol} no data`;
    case "error":
      return `${row.asset.symbol} read error`;
    case "ok":
      return joinCells(
        [
          displayCode(row.asset.symbol).padEnd(COLUMN.code),
          row.asset.name.padEnd(COLUMN.name),
          formatTablePrice(row.price).padStart(COLUMN.price),
          formatChange(row.percentChange).padStart(COLUMN.change),
          String(row.lots).padStart(COLUMN.lots),
        ],
        withTag ? row.asset.tag ?? "" : undefined
      );
  }
}

function joinCells(cells: string[], tag: string | undefined): string {
  const line = tag === undefined ? cells.join(" ") : [...cells, tag].join(" ");
  return line.trimEnd();
}

/** "+1.23% ▲", "-0.50% ▼", "0.00% =" */
export function formatChange(percentChange: number | undefined): string {
  if (percentChange === undefined) return "0.00% =";
  const text = formatSignedPercent(percentChange);
  if (text.startsWith("+")) return `${text} ▲`;
  if (text.startsWith("-")) return `${text} ▼`;
  return `${text} =`;
}

/** Drops an exchange suffix: "2027.TW" → "2027" */
export function displayCode(symbol: string): string {
  return symbol.replace(/\.[A-Z]{2,4}$/, "");
}
