import { PriceSample } from './price-sample.entity';
import { EmptySeriesError, ZeroBasePriceError } from './price-series.errors';

/** The fields of a sample the statistics read. */
export type PricePoint = Pick<
  PriceSample,
  'asset' | 'priceUsd' | 'marketCapUsd' | 'volumeUsd' | 'timestamp'
>;

export interface PriceSummary {
  asset: string;
  currentPrice: number;
  percentChange: number;
  highestPrice: number;
  lowestPrice: number;
  averageVolume: number;
}

export interface NormalizedPoint {
  timestamp: string;
  value: number;
}

/**
 * Relative change from the first to the last price of an already
 * time-ordered series, in percent.
 */
export function percentChange(rows: readonly PricePoint[]): number {
  if (rows.length === 0) {
    throw new EmptySeriesError();
  }
  const first = rows[0];
  const last = rows[rows.length - 1];

  if (first.priceUsd === 0) {
    throw new ZeroBasePriceError(first.asset);
  }
  return ((last.priceUsd - first.priceUsd) / first.priceUsd) * 100;
}

export function summarize(rows: readonly PricePoint[]): PriceSummary {
  if (rows.length === 0) {
    throw new EmptySeriesError();
  }
  const prices = rows.map((row) => row.priceUsd);
  const totalVolume = rows.reduce((sum, row) => sum + row.volumeUsd, 0);

  return {
    asset: rows[0].asset,
    currentPrice: prices[prices.length - 1],
    percentChange: percentChange(rows),
    highestPrice: Math.max(...prices),
    lowestPrice: Math.min(...prices),
    averageVolume: totalVolume / rows.length,
  };
}

/** Splits a mixed series per asset, keeping each asset's order. */
export function groupByAsset<T extends PricePoint>(
  rows: readonly T[],
): Map<string, T[]> {
  const groups = new Map<string, T[]>();

  for (const row of rows) {
    const group = groups.get(row.asset);
    if (group) {
      group.push(row);
    } else {
      groups.set(row.asset, [row]);
    }
  }
  return groups;
}

/** Summaries in `assets` order; assets without samples are left out. */
export function summarizeByAsset(
  rows: readonly PricePoint[],
  assets: readonly string[],
): PriceSummary[] {
  const groups = groupByAsset(rows);

  return assets.flatMap((asset) => {
    const series = groups.get(asset);
    return series ? [summarize(series)] : [];
  });
}

/** Prices rebased so the first sample of the series is 100. */
export function normalizeSeries(
  rows: readonly PricePoint[],
): NormalizedPoint[] {
  if (rows.length === 0) {
    return [];
  }
  const base = rows[0].priceUsd;
  if (base === 0) {
    throw new ZeroBasePriceError(rows[0].asset);
  }
  return rows.map((row) => ({
    timestamp: row.timestamp,
    value: (row.priceUsd / base) * 100,
  }));
}
