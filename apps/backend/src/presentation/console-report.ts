import { PriceSample } from '../prices/price-sample.entity';
import { ZeroBasePriceError } from '../prices/price-series.errors';
import { percentChange, PricePoint, PriceSummary } from '../prices/price-stats';
import { formatTimestamp } from '../prices/timestamps';
import { PriceQuote } from '../tracker/dto/simple-price-quote.dto';
import { assetLabel, formatPercent, formatUsd } from './format';

export const NO_DATA_MESSAGE = 'No data available for this time period';

export function renderCurrentPrices(
  quotes: readonly PriceQuote[],
  at: Date,
): string {
  const lines = [`Time: ${formatTimestamp(at)}`];

  for (const quote of quotes) {
    lines.push(
      '',
      `${assetLabel(quote.asset)}:`,
      `Price: ${formatUsd(quote.priceUsd)}`,
      `Market Cap: ${formatUsd(quote.marketCapUsd)}`,
      `24h Volume: ${formatUsd(quote.volumeUsd)}`,
    );
  }
  return lines.join('\n');
}

export function renderLatestStored(rows: readonly PriceSample[]): string {
  return [
    'Latest stored data from database:',
    ...rows.map(
      (row) =>
        `${assetLabel(row.asset)}: ${formatUsd(row.priceUsd)} at ${row.timestamp}`,
    ),
  ].join('\n');
}

/** One asset's samples in a window followed by its price change. */
export function renderHistory(
  asset: string,
  hours: number,
  rows: readonly PricePoint[],
): string {
  const header = `${assetLabel(asset)} price history for the last ${hours} hours:`;
  if (rows.length === 0) {
    return [header, NO_DATA_MESSAGE].join('\n');
  }

  let change: string;
  try {
    change = formatPercent(percentChange(rows));
  } catch (error) {
    if (!(error instanceof ZeroBasePriceError)) {
      throw error;
    }
    change = 'n/a (first price in window is 0)';
  }

  return [
    header,
    ...rows.map((row) => `${row.timestamp}: ${formatUsd(row.priceUsd)}`),
    '',
    `Price change: ${change}`,
  ].join('\n');
}

const SUMMARY_HEADERS = [
  'Cryptocurrency',
  'Current Price',
  'Price Change (%)',
  'Highest Price',
  'Lowest Price',
  'Average Volume',
] as const;

export function summaryCells(summary: PriceSummary): string[] {
  return [
    assetLabel(summary.asset),
    formatUsd(summary.currentPrice),
    formatPercent(summary.percentChange),
    formatUsd(summary.highestPrice),
    formatUsd(summary.lowestPrice),
    formatUsd(summary.averageVolume),
  ];
}

/** Right-aligned text table, one row per summarized asset. */
export function renderSummaryTable(summaries: readonly PriceSummary[]): string {
  if (summaries.length === 0) {
    return NO_DATA_MESSAGE;
  }
  const rows = [[...SUMMARY_HEADERS], ...summaries.map(summaryCells)];
  const widths = SUMMARY_HEADERS.map((_, column) =>
    Math.max(...rows.map((row) => row[column].length)),
  );

  return rows
    .map((row) =>
      row.map((cell, column) => cell.padStart(widths[column])).join(' '),
    )
    .join('\n');
}
