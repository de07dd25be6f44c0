import { PricePoint } from '../prices/price-stats';
import {
  marketMetricsPage,
  pivotByTime,
  priceComparisonPage,
  priceTrendPage,
} from './price-charts';

// ─── Helpers ─────────────────────────────────────────────────────────────────

function makePoint(overrides: Partial<PricePoint> = {}): PricePoint {
  return {
    asset: 'bitcoin',
    priceUsd: 100,
    marketCapUsd: 2_000_000_000,
    volumeUsd: 1_000_000,
    timestamp: '2024-01-01 10:00:00',
    ...overrides,
  };
}

const ROWS: PricePoint[] = [
  makePoint(),
  makePoint({ asset: 'ethereum', priceUsd: 50 }),
  makePoint({ priceUsd: 110, timestamp: '2024-01-01 11:00:00' }),
  makePoint({ asset: 'ethereum', priceUsd: 55, timestamp: '2024-01-01 11:00:00' }),
];

const countOf = (markup: string, pattern: RegExp): number =>
  markup.match(pattern)?.length ?? 0;

// ─── pivotByTime ─────────────────────────────────────────────────────────────

describe('pivotByTime()', () => {
  it('should merge series sharing a timestamp into one ordered row', () => {
    const rows = pivotByTime([
      { key: 'bitcoin', timestamp: '2024-01-01 10:00:00', value: 1 },
      { key: 'ethereum', timestamp: '2024-01-01 10:00:00', value: 2 },
      { key: 'bitcoin', timestamp: '2024-01-01 09:00:00', value: 3 },
    ]);

    expect(rows).toEqual([
      { time: new Date(2024, 0, 1, 9, 0, 0).getTime(), bitcoin: 3 },
      { time: new Date(2024, 0, 1, 10, 0, 0).getTime(), bitcoin: 1, ethereum: 2 },
    ]);
  });

  it('should return no rows for no points', () => {
    expect(pivotByTime([])).toEqual([]);
  });
});

// ─── Chart pages ─────────────────────────────────────────────────────────────

describe('priceTrendPage()', () => {
  it('should draw one line per tracked asset', () => {
    const page = priceTrendPage(ROWS, ['bitcoin', 'ethereum'], 24);

    expect(page).toContain('<meta charset="utf-8"/>');
    expect(page).toContain('<title>Cryptocurrency Prices - Last 24 Hours</title>');
    expect(page).toContain(
      '<figcaption>Cryptocurrency Prices - Last 24 Hours</figcaption>',
    );
    expect(countOf(page, /class="recharts-wrapper"/g)).toBe(1);
    expect(countOf(page, /recharts-line-curve/g)).toBe(2);
  });

  it('should mark an empty window instead of drawing a chart', () => {
    const page = priceTrendPage([], ['bitcoin'], 1);

    expect(page).toContain('<p class="no-data">No data</p>');
    expect(page).not.toContain('recharts-wrapper');
  });
});

describe('priceComparisonPage()', () => {
  it('should chart the normalized series of each asset', () => {
    const page = priceComparisonPage(ROWS, ['bitcoin', 'ethereum'], 24);

    expect(page).toContain(
      '<figcaption>Normalized Price Comparison - Last 24 Hours (Starting at 100)</figcaption>',
    );
    expect(countOf(page, /recharts-line-curve/g)).toBe(2);
  });
});

describe('marketMetricsPage()', () => {
  it('should stack price, market cap and volume charts', () => {
    const page = marketMetricsPage(ROWS, 'bitcoin');

    expect(countOf(page, /class="recharts-wrapper"/g)).toBe(3);
    expect(page).toContain('<figcaption>Bitcoin Price (USD)</figcaption>');
    expect(page).toContain('<figcaption>Market Cap (USD)</figcaption>');
    expect(page).toContain('<figcaption>24h Volume (USD)</figcaption>');
  });
});
