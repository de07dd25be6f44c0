import { format } from 'date-fns';
import { ReactElement } from 'react';
import { renderToStaticMarkup } from 'react-dom/server';
import { CartesianGrid, Legend, Line, LineChart, XAxis, YAxis } from 'recharts';
import { groupByAsset, normalizeSeries, PricePoint } from '../prices/price-stats';
import { parseTimestamp } from '../prices/timestamps';
import { assetLabel, formatUsd } from './format';

const PALETTE = ['#f7931a', '#627eea', '#26a17b', '#e84142', '#8247e5'];

/** One row per timestamp: `time` in epoch ms plus a column per series. */
export type ChartRow = Record<string, number>;

export interface SeriesPoint {
  key: string;
  timestamp: string;
  value: number;
}

interface LineSpec {
  key: string;
  name: string;
  color: string;
}

const formatTime = (time: number): string => format(time, 'MM-dd HH:mm');

function compactUsd(value: number): string {
  const abs = Math.abs(value);
  if (abs >= 1e12) return `$${(value / 1e12).toFixed(2)}T`;
  if (abs >= 1e9) return `$${(value / 1e9).toFixed(2)}B`;
  if (abs >= 1e6) return `$${(value / 1e6).toFixed(2)}M`;
  return formatUsd(value);
}

export function pivotByTime(points: readonly SeriesPoint[]): ChartRow[] {
  const rows = new Map<string, ChartRow>();
  for (const point of points) {
    let row = rows.get(point.timestamp);
    if (!row) {
      row = { time: parseTimestamp(point.timestamp).getTime() };
      rows.set(point.timestamp, row);
    }
    row[point.key] = point.value;
  }
  return [...rows.values()].sort((a, b) => a.time - b.time);
}

function assetLines(assets: readonly string[]): LineSpec[] {
  return assets.map((asset, index) => ({
    key: asset,
    name: assetLabel(asset),
    color: PALETTE[index % PALETTE.length],
  }));
}

function metricPoints(
  rows: readonly PricePoint[],
  key: string,
  pick: (row: PricePoint) => number,
): SeriesPoint[] {
  return rows.map((row) => ({ key, timestamp: row.timestamp, value: pick(row) }));
}

interface TimeSeriesChartProps {
  title: string;
  data: ChartRow[];
  lines: LineSpec[];
  width: number;
  height: number;
  formatY: (value: number) => string;
  yLabel?: string;
}

function TimeSeriesChart({
  title,
  data,
  lines,
  width,
  height,
  formatY,
  yLabel,
}: TimeSeriesChartProps) {
  return (
    <figure className="chart">
      <figcaption>{title}</figcaption>
      {data.length === 0 ? (
        <p className="no-data">No data</p>
      ) : (
        <LineChart
          width={width}
          height={height}
          data={data}
          margin={{ top: 10, right: 30, bottom: 10, left: 20 }}
        >
          <CartesianGrid strokeDasharray="3 3" />
          <XAxis
            dataKey="time"
            type="number"
            domain={['dataMin', 'dataMax']}
            tickFormatter={formatTime}
            minTickGap={40}
          />
          <YAxis
            domain={['auto', 'auto']}
            tickFormatter={formatY}
            width={90}
            label={
              yLabel
                ? { value: yLabel, angle: -90, position: 'insideLeft' }
                : undefined
            }
          />
          <Legend />
          {lines.map((line) => (
            <Line
              key={line.key}
              type="monotone"
              dataKey={line.key}
              name={line.name}
              stroke={line.color}
              strokeWidth={2}
              dot={false}
              connectNulls
              isAnimationActive={false}
            />
          ))}
        </LineChart>
      )}
    </figure>
  );
}

interface WindowChartProps {
  rows: readonly PricePoint[];
  assets: readonly string[];
  hours: number;
}

/** Prices of every asset over the window on one chart. */
export function PriceTrendChart({ rows, assets, hours }: WindowChartProps) {
  return (
    <TimeSeriesChart
      title={`Cryptocurrency Prices - Last ${hours} Hours`}
      data={pivotByTime(
        rows.map((row) => ({
          key: row.asset,
          timestamp: row.timestamp,
          value: row.priceUsd,
        })),
      )}
      lines={assetLines(assets)}
      width={1200}
      height={600}
      formatY={compactUsd}
      yLabel="Price (USD)"
    />
  );
}

/** Every asset rebased to 100 at the start of the window. */
function PriceComparisonChart({ rows, assets, hours }: WindowChartProps) {
  const groups = groupByAsset(rows);
  const points = assets.flatMap((asset) =>
    normalizeSeries(groups.get(asset) ?? []).map((point) => ({
      key: asset,
      timestamp: point.timestamp,
      value: point.value,
    })),
  );

  return (
    <TimeSeriesChart
      title={`Normalized Price Comparison - Last ${hours} Hours (Starting at 100)`}
      data={pivotByTime(points)}
      lines={assetLines(assets)}
      width={1200}
      height={600}
      formatY={(value) => value.toFixed(1)}
      yLabel="Normalized Price"
    />
  );
}

interface AssetChartProps {
  rows: readonly PricePoint[];
  asset: string;
}

/** Price, market cap and volume of one asset, stacked. */
function MarketMetricsChart({ rows, asset }: AssetChartProps) {
  const series = rows.filter((row) => row.asset === asset);
  const panels = [
    { title: `${assetLabel(asset)} Price (USD)`, name: 'Price', color: '#1f77b4', pick: (row: PricePoint) => row.priceUsd },
    { title: 'Market Cap (USD)', name: 'Market Cap', color: '#2ca02c', pick: (row: PricePoint) => row.marketCapUsd },
    { title: '24h Volume (USD)', name: 'Volume', color: '#d62728', pick: (row: PricePoint) => row.volumeUsd },
  ];

  return (
    <div className="metrics-chart">
      {panels.map((panel) => (
        <TimeSeriesChart
          key={panel.name}
          title={panel.title}
          data={pivotByTime(metricPoints(series, 'value', panel.pick))}
          lines={[{ key: 'value', name: panel.name, color: panel.color }]}
          width={1200}
          height={320}
          formatY={compactUsd}
        />
      ))}
    </div>
  );
}

/** Price above volume for one asset, sized for the dashboard. */
export function PriceVolumeChart({ rows, asset }: AssetChartProps) {
  const series = rows.filter((row) => row.asset === asset);

  return (
    <div className="price-volume-chart">
      <TimeSeriesChart
        title={`${assetLabel(asset)} Price and Volume`}
        data={pivotByTime(metricPoints(series, 'value', (row) => row.priceUsd))}
        lines={[{ key: 'value', name: 'Price', color: '#1f77b4' }]}
        width={960}
        height={320}
        formatY={compactUsd}
        yLabel="Price (USD)"
      />
      <TimeSeriesChart
        title={`${assetLabel(asset)} 24h Volume`}
        data={pivotByTime(metricPoints(series, 'value', (row) => row.volumeUsd))}
        lines={[{ key: 'value', name: 'Volume', color: '#d62728' }]}
        width={960}
        height={320}
        formatY={compactUsd}
        yLabel="Volume (USD)"
      />
    </div>
  );
}

// an <html> root makes React emit the doctype
function renderPage(title: string, chart: ReactElement): string {
  const markup = renderToStaticMarkup(
    <html lang="en">
      <head>
        <meta charSet="utf-8" />
        <title>{title}</title>
      </head>
      <body>{chart}</body>
    </html>,
  );
  return `${markup}\n`;
}

export function priceTrendPage(
  rows: readonly PricePoint[],
  assets: readonly string[],
  hours: number,
): string {
  return renderPage(
    `Cryptocurrency Prices - Last ${hours} Hours`,
    <PriceTrendChart rows={rows} assets={assets} hours={hours} />,
  );
}

export function priceComparisonPage(
  rows: readonly PricePoint[],
  assets: readonly string[],
  hours: number,
): string {
  return renderPage(
    `Normalized Price Comparison - Last ${hours} Hours`,
    <PriceComparisonChart rows={rows} assets={assets} hours={hours} />,
  );
}

export function marketMetricsPage(
  rows: readonly PricePoint[],
  asset: string,
): string {
  return renderPage(
    `${assetLabel(asset)} Market Metrics`,
    <MarketMetricsChart rows={rows} asset={asset} />,
  );
}
