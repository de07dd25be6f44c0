import { renderToStaticMarkup } from 'react-dom/server';
import { NO_DATA_MESSAGE, summaryCells } from '../presentation/console-report';
import { assetLabel, formatUsd } from '../presentation/format';
import { PriceTrendChart, PriceVolumeChart } from '../presentation/price-charts';
import { PriceSample } from '../prices/price-sample.entity';
import { PriceSummary } from '../prices/price-stats';
import { formatTimestamp } from '../prices/timestamps';
import {
  DASHBOARD_PERIOD_KEYS,
  DASHBOARD_PERIODS,
  DashboardState,
  refreshed,
} from './dashboard-state';

export interface DashboardView {
  state: DashboardState;
  assets: string[];
  latest: PriceSample[];
  history: PriceSample[];
  summaries: PriceSummary[];
  /** set when the window could not be summarized */
  summaryError?: string;
  renderedAt: Date;
}

const STYLE = `
  body { font-family: sans-serif; margin: 2rem auto; max-width: 1240px; color: #222; }
  .metrics { display: flex; gap: 1rem; }
  .metric { flex: 1; border: 1px solid #ddd; border-radius: 6px; padding: 1rem; }
  .metric .label { display: block; color: #666; font-size: 0.9rem; }
  .metric .value { display: block; font-size: 1.8rem; font-weight: bold; }
  figure.chart { margin: 1rem 0; }
  figure.chart figcaption { font-weight: bold; margin-bottom: 0.5rem; }
  table { border-collapse: collapse; width: 100%; }
  th, td { border-bottom: 1px solid #ddd; padding: 0.4rem 0.6rem; text-align: right; }
  th:first-child, td:first-child { text-align: left; }
  .refresh { display: flex; gap: 1rem; align-items: center; margin-top: 2rem; }
`;

const SUMMARY_HEADERS = [
  'Cryptocurrency',
  'Current Price',
  'Price Change',
  'Highest Price',
  'Lowest Price',
  'Average Volume',
];

function LatestMetrics({ latest }: { latest: PriceSample[] }) {
  if (latest.length === 0) {
    return <p>No data available yet. Start the tracker to collect prices.</p>;
  }
  return (
    <section className="metrics">
      {latest.map((sample) => (
        <div className="metric" key={sample.asset}>
          <span className="label">{`${assetLabel(sample.asset)} Price`}</span>
          <span className="value">{formatUsd(sample.priceUsd)}</span>
        </div>
      ))}
    </section>
  );
}

function PeriodSelector({ state }: { state: DashboardState }) {
  return (
    <form method="get" action="/dashboard">
      <label>
        Select Time Period{' '}
        <select name="period" defaultValue={state.period}>
          {DASHBOARD_PERIOD_KEYS.map((period) => (
            <option key={period} value={period}>
              {DASHBOARD_PERIODS[period].label}
            </option>
          ))}
        </select>
      </label>
      <input type="hidden" name="refresh" value={state.refreshCount} />
      <button type="submit">Apply</button>
    </form>
  );
}

function SummaryTable({ view }: { view: DashboardView }) {
  if (view.summaryError) {
    return <p>{`Summary unavailable: ${view.summaryError}`}</p>;
  }
  if (view.summaries.length === 0) {
    return <p>{NO_DATA_MESSAGE}</p>;
  }
  return (
    <table>
      <thead>
        <tr>
          {SUMMARY_HEADERS.map((header) => (
            <th key={header}>{header}</th>
          ))}
        </tr>
      </thead>
      <tbody>
        {view.summaries.map((summary) => (
          <tr key={summary.asset}>
            {summaryCells(summary).map((cell, index) => (
              <td key={index}>{cell}</td>
            ))}
          </tr>
        ))}
      </tbody>
    </table>
  );
}

export function DashboardPage({ view }: { view: DashboardView }) {
  const { state } = view;
  const { label, hours } = DASHBOARD_PERIODS[state.period];
  const next = refreshed(state);

  return (
    <html lang="en">
      <head>
        <meta charSet="utf-8" />
        <title>Crypto Dashboard</title>
        <style dangerouslySetInnerHTML={{ __html: STYLE }} />
      </head>
      <body>
        <h1>Cryptocurrency Real-Time Dashboard</h1>
        <p>{`Tracking ${view.assets.map(assetLabel).join(', ')} prices, volumes, and trends`}</p>
        <LatestMetrics latest={view.latest} />
        <PeriodSelector state={state} />
        <h2>{`Price Trends - ${label}`}</h2>
        <PriceTrendChart rows={view.history} assets={view.assets} hours={hours} />
        {view.assets.map((asset, index) => (
          <details key={asset} open={index === 0}>
            <summary>{`${assetLabel(asset)} Metrics`}</summary>
            <PriceVolumeChart rows={view.history} asset={asset} />
          </details>
        ))}
        <h2>Summary Statistics</h2>
        <SummaryTable view={view} />
        <div className="refresh">
          <form method="get" action="/dashboard">
            <input type="hidden" name="period" value={next.period} />
            <input type="hidden" name="refresh" value={next.refreshCount} />
            <button type="submit">Refresh Data</button>
          </form>
          <span>{`Data updates when refreshed • Last updated: ${formatTimestamp(view.renderedAt)}`}</span>
        </div>
      </body>
    </html>
  );
}

export function renderDashboard(view: DashboardView): string {
  return `${renderToStaticMarkup(<DashboardPage view={view} />)}\n`;
}
