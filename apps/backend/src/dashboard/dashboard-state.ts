export const DASHBOARD_PERIODS = {
  '1h': { label: 'Last 1 Hour', hours: 1 },
  '24h': { label: 'Last 24 Hours', hours: 24 },
  '7d': { label: 'Last 7 Days', hours: 168 },
} as const;

export type DashboardPeriod = keyof typeof DASHBOARD_PERIODS;

export const DASHBOARD_PERIOD_KEYS: readonly DashboardPeriod[] = [
  '1h',
  '24h',
  '7d',
];

export const DEFAULT_PERIOD: DashboardPeriod = '24h';

/**
 * Everything the page remembers between requests. It round-trips through the
 * query string instead of living in a server-side session.
 */
export interface DashboardState {
  period: DashboardPeriod;
  refreshCount: number;
}

export function isDashboardPeriod(value: unknown): value is DashboardPeriod {
  return (
    typeof value === 'string' &&
    Object.prototype.hasOwnProperty.call(DASHBOARD_PERIODS, value)
  );
}

export function toDashboardState(query: {
  period?: string;
  refresh?: number;
}): DashboardState {
  return {
    period: isDashboardPeriod(query.period) ? query.period : DEFAULT_PERIOD,
    refreshCount: query.refresh ?? 0,
  };
}

/** State after pressing "Refresh Data". */
export function refreshed(state: DashboardState): DashboardState {
  return { ...state, refreshCount: state.refreshCount + 1 };
}
