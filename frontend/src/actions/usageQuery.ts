import { MONTHLY_HISTORY_FAILED, USAGE_FAILED, fetchMonthlyHistory, fetchUsage } from '../api/client';
import type { TimeRange } from '../api/types';
import type { MeterSession } from '../hooks/useMeterSession';
import type { Notifier } from '../notifications/NotifierProvider';
import { type MonthlyHistoryRow, type UsageChartRow, toMonthlyHistoryRows, toUsageChartRows } from '../utils/chartData';
import { formatKwh } from '../utils/formatting';

export const LOGIN_REQUIRED = 'Please log in with a valid meter ID first.';

export interface UsageView {
  timeRange: TimeRange;
  rows: UsageChartRow[];
  totalText: string | null;
  averageText: string | null;
}

export type UsageOutcome =
  | { status: 'blocked' }
  | { status: 'loaded'; view: UsageView }
  | { status: 'failed'; message: string };

export type HistoryOutcome =
  | { status: 'blocked' }
  | { status: 'loaded'; rows: MonthlyHistoryRow[] }
  | { status: 'failed'; message: string };

/**
 * Failures are reported through the notifier as well as returned, so the
 * caller only has to render the text.
 */
export async function queryUsage(
  session: MeterSession,
  timeRange: TimeRange,
  notifier: Notifier,
): Promise<UsageOutcome> {
  if (session.status !== 'loggedIn') {
    notifier.alert(LOGIN_REQUIRED);
    return { status: 'blocked' };
  }

  try {
    const series = await fetchUsage(session.meterId, timeRange);
    return {
      status: 'loaded',
      view: {
        timeRange,
        rows: toUsageChartRows(series),
        totalText: series.total_usage === undefined ? null : formatKwh(series.total_usage),
        averageText: series.average_usage === undefined ? null : formatKwh(series.average_usage),
      },
    };
  } catch (err) {
    console.warn('Usage query failed', err);
    notifier.alert(USAGE_FAILED);
    return { status: 'failed', message: USAGE_FAILED };
  }
}

export async function loadMonthlyHistory(session: MeterSession): Promise<HistoryOutcome> {
  if (session.status !== 'loggedIn') {
    return { status: 'blocked' };
  }

  try {
    const history = await fetchMonthlyHistory(session.meterId);
    return { status: 'loaded', rows: toMonthlyHistoryRows(history) };
  } catch (err) {
    console.warn('Monthly history request failed', err);
    return { status: 'failed', message: MONTHLY_HISTORY_FAILED };
  }
}
