import type { MonthlyHistory, UsageSeries } from '../api/types';
import { formatKwh } from './formatting';

export interface UsageChartRow {
  label: string;
  usage: number;
}

export interface MonthlyHistoryRow {
  month: string;
  usage: number;
  days: number;
  usageText: string;
  averageText: string;
}

// Backend order is chronological already; keep it.
export function toUsageChartRows(series: Pick<UsageSeries, 'dates' | 'usage'>): UsageChartRow[] {
  if (series.dates.length !== series.usage.length) {
    throw new Error(
      `Usage series length mismatch: dates=${series.dates.length}, usage=${series.usage.length}`,
    );
  }
  return series.dates.map((label, index) => ({ label, usage: series.usage[index] }));
}

export function averagePerDay(usage: number, days: number): number | null {
  return days > 0 ? usage / days : null;
}

export function toMonthlyHistoryRows(history: MonthlyHistory): MonthlyHistoryRow[] {
  const { months, usage, days } = history;
  if (months.length !== usage.length || months.length !== days.length) {
    throw new Error(
      `Monthly history length mismatch: months=${months.length}, usage=${usage.length}, days=${days.length}`,
    );
  }

  return months.map((month, index) => {
    const average = averagePerDay(usage[index], days[index]);
    return {
      month,
      usage: usage[index],
      days: days[index],
      usageText: formatKwh(usage[index]),
      averageText: average === null ? '-' : formatKwh(average),
    };
  });
}
