import type { SimulationTime, TimeRange } from '../api/types';

export function formatSimulationTime(time: SimulationTime): string {
  return `Date: ${time.date}\nTime: ${time.time}\nWeekday: ${time.weekday}`;
}

export function formatKwh(value: number): string {
  return value.toFixed(3);
}

export const timeRangeLabels: Record<TimeRange, string> = {
  today: 'Today',
  last_7_days: 'Last 7 days',
  this_month: 'This month',
  last_month: 'Last month',
};

// Chart tooltips hand over number | string | array values.
export function formatTooltipKwh(value: unknown): string {
  return typeof value === 'number' ? `${formatKwh(value)} kWh` : String(value);
}
