import React from 'react';
import { Bar, BarChart, CartesianGrid, Tooltip, XAxis, YAxis } from 'recharts';
import { formatTooltipKwh } from '../../utils/formatting';
import type { MonthlyHistoryRow } from '../../utils/chartData';

interface Props {
  rows: MonthlyHistoryRow[];
}

const MonthlyUsageChart: React.FC<Props> = ({ rows }) => {
  return (
    <figure className="chart" aria-label="Monthly usage chart">
      <figcaption>Monthly usage (kWh)</figcaption>
      <BarChart width={760} height={260} data={rows}>
        <CartesianGrid strokeDasharray="3 3" />
        <XAxis dataKey="month" />
        <YAxis unit=" kWh" width={80} />
        <Tooltip formatter={(value) => formatTooltipKwh(value)} />
        <Bar dataKey="usage" name="Usage" fill="var(--color-accent)" />
      </BarChart>
    </figure>
  );
};

export default React.memo(MonthlyUsageChart);
