import React from 'react';
import { Bar, CartesianGrid, ComposedChart, Legend, Line, Tooltip, XAxis, YAxis } from 'recharts';
import { formatTooltipKwh } from '../../utils/formatting';
import type { UsageChartRow } from '../../utils/chartData';

interface Props {
  rows: UsageChartRow[];
  title: string;
}

/** Bars for each interval with a line tracing the same values. */
const DailyUsageChart: React.FC<Props> = ({ rows, title }) => {
  return (
    <figure className="chart" aria-label={title}>
      <figcaption>{title}</figcaption>
      <ComposedChart width={760} height={300} data={rows}>
        <CartesianGrid strokeDasharray="3 3" />
        <XAxis dataKey="label" />
        <YAxis unit=" kWh" width={80} />
        <Tooltip formatter={(value) => formatTooltipKwh(value)} />
        <Legend />
        <Bar dataKey="usage" name="Usage" fill="var(--color-accent)" />
        <Line type="monotone" dataKey="usage" name="Trend" stroke="var(--color-accent-strong)" dot={false} />
      </ComposedChart>
    </figure>
  );
};

export default React.memo(DailyUsageChart);
