import React from 'react';
import type { MonthlyHistoryRow } from '../utils/chartData';

interface Props {
  rows: MonthlyHistoryRow[];
}

const MonthlyHistoryTable: React.FC<Props> = ({ rows }) => {
  return (
    <table className="history-table" aria-label="Monthly history">
      <thead>
        <tr>
          <th scope="col">Month</th>
          <th scope="col">Usage (kWh)</th>
          <th scope="col">Days</th>
          <th scope="col">Average per day (kWh)</th>
        </tr>
      </thead>
      <tbody>
        {rows.map((row) => (
          <tr key={row.month}>
            <td>{row.month}</td>
            <td>{row.usageText}</td>
            <td>{row.days}</td>
            <td>{row.averageText}</td>
          </tr>
        ))}
      </tbody>
    </table>
  );
};

export default MonthlyHistoryTable;
