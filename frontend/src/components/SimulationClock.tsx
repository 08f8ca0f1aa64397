import React from 'react';
import type { SimulationClockState } from '../hooks/useSimulationClock';
import { formatSimulationTime } from '../utils/formatting';
import LineIcon from './icons/LineIcon';

interface Props extends SimulationClockState {
  onRefresh: () => void;
}

const SimulationClock: React.FC<Props> = ({ time, error, onRefresh }) => {
  const text = error ?? (time ? formatSimulationTime(time) : 'Loading…');

  return (
    <section className="card" aria-labelledby="clock-heading">
      <div className="section-head">
        <h2 id="clock-heading" style={{ display: 'flex', gap: '0.4rem', alignItems: 'center' }}>
          <LineIcon name="clock" size={18} /> Current simulation time
        </h2>
        <button type="button" className="pill" onClick={onRefresh}>
          Refresh time
        </button>
      </div>
      <pre className={error ? 'time-display error-text' : 'time-display'} data-testid="simulation-time">
        {text}
      </pre>
    </section>
  );
};

export default SimulationClock;
