import React, { useState } from 'react';
import { submitCollection } from '../actions/collection';
import { COLLECTION_UNITS, type CollectionUnit } from '../api/types';
import ErrorNotice from '../components/ErrorNotice';
import PageShell from '../components/layout/PageShell';
import SimulationClock from '../components/SimulationClock';
import { useSimulationClock } from '../hooks/useSimulationClock';

const CollectionConsole = () => {
  const clock = useSimulationClock();
  const [value, setValue] = useState('1');
  const [unit, setUnit] = useState<CollectionUnit>('days');
  const [validation, setValidation] = useState<string | null>(null);
  const [result, setResult] = useState<string | null>(null);
  const [error, setError] = useState<string | null>(null);

  const handleUnitChange = (raw: string) => {
    const match = COLLECTION_UNITS.find((candidate) => candidate === raw);
    if (match) setUnit(match);
  };

  const handleSubmit = async (event: React.FormEvent) => {
    event.preventDefault();
    setValidation(null);

    const outcome = await submitCollection(value, unit);
    if (outcome.status === 'invalid') {
      setValidation(outcome.message);
      return;
    }

    if (outcome.status === 'collected') {
      setResult(outcome.text);
      setError(null);
    } else {
      setResult(null);
      setError(outcome.message);
    }
    void clock.refresh();
  };

  return (
    <PageShell active="collect" title="Meter reading collection" subtitle="Advance the simulation clock and collect readings for every registered meter.">
      <SimulationClock time={clock.time} error={clock.error} onRefresh={() => void clock.refresh()} />

      <section className="card" aria-labelledby="collect-heading">
        <h2 id="collect-heading">Collect readings</h2>
        <form onSubmit={handleSubmit} className="inline-form" noValidate>
          <label>
            <span>Advance by</span>
            <input
              type="number"
              min="1"
              step="1"
              value={value}
              onChange={(e) => setValue(e.target.value)}
              aria-invalid={validation ? true : undefined}
              aria-describedby={validation ? 'collect-validation' : undefined}
            />
          </label>
          <label>
            <span>Unit</span>
            <select value={unit} onChange={(e) => handleUnitChange(e.target.value)}>
              {COLLECTION_UNITS.map((option) => (
                <option key={option} value={option}>
                  {option}
                </option>
              ))}
            </select>
          </label>
          <button type="submit">Collect</button>
        </form>
        {validation && (
          <p id="collect-validation" className="field-error">
            {validation}
          </p>
        )}
        {error && <ErrorNotice message={error} />}
        {result && (
          <pre className="json-output" data-testid="collection-result">
            {result}
          </pre>
        )}
      </section>
    </PageShell>
  );
};

export default CollectionConsole;
