import React, { useEffect, useState } from 'react';
import { type RegistrationForm, submitRegistration } from '../actions/registration';
import { AREAS_FAILED, fetchAreas } from '../api/client';
import { type AreaCatalog, DWELLING_TYPES } from '../api/types';
import ErrorNotice from '../components/ErrorNotice';
import PageShell from '../components/layout/PageShell';

type MessageType = 'success' | 'error' | null;

const emptyForm: RegistrationForm = { meterId: '', area: '', dwelling: '' };

const RegisterConsole = () => {
  const [areas, setAreas] = useState<AreaCatalog>({});
  const [areasError, setAreasError] = useState<string | null>(null);
  const [region, setRegion] = useState('');
  const [form, setForm] = useState<RegistrationForm>(emptyForm);
  const [submitting, setSubmitting] = useState(false);
  const [message, setMessage] = useState<string | null>(null);
  const [messageType, setMessageType] = useState<MessageType>(null);

  useEffect(() => {
    const controller = new AbortController();

    fetchAreas(controller.signal)
      .then((catalog) => setAreas(catalog))
      .catch((err) => {
        if (err instanceof DOMException && err.name === 'AbortError') return;
        console.warn('Area catalog request failed', err);
        setAreasError(AREAS_FAILED);
      });

    return () => controller.abort();
  }, []);

  const regions = Object.keys(areas);
  const regionAreas = region ? areas[region] ?? [] : [];

  const handleRegionChange = (next: string) => {
    setRegion(next);
    setForm((prev) => ({ ...prev, area: '' }));
  };

  const handleDwellingChange = (raw: string) => {
    const match = DWELLING_TYPES.find((candidate) => candidate === raw);
    setForm((prev) => ({ ...prev, dwelling: match ?? '' }));
  };

  const handleSubmit = async (event: React.FormEvent) => {
    event.preventDefault();
    setMessage(null);
    setMessageType(null);
    setSubmitting(true);
    try {
      const outcome = await submitRegistration(form);
      setMessage(outcome.message);
      if (outcome.status === 'registered') {
        setMessageType('success');
        setForm(emptyForm);
        setRegion('');
      } else {
        setMessageType('error');
      }
    } finally {
      setSubmitting(false);
    }
  };

  return (
    <PageShell active="register" title="Register a meter" subtitle="New meters start reporting from the current simulation time.">
      <section className="card" aria-labelledby="register-heading">
        <h2 id="register-heading">Meter details</h2>
        {areasError && <ErrorNotice message={areasError} />}
        <form onSubmit={handleSubmit} className="stacked-form" noValidate>
          <label>
            <span>Meter ID</span>
            <input
              type="text"
              value={form.meterId}
              onChange={(e) => setForm((prev) => ({ ...prev, meterId: e.target.value }))}
              placeholder="123-456-789"
            />
          </label>
          <label>
            <span>Region</span>
            <select value={region} onChange={(e) => handleRegionChange(e.target.value)}>
              <option value="">Select a region</option>
              {regions.map((name) => (
                <option key={name} value={name}>
                  {name}
                </option>
              ))}
            </select>
          </label>
          <label>
            <span>Area</span>
            <select
              value={form.area}
              onChange={(e) => setForm((prev) => ({ ...prev, area: e.target.value }))}
              disabled={regionAreas.length === 0}
            >
              <option value="">Select an area</option>
              {regionAreas.map((name) => (
                <option key={name} value={name}>
                  {name}
                </option>
              ))}
            </select>
          </label>
          <label>
            <span>Dwelling type</span>
            <select value={form.dwelling} onChange={(e) => handleDwellingChange(e.target.value)}>
              <option value="">Select a dwelling type</option>
              {DWELLING_TYPES.map((name) => (
                <option key={name} value={name}>
                  {name}
                </option>
              ))}
            </select>
          </label>
          <button type="submit" disabled={submitting}>
            {submitting ? 'Registering…' : 'Register'}
          </button>
        </form>
        {message && messageType === 'error' && <ErrorNotice message={message} />}
        {message && messageType === 'success' && (
          <p className="success-text" role="status">
            {message}
          </p>
        )}
      </section>
    </PageShell>
  );
};

export default RegisterConsole;
