import React, { useCallback, useState } from 'react';
import { type UsageView, loadMonthlyHistory, queryUsage } from '../actions/usageQuery';
import { TIME_RANGES, type TimeRange } from '../api/types';
import DailyUsageChart from '../components/charts/DailyUsageChart';
import MonthlyUsageChart from '../components/charts/MonthlyUsageChart';
import EmptyState from '../components/empty/EmptyState';
import ErrorNotice from '../components/ErrorNotice';
import PageShell from '../components/layout/PageShell';
import MonthlyHistoryTable from '../components/MonthlyHistoryTable';
import { type MeterSession, useMeterSession } from '../hooks/useMeterSession';
import { useNotifier } from '../notifications/NotifierProvider';
import type { MonthlyHistoryRow } from '../utils/chartData';
import { timeRangeLabels } from '../utils/formatting';
import { METER_ID_HINT } from '../utils/validation';

const UsageQueryConsole = () => {
  const notifier = useNotifier();
  const { session, login } = useMeterSession();

  const [meterIdInput, setMeterIdInput] = useState('');
  const [formatInvalid, setFormatInvalid] = useState(false);
  const [loginError, setLoginError] = useState<string | null>(null);
  const [loggingIn, setLoggingIn] = useState(false);

  const [history, setHistory] = useState<MonthlyHistoryRow[] | null>(null);
  const [historyErrors, setHistoryErrors] = useState<string[]>([]);

  const [timeRange, setTimeRange] = useState<TimeRange>('today');
  const [usage, setUsage] = useState<UsageView | null>(null);
  const [usageError, setUsageError] = useState<string | null>(null);

  const refreshHistory = useCallback(async (current: MeterSession) => {
    const outcome = await loadMonthlyHistory(current);
    if (outcome.status === 'loaded') {
      setHistory(outcome.rows);
    } else if (outcome.status === 'failed') {
      // Appended, not replaced: each failed attempt leaves its own line.
      setHistoryErrors((prev) => [...prev, outcome.message]);
    }
  }, []);

  const handleLogin = async (event: React.FormEvent) => {
    event.preventDefault();
    setLoggingIn(true);
    try {
      const result = await login(meterIdInput);
      if (!result.ok) {
        if (result.reason === 'format') {
          setFormatInvalid(true);
          return;
        }
        setFormatInvalid(false);
        setLoginError(result.message);
        notifier.alert(result.message);
        return;
      }
      setFormatInvalid(false);
      setLoginError(null);
      void refreshHistory(result.session);
    } finally {
      setLoggingIn(false);
    }
  };

  const handleTimeRangeChange = (raw: string) => {
    const match = TIME_RANGES.find((candidate) => candidate === raw);
    if (match) setTimeRange(match);
  };

  const handleQuery = async (event: React.FormEvent) => {
    event.preventDefault();
    const outcome = await queryUsage(session, timeRange, notifier);
    if (outcome.status === 'loaded') {
      setUsage(outcome.view);
      setUsageError(null);
    } else if (outcome.status === 'failed') {
      setUsage(null);
      setUsageError(outcome.message);
    }
  };

  return (
    <PageShell active="query" title="Power usage query" subtitle="Log in with your meter ID to see daily and monthly usage.">
      {session.status === 'loggedOut' ? (
        <section className="card" aria-labelledby="login-heading">
          <h2 id="login-heading">Meter login</h2>
          <form onSubmit={handleLogin} className="inline-form" noValidate>
            <label>
              <span>Meter ID</span>
              <input
                type="text"
                value={meterIdInput}
                onChange={(e) => setMeterIdInput(e.target.value)}
                placeholder="123-456-789"
                aria-invalid={formatInvalid ? true : undefined}
                aria-describedby={formatInvalid ? 'meter-id-hint' : undefined}
              />
            </label>
            <button type="submit" disabled={loggingIn}>
              {loggingIn ? 'Checking…' : 'Log in'}
            </button>
          </form>
          {formatInvalid && (
            <p id="meter-id-hint" className="field-error">
              {METER_ID_HINT}
            </p>
          )}
          {loginError && <ErrorNotice message={loginError} />}
        </section>
      ) : (
        <>
          <p className="pill" data-testid="session-meter">
            Logged in as {session.meterId}
          </p>

          <section className="card" aria-labelledby="query-heading">
            <h2 id="query-heading">Usage by period</h2>
            <form onSubmit={handleQuery} className="inline-form">
              <label>
                <span>Time range</span>
                <select value={timeRange} onChange={(e) => handleTimeRangeChange(e.target.value)}>
                  {TIME_RANGES.map((range) => (
                    <option key={range} value={range}>
                      {timeRangeLabels[range]}
                    </option>
                  ))}
                </select>
              </label>
              <button type="submit">Query usage</button>
            </form>
            {usageError && <ErrorNotice message={usageError} />}
            {usage &&
              (usage.rows.length === 0 ? (
                <EmptyState title="No usage recorded" description="The backend returned no readings for this period." />
              ) : (
                <>
                  <DailyUsageChart rows={usage.rows} title={`Usage for ${timeRangeLabels[usage.timeRange]}`} />
                  {(usage.totalText !== null || usage.averageText !== null) && (
                    <dl className="usage-summary">
                      {usage.totalText !== null && (
                        <>
                          <dt>Total</dt>
                          <dd data-testid="usage-total">{usage.totalText} kWh</dd>
                        </>
                      )}
                      {usage.averageText !== null && (
                        <>
                          <dt>Average</dt>
                          <dd data-testid="usage-average">{usage.averageText} kWh</dd>
                        </>
                      )}
                    </dl>
                  )}
                </>
              ))}
          </section>

          <section className="card" aria-labelledby="history-heading">
            <div className="section-head">
              <h2 id="history-heading">Monthly history</h2>
              <button type="button" className="pill" onClick={() => void refreshHistory(session)}>
                Reload history
              </button>
            </div>
            {history && (
              <>
                <MonthlyUsageChart rows={history} />
                <MonthlyHistoryTable rows={history} />
              </>
            )}
            {historyErrors.map((message, index) => (
              <ErrorNotice key={index} message={message} />
            ))}
          </section>
        </>
      )}
    </PageShell>
  );
};

export default UsageQueryConsole;
