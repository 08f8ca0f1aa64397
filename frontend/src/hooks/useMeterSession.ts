import { useCallback, useRef, useState } from 'react';
import { METER_VALIDATION_FAILED, validateMeter } from '../api/client';
import { ApiError } from '../api/http';
import { isValidMeterId } from '../utils/validation';

export type MeterSession = { status: 'loggedOut' } | { status: 'loggedIn'; meterId: string };

export type LoginResult =
  | { ok: true; session: Extract<MeterSession, { status: 'loggedIn' }> }
  | { ok: false; reason: 'format' }
  | { ok: false; reason: 'rejected'; message: string };

export const loggedOut: MeterSession = { status: 'loggedOut' };

/**
 * LoggedOut -> LoggedIn, once. There is no way back short of a reload.
 */
export function useMeterSession() {
  const [session, setSession] = useState<MeterSession>(loggedOut);
  const sessionRef = useRef<MeterSession>(loggedOut);

  const login = useCallback(async (rawMeterId: string): Promise<LoginResult> => {
    const current = sessionRef.current;
    if (current.status === 'loggedIn') {
      return { ok: true, session: current };
    }

    const meterId = rawMeterId.trim();
    if (!isValidMeterId(meterId)) {
      return { ok: false, reason: 'format' };
    }

    try {
      await validateMeter(meterId);
    } catch (err) {
      if (!(err instanceof ApiError)) {
        console.warn('Meter validation request failed', err);
      }
      return { ok: false, reason: 'rejected', message: METER_VALIDATION_FAILED };
    }

    const next = { status: 'loggedIn', meterId } as const;
    sessionRef.current = next;
    setSession(next);
    return { ok: true, session: next };
  }, []);

  return { session, login };
}
