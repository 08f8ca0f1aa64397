import { useCallback, useEffect, useRef, useState } from 'react';
import type { SimulationTime } from '../api/types';
import { fetchCurrentTime } from '../api/client';
import { TIME_POLL_MS } from '../config';

export const TIME_FETCH_ERROR = 'Error fetching current time';

export interface SimulationClockState {
  time: SimulationTime | null;
  error: string | null;
}

export interface SimulationClock extends SimulationClockState {
  refresh: () => Promise<void>;
}

/**
 * Polls the backend clock. Every request carries a sequence number and a
 * response is applied only if nothing newer has been applied already, so a
 * slow poll can never overwrite the time fetched after a collection.
 */
export function useSimulationClock(pollMs = TIME_POLL_MS): SimulationClock {
  const [state, setState] = useState<SimulationClockState>({ time: null, error: null });

  const issuedRef = useRef(0);
  const appliedRef = useRef(0);
  const mountedRef = useRef(true);
  const inflightRef = useRef(new Set<AbortController>());

  const refresh = useCallback(async () => {
    issuedRef.current += 1;
    const sequence = issuedRef.current;
    const controller = new AbortController();
    inflightRef.current.add(controller);

    try {
      const time = await fetchCurrentTime(controller.signal);
      if (!mountedRef.current || sequence < appliedRef.current) return;
      appliedRef.current = sequence;
      setState({ time, error: null });
    } catch (err) {
      if (!mountedRef.current || (err instanceof DOMException && err.name === 'AbortError')) return;
      if (sequence < appliedRef.current) return;
      appliedRef.current = sequence;
      setState((prev) => ({ ...prev, error: TIME_FETCH_ERROR }));
    } finally {
      inflightRef.current.delete(controller);
    }
  }, []);

  useEffect(() => {
    mountedRef.current = true;
    const inflight = inflightRef.current;

    void refresh();
    const timer = window.setInterval(() => {
      void refresh();
    }, pollMs);

    return () => {
      mountedRef.current = false;
      window.clearInterval(timer);
      inflight.forEach((controller) => controller.abort());
      inflight.clear();
    };
  }, [pollMs, refresh]);

  return { ...state, refresh };
}
