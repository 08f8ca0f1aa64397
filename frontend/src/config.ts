const DEFAULT_TIME_POLL_MS = 30_000;

export function parsePollMs(raw: string | undefined): number {
  const parsed = Number(raw);
  return Number.isInteger(parsed) && parsed > 0 ? parsed : DEFAULT_TIME_POLL_MS;
}

// Empty means same origin: the page host forwards backend routes.
export const API_BASE_URL = (import.meta.env.VITE_API_URL ?? '').replace(/\/+$/, '');

export const TIME_POLL_MS = parsePollMs(import.meta.env.VITE_TIME_POLL_MS);
