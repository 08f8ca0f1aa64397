export const METER_ID_PATTERN = /^\d{3}-\d{3}-\d{3}$/;

export const METER_ID_HINT = 'Meter ID must look like 123-456-789.';
export const COLLECTION_VALUE_HINT = 'Please enter a positive integer (1 or greater).';

export function isValidMeterId(raw: string): boolean {
  return METER_ID_PATTERN.test(raw.trim());
}

/**
 * Digits only: signs, decimals and exponents are rejected rather than
 * rounded, so "1.5" or "1e3" never reach the backend.
 */
export function parseCollectionValue(raw: string): number | null {
  const trimmed = raw.trim();
  if (!/^\d+$/.test(trimmed)) return null;
  const value = Number(trimmed);
  return Number.isSafeInteger(value) && value >= 1 ? value : null;
}
