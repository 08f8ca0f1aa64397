import { COLLECTION_FAILED, collectReadings } from '../api/client';
import { ApiError } from '../api/http';
import type { CollectionUnit } from '../api/types';
import { COLLECTION_VALUE_HINT, parseCollectionValue } from '../utils/validation';

export type CollectionOutcome =
  | { status: 'invalid'; message: string }
  | { status: 'collected'; text: string }
  | { status: 'failed'; message: string };

/**
 * Validates the raw form value, then asks the backend to advance the clock.
 * Invalid input never leaves the page.
 */
export async function submitCollection(rawValue: string, unit: CollectionUnit): Promise<CollectionOutcome> {
  const value = parseCollectionValue(rawValue);
  if (value === null) {
    return { status: 'invalid', message: COLLECTION_VALUE_HINT };
  }

  try {
    const body = await collectReadings({ value, unit });
    return { status: 'collected', text: JSON.stringify(body, null, 2) };
  } catch (err) {
    return { status: 'failed', message: err instanceof ApiError ? err.message : COLLECTION_FAILED };
  }
}
