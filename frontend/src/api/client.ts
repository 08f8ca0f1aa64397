import type {
  AreaCatalog,
  CollectionCommand,
  MonthlyHistory,
  RegisteredAccount,
  RegistrationRequest,
  SimulationTime,
  TimeRange,
  UsageSeries,
} from './types';
import {
  AreaCatalogSchema,
  CurrentTimeResponseSchema,
  MonthlyHistorySchema,
  RegisterResponseSchema,
  UsageSeriesSchema,
} from './schemas';
import { ApiError, apiFetch, backendDetail, hasErrorField, readJson } from './http';

export const CURRENT_TIME_FAILED = 'Failed to fetch current time';
export const COLLECTION_FAILED = 'Failed to collect meter readings';
export const METER_VALIDATION_FAILED = 'Meter validation failed';
export const MONTHLY_HISTORY_FAILED = 'Failed to fetch monthly history';
export const USAGE_FAILED = 'Failed to fetch usage data';
export const AREAS_FAILED = 'Failed to load areas';
export const REGISTRATION_FAILED = 'Registration failed';

export async function fetchCurrentTime(signal?: AbortSignal): Promise<SimulationTime> {
  const res = await apiFetch('/current_time', { signal });
  if (!res.ok) {
    throw new ApiError(CURRENT_TIME_FAILED, { status: res.status });
  }
  const parsed = CurrentTimeResponseSchema.safeParse(await readJson(res));
  if (!parsed.success) {
    throw new ApiError(CURRENT_TIME_FAILED, { status: res.status });
  }
  const current = parsed.data['Current Simulation Time'];
  return { date: current.Date, time: current.Time, weekday: current.Weekday };
}

/**
 * Advances the simulation clock and collects readings for the elapsed window.
 * Resolves with the backend's response as-is; rejects with the backend's
 * `error` or `message` text when it supplies one.
 */
export async function collectReadings(command: CollectionCommand): Promise<unknown> {
  const res = await apiFetch('/meter_reading', {
    method: 'POST',
    body: JSON.stringify({ value: command.value, unit: command.unit }),
  });
  const body = await readJson(res);
  if (!res.ok || hasErrorField(body)) {
    const detail = backendDetail(body);
    throw new ApiError(detail ?? COLLECTION_FAILED, { status: res.status, detail });
  }
  return body;
}

export async function validateMeter(meterId: string): Promise<void> {
  const res = await apiFetch('/validate_meter', {
    method: 'POST',
    body: JSON.stringify({ meterId }),
  });
  if (!res.ok) {
    throw new ApiError(METER_VALIDATION_FAILED, { status: res.status });
  }
}

export async function fetchMonthlyHistory(meterId: string): Promise<MonthlyHistory> {
  const params = new URLSearchParams({ meter_id: meterId });
  const res = await apiFetch(`/monthly_history?${params.toString()}`);
  const body = await readJson(res);
  if (!res.ok || hasErrorField(body)) {
    throw new ApiError(MONTHLY_HISTORY_FAILED, { status: res.status, detail: backendDetail(body) });
  }
  const parsed = MonthlyHistorySchema.safeParse(body);
  if (!parsed.success) {
    throw new ApiError(MONTHLY_HISTORY_FAILED, { status: res.status });
  }
  return parsed.data;
}

export async function fetchUsage(meterId: string, timeRange: TimeRange): Promise<UsageSeries> {
  const params = new URLSearchParams({ meter_id: meterId, time_range: timeRange });
  const res = await apiFetch(`/query_usage?${params.toString()}`);
  const body = await readJson(res);
  if (!res.ok || hasErrorField(body)) {
    throw new ApiError(USAGE_FAILED, { status: res.status, detail: backendDetail(body) });
  }
  const parsed = UsageSeriesSchema.safeParse(body);
  if (!parsed.success) {
    throw new ApiError(USAGE_FAILED, { status: res.status });
  }
  return parsed.data;
}

export async function fetchAreas(signal?: AbortSignal): Promise<AreaCatalog> {
  const res = await apiFetch('/api/areas', { signal });
  const body = await readJson(res);
  if (!res.ok) {
    throw new ApiError(AREAS_FAILED, { status: res.status, detail: backendDetail(body) });
  }
  const parsed = AreaCatalogSchema.safeParse(body);
  if (!parsed.success) {
    throw new ApiError(AREAS_FAILED, { status: res.status });
  }
  return parsed.data;
}

export async function registerMeter(input: RegistrationRequest): Promise<RegisteredAccount> {
  const res = await apiFetch('/register', {
    method: 'POST',
    body: JSON.stringify({ meterId: input.meterId, area: input.area, dwelling: input.dwelling }),
  });
  const body = await readJson(res);
  const detail = backendDetail(body);
  const parsed = RegisterResponseSchema.safeParse(body);
  if (!res.ok || !parsed.success) {
    throw new ApiError(detail ?? REGISTRATION_FAILED, { status: res.status, detail });
  }
  const result = parsed.data;
  if (!result.success) {
    throw new ApiError(result.message ?? REGISTRATION_FAILED, { status: res.status, detail });
  }
  return result.account;
}
