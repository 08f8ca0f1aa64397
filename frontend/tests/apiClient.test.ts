import { afterEach, beforeEach, describe, expect, it } from 'vitest';
import { vi } from 'vitest';
import {
  collectReadings,
  fetchAreas,
  fetchCurrentTime,
  fetchMonthlyHistory,
  fetchUsage,
  registerMeter,
  validateMeter,
} from '../src/api/client';
import { ApiError } from '../src/api/http';
import { jsonResponse, simulationTimeBody, stubFetch } from './helpers';

describe('api client', () => {
  let fetchMock: ReturnType<typeof stubFetch>;

  beforeEach(() => {
    fetchMock = stubFetch();
  });

  afterEach(() => {
    vi.unstubAllGlobals();
  });

  it('maps the simulation time payload', async () => {
    fetchMock.mockResolvedValueOnce(jsonResponse(simulationTimeBody));

    await expect(fetchCurrentTime()).resolves.toEqual({
      date: '2024-05-01',
      time: '10:00',
      weekday: 'Wednesday',
    });
    expect(String(fetchMock.mock.calls[0][0])).toBe('/current_time');
  });

  it('rejects a simulation time payload missing its fields', async () => {
    fetchMock.mockResolvedValueOnce(jsonResponse({ 'Current Simulation Time': { Date: '2024-05-01' } }));

    await expect(fetchCurrentTime()).rejects.toThrow('Failed to fetch current time');
  });

  it('posts collection commands as JSON', async () => {
    fetchMock.mockResolvedValueOnce(jsonResponse({ readings: 12 }));

    await expect(collectReadings({ value: 3, unit: 'hours' })).resolves.toEqual({ readings: 12 });

    const [input, init] = fetchMock.mock.calls[0];
    expect(String(input)).toBe('/meter_reading');
    expect(init?.method).toBe('POST');
    expect(init?.body).toBe('{"value":3,"unit":"hours"}');
    expect(new Headers(init?.headers).get('Content-Type')).toBe('application/json');
  });

  it.each([
    ['the error field', 400, { error: 'Invalid time unit', message: 'ignored' }, 'Invalid time unit'],
    ['the message field', 500, { message: 'Simulation is busy' }, 'Simulation is busy'],
    ['a generic message', 500, { detail: 'nothing useful' }, 'Failed to collect meter readings'],
    ['the error field of a 2xx body', 200, { error: 'Clock overflow' }, 'Clock overflow'],
  ])('reports collection failures using %s', async (_label, status, body, expected) => {
    fetchMock.mockResolvedValueOnce(jsonResponse(body, status));

    await expect(collectReadings({ value: 1, unit: 'days' })).rejects.toThrow(expected);
  });

  it('treats any non-2xx meter validation as a failure', async () => {
    fetchMock.mockResolvedValueOnce(new Response(null, { status: 404 }));

    const error = await validateMeter('123-456-789').catch((err: unknown) => err);
    expect(error).toBeInstanceOf(ApiError);
    expect(error).toMatchObject({ message: 'Meter validation failed', status: 404 });
    expect(fetchMock.mock.calls[0][1]?.body).toBe('{"meterId":"123-456-789"}');
  });

  it('encodes the meter id and time range as query parameters', async () => {
    fetchMock.mockResolvedValueOnce(jsonResponse({ dates: ['2024-05-01'], usage: [1.5], total_usage: 1.5 }));

    await expect(fetchUsage('123-456-789', 'last_7_days')).resolves.toEqual({
      dates: ['2024-05-01'],
      usage: [1.5],
      total_usage: 1.5,
    });
    expect(String(fetchMock.mock.calls[0][0])).toBe('/query_usage?meter_id=123-456-789&time_range=last_7_days');
  });

  it('treats an error field on a 2xx usage body as a failure', async () => {
    fetchMock.mockResolvedValueOnce(jsonResponse({ error: 'No readings' }));

    await expect(fetchUsage('123-456-789', 'today')).rejects.toMatchObject({
      message: 'Failed to fetch usage data',
      detail: 'No readings',
    });
  });

  it('rejects monthly history whose arrays differ in length', async () => {
    fetchMock.mockResolvedValueOnce(jsonResponse({ months: ['2024-05'], usage: [1, 2], days: [31] }));

    await expect(fetchMonthlyHistory('123-456-789')).rejects.toThrow('Failed to fetch monthly history');
    expect(String(fetchMock.mock.calls[0][0])).toBe('/monthly_history?meter_id=123-456-789');
  });

  it('loads the area catalog', async () => {
    fetchMock.mockResolvedValueOnce(jsonResponse({ North: ['Riverside', 'Hilltop'] }));

    await expect(fetchAreas()).resolves.toEqual({ North: ['Riverside', 'Hilltop'] });
  });

  it('returns the registered account', async () => {
    const account = {
      meter_ID: '123-456-789',
      area: 'Hilltop',
      dwelling: 'Apartment',
      register_time: '2024-05-01 10:00:00',
    };
    fetchMock.mockResolvedValueOnce(jsonResponse({ success: true, account }));

    await expect(
      registerMeter({ meterId: '123-456-789', area: 'Hilltop', dwelling: 'Apartment' }),
    ).resolves.toEqual(account);
  });

  it('surfaces the backend reason for a refused registration', async () => {
    fetchMock.mockResolvedValueOnce(jsonResponse({ success: false, message: 'Meter ID already exists' }, 400));

    await expect(
      registerMeter({ meterId: '123-456-789', area: 'Hilltop', dwelling: 'Apartment' }),
    ).rejects.toThrow('Meter ID already exists');
  });

  it('falls back to a generic registration failure', async () => {
    fetchMock.mockResolvedValueOnce(jsonResponse({ success: false }));

    await expect(
      registerMeter({ meterId: '123-456-789', area: 'Hilltop', dwelling: 'Apartment' }),
    ).rejects.toThrow('Registration failed');
  });
});
