import React from 'react';
import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest';
import { render, screen, waitFor } from '@testing-library/react';
import userEvent from '@testing-library/user-event';
import RegisterConsole from '../src/pages/RegisterConsole';
import { jsonResponse, requestedUrls, routeFetch, stubFetch } from './helpers';

const catalog = { North: ['Riverside', 'Hilltop'], South: ['Harbour'] };

async function fillForm(user: ReturnType<typeof userEvent.setup>, meterId: string) {
  await user.type(screen.getByLabelText('Meter ID'), meterId);
  await user.selectOptions(screen.getByLabelText('Region'), await screen.findByRole('option', { name: 'North' }));
  await user.selectOptions(screen.getByLabelText('Area'), 'Hilltop');
  await user.selectOptions(screen.getByLabelText('Dwelling type'), 'Apartment');
}

describe('RegisterConsole', () => {
  let fetchMock: ReturnType<typeof stubFetch>;

  beforeEach(() => {
    fetchMock = stubFetch();
    vi.spyOn(console, 'warn').mockImplementation(() => undefined);
  });

  afterEach(() => {
    vi.unstubAllGlobals();
    vi.restoreAllMocks();
  });

  it('offers only the areas of the chosen region', async () => {
    const user = userEvent.setup();
    routeFetch(fetchMock, { '/api/areas': () => jsonResponse(catalog) });
    render(<RegisterConsole />);

    const area = screen.getByLabelText('Area');
    expect(area).toBeDisabled();

    await user.selectOptions(screen.getByLabelText('Region'), await screen.findByRole('option', { name: 'South' }));

    expect(area).toBeEnabled();
    expect(Array.from(area.querySelectorAll('option')).map((option) => option.textContent)).toEqual([
      'Select an area',
      'Harbour',
    ]);
  });

  it('registers a meter and reports the registration time', async () => {
    const user = userEvent.setup();
    routeFetch(fetchMock, {
      '/api/areas': () => jsonResponse(catalog),
      '/register': () =>
        jsonResponse({
          success: true,
          account: {
            meter_ID: '123-456-789',
            area: 'Hilltop',
            dwelling: 'Apartment',
            register_time: '2024-05-01 10:00:00',
          },
        }),
    });
    render(<RegisterConsole />);

    await fillForm(user, '123-456-789');
    await user.click(screen.getByRole('button', { name: 'Register' }));

    expect(await screen.findByRole('status')).toHaveTextContent('Meter 123-456-789 registered at 2024-05-01 10:00:00');
    const registerCall = fetchMock.mock.calls.find(([url]) => String(url) === '/register');
    expect(registerCall?.[1]?.body).toBe('{"meterId":"123-456-789","area":"Hilltop","dwelling":"Apartment"}');
    expect(screen.getByLabelText('Meter ID')).toHaveValue('');
  });

  it('checks the meter id format before submitting', async () => {
    const user = userEvent.setup();
    routeFetch(fetchMock, { '/api/areas': () => jsonResponse(catalog) });
    render(<RegisterConsole />);

    await fillForm(user, '12345');
    await user.click(screen.getByRole('button', { name: 'Register' }));

    expect(await screen.findByRole('alert')).toHaveTextContent('Meter ID must look like 123-456-789.');
    expect(requestedUrls(fetchMock)).toEqual(['/api/areas']);
  });

  it('requires an area', async () => {
    const user = userEvent.setup();
    routeFetch(fetchMock, { '/api/areas': () => jsonResponse(catalog) });
    render(<RegisterConsole />);
    await waitFor(() => expect(requestedUrls(fetchMock)).toEqual(['/api/areas']));

    await user.type(screen.getByLabelText('Meter ID'), '123-456-789');
    await user.click(screen.getByRole('button', { name: 'Register' }));

    expect(await screen.findByRole('alert')).toHaveTextContent('Please choose an area.');
    expect(requestedUrls(fetchMock)).toEqual(['/api/areas']);
  });

  it('shows the reason the backend refused the registration', async () => {
    const user = userEvent.setup();
    routeFetch(fetchMock, {
      '/api/areas': () => jsonResponse(catalog),
      '/register': () => jsonResponse({ success: false, message: 'Meter ID already exists' }, 400),
    });
    render(<RegisterConsole />);

    await fillForm(user, '123-456-789');
    await user.click(screen.getByRole('button', { name: 'Register' }));

    expect(await screen.findByRole('alert')).toHaveTextContent('Meter ID already exists');
    expect(screen.queryByRole('status')).toBeNull();
  });

  it('reports an area catalog that cannot be loaded', async () => {
    routeFetch(fetchMock, { '/api/areas': () => jsonResponse({ error: 'down' }, 500) });
    render(<RegisterConsole />);

    expect(await screen.findByRole('alert')).toHaveTextContent('Failed to load areas');
  });
});
