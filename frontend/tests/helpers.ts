import { vi } from 'vitest';

export function jsonResponse(body: unknown, status = 200): Response {
  return new Response(JSON.stringify(body), {
    status,
    headers: { 'Content-Type': 'application/json' },
  });
}

export function stubFetch() {
  const fetchMock = vi.fn(
    (_input: RequestInfo | URL, _init?: RequestInit): Promise<Response> =>
      Promise.reject(new TypeError('fetch not stubbed for this request')),
  );
  vi.stubGlobal('fetch', fetchMock);
  return fetchMock;
}

export function requestedUrls(fetchMock: ReturnType<typeof stubFetch>): string[] {
  return fetchMock.mock.calls.map(([input]) => String(input));
}

export function deferred<T>() {
  let settle: (value: T) => void = () => undefined;
  const promise = new Promise<T>((resolve) => {
    settle = resolve;
  });
  return { promise, resolve: (value: T) => settle(value) };
}

export const simulationTimeBody = {
  'Current Simulation Time': { Date: '2024-05-01', Time: '10:00', Weekday: 'Wednesday' },
};

type RouteHandler = (init?: RequestInit) => Response | Promise<Response>;

/**
 * Answers each request by its exact URL first, then by path alone. Handlers
 * build a fresh Response per call since bodies can only be read once.
 */
export function routeFetch(fetchMock: ReturnType<typeof stubFetch>, routes: Record<string, RouteHandler>) {
  fetchMock.mockImplementation(async (input, init) => {
    const url = String(input);
    const handler = routes[url] ?? routes[url.split('?')[0]];
    if (!handler) {
      throw new TypeError(`unexpected request to ${url}`);
    }
    return handler(init);
  });
}
