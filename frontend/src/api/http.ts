import { z } from 'zod';
import { API_BASE_URL } from '../config';

export class ApiError extends Error {
  readonly status: number | null;
  readonly detail: string | null;

  constructor(message: string, options: { status?: number | null; detail?: string | null } = {}) {
    super(message);
    this.name = 'ApiError';
    this.status = options.status ?? null;
    this.detail = options.detail ?? null;
  }
}

export async function apiFetch(path: string, init?: RequestInit): Promise<Response> {
  const headers = new Headers(init?.headers || {});
  if (init?.body && !headers.has('Content-Type')) {
    headers.set('Content-Type', 'application/json');
  }

  return fetch(`${API_BASE_URL}${path}`, { ...init, headers });
}

export async function readJson(res: Response): Promise<unknown> {
  const text = await res.text();
  if (!text) return null;
  try {
    return JSON.parse(text);
  } catch (err) {
    console.warn(`Response from ${res.url || 'backend'} is not JSON`);
    return null;
  }
}

const ErrorFieldSchema = z.object({ error: z.string() });
const MessageFieldSchema = z.object({ message: z.string() });

export function hasErrorField(body: unknown): boolean {
  return typeof body === 'object' && body !== null && 'error' in body;
}

/** The backend's own explanation, `error` first, then `message`. */
export function backendDetail(body: unknown): string | null {
  const withError = ErrorFieldSchema.safeParse(body);
  if (withError.success) return withError.data.error;
  const withMessage = MessageFieldSchema.safeParse(body);
  if (withMessage.success) return withMessage.data.message;
  return null;
}
