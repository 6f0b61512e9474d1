/**
 * Shared HTTP plumbing for the web translation services
 */

import type { ZodType, ZodTypeDef } from 'zod';

import { BackendError, errorMessage } from '../errors.js';

export const DEFAULT_HTTP_TIMEOUT_MS = 30000;

const USER_AGENT = 'catalog-translator/0.1';

export interface RequestJsonOptions<T> {
  backend: string;
  url: string;
  schema: ZodType<T, ZodTypeDef, unknown>;
  method?: 'GET' | 'POST';
  body?: unknown;
  timeoutMs?: number;
}

/**
 * Fetch a JSON document and validate its shape. Every failure becomes a BackendError.
 */
export async function requestJson<T>(options: RequestJsonOptions<T>): Promise<T> {
  const { backend, url, schema } = options;

  let response: Response;
  try {
    response = await fetch(url, {
      method: options.method ?? 'GET',
      headers: {
        'User-Agent': USER_AGENT,
        Accept: 'application/json',
        ...(options.body !== undefined ? { 'Content-Type': 'application/json' } : {}),
      },
      body: options.body !== undefined ? JSON.stringify(options.body) : undefined,
      signal: AbortSignal.timeout(options.timeoutMs ?? DEFAULT_HTTP_TIMEOUT_MS),
    });
  } catch (error) {
    throw new BackendError(backend, `Request failed: ${errorMessage(error)}`, { cause: error });
  }

  if (!response.ok) {
    throw new BackendError(backend, `HTTP ${response.status} ${response.statusText}`, { status: response.status });
  }

  let payload: unknown;
  try {
    payload = await response.json();
  } catch (error) {
    throw new BackendError(backend, `Invalid JSON response: ${errorMessage(error)}`, { cause: error });
  }

  const parsed = schema.safeParse(payload);
  if (!parsed.success) {
    throw new BackendError(backend, `Unexpected response shape: ${parsed.error.issues[0]?.message ?? 'unknown issue'}`);
  }
  return parsed.data;
}
