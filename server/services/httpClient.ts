/**
 * HTTP Client Boundary
 *
 * Every travel API client goes through fetchJson(), which turns transport and
 * HTTP failures into the engine's error taxonomy before the resilient wrapper
 * sees them:
 *
 *   timeout / network error / 408, 425, 429, 5xx  → TransientFetchError (retried)
 *   401, 403                                       → ConfigurationError
 *   any other 4xx                                  → ValidationError
 *
 * A body that is not JSON is treated as transient (truncated or proxied
 * responses). A JSON body that does not match the expected shape is a plain
 * Error and is not retried.
 */

import { z } from 'zod';
import {
  ConfigurationError,
  TransientFetchError,
  ValidationError,
  errorMessage,
  type ResultCache,
  type RetryPolicy,
} from '../engine';

export const DEFAULT_HTTP_TIMEOUT_MS = 10_000;

const TRANSIENT_STATUSES = new Set([408, 425, 429]);

/** Shared construction options for the travel API clients. */
export interface ClientOptions {
  apiKey?: string;
  cache?: ResultCache | null;
  policy?: RetryPolicy;
  timeoutMs?: number;
}

export type QueryParams = Record<string, string | number | undefined>;

export interface FetchJsonOptions {
  method?: 'GET' | 'POST';
  params?: QueryParams;
  headers?: Record<string, string>;
  body?: URLSearchParams;
  timeoutMs?: number;
  /** Log tag, e.g. "Weather". */
  source?: string;
}

export function buildUrl(baseUrl: string, params: QueryParams = {}): string {
  const search = new URLSearchParams();
  for (const [key, value] of Object.entries(params)) {
    if (value !== undefined) search.append(key, String(value));
  }
  const query = search.toString();
  return query ? `${baseUrl}?${query}` : baseUrl;
}

export function classifyStatus(status: number, message: string): Error {
  if (TRANSIENT_STATUSES.has(status) || status >= 500) {
    return new TransientFetchError(message, { status });
  }
  if (status === 401 || status === 403) {
    return new ConfigurationError(message);
  }
  return new ValidationError(message);
}

export function requireApiKey(apiKey: string | undefined, envName: string): string {
  if (!apiKey) {
    throw new ConfigurationError(`${envName} is not configured`);
  }
  return apiKey;
}

export async function fetchJson<T>(
  url: string,
  schema: z.ZodType<T, z.ZodTypeDef, unknown>,
  options: FetchJsonOptions = {}
): Promise<T> {
  const source = options.source ?? 'HTTP';
  const timeoutMs = options.timeoutMs ?? DEFAULT_HTTP_TIMEOUT_MS;
  const target = buildUrl(url, options.params);

  let response: Response;
  try {
    response = await fetch(target, {
      method: options.method ?? 'GET',
      headers: options.headers,
      body: options.body,
      signal: AbortSignal.timeout(timeoutMs),
    });
  } catch (error) {
    if (error instanceof Error && (error.name === 'TimeoutError' || error.name === 'AbortError')) {
      throw new TransientFetchError(`${source} request timed out after ${timeoutMs}ms`, { cause: error });
    }
    throw new TransientFetchError(`${source} request failed: ${errorMessage(error)}`, { cause: error });
  }

  if (!response.ok) {
    console.error(`[${source}] Request failed:`, response.status);
    throw classifyStatus(response.status, `${source} request failed with status ${response.status}`);
  }

  let body: unknown;
  try {
    body = await response.json();
  } catch (error) {
    throw new TransientFetchError(`${source} returned a body that is not JSON`, {
      status: response.status,
      cause: error,
    });
  }

  const parsed = schema.safeParse(body);
  if (!parsed.success) {
    throw new Error(`${source} returned an unexpected response shape: ${parsed.error.errors[0]?.message ?? 'invalid'}`);
  }
  return parsed.data;
}
