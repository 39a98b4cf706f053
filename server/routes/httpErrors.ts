/**
 * Maps engine failures onto HTTP responses.
 *
 *   ValidationError     → 400
 *   ConfigurationError  → 503 (the upstream client is not set up)
 *   TransientFetchError → 502 (upstream still failing after retries)
 *   anything else       → 500
 */

import type { Response } from 'express';
import type { z } from 'zod';
import { ConfigurationError, TransientFetchError, ValidationError, errorMessage } from '../engine';

export interface ErrorBody {
  error: string;
  message: string;
  details?: unknown;
}

export function describeError(error: unknown): { status: number; body: ErrorBody } {
  if (error instanceof ValidationError) {
    return { status: 400, body: { error: 'validation_error', message: error.message } };
  }
  if (error instanceof ConfigurationError) {
    return { status: 503, body: { error: 'configuration_error', message: error.message } };
  }
  if (error instanceof TransientFetchError) {
    return {
      status: 502,
      body: { error: 'upstream_unavailable', message: error.message, details: { upstreamStatus: error.status } },
    };
  }
  return { status: 500, body: { error: 'internal_error', message: errorMessage(error) || 'Internal Server Error' } };
}

export function sendError(res: Response, error: unknown, source: string) {
  const { status, body } = describeError(error);
  if (status >= 500) {
    console.error(`[${source}] Request failed:`, errorMessage(error));
  }
  return res.status(status).json(body);
}

export function sendValidationError(res: Response, error: z.ZodError, message = 'Invalid request') {
  return res.status(400).json({
    error: 'validation_error',
    message,
    details: error.errors,
  });
}
