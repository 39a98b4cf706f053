/**
 * Engine failure taxonomy.
 *
 * Only TransientFetchError is retried by the resilient wrapper. The other two
 * are surfaced to the caller on first occurrence.
 */

export type EngineErrorCode = "transient_fetch" | "configuration" | "validation";

export abstract class EngineError extends Error {
  abstract readonly code: EngineErrorCode;

  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
  }
}

/** Network timeout, connection reset, rate limit or 5xx. */
export class TransientFetchError extends EngineError {
  readonly code = "transient_fetch" as const;
  readonly status: number | null;

  constructor(message: string, options: { status?: number; cause?: unknown } = {}) {
    super(message, { cause: options.cause });
    this.status = options.status ?? null;
  }
}

/** Missing credential or setup. */
export class ConfigurationError extends EngineError {
  readonly code = "configuration" as const;
}

/** Malformed caller input: bad coordinates, bad options, mismatched field types. */
export class ValidationError extends EngineError {
  readonly code = "validation" as const;
}

export function isEngineError(err: unknown): err is EngineError {
  return err instanceof EngineError;
}

export function isTransient(err: unknown): err is TransientFetchError {
  return err instanceof TransientFetchError;
}

export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
