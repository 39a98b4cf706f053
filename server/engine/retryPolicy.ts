import { ValidationError } from "./errors";

export interface RetryPolicy {
  readonly maxAttempts: number;
  readonly baseDelaySeconds: number;
  readonly backoffMultiplier: number;
}

export const DEFAULT_RETRY_POLICY: RetryPolicy = Object.freeze({
  maxAttempts: 3,
  baseDelaySeconds: 1.5,
  backoffMultiplier: 2,
});

/**
 * Build a frozen retry policy, filling gaps from the defaults.
 * Rejects values outside their ranges instead of adjusting them.
 */
export function createRetryPolicy(overrides: Partial<RetryPolicy> = {}): RetryPolicy {
  const policy = { ...DEFAULT_RETRY_POLICY, ...overrides };

  if (!Number.isInteger(policy.maxAttempts) || policy.maxAttempts < 1) {
    throw new ValidationError(`maxAttempts must be an integer >= 1 (got ${policy.maxAttempts})`);
  }
  if (!Number.isFinite(policy.baseDelaySeconds) || policy.baseDelaySeconds <= 0) {
    throw new ValidationError(`baseDelaySeconds must be > 0 (got ${policy.baseDelaySeconds})`);
  }
  if (!Number.isFinite(policy.backoffMultiplier) || policy.backoffMultiplier < 1) {
    throw new ValidationError(`backoffMultiplier must be >= 1 (got ${policy.backoffMultiplier})`);
  }

  return Object.freeze(policy);
}

/** Wait before the retry that follows the given (1-based) failed attempt. */
export function backoffDelayMs(policy: RetryPolicy, attempt: number): number {
  return policy.baseDelaySeconds * Math.pow(policy.backoffMultiplier, attempt - 1) * 1000;
}

/**
 * Upper bound on how long one wrapped call can take: every attempt runs to its
 * timeout and every wait between attempts is served. There is no wait after
 * the last attempt. Callers size their own deadline above this value, since the
 * wrapper cannot be cancelled.
 */
export function worstCaseLatencyMs(policy: RetryPolicy, operationTimeoutMs: number): number {
  let total = policy.maxAttempts * operationTimeoutMs;
  for (let attempt = 1; attempt < policy.maxAttempts; attempt++) {
    total += backoffDelayMs(policy, attempt);
  }
  return total;
}
