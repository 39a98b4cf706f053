/**
 * Resilient Call
 *
 * Wraps an external operation with a cache lookup in front of a bounded
 * retry loop:
 *
 *   cache hit  → cached result, operation not invoked
 *   cache miss → retry loop → successful result cached for ttlMs
 *
 * Cached values are structured clones: results must be plain data.
 *
 * Only TransientFetchError is retried. Configuration and validation failures,
 * and anything the client boundary did not classify, fail on the first attempt.
 * Failures are never cached.
 *
 * The wrapper has no cancellation signal; see worstCaseLatencyMs() for the
 * ceiling a caller's own deadline should exceed.
 */

import { isTransient, errorMessage } from "./errors";
import { DEFAULT_RETRY_POLICY, backoffDelayMs, type RetryPolicy } from "./retryPolicy";
import type { ResultCache } from "./resultCache";

export interface ResilientOptions {
  policy?: RetryPolicy;
  /** Shared cache. Without one the wrapper only retries. */
  cache?: ResultCache | null;
  /** Overrides the cache's default TTL for this operation. */
  ttlMs?: number;
}

export type AsyncOperation<A extends unknown[], R> = (...args: A) => Promise<R>;

interface Memo<R> {
  readonly result: R;
}

const sleep = (ms: number) => new Promise<void>((resolve) => setTimeout(resolve, ms));

/**
 * Serialize a value with object keys sorted at every depth, so argument
 * objects that differ only in key order produce the same text.
 */
export function stableSerialize(value: unknown): string {
  if (value === undefined) return "undefined";
  if (value === null || typeof value !== "object") {
    if (typeof value === "bigint") return `${value}n`;
    if (typeof value === "function") return "[function]";
    return JSON.stringify(value);
  }
  if (value instanceof Date) return JSON.stringify(value.toISOString());
  if (Array.isArray(value)) {
    return `[${value.map(stableSerialize).join(",")}]`;
  }

  const parts = Object.keys(value)
    .sort()
    .flatMap((key) => {
      const field: unknown = Reflect.get(value, key);
      return field === undefined ? [] : [`${JSON.stringify(key)}:${stableSerialize(field)}`];
    });
  return `{${parts.join(",")}}`;
}

export function buildCacheKey(operationName: string, args: readonly unknown[]): string {
  return `${operationName}:${stableSerialize(args)}`;
}

/**
 * Run an operation under a retry policy. The last transient failure is
 * rethrown as-is once attempts run out.
 */
export async function withRetry<R>(
  operationName: string,
  fn: () => Promise<R>,
  policy: RetryPolicy = DEFAULT_RETRY_POLICY
): Promise<R> {
  for (let attempt = 1; ; attempt++) {
    try {
      return await fn();
    } catch (err) {
      if (!isTransient(err) || attempt >= policy.maxAttempts) {
        throw err;
      }
      const delay = backoffDelayMs(policy, attempt);
      console.warn(
        `[Resilient] ${operationName} attempt ${attempt}/${policy.maxAttempts} failed (${errorMessage(err)}), retrying in ${Math.round(delay)}ms`
      );
      await sleep(delay);
    }
  }
}

/**
 * resilient(name, options)(operation) returns a function with the same
 * signature as operation, transparently cached and retried.
 */
export function resilient(operationName: string, options: ResilientOptions = {}) {
  const policy = options.policy ?? DEFAULT_RETRY_POLICY;
  const cache = options.cache ?? null;

  return function wrap<A extends unknown[], R>(operation: AsyncOperation<A, R>): AsyncOperation<A, R> {
    // Entries are recognised through their memo object, so a value stored under
    // the same key by a different wrapper is never returned with this R.
    const memos = new WeakMap<object, Memo<R>>();

    return async (...args: A): Promise<R> => {
      if (!cache) {
        return withRetry(operationName, () => operation(...args), policy);
      }

      const key = buildCacheKey(operationName, args);
      const hit = cache.get(key);
      const memo = typeof hit === "object" && hit !== null ? memos.get(hit) : undefined;
      if (memo) {
        console.log(`[Resilient] HIT: ${key}`);
        return structuredClone(memo.result);
      }

      const result = await withRetry(operationName, () => operation(...args), policy);

      // The cache holds its own copy and hands out copies, so no caller can edit a stored value.
      const fresh: Memo<R> = Object.freeze({ result: structuredClone(result) });
      memos.set(fresh, fresh);
      cache.set(key, fresh, options.ttlMs);
      return result;
    };
  };
}
