/**
 * Retry policy
 *
 * Retry behaviour is a table keyed by error kind rather than logic spread
 * across call sites. Only transient failures are retried locally; rate limits
 * are handed back to the caller with their retry-after duration.
 */

import type { ApiError, ApiErrorKind } from '../types/errors';

export interface BackoffRule {
  /** Retries after the first attempt */
  maxRetries: number;
  baseDelayMs: number;
  factor: number;
  maxDelayMs: number;
}

export type RetryPolicy = Record<ApiErrorKind, BackoffRule>;

const NO_RETRY: BackoffRule = { maxRetries: 0, baseDelayMs: 0, factor: 1, maxDelayMs: 0 };

export const DEFAULT_RETRY_POLICY: RetryPolicy = {
  transient: { maxRetries: 2, baseDelayMs: 250, factor: 2, maxDelayMs: 2000 },
  rate_limited: NO_RETRY,
  unauthorized: NO_RETRY,
  not_found: NO_RETRY,
  invalid_request: NO_RETRY,
};

/**
 * Delay before retry number `retry` (1-based), or null when the policy
 * does not allow another attempt
 */
export function backoffDelay(policy: RetryPolicy, error: ApiError, retry: number): number | null {
  const rule = policy[error.kind];
  if (retry < 1 || retry > rule.maxRetries) {
    return null;
  }
  const delay = rule.baseDelayMs * Math.pow(rule.factor, retry - 1);
  return Math.min(delay, rule.maxDelayMs);
}

/** Wait `ms`, or less when `signal` aborts first */
export type Sleep = (ms: number, signal?: AbortSignal) => Promise<void>;

export const sleep: Sleep = (ms, signal) =>
  new Promise((resolve) => {
    if (signal?.aborted) {
      resolve();
      return;
    }
    const onAbort = (): void => {
      clearTimeout(timer);
      resolve();
    };
    const timer = setTimeout(() => {
      signal?.removeEventListener('abort', onAbort);
      resolve();
    }, ms);
    signal?.addEventListener('abort', onAbort, { once: true });
  });
