/**
 * Retry policy for calls to the completion endpoint.
 * Exponential backoff, capped, honouring Retry-After when the API sends one.
 */

import { setTimeout, clearTimeout } from 'node:timers';
import { RequestCancelledError } from '../shared/errors.js';
import type { ApiError } from '../shared/errors.js';

export interface RetryPolicy {
  /** Retries after the first attempt (0 disables retrying). */
  maxRetries: number;
  /** Delay before the first retry. Doubles on each further retry. */
  baseDelayMs: number;
  /** Upper bound for any single delay, Retry-After included. */
  maxDelayMs: number;
}

/**
 * Delay before retry number `retry` (0-based).
 *
 * Examples with base 500, max 8000:
 *   retry 0 -> 500, retry 1 -> 1000, retry 2 -> 2000, retry 5 -> 8000
 *   retry 0 with Retry-After 3000 -> 3000
 */
export function backoffDelayMs(retry: number, policy: RetryPolicy, retryAfterMs?: number): number {
  const exponential = policy.baseDelayMs * 2 ** retry;
  return Math.min(policy.maxDelayMs, Math.max(exponential, retryAfterMs ?? 0));
}

/**
 * Transient failures are retried; client errors (auth, bad request,
 * malformed payloads) would fail the same way again.
 */
export function isRetryable(error: ApiError): boolean {
  return error.retrySuggested;
}

/**
 * Wait for `ms`, rejecting with RequestCancelledError as soon as `signal` aborts.
 */
export function sleep(ms: number, signal?: AbortSignal): Promise<void> {
  return new Promise((resolve, reject) => {
    if (signal?.aborted) {
      reject(new RequestCancelledError());
      return;
    }

    const onAbort = () => {
      clearTimeout(timer);
      reject(new RequestCancelledError());
    };

    const timer = setTimeout(() => {
      signal?.removeEventListener('abort', onAbort);
      resolve();
    }, ms);

    signal?.addEventListener('abort', onAbort, { once: true });
  });
}
