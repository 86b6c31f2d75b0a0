/**
 * Retry Policy
 *
 * How many times a failed provider call is attempted and how long to wait in
 * between. Pacing between distinct calls is the limiter's job, not this one.
 */

import type { ProviderError } from './types';

export interface RetryPolicy {
  maxAttempts: number;
  /** Delay before attempt `attempt + 1`, given the failure of attempt `attempt` (1-based). */
  backoffMs(attempt: number, error: ProviderError): number;
  isRetryable(error: ProviderError): boolean;
}

export interface BackoffOptions {
  maxAttempts: number;
  baseDelayMs: number;
  maxDelayMs: number;
}

export const DEFAULT_BACKOFF: BackoffOptions = {
  maxAttempts: 3,
  baseDelayMs: 800,
  maxDelayMs: 10_000,
};

export function isRetryableProviderError(error: ProviderError): boolean {
  return error.kind === 'Transient' || error.kind === 'RateLimited';
}

/**
 * base * 2^(attempt-1), capped; a rate-limit response waits at least as long
 * as the server asked.
 */
export function exponentialBackoff(options: BackoffOptions = DEFAULT_BACKOFF): RetryPolicy {
  return {
    maxAttempts: options.maxAttempts,
    backoffMs(attempt, error) {
      const exponential = Math.min(options.baseDelayMs * 2 ** (attempt - 1), options.maxDelayMs);
      return Math.max(exponential, error.retryAfterMs ?? 0);
    },
    isRetryable: isRetryableProviderError,
  };
}
