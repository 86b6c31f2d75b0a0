/**
 * Provider error classification.
 */

import type { ProviderError, ProviderErrorKind } from './types';

export class ProviderFailure extends Error {
  readonly error: ProviderError;

  constructor(kind: ProviderErrorKind, message: string, extra: Omit<ProviderError, 'kind' | 'message'> = {}) {
    super(message);
    this.name = 'ProviderFailure';
    this.error = { kind, message, ...extra };
  }
}

export function kindForStatus(status: number): ProviderErrorKind {
  if (status === 401 || status === 403) return 'AuthFailure';
  if (status === 429) return 'RateLimited';
  if (status === 408 || status >= 500) return 'Transient';
  // Other 4xx: route or date the provider does not serve. No data, not worth retrying.
  return 'NotFound';
}

/** Retry-After in seconds or as an HTTP date. */
export function parseRetryAfter(header: string | null, now: number = Date.now()): number | undefined {
  if (!header) return undefined;
  const seconds = Number(header);
  if (Number.isFinite(seconds)) return Math.max(0, seconds * 1000);
  const at = Date.parse(header);
  return Number.isNaN(at) ? undefined : Math.max(0, at - now);
}

export function failureFromResponse(response: Pick<Response, 'status' | 'headers'>, context: string): ProviderFailure {
  const kind = kindForStatus(response.status);
  const retryAfterMs = kind === 'RateLimited' ? parseRetryAfter(response.headers.get('retry-after')) : undefined;
  return new ProviderFailure(kind, `${context}: HTTP ${response.status}`, {
    status: response.status,
    retryAfterMs,
  });
}

function isAbortError(e: unknown): boolean {
  return e instanceof Error && (e.name === 'AbortError' || e.name === 'TimeoutError');
}

/**
 * Anything a provider throws becomes a ProviderError. Unknown exceptions
 * (DNS, reset connections, timeouts) count as transient.
 */
export function toProviderError(e: unknown): ProviderError {
  if (e instanceof ProviderFailure) return e.error;
  if (isAbortError(e)) return { kind: 'Transient', message: 'Request aborted' };
  return { kind: 'Transient', message: e instanceof Error ? e.message : String(e) };
}
