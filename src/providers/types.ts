/**
 * Fare Provider Interface
 *
 * Defines the contract for every external fare search service.
 * Providers return raw, provider-specific payloads; normalization happens
 * downstream. Failures are thrown as ProviderFailure carrying a ProviderError.
 */

import type { ProviderId } from '../config/loader';
import type { RawPayload, SearchQuery } from '../fares/types';

export type ProviderErrorKind = 'AuthFailure' | 'RateLimited' | 'Transient' | 'NotFound' | 'Malformed';

export interface ProviderError {
  kind: ProviderErrorKind;
  message: string;
  /** HTTP status, when the failure came from a response */
  status?: number;
  /** Server-requested wait before retrying (Retry-After) */
  retryAfterMs?: number;
  /** Attempts made before giving up; set by the adapter */
  attempts?: number;
}

/**
 * Values every provider needs from the scan request.
 */
export interface ProviderContext {
  currency: string;
  airline: string;
  fetchImpl?: typeof fetch;
}

export interface FareProvider {
  readonly id: ProviderId;

  /**
   * Acquire credentials once per run. Resolves immediately for providers
   * without authentication.
   */
  authenticate(signal?: AbortSignal): Promise<void>;

  /**
   * search(origin, destination, departureDate, returnDate, cabin, flexDays)
   */
  search(query: SearchQuery, signal?: AbortSignal): Promise<RawPayload>;
}
