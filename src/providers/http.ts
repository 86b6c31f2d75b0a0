/**
 * JSON over fetch, with every failure mapped to a ProviderFailure.
 */

import type { RawPayload } from '../fares/types';
import { ProviderFailure, failureFromResponse } from './errors';

export const REQUEST_TIMEOUT_MS = 25_000;

export function withTimeout(signal: AbortSignal | undefined, timeoutMs: number): AbortSignal {
  const timeout = AbortSignal.timeout(timeoutMs);
  return signal ? AbortSignal.any([signal, timeout]) : timeout;
}

export async function requestJson(
  fetchImpl: typeof fetch,
  url: string,
  init: RequestInit,
  context: string,
  signal?: AbortSignal
): Promise<RawPayload> {
  const response = await fetchImpl(url, { ...init, signal: withTimeout(signal, REQUEST_TIMEOUT_MS) });

  if (!response.ok) {
    throw failureFromResponse(response, context);
  }

  const text = await response.text();
  try {
    return JSON.parse(text);
  } catch {
    throw new ProviderFailure('Malformed', `${context}: response is not JSON`, { status: response.status });
  }
}
