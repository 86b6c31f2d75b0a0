/**
 * Result type for operations that fail in expected, typed ways.
 *
 * Provider calls return Result<RawPayload, ProviderError> instead of throwing,
 * so the scan runner can tell a dead query from a dead run.
 *
 * @example
 * const result = await adapter.execute(query);
 * if (result.ok) {
 *   normalizeOffers(result.value, query, request);
 * } else if (result.error.kind === 'AuthFailure') {
 *   abort();
 * }
 */

export type Result<T, E = string> =
  | { ok: true; value: T }
  | { ok: false; error: E };

export const Result = {
  ok<T>(value: T): Result<T, never> {
    return { ok: true, value };
  },

  err<E = string>(error: E): Result<never, E> {
    return { ok: false, error };
  },
};
