/**
 * Fare Provider Adapter
 *
 * Wraps a FareProvider with the retry policy and the request limiter and turns
 * every outcome into Result<RawPayload, ProviderError>. Never throws.
 */

import { Result } from '../types/result';
import type { RawPayload, SearchQuery } from '../fares/types';
import { Logger, silentLogger } from '../observability/logger';
import { toProviderError } from './errors';
import { RequestLimiter, sleep as defaultSleep } from './limiter';
import type { Sleeper } from './limiter';
import { exponentialBackoff } from './retry';
import type { RetryPolicy } from './retry';
import type { FareProvider, ProviderError } from './types';

export interface AdapterOptions {
  retry?: RetryPolicy;
  limiter?: RequestLimiter;
  logger?: Logger;
  sleep?: Sleeper;
}

const CANCELLED: ProviderError = { kind: 'Transient', message: 'Cancelled before completion' };

export class FareProviderAdapter {
  private readonly retry: RetryPolicy;
  private readonly limiter: RequestLimiter;
  private readonly logger: Logger;
  private readonly sleep: Sleeper;

  constructor(
    private readonly provider: FareProvider,
    options: AdapterOptions = {}
  ) {
    this.retry = options.retry ?? exponentialBackoff();
    this.limiter = options.limiter ?? new RequestLimiter({ concurrency: 1, minGapMs: 0 });
    this.logger = options.logger ?? silentLogger;
    this.sleep = options.sleep ?? defaultSleep;
  }

  get providerId(): string {
    return this.provider.id;
  }

  async authenticate(signal?: AbortSignal): Promise<Result<void, ProviderError>> {
    return this.attempt('authenticate', () => this.provider.authenticate(signal), signal);
  }

  async execute(query: SearchQuery, signal?: AbortSignal): Promise<Result<RawPayload, ProviderError>> {
    const label = `${query.origin}-${query.destination} ${query.cabin} ${query.departureDate}/${query.returnDate}`;
    return this.attempt(label, () => this.provider.search(query, signal), signal);
  }

  private async attempt<T>(
    label: string,
    operation: () => Promise<T>,
    signal?: AbortSignal
  ): Promise<Result<T, ProviderError>> {
    for (let attempt = 1; ; attempt++) {
      if (signal?.aborted) return Result.err({ ...CANCELLED, attempts: attempt - 1 });

      let error: ProviderError;
      try {
        return Result.ok(await this.limiter.run(operation, signal));
      } catch (e) {
        if (signal?.aborted) return Result.err({ ...CANCELLED, attempts: attempt });
        error = toProviderError(e);
      }

      if (!this.retry.isRetryable(error) || attempt >= this.retry.maxAttempts) {
        return Result.err({ ...error, attempts: attempt });
      }

      const delayMs = this.retry.backoffMs(attempt, error);
      this.logger.warn(`Retry ${attempt}/${this.retry.maxAttempts} for ${label}`, {
        kind: error.kind,
        reason: error.message,
        delayMs,
      });
      await this.sleep(delayMs, signal);
    }
  }
}
