/**
 * Shared builders and fakes for fare-watch tests.
 */

import type { EligibleOffer, Offer, RawPayload, ScanRequest, SearchQuery } from '../../src/fares/types';
import { FareProviderAdapter } from '../../src/providers/adapter';
import { RequestLimiter } from '../../src/providers/limiter';
import type { Sleeper } from '../../src/providers/limiter';
import { exponentialBackoff } from '../../src/providers/retry';
import type { FareProvider } from '../../src/providers/types';

export function makeRequest(overrides: Partial<ScanRequest> = {}): ScanRequest {
  return {
    routes: [{ origin: 'AKL', destination: 'SYD' }],
    cabins: ['PremiumEconomy', 'Business'],
    priceCaps: { PremiumEconomy: 1300, Business: 1500 },
    currency: 'NZD',
    requiredAirline: 'NZ',
    horizonMonths: 1,
    stay: { minNights: 8, maxNights: 12 },
    dateStepDays: 10,
    flexDays: 2,
    today: '2026-11-01',
    ...overrides,
  };
}

export function makeOffer(overrides: Partial<Offer> = {}): Offer {
  return {
    origin: 'AKL',
    destination: 'SYD',
    departureDate: '2026-11-10',
    returnDate: '2026-11-20',
    cabin: 'PremiumEconomy',
    price: 899,
    currency: 'NZD',
    marketingCarrier: 'NZ',
    operatingCarrier: 'NZ',
    bookingLink: 'https://example.test/book',
    ...overrides,
  };
}

export function makeEligible(overrides: Partial<EligibleOffer> = {}): EligibleOffer {
  return { ...makeOffer(), cabin: 'PremiumEconomy' as const, ...overrides };
}

export function makeQuery(overrides: Partial<SearchQuery> = {}): SearchQuery {
  return {
    index: 0,
    origin: 'AKL',
    destination: 'SYD',
    departureDate: '2026-11-10',
    returnDate: '2026-11-20',
    cabin: 'PremiumEconomy',
    flexDays: 2,
    ...overrides,
  };
}

/** A payload item in the shape the Grabaseat endpoint returns. */
export function grabaseatItem(fields: {
  cabin?: string;
  price?: number;
  currency?: string;
  depart?: string;
  ret?: string;
  carrier?: string;
  link?: string;
} = {}): Record<string, unknown> {
  return {
    marketingCarrier: fields.carrier ?? 'NZ',
    operatedBy: fields.carrier ?? 'NZ',
    cabin: fields.cabin ?? 'Premium Economy',
    price: { amount: fields.price ?? 899, currency: fields.currency ?? 'NZD' },
    outbound: { date: fields.depart ?? '2026-11-10' },
    inbound: { date: fields.ret ?? '2026-11-20' },
    deeplink: fields.link ?? 'https://example.test/book',
  };
}

export type SearchHandler = (query: SearchQuery, call: number) => RawPayload | Promise<RawPayload>;

export class FakeProvider implements FareProvider {
  readonly id = 'grabaseat' as const;
  readonly calls: SearchQuery[] = [];
  authCalls = 0;

  constructor(
    private readonly handler: SearchHandler,
    private readonly onAuthenticate: () => Promise<void> = async () => undefined
  ) {}

  async authenticate(): Promise<void> {
    this.authCalls++;
    await this.onAuthenticate();
  }

  async search(query: SearchQuery): Promise<RawPayload> {
    this.calls.push(query);
    return this.handler(query, this.calls.length);
  }
}

export const noSleep: Sleeper = async () => undefined;

/** Adapter with no pacing and no backoff delay. */
export function fastAdapter(provider: FareProvider, concurrency = 1, maxAttempts = 3): FareProviderAdapter {
  return new FareProviderAdapter(provider, {
    retry: exponentialBackoff({ maxAttempts, baseDelayMs: 0, maxDelayMs: 0 }),
    limiter: new RequestLimiter({ concurrency, minGapMs: 0, sleep: noSleep }),
    sleep: noSleep,
  });
}
