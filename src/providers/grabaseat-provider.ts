/**
 * Grabaseat provider
 *
 * POSTs one round-trip search per query with a ±flexDays window on both
 * legs. The endpoint takes no credentials.
 */

import { CABIN_LABELS } from '../config/constants';
import { shiftDate } from '../fares/enumerator';
import type { IsoDate, RawPayload, SearchQuery } from '../fares/types';
import { requestJson } from './http';
import type { FareProvider } from './types';

export interface GrabaseatProviderOptions {
  endpoint: string;
  currency: string;
  airline: string;
  fetchImpl?: typeof fetch;
}

export interface GrabaseatSearchBody {
  origin: string;
  destination: string;
  tripType: 'return';
  cabin: string;
  dateRanges: { outbound: string; inbound: string };
  passengers: { adults: number };
  currency: string;
  filters: { operators: string[]; maxStops: number };
}

/** Whole-day ISO interval around `date`. */
export function flexRange(date: IsoDate, flexDays: number): string {
  return `${shiftDate(date, -flexDays)}T00:00:00Z/${shiftDate(date, flexDays)}T23:59:59Z`;
}

export function buildSearchBody(query: SearchQuery, currency: string, airline: string): GrabaseatSearchBody {
  return {
    origin: query.origin,
    destination: query.destination,
    tripType: 'return',
    cabin: CABIN_LABELS[query.cabin],
    dateRanges: {
      outbound: flexRange(query.departureDate, query.flexDays),
      inbound: flexRange(query.returnDate, query.flexDays),
    },
    passengers: { adults: 1 },
    currency,
    filters: { operators: [airline], maxStops: 1 },
  };
}

export class GrabaseatFareProvider implements FareProvider {
  readonly id = 'grabaseat' as const;

  private readonly fetchImpl: typeof fetch;

  constructor(private readonly options: GrabaseatProviderOptions) {
    this.fetchImpl = options.fetchImpl ?? fetch;
  }

  async authenticate(): Promise<void> {
    // No credentials
  }

  search(query: SearchQuery, signal?: AbortSignal): Promise<RawPayload> {
    const body = buildSearchBody(query, this.options.currency, this.options.airline);
    return requestJson(
      this.fetchImpl,
      this.options.endpoint,
      {
        method: 'POST',
        headers: { 'Content-Type': 'application/json', Accept: 'application/json' },
        body: JSON.stringify(body),
      },
      'Grabaseat search',
      signal
    );
  }
}
