/**
 * Kiwi.com Tequila provider
 *
 * One round-trip search per query: outbound and return windows of ±flexDays,
 * direct flights on the required airline, in the query's cabin. Tequila states
 * the currency once per response, so each item is tagged with it before the
 * payload goes downstream.
 */

import { format, parseISO } from 'date-fns';
import { shiftDate } from '../fares/enumerator';
import { isRecord } from '../fares/field-strategies';
import type { Cabin, IsoDate, RawPayload, SearchQuery } from '../fares/types';
import { requestJson } from './http';
import type { FareProvider } from './types';

/** Tequila `selected_cabins` codes */
export const TEQUILA_CABIN_CODES: Readonly<Record<Cabin, string>> = {
  PremiumEconomy: 'W',
  Business: 'C',
};

export interface TequilaProviderOptions {
  apiKey: string;
  endpoint: string;
  currency: string;
  airline: string;
  /** Results per search; defaults to 50 */
  limit?: number;
  fetchImpl?: typeof fetch;
}

/** dd/mm/yyyy */
export function tequilaDate(date: IsoDate): string {
  return format(parseISO(date), 'dd/MM/yyyy');
}

export function buildSearchParams(query: SearchQuery, currency: string, airline: string, limit = 50): URLSearchParams {
  const { departureDate, returnDate, flexDays } = query;
  return new URLSearchParams({
    fly_from: query.origin,
    fly_to: query.destination,
    date_from: tequilaDate(shiftDate(departureDate, -flexDays)),
    date_to: tequilaDate(shiftDate(departureDate, flexDays)),
    return_from: tequilaDate(shiftDate(returnDate, -flexDays)),
    return_to: tequilaDate(shiftDate(returnDate, flexDays)),
    flight_type: 'round',
    selected_cabins: TEQUILA_CABIN_CODES[query.cabin],
    select_airlines: airline,
    select_airlines_exclude: 'false',
    max_stopovers: '0',
    curr: currency,
    sort: 'price',
    limit: String(limit),
  });
}

/**
 * Copy the response-level `currency` onto every item that has none.
 */
export function tagCurrency(payload: RawPayload): RawPayload {
  if (!isRecord(payload)) return payload;
  const currency = payload.currency;
  const items: unknown = payload.data;
  if (typeof currency !== 'string' || !Array.isArray(items)) return payload;

  return {
    ...payload,
    data: items.map((item: unknown) => (isRecord(item) && item.currency === undefined ? { ...item, currency } : item)),
  };
}

export class TequilaFareProvider implements FareProvider {
  readonly id = 'tequila' as const;

  private readonly fetchImpl: typeof fetch;

  constructor(private readonly options: TequilaProviderOptions) {
    this.fetchImpl = options.fetchImpl ?? fetch;
  }

  async authenticate(): Promise<void> {
    // The API key goes with every search
  }

  async search(query: SearchQuery, signal?: AbortSignal): Promise<RawPayload> {
    const { apiKey, endpoint, currency, airline, limit } = this.options;
    const params = buildSearchParams(query, currency, airline, limit);
    const payload = await requestJson(
      this.fetchImpl,
      `${endpoint}?${params.toString()}`,
      { method: 'GET', headers: { apikey: apiKey, accept: 'application/json' } },
      'Tequila search',
      signal
    );
    return tagCurrency(payload);
  }
}
