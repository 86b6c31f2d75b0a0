/**
 * Offer Normalizer
 *
 * Maps one provider payload into canonical Offers. Items are fault-isolated:
 * a bad item is recorded as a skip and the rest of the payload still counts.
 * Output keeps payload order.
 */

import { BOOKING_LINK_PLACEHOLDER } from '../config/constants';
import { Result } from '../types/result';
import { FIELD_STRATEGIES, extractField, isRecord } from './field-strategies';
import type { NormalizationSkip, Offer, RawPayload, SearchQuery } from './types';

export interface NormalizeOptions {
  /** Reporting currency; items priced in anything else are dropped. */
  currency: string;
  bookingLinkFallback?: string;
}

export interface NormalizationResult {
  offers: Offer[];
  skipped: NormalizationSkip[];
}

const ITEM_CONTAINERS = ['data', 'results', 'offers'] as const;

/**
 * Find the list of offer-like items in a payload, or null when there is none.
 */
export function locateItems(payload: RawPayload): unknown[] | null {
  if (Array.isArray(payload)) return payload;
  if (!isRecord(payload)) return null;
  for (const key of ITEM_CONTAINERS) {
    const items = payload[key];
    if (Array.isArray(items)) return items;
  }
  return null;
}

function normalizeItem(item: unknown, query: SearchQuery, options: NormalizeOptions): Result<Offer> {
  if (!isRecord(item)) return Result.err('item is not an object');

  const price = extractField(item, FIELD_STRATEGIES.price);
  if (price === undefined) return Result.err('missing price');

  const currency = extractField(item, FIELD_STRATEGIES.currency);
  if (currency === undefined) return Result.err('missing currency');
  if (currency !== options.currency) {
    return Result.err(`currency ${currency} does not match ${options.currency}`);
  }

  const cabin = extractField(item, FIELD_STRATEGIES.cabin);
  if (cabin === undefined) return Result.err('missing cabin');

  const departureDate = extractField(item, FIELD_STRATEGIES.departureDate);
  if (departureDate === undefined) return Result.err('missing departure date');

  const returnDate = extractField(item, FIELD_STRATEGIES.returnDate);
  if (returnDate === undefined) return Result.err('missing return date');

  return Result.ok({
    origin: extractField(item, FIELD_STRATEGIES.origin) ?? query.origin,
    destination: extractField(item, FIELD_STRATEGIES.destination) ?? query.destination,
    departureDate,
    returnDate,
    cabin,
    price,
    currency,
    marketingCarrier: extractField(item, FIELD_STRATEGIES.marketingCarrier) ?? null,
    operatingCarrier: extractField(item, FIELD_STRATEGIES.operatingCarrier) ?? null,
    bookingLink:
      extractField(item, FIELD_STRATEGIES.bookingLink) ?? options.bookingLinkFallback ?? BOOKING_LINK_PLACEHOLDER,
  });
}

export function normalizeOffers(
  payload: RawPayload,
  query: SearchQuery,
  options: NormalizeOptions
): NormalizationResult {
  const items = locateItems(payload);
  if (!items) return { offers: [], skipped: [] };

  const offers: Offer[] = [];
  const skipped: NormalizationSkip[] = [];

  items.forEach((item, index) => {
    try {
      const result = normalizeItem(item, query, options);
      if (result.ok) offers.push(result.value);
      else skipped.push({ index, reason: result.error });
    } catch (e) {
      skipped.push({ index, reason: e instanceof Error ? e.message : String(e) });
    }
  });

  return { offers, skipped };
}
