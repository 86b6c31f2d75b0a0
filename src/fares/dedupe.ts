/**
 * Deduplicator & Ranker
 *
 * Overlapping queries (flex windows, several stay lengths) rediscover the same
 * itinerary; the report wants one row per itinerary at its cheapest price.
 */

import type { EligibleOffer, ResultSet, ScanWindow } from './types';

/** (origin, destination, cabin, departureDate, returnDate) */
export function itineraryKey(offer: EligibleOffer): string {
  return [offer.origin, offer.destination, offer.cabin, offer.departureDate, offer.returnDate].join('|');
}

/**
 * Keep the cheapest offer per itinerary. Equal prices keep the first seen.
 * Result order follows first appearance of each key.
 */
export function dedupeOffers(offers: Iterable<EligibleOffer>): EligibleOffer[] {
  const cheapest = new Map<string, EligibleOffer>();
  for (const offer of offers) {
    const key = itineraryKey(offer);
    const current = cheapest.get(key);
    if (!current || offer.price < current.price) cheapest.set(key, offer);
  }
  return [...cheapest.values()];
}

function compareText(a: string, b: string): number {
  return a < b ? -1 : a > b ? 1 : 0;
}

/** Price ascending; ties broken on the itinerary fields so the order is total. */
export function compareByPrice(a: EligibleOffer, b: EligibleOffer): number {
  return (
    a.price - b.price ||
    compareText(a.departureDate, b.departureDate) ||
    compareText(a.returnDate, b.returnDate) ||
    compareText(a.origin, b.origin) ||
    compareText(a.destination, b.destination) ||
    compareText(a.cabin, b.cabin)
  );
}

export function rankOffers(offers: readonly EligibleOffer[]): EligibleOffer[] {
  return [...offers].sort(compareByPrice);
}

export function buildResultSet(offers: Iterable<EligibleOffer>, window: ScanWindow): ResultSet {
  return { offers: rankOffers(dedupeOffers(offers)), window };
}
