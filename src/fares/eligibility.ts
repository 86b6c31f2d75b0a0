/**
 * Eligibility Filter
 *
 * Pure rules deciding whether a normalized Offer is reportable for a request.
 * Caps are inclusive: a price equal to the cap is eligible.
 */

import { differenceInCalendarDays, parseISO } from 'date-fns';
import { Result } from '../types/result';
import { isRequestedCabin } from './cabin';
import type { EligibleOffer, Offer, RejectionReason, ScanRequest } from './types';

export function stayNights(offer: Pick<Offer, 'departureDate' | 'returnDate'>): number {
  return differenceInCalendarDays(parseISO(offer.returnDate), parseISO(offer.departureDate));
}

/** Operating carrier when known, else the marketing carrier. */
export function effectiveCarrier(offer: Offer): string | null {
  return offer.operatingCarrier ?? offer.marketingCarrier;
}

function reject(reason: RejectionReason): Result<never, RejectionReason> {
  return Result.err(reason);
}

/**
 * The offer narrowed to EligibleOffer, or the first rule it breaks.
 */
export function classifyOffer(offer: Offer, request: ScanRequest): Result<EligibleOffer, RejectionReason> {
  const carrier = effectiveCarrier(offer);
  if (!carrier || carrier.toUpperCase() !== request.requiredAirline.toUpperCase()) return reject('airline');

  const cabin = offer.cabin;
  if (!isRequestedCabin(cabin, request.cabins)) return reject('cabin');

  if (offer.currency !== request.currency) return reject('currency');

  if (!(offer.price <= request.priceCaps[cabin])) return reject('price_cap');

  const nights = stayNights(offer);
  if (!(nights >= request.stay.minNights && nights <= request.stay.maxNights)) return reject('stay_length');

  return Result.ok({ ...offer, cabin });
}

/** First rule the offer breaks, or null when it is eligible. */
export function checkEligibility(offer: Offer, request: ScanRequest): RejectionReason | null {
  const result = classifyOffer(offer, request);
  return result.ok ? null : result.error;
}

export function isEligible(offer: Offer, request: ScanRequest): offer is EligibleOffer {
  return checkEligibility(offer, request) === null;
}
