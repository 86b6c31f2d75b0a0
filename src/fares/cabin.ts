/**
 * Cabin label matching.
 *
 * Provider vocabularies vary ("PREMIUM_ECONOMY", "Premium Economy", fare codes
 * "W"/"C"/"J"). Matching is case-insensitive and substring-tolerant. The
 * phrase "premium economy" wins, then "business", then a bare "premium", so
 * "Business Premium" stays Business.
 */

import type { Cabin, OfferCabin } from './types';

const FARE_CODES: Record<string, Cabin> = {
  W: 'PremiumEconomy',
  C: 'Business',
  J: 'Business',
};

export function matchCabin(label: string): OfferCabin {
  const trimmed = label.trim();
  if (!trimmed) return 'Unknown';

  const code = FARE_CODES[trimmed.toUpperCase()];
  if (code) return code;

  const normalized = trimmed.toLowerCase().replace(/[_\-\s]+/g, '');
  if (normalized.includes('premiumeconomy')) return 'PremiumEconomy';
  if (normalized.includes('business')) return 'Business';
  if (normalized.includes('premium')) return 'PremiumEconomy';
  return 'Unknown';
}

export function isRequestedCabin(cabin: OfferCabin, requested: readonly Cabin[]): cabin is Cabin {
  return cabin !== 'Unknown' && requested.includes(cabin);
}
