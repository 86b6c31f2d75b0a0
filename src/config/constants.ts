/**
 * Fare Watch Configuration Constants
 *
 * Defaults for every configuration value the loader reads.
 */

import type { Cabin } from '../fares/types';

/**
 * Default values - overridden by environment variables at the process boundary.
 */
export const DEFAULTS = {
  provider: 'amadeus',
  routes: 'AKL:SYD,AKL:MEL',
  cabins: 'PremiumEconomy,Business',
  currency: 'NZD',
  requiredAirline: 'NZ',

  /** Scan horizon, months from today */
  scanMonths: 3,

  minStayNights: 8,
  maxStayNights: 12,
  dateStepDays: 10,
  flexDays: 2,

  /** Worker pool size for provider calls */
  concurrency: 2,

  /** Minimum gap between consecutive request starts */
  minRequestGapMs: 400,
  requestJitterMs: 150,

  maxAttempts: 3,
  retryBaseDelayMs: 800,
  retryMaxDelayMs: 10_000,

  dryRun: true,
  outFile: 'out-fare-watch.html',
  fromName: 'Fare Watch',
  logLevel: 'info',
} as const;

/** Per-cabin price caps in the reporting currency. */
export const DEFAULT_PRICE_CAPS: Readonly<Record<Cabin, number>> = {
  PremiumEconomy: 1300,
  Business: 1500,
};

export const PROVIDER_URLS = {
  amadeus: 'https://test.api.amadeus.com',
  grabaseat: 'https://grabaseat.airnewzealand.co.nz/v1/flights/search',
  tequila: 'https://tequila-api.kiwi.com/v2/search',
  brevo: 'https://api.brevo.com/v3/smtp/email',
} as const;

export const CABIN_LABELS: Readonly<Record<Cabin, string>> = {
  PremiumEconomy: 'Premium Economy',
  Business: 'Business',
};

/** City names for report display. Unknown codes render as the bare code. */
export const AIRPORT_NAMES: Readonly<Record<string, string>> = {
  AKL: 'Auckland',
  WLG: 'Wellington',
  CHC: 'Christchurch',
  ZQN: 'Queenstown',
  SYD: 'Sydney',
  MEL: 'Melbourne',
  BNE: 'Brisbane',
  OOL: 'Gold Coast',
  PER: 'Perth',
  ADL: 'Adelaide',
};

/**
 * Used when a provider gives no booking link for an offer.
 */
export const BOOKING_LINK_PLACEHOLDER = 'https://www.grabaseat.co.nz/';
