/**
 * Fare Pipeline Types
 *
 * Canonical, provider-independent records that flow through the scan:
 * ScanRequest → SearchQuery → RawPayload → Offer → EligibleOffer → ResultSet → MonthBucket.
 */

/** Cabins a scan can ask for. */
export type Cabin = 'PremiumEconomy' | 'Business';

/** Cabin as read from a provider payload; labels we cannot place become Unknown. */
export type OfferCabin = Cabin | 'Unknown';

export const CABINS: readonly Cabin[] = ['PremiumEconomy', 'Business'];

/** Calendar date, YYYY-MM-DD. No time-of-day semantics. */
export type IsoDate = string;

export interface Route {
  origin: string;
  destination: string;
}

export interface StayPolicy {
  minNights: number;
  maxNights: number;
}

/**
 * One run's parameters. Built once at the process boundary and passed
 * explicitly; never mutated.
 */
export interface ScanRequest {
  readonly routes: readonly Route[];
  readonly cabins: readonly Cabin[];
  readonly priceCaps: Readonly<Record<Cabin, number>>;
  readonly currency: string;
  readonly requiredAirline: string;
  readonly horizonMonths: number;
  readonly stay: Readonly<StayPolicy>;
  readonly dateStepDays: number;
  readonly flexDays: number;
  readonly today: IsoDate;
}

/** Unit of work sent to a provider. Independent of every other query. */
export interface SearchQuery {
  /** Position in the query plan; used to merge results in a stable order. */
  readonly index: number;
  readonly origin: string;
  readonly destination: string;
  readonly departureDate: IsoDate;
  readonly returnDate: IsoDate;
  readonly cabin: Cabin;
  readonly flexDays: number;
}

/** Whatever the provider answered with; shape varies per provider. */
export type RawPayload = unknown;

export interface Offer {
  readonly origin: string;
  readonly destination: string;
  readonly departureDate: IsoDate;
  readonly returnDate: IsoDate;
  readonly cabin: OfferCabin;
  readonly price: number;
  readonly currency: string;
  readonly marketingCarrier: string | null;
  readonly operatingCarrier: string | null;
  readonly bookingLink: string;
}

/** An Offer that passed the eligibility filter. Same fields, narrower set. */
export type EligibleOffer = Offer & { readonly cabin: Cabin };

export interface ScanWindow {
  start: IsoDate;
  end: IsoDate;
}

export interface ResultSet {
  readonly offers: readonly EligibleOffer[];
  readonly window: ScanWindow;
}

export interface MonthBucket {
  /** YYYY-MM */
  readonly key: string;
  readonly year: number;
  readonly month: number;
  /** e.g. "November 2026" */
  readonly label: string;
  readonly offers: readonly EligibleOffer[];
}

export const REJECTION_REASONS = ['airline', 'cabin', 'price_cap', 'currency', 'stay_length'] as const;

export type RejectionReason = (typeof REJECTION_REASONS)[number];

export interface NormalizationSkip {
  index: number;
  reason: string;
}
