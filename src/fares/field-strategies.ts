/**
 * Field Extraction Strategies
 *
 * Providers put the same logical value in different places (cabin per segment
 * or per traveler pricing, price as a bare number or under a price object,
 * dates as dates or timestamps). Each logical field gets an ordered list of
 * paths and a zod schema; the first candidate the schema accepts wins.
 *
 * Paths walk objects by key and arrays by index (negative counts from the end);
 * `*` fans out over every array element, in order.
 */

import { isValid, parseISO } from 'date-fns';
import { z } from 'zod';
import { matchCabin } from './cabin';
import type { IsoDate, OfferCabin } from './types';

export type PathSegment = string | number;
export type FieldPath = readonly PathSegment[];

export interface FieldStrategy<T> {
  readonly paths: readonly FieldPath[];
  readonly schema: z.ZodType<T, z.ZodTypeDef, unknown>;
}

export function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function collect(node: unknown, path: FieldPath, depth: number, out: unknown[]): void {
  if (node === undefined || node === null) return;
  if (depth === path.length) {
    out.push(node);
    return;
  }

  const segment = path[depth];
  if (segment === '*') {
    if (Array.isArray(node)) {
      for (const child of node) collect(child, path, depth + 1, out);
    }
    return;
  }
  if (typeof segment === 'number') {
    if (Array.isArray(node)) collect(node[segment < 0 ? node.length + segment : segment], path, depth + 1, out);
    return;
  }
  if (isRecord(node)) collect(node[segment], path, depth + 1, out);
}

/** Every non-null value found at `path`, in document order. */
export function probe(source: unknown, path: FieldPath): unknown[] {
  const out: unknown[] = [];
  collect(source, path, 0, out);
  return out;
}

export function extractField<T>(source: unknown, strategy: FieldStrategy<T>): T | undefined {
  for (const path of strategy.paths) {
    for (const candidate of probe(source, path)) {
      const parsed = strategy.schema.safeParse(candidate);
      if (parsed.success) return parsed.data;
    }
  }
  return undefined;
}

// ============ Value Schemas ============

const LocationCodeSchema = z
  .string()
  .trim()
  .toUpperCase()
  .pipe(z.string().regex(/^[A-Z]{3}$/));

const CarrierCodeSchema = z
  .string()
  .trim()
  .toUpperCase()
  .pipe(z.string().regex(/^[A-Z0-9]{2,3}$/));

const CurrencySchema = z
  .string()
  .trim()
  .toUpperCase()
  .pipe(z.string().regex(/^[A-Z]{3}$/));

/** Bare date or timestamp; only the date part is kept. */
const DateSchema: z.ZodType<IsoDate, z.ZodTypeDef, unknown> = z
  .string()
  .trim()
  .regex(/^\d{4}-\d{2}-\d{2}/)
  .transform((value) => value.slice(0, 10))
  .refine((value) => isValid(parseISO(value)), 'Not a calendar date');

const PriceSchema: z.ZodType<number, z.ZodTypeDef, unknown> = z
  .union([
    z.number(),
    z
      .string()
      .trim()
      .transform((value) => value.replace(/,/g, ''))
      .pipe(z.string().regex(/^\d+(\.\d+)?$/))
      .transform(Number),
  ])
  .pipe(z.number().finite().nonnegative());

const CabinSchema: z.ZodType<OfferCabin, z.ZodTypeDef, unknown> = z
  .string()
  .trim()
  .min(1)
  .transform(matchCabin);

const LinkSchema = z.string().trim().min(1);

// ============ Strategy Table ============

export interface ExtractedFields {
  origin: string;
  destination: string;
  departureDate: IsoDate;
  returnDate: IsoDate;
  cabin: OfferCabin;
  price: number;
  currency: string;
  marketingCarrier: string;
  operatingCarrier: string;
  bookingLink: string;
}

export const FIELD_STRATEGIES: { readonly [K in keyof ExtractedFields]: FieldStrategy<ExtractedFields[K]> } = {
  origin: {
    paths: [
      ['itineraries', 0, 'segments', 0, 'departure', 'iataCode'],
      ['origin'],
      ['from'],
      ['flyFrom'],
    ],
    schema: LocationCodeSchema,
  },
  destination: {
    paths: [['destination'], ['to'], ['flyTo']],
    schema: LocationCodeSchema,
  },
  departureDate: {
    paths: [
      ['itineraries', 0, 'segments', 0, 'departure', 'at'],
      ['outbound', 'date'],
      ['departDate'],
      ['departureDate'],
      ['local_departure'],
      ['route', 0, 'local_departure'],
    ],
    schema: DateSchema,
  },
  returnDate: {
    paths: [
      ['itineraries', 1, 'segments', 0, 'departure', 'at'],
      ['inbound', 'date'],
      ['returnDate'],
      ['return_date'],
      // Tequila round trips: the last leg flies home
      ['route', -1, 'local_departure'],
    ],
    schema: DateSchema,
  },
  cabin: {
    paths: [
      ['travelerPricings', '*', 'fareDetailsBySegment', '*', 'cabin'],
      ['itineraries', '*', 'segments', '*', 'cabin'],
      ['itineraries', '*', 'segments', '*', 'cabinClass'],
      ['cabin'],
      ['cabinClass'],
      ['travelClass'],
      ['fare_category'],
      ['route', '*', 'fare_category'],
    ],
    schema: CabinSchema,
  },
  price: {
    paths: [['price', 'grandTotal'], ['price', 'total'], ['price', 'amount'], ['price'], ['totalPrice']],
    schema: PriceSchema,
  },
  currency: {
    paths: [['price', 'currency'], ['currency'], ['currencyCode']],
    schema: CurrencySchema,
  },
  marketingCarrier: {
    paths: [
      ['itineraries', '*', 'segments', '*', 'carrierCode'],
      ['marketingCarrier'],
      ['carrierCode'],
      ['validatingAirlineCodes', '*'],
      ['airlines', '*'],
      ['route', '*', 'airline'],
    ],
    schema: CarrierCodeSchema,
  },
  operatingCarrier: {
    paths: [
      ['itineraries', '*', 'segments', '*', 'operating', 'carrierCode'],
      ['operatedBy'],
      ['operatingCarrier'],
      ['route', '*', 'operating_carrier'],
    ],
    schema: CarrierCodeSchema,
  },
  bookingLink: {
    paths: [['deeplink'], ['deep_link'], ['bookingLink'], ['url']],
    schema: LinkSchema,
  },
};
