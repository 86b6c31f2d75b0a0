/**
 * Parameter Space Enumerator
 *
 * Turns a ScanRequest into the finite, ordered set of provider queries.
 * Order: routes → cabins → departure dates → night offsets.
 */

import { addDays, addMonths, format, isAfter, isValid, parseISO } from 'date-fns';
import type { IsoDate, ScanRequest, SearchQuery, StayPolicy } from './types';

const ISO_FORMAT = 'yyyy-MM-dd';

function parseDay(date: IsoDate, field: string): Date {
  const parsed = parseISO(date);
  if (!isValid(parsed)) {
    throw new Error(`${field} is not a valid date: "${date}"`);
  }
  return parsed;
}

export function shiftDate(date: IsoDate, days: number): IsoDate {
  return format(addDays(parseDay(date, 'date'), days), ISO_FORMAT);
}

/** Last departure date the scan may use: today + horizonMonths. */
export function horizonEnd(request: ScanRequest): IsoDate {
  return format(addMonths(parseDay(request.today, 'today'), request.horizonMonths), ISO_FORMAT);
}

/**
 * Sparse stay-length sample: min, midpoint and max, deduplicated.
 * Empty when minNights > maxNights.
 */
export function nightOffsets(stay: StayPolicy): number[] {
  if (stay.minNights > stay.maxNights) return [];
  const mid = Math.floor((stay.minNights + stay.maxNights) / 2);
  return [...new Set([stay.minNights, mid, stay.maxNights])];
}

export function departureDates(request: ScanRequest): IsoDate[] {
  const start = parseDay(request.today, 'today');
  const end = addMonths(start, request.horizonMonths);
  const step = Math.max(1, request.dateStepDays);

  const dates: IsoDate[] = [];
  for (let day = start; !isAfter(day, end); day = addDays(day, step)) {
    dates.push(format(day, ISO_FORMAT));
  }
  return dates;
}

/**
 * Lazy view over the query space. Iterating again starts from the first query.
 */
export class QueryPlan implements Iterable<SearchQuery> {
  private readonly dates: IsoDate[];
  private readonly offsets: number[];

  constructor(private readonly request: ScanRequest) {
    this.dates = departureDates(request);
    this.offsets = nightOffsets(request.stay);
  }

  get size(): number {
    return this.request.routes.length * this.request.cabins.length * this.dates.length * this.offsets.length;
  }

  *[Symbol.iterator](): Generator<SearchQuery> {
    let index = 0;
    for (const route of this.request.routes) {
      for (const cabin of this.request.cabins) {
        for (const departureDate of this.dates) {
          for (const nights of this.offsets) {
            yield {
              index: index++,
              origin: route.origin,
              destination: route.destination,
              departureDate,
              returnDate: shiftDate(departureDate, nights),
              cabin,
              flexDays: this.request.flexDays,
            };
          }
        }
      }
    }
  }
}

export function planQueries(request: ScanRequest): QueryPlan {
  return new QueryPlan(request);
}
