/**
 * Month Grouper
 *
 * Buckets a ResultSet by departure month for presentation. Months with no
 * offers are simply absent.
 */

import { format, parseISO } from 'date-fns';
import type { EligibleOffer, MonthBucket, ResultSet } from './types';

export function monthKey(date: string): string {
  return date.slice(0, 7);
}

function compareWithinMonth(a: EligibleOffer, b: EligibleOffer): number {
  if (a.price !== b.price) return a.price - b.price;
  if (a.departureDate !== b.departureDate) return a.departureDate < b.departureDate ? -1 : 1;
  if (a.returnDate !== b.returnDate) return a.returnDate < b.returnDate ? -1 : 1;
  return 0;
}

export function groupByMonth(resultSet: ResultSet): MonthBucket[] {
  const buckets = new Map<string, EligibleOffer[]>();
  for (const offer of resultSet.offers) {
    const key = monthKey(offer.departureDate);
    const rows = buckets.get(key);
    if (rows) rows.push(offer);
    else buckets.set(key, [offer]);
  }

  return [...buckets.keys()].sort().map((key) => {
    const [year, month] = key.split('-').map(Number);
    return {
      key,
      year,
      month,
      label: format(parseISO(`${key}-01`), 'MMMM yyyy'),
      offers: (buckets.get(key) ?? []).sort(compareWithinMonth),
    };
  });
}
