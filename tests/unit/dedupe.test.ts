import { describe, it, expect } from 'vitest';
import { buildResultSet, dedupeOffers, itineraryKey, rankOffers } from '../../src/fares/dedupe';
import { makeEligible } from '../helpers/fixtures';

describe('dedupeOffers', () => {
  it('keeps the cheapest offer per itinerary whatever the order', () => {
    const cheap = makeEligible({ price: 1200, bookingLink: 'https://example.test/a' });
    const dear = makeEligible({ price: 1250, bookingLink: 'https://example.test/b' });
    expect(dedupeOffers([dear, cheap])).toEqual([cheap]);
    expect(dedupeOffers([cheap, dear])).toEqual([cheap]);
  });

  it('keeps the first seen on a price tie', () => {
    const first = makeEligible({ price: 1200, bookingLink: 'https://example.test/first' });
    const second = makeEligible({ price: 1200, bookingLink: 'https://example.test/second' });
    expect(dedupeOffers([first, second])).toEqual([first]);
  });

  it('treats a different return date or cabin as a different itinerary', () => {
    const base = makeEligible();
    const otherReturn = makeEligible({ returnDate: '2026-11-21' });
    const otherCabin = makeEligible({ cabin: 'Business' });
    expect(dedupeOffers([base, otherReturn, otherCabin])).toHaveLength(3);
  });

  it('builds keys from route, cabin and dates', () => {
    expect(itineraryKey(makeEligible())).toBe('AKL|SYD|PremiumEconomy|2026-11-10|2026-11-20');
  });
});

describe('rankOffers', () => {
  it('sorts by price and breaks ties on the itinerary', () => {
    const a = makeEligible({ price: 1500, cabin: 'Business' });
    const b = makeEligible({ price: 900, departureDate: '2026-11-12', returnDate: '2026-11-22' });
    const c = makeEligible({ price: 900, departureDate: '2026-11-10', returnDate: '2026-11-20' });
    const d = makeEligible({ price: 900, departureDate: '2026-11-10', returnDate: '2026-11-20', destination: 'MEL' });
    expect(rankOffers([a, b, c, d])).toEqual([d, c, b, a]);
  });

  it('does not mutate its input', () => {
    const input = [makeEligible({ price: 2 }), makeEligible({ price: 1, returnDate: '2026-11-19' })];
    rankOffers(input);
    expect(input.map((o) => o.price)).toEqual([2, 1]);
  });
});

describe('buildResultSet', () => {
  it('dedupes, ranks and carries the window', () => {
    const window = { start: '2026-11-01', end: '2026-12-01' };
    const result = buildResultSet(
      [
        makeEligible({ price: 1100, departureDate: '2026-11-15', returnDate: '2026-11-25' }),
        makeEligible({ price: 1250 }),
        makeEligible({ price: 1200 }),
      ],
      window
    );
    expect(result.window).toEqual(window);
    expect(result.offers.map((o) => [o.departureDate, o.price])).toEqual([
      ['2026-11-15', 1100],
      ['2026-11-10', 1200],
    ]);
  });
});
