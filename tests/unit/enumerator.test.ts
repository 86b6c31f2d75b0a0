/**
 * Query plan enumeration
 */

import { describe, it, expect } from 'vitest';
import { departureDates, horizonEnd, nightOffsets, planQueries, shiftDate } from '../../src/fares/enumerator';
import { makeRequest } from '../helpers/fixtures';

describe('nightOffsets', () => {
  it('samples min, midpoint and max', () => {
    expect(nightOffsets({ minNights: 8, maxNights: 12 })).toEqual([8, 10, 12]);
  });

  it('collapses duplicates when the range is narrow', () => {
    expect(nightOffsets({ minNights: 8, maxNights: 8 })).toEqual([8]);
    expect(nightOffsets({ minNights: 8, maxNights: 9 })).toEqual([8, 9]);
  });

  it('is empty when min exceeds max', () => {
    expect(nightOffsets({ minNights: 10, maxNights: 8 })).toEqual([]);
  });
});

describe('horizon and departure dates', () => {
  it('adds calendar months to today', () => {
    expect(horizonEnd(makeRequest({ today: '2026-11-01', horizonMonths: 3 }))).toBe('2027-02-01');
  });

  it('clamps to the end of a shorter month', () => {
    expect(horizonEnd(makeRequest({ today: '2026-01-31', horizonMonths: 1 }))).toBe('2026-02-28');
  });

  it('steps from today through the horizon inclusive', () => {
    const dates = departureDates(makeRequest({ today: '2026-11-01', horizonMonths: 1, dateStepDays: 10 }));
    expect(dates).toEqual(['2026-11-01', '2026-11-11', '2026-11-21', '2026-12-01']);
  });

  it('shifts across month and year boundaries', () => {
    expect(shiftDate('2026-12-28', 8)).toBe('2027-01-05');
    expect(shiftDate('2026-03-02', -2)).toBe('2026-02-28');
  });

  it('rejects an invalid anchor date', () => {
    expect(() => departureDates(makeRequest({ today: 'not-a-date' }))).toThrow('today is not a valid date');
  });
});

describe('planQueries', () => {
  const request = makeRequest({
    routes: [
      { origin: 'AKL', destination: 'SYD' },
      { origin: 'AKL', destination: 'MEL' },
    ],
    today: '2026-11-01',
    horizonMonths: 1,
  });

  it('covers routes × cabins × dates × stay lengths', () => {
    const plan = planQueries(request);
    expect(plan.size).toBe(2 * 2 * 4 * 3);
    expect([...plan]).toHaveLength(plan.size);
  });

  it('numbers queries in plan order', () => {
    const indexes = [...planQueries(request)].map((q) => q.index);
    expect(indexes).toEqual(Array.from({ length: 48 }, (_, i) => i));
  });

  it('orders by route, then cabin, then date, then stay length', () => {
    const [first, second, , fourth] = [...planQueries(request)];
    expect(first).toEqual({
      index: 0,
      origin: 'AKL',
      destination: 'SYD',
      departureDate: '2026-11-01',
      returnDate: '2026-11-09',
      cabin: 'PremiumEconomy',
      flexDays: 2,
    });
    expect(second.returnDate).toBe('2026-11-11');
    expect(fourth.departureDate).toBe('2026-11-11');
    expect(fourth.returnDate).toBe('2026-11-19');
  });

  it('keeps every departure date inside the scan window', () => {
    const end = horizonEnd(request);
    for (const query of planQueries(request)) {
      expect(query.departureDate >= request.today).toBe(true);
      expect(query.departureDate <= end).toBe(true);
    }
  });

  it('can be iterated more than once', () => {
    const plan = planQueries(request);
    expect([...plan]).toEqual([...plan]);
  });

  it('is empty when the stay range is inverted', () => {
    const plan = planQueries(makeRequest({ stay: { minNights: 12, maxNights: 8 } }));
    expect(plan.size).toBe(0);
    expect([...plan]).toEqual([]);
  });
});
