/**
 * Offer normalization across payload shapes
 */

import { describe, it, expect } from 'vitest';
import { locateItems, normalizeOffers } from '../../src/fares/normalizer';
import { tagCurrency } from '../../src/providers/tequila-provider';
import { grabaseatItem, makeQuery } from '../helpers/fixtures';

const options = { currency: 'NZD' };
const query = makeQuery({ origin: 'AKL', destination: 'SYD' });

function amadeusItem(overrides: Record<string, unknown> = {}): Record<string, unknown> {
  return {
    type: 'flight-offer',
    itineraries: [
      {
        segments: [
          {
            departure: { iataCode: 'AKL', at: '2026-11-10T07:05:00' },
            arrival: { iataCode: 'SYD', at: '2026-11-10T08:55:00' },
            carrierCode: 'NZ',
            operating: { carrierCode: 'NZ' },
          },
        ],
      },
      {
        segments: [
          {
            departure: { iataCode: 'SYD', at: '2026-11-20T10:00:00' },
            arrival: { iataCode: 'AKL', at: '2026-11-20T15:10:00' },
            carrierCode: 'NZ',
          },
        ],
      },
    ],
    price: { currency: 'NZD', total: '1234.50', grandTotal: '1,234.50' },
    validatingAirlineCodes: ['NZ'],
    travelerPricings: [{ fareDetailsBySegment: [{ cabin: 'PREMIUM_ECONOMY' }, { cabin: 'PREMIUM_ECONOMY' }] }],
    ...overrides,
  };
}

describe('locateItems', () => {
  it('finds items in the usual containers', () => {
    expect(locateItems([1, 2])).toEqual([1, 2]);
    expect(locateItems({ data: [1] })).toEqual([1]);
    expect(locateItems({ results: [2] })).toEqual([2]);
    expect(locateItems({ offers: [3] })).toEqual([3]);
  });

  it('returns null for payloads without an item list', () => {
    expect(locateItems(null)).toBeNull();
    expect(locateItems('<html>')).toBeNull();
    expect(locateItems({ data: { nested: [] } })).toBeNull();
  });
});

describe('normalizeOffers', () => {
  it('maps a Grabaseat result item', () => {
    const { offers, skipped } = normalizeOffers({ results: [grabaseatItem()] }, query, options);
    expect(skipped).toEqual([]);
    expect(offers).toEqual([
      {
        origin: 'AKL',
        destination: 'SYD',
        departureDate: '2026-11-10',
        returnDate: '2026-11-20',
        cabin: 'PremiumEconomy',
        price: 899,
        currency: 'NZD',
        marketingCarrier: 'NZ',
        operatingCarrier: 'NZ',
        bookingLink: 'https://example.test/book',
      },
    ]);
  });

  it('maps an Amadeus flight offer', () => {
    const { offers } = normalizeOffers({ data: [amadeusItem()] }, query, options);
    expect(offers).toEqual([
      {
        origin: 'AKL',
        destination: 'SYD',
        departureDate: '2026-11-10',
        returnDate: '2026-11-20',
        cabin: 'PremiumEconomy',
        price: 1234.5,
        currency: 'NZD',
        marketingCarrier: 'NZ',
        operatingCarrier: 'NZ',
        bookingLink: 'https://www.grabaseat.co.nz/',
      },
    ]);
  });

  it('falls back to the query route and null carriers', () => {
    const item = { cabin: 'Business', price: 1400, currency: 'nzd', departDate: '2026-11-10', returnDate: '2026-11-21' };
    const { offers } = normalizeOffers([item], makeQuery({ origin: 'WLG', destination: 'MEL' }), {
      currency: 'NZD',
      bookingLinkFallback: 'https://example.test/search',
    });
    expect(offers).toHaveLength(1);
    expect(offers[0]).toMatchObject({
      origin: 'WLG',
      destination: 'MEL',
      cabin: 'Business',
      currency: 'NZD',
      marketingCarrier: null,
      operatingCarrier: null,
      bookingLink: 'https://example.test/search',
    });
  });

  it('produces no offer when a required field is missing', () => {
    const base = grabaseatItem();
    const items = [
      { ...base, price: undefined },
      { ...base, price: { amount: 899 } },
      { ...base, cabin: undefined },
      { ...base, outbound: undefined },
      { ...base, inbound: { date: 'soon' } },
      'not an item',
    ];
    const { offers, skipped } = normalizeOffers({ results: items }, query, options);
    expect(offers).toEqual([]);
    expect(skipped).toEqual([
      { index: 0, reason: 'missing price' },
      { index: 1, reason: 'missing currency' },
      { index: 2, reason: 'missing cabin' },
      { index: 3, reason: 'missing departure date' },
      { index: 4, reason: 'missing return date' },
      { index: 5, reason: 'item is not an object' },
    ]);
  });

  it('drops offers priced in another currency', () => {
    const { offers, skipped } = normalizeOffers({ results: [grabaseatItem({ currency: 'AUD' })] }, query, options);
    expect(offers).toEqual([]);
    expect(skipped).toEqual([{ index: 0, reason: 'currency AUD does not match NZD' }]);
  });

  it('keeps good items when others in the payload are bad', () => {
    const items = [grabaseatItem({ price: 950 }), { price: 'free' }, grabaseatItem({ price: 1010 })];
    const { offers, skipped } = normalizeOffers({ results: items }, query, options);
    expect(offers.map((o) => o.price)).toEqual([950, 1010]);
    expect(skipped).toEqual([{ index: 1, reason: 'missing price' }]);
  });

  it('reads cabins it cannot place as Unknown', () => {
    const { offers } = normalizeOffers({ results: [grabaseatItem({ cabin: 'Economy' })] }, query, options);
    expect(offers[0].cabin).toBe('Unknown');
  });

  it('returns nothing for a payload with no items', () => {
    expect(normalizeOffers({ message: 'no flights' }, query, options)).toEqual({ offers: [], skipped: [] });
  });
});

describe('normalizeOffers with Tequila round trips', () => {
  function tequilaItem(overrides: Record<string, unknown> = {}): Record<string, unknown> {
    return {
      flyFrom: 'AKL',
      flyTo: 'SYD',
      local_departure: '2026-11-10T07:05:00.000Z',
      price: 1180,
      airlines: ['NZ'],
      deep_link: 'https://example.test/kiwi/1',
      route: [
        { flyFrom: 'AKL', flyTo: 'SYD', local_departure: '2026-11-10T07:05:00.000Z', airline: 'NZ', operating_carrier: '', fare_category: 'W' },
        { flyFrom: 'SYD', flyTo: 'AKL', local_departure: '2026-11-20T10:00:00.000Z', airline: 'NZ', operating_carrier: 'NZ', fare_category: 'W' },
      ],
      ...overrides,
    };
  }

  it('takes the return date from the last leg and the currency from the response', () => {
    const { offers, skipped } = normalizeOffers(tagCurrency({ currency: 'NZD', data: [tequilaItem()] }), query, options);
    expect(skipped).toEqual([]);
    expect(offers).toEqual([
      {
        origin: 'AKL',
        destination: 'SYD',
        departureDate: '2026-11-10',
        returnDate: '2026-11-20',
        cabin: 'PremiumEconomy',
        price: 1180,
        currency: 'NZD',
        marketingCarrier: 'NZ',
        operatingCarrier: 'NZ',
        bookingLink: 'https://example.test/kiwi/1',
      },
    ]);
  });

  it('places a mixed-cabin fare outside the requested cabins', () => {
    const { offers } = normalizeOffers(tagCurrency({ currency: 'NZD', data: [tequilaItem({ fare_category: 'M' })] }), query, options);
    expect(offers[0].cabin).toBe('Unknown');
  });
});
