/**
 * Amadeus Flight Offers provider
 *
 * Round-trip search restricted to one airline and cabin. The OAuth token is
 * fetched once per run and reused until shortly before it expires.
 */

import { z } from 'zod';
import type { Cabin, RawPayload, SearchQuery } from '../fares/types';
import { ProviderFailure, failureFromResponse } from './errors';
import { REQUEST_TIMEOUT_MS, requestJson, withTimeout } from './http';
import type { FareProvider } from './types';

export interface AmadeusProviderOptions {
  clientId: string;
  clientSecret: string;
  baseUrl: string;
  currency: string;
  airline: string;
  maxOffers?: number;
  fetchImpl?: typeof fetch;
  now?: () => number;
}

const TRAVEL_CLASS: Record<Cabin, string> = {
  PremiumEconomy: 'PREMIUM_ECONOMY',
  Business: 'BUSINESS',
};

/** Refresh this long before the reported expiry. */
const TOKEN_EXPIRY_MARGIN_MS = 60_000;

const TokenResponseSchema = z.object({
  access_token: z.string().min(1),
  expires_in: z.coerce.number().nonnegative().default(0),
});

type TokenCache = { token: string; expiresAtMs: number };

export class AmadeusFareProvider implements FareProvider {
  readonly id = 'amadeus' as const;

  private readonly baseUrl: string;
  private readonly fetchImpl: typeof fetch;
  private readonly now: () => number;
  private tokenCache: TokenCache | null = null;

  constructor(private readonly options: AmadeusProviderOptions) {
    this.baseUrl = options.baseUrl.replace(/\/+$/, '');
    this.fetchImpl = options.fetchImpl ?? fetch;
    this.now = options.now ?? Date.now;
  }

  async authenticate(signal?: AbortSignal): Promise<void> {
    await this.getAccessToken(signal);
  }

  async search(query: SearchQuery, signal?: AbortSignal): Promise<RawPayload> {
    const params = new URLSearchParams({
      originLocationCode: query.origin,
      destinationLocationCode: query.destination,
      departureDate: query.departureDate,
      returnDate: query.returnDate,
      adults: '1',
      travelClass: TRAVEL_CLASS[query.cabin],
      includedAirlineCodes: this.options.airline,
      currencyCode: this.options.currency,
      max: String(this.options.maxOffers ?? 50),
    });

    const token = await this.getAccessToken(signal);
    try {
      return await requestJson(
        this.fetchImpl,
        `${this.baseUrl}/v2/shopping/flight-offers?${params.toString()}`,
        { headers: { Authorization: `Bearer ${token}`, Accept: 'application/json' } },
        'Amadeus flight-offers',
        signal
      );
    } catch (e) {
      // A rejected token will not get better by retrying with it.
      if (e instanceof ProviderFailure && e.error.kind === 'AuthFailure') this.tokenCache = null;
      throw e;
    }
  }

  private async getAccessToken(signal?: AbortSignal): Promise<string> {
    if (this.tokenCache && this.now() < this.tokenCache.expiresAtMs - TOKEN_EXPIRY_MARGIN_MS) {
      return this.tokenCache.token;
    }

    const body = new URLSearchParams({
      grant_type: 'client_credentials',
      client_id: this.options.clientId,
      client_secret: this.options.clientSecret,
    });

    const response = await this.fetchImpl(`${this.baseUrl}/v1/security/oauth2/token`, {
      method: 'POST',
      headers: { 'Content-Type': 'application/x-www-form-urlencoded' },
      body,
      signal: withTimeout(signal, REQUEST_TIMEOUT_MS),
    });

    if (!response.ok) {
      const failure = failureFromResponse(response, 'Amadeus auth');
      // Bad client credentials come back as 400/401; both end the run.
      if (response.status >= 400 && response.status < 500 && response.status !== 429) {
        throw new ProviderFailure('AuthFailure', failure.message, { status: response.status });
      }
      throw failure;
    }

    const parsed = TokenResponseSchema.safeParse(await response.json().catch(() => null));
    if (!parsed.success) {
      throw new ProviderFailure('AuthFailure', 'Amadeus auth response missing access_token');
    }

    this.tokenCache = {
      token: parsed.data.access_token,
      expiresAtMs: this.now() + parsed.data.expires_in * 1000,
    };
    return this.tokenCache.token;
  }
}
