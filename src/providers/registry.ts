/**
 * Provider Registry
 *
 * Maps a configured provider id to the factory that builds it. New providers
 * register here; nothing downstream of the adapter knows which one ran.
 */

import type { ProviderConfig, ProviderId } from '../config/loader';
import { AmadeusFareProvider } from './amadeus-provider';
import { GrabaseatFareProvider } from './grabaseat-provider';
import { TequilaFareProvider } from './tequila-provider';
import type { FareProvider, ProviderContext } from './types';

export type ProviderFactory = (config: ProviderConfig, context: ProviderContext) => FareProvider;

export class ProviderRegistry {
  private factories: Map<ProviderId, ProviderFactory> = new Map();

  register(id: ProviderId, factory: ProviderFactory): void {
    if (this.factories.has(id)) {
      console.warn(`[providers] ${id} already registered, replacing...`);
    }
    this.factories.set(id, factory);
  }

  ids(): ProviderId[] {
    return Array.from(this.factories.keys());
  }

  create(config: ProviderConfig, context: ProviderContext): FareProvider {
    const factory = this.factories.get(config.id);
    if (!factory) {
      throw new Error(`No provider registered for "${config.id}" (known: ${this.ids().join(', ') || 'none'})`);
    }
    return factory(config, context);
  }
}

function mismatch(expected: ProviderId, config: ProviderConfig): Error {
  return new Error(`Provider factory for ${expected} received ${config.id} config`);
}

export function createDefaultRegistry(): ProviderRegistry {
  const registry = new ProviderRegistry();

  registry.register('amadeus', (config, context) => {
    if (config.id !== 'amadeus') throw mismatch('amadeus', config);
    return new AmadeusFareProvider({
      clientId: config.clientId,
      clientSecret: config.clientSecret,
      baseUrl: config.baseUrl,
      currency: context.currency,
      airline: context.airline,
      fetchImpl: context.fetchImpl,
    });
  });

  registry.register('grabaseat', (config, context) => {
    if (config.id !== 'grabaseat') throw mismatch('grabaseat', config);
    return new GrabaseatFareProvider({
      endpoint: config.endpoint,
      currency: context.currency,
      airline: context.airline,
      fetchImpl: context.fetchImpl,
    });
  });

  registry.register('tequila', (config, context) => {
    if (config.id !== 'tequila') throw mismatch('tequila', config);
    return new TequilaFareProvider({
      apiKey: config.apiKey,
      endpoint: config.endpoint,
      currency: context.currency,
      airline: context.airline,
      fetchImpl: context.fetchImpl,
    });
  });

  return registry;
}
