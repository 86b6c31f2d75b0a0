/**
 * Providers Module
 *
 * Exports the provider contract, the adapter with its retry and pacing
 * pieces, and the built-in providers.
 */

export * from './types';
export * from './errors';
export * from './retry';
export * from './limiter';
export * from './adapter';
export * from './registry';
export * from './amadeus-provider';
export * from './grabaseat-provider';
export * from './tequila-provider';
