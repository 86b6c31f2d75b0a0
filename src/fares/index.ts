/**
 * Fares Module
 *
 * The provider-independent pipeline stages: plan, normalize, filter,
 * dedupe and rank, group by month.
 */

export * from './types';
export * from './cabin';
export * from './enumerator';
export * from './normalizer';
export * from './eligibility';
export * from './dedupe';
export * from './month-grouper';
