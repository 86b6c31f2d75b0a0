/**
 * Configuration Module
 *
 * Scan defaults, provider endpoints and the environment loader.
 */

export * from './constants';
export * from './loader';
