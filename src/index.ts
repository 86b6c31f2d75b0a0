/**
 * Fare Watch
 *
 * Library entry: the pipeline stages, providers, scan runner, rendering and
 * delivery. The scheduled job itself lives in src/cli/fare-watch.ts.
 */

export * from './fares';
export * from './providers';
export * from './config';
export { Logger, silentLogger } from './observability/logger';
export type { LogFields, LogLevel, LogWriter } from './observability/logger';
export { runScan } from './scan/runner';
export type { RejectionCounts, ScanOptions, ScanReport, ScanStats } from './scan/runner';
export * from './render/html-report';
export * from './delivery/brevo';
export * from './delivery/webhook';
export * from './types';
