/**
 * Scan Runner
 *
 * Drives one batch scan: plan → fetch (bounded pool) → normalize → filter,
 * then dedupe/rank and group once every query has finished.
 *
 * Per-query partials are stored by plan index and merged in plan order, so
 * the report never depends on which request came back first.
 */

import { classifyOffer } from '../fares/eligibility';
import { buildResultSet } from '../fares/dedupe';
import { horizonEnd, planQueries } from '../fares/enumerator';
import { groupByMonth } from '../fares/month-grouper';
import { normalizeOffers } from '../fares/normalizer';
import { REJECTION_REASONS } from '../fares/types';
import type {
  EligibleOffer,
  MonthBucket,
  RejectionReason,
  ResultSet,
  ScanRequest,
  SearchQuery,
} from '../fares/types';
import { Logger, silentLogger } from '../observability/logger';
import type { FareProviderAdapter } from '../providers/adapter';
import type { ProviderError } from '../providers/types';

// ============ Types ============

export type RejectionCounts = Record<RejectionReason, number>;

export interface ScanStats {
  queriesPlanned: number;
  queriesAttempted: number;
  /** Queries dropped after retries, cancelled, or rejected for auth */
  queriesFailed: number;
  /** Queries that answered with no offers, including NotFound and Malformed */
  queriesEmpty: number;
  /** Offers normalized, before eligibility */
  offersFound: number;
  offersEligible: number;
  /** Itineraries left after dedupe */
  offersUnique: number;
  itemsSkipped: number;
  rejections: RejectionCounts;
}

export interface ScanReport {
  status: 'completed' | 'aborted';
  resultSet: ResultSet;
  buckets: MonthBucket[];
  stats: ScanStats;
  /** Set when status is 'aborted' */
  fatal?: ProviderError;
}

export interface ScanOptions {
  concurrency?: number;
  logger?: Logger;
}

interface QueryPartial {
  eligible: EligibleOffer[];
  found: number;
  skipped: number;
  rejections: RejectionCounts;
  failed: boolean;
}

function emptyRejections(): RejectionCounts {
  return { airline: 0, cabin: 0, price_cap: 0, currency: 0, stay_length: 0 };
}

function mergePartial(stats: ScanStats, partial: QueryPartial): void {
  if (partial.failed) stats.queriesFailed++;
  else if (partial.found === 0) stats.queriesEmpty++;
  stats.offersFound += partial.found;
  stats.itemsSkipped += partial.skipped;
  stats.offersEligible += partial.eligible.length;
  for (const reason of REJECTION_REASONS) {
    stats.rejections[reason] += partial.rejections[reason];
  }
}

function emptyStats(planned: number): ScanStats {
  return {
    queriesPlanned: planned,
    queriesAttempted: 0,
    queriesFailed: 0,
    queriesEmpty: 0,
    offersFound: 0,
    offersEligible: 0,
    offersUnique: 0,
    itemsSkipped: 0,
    rejections: emptyRejections(),
  };
}

function describe(query: SearchQuery): string {
  return `${query.origin}-${query.destination} ${query.cabin} ${query.departureDate}/${query.returnDate}`;
}

// ============ Per-query Processing ============

async function processQuery(
  query: SearchQuery,
  request: ScanRequest,
  adapter: FareProviderAdapter,
  signal: AbortSignal,
  logger: Logger
): Promise<{ partial: QueryPartial; fatal?: ProviderError }> {
  const partial: QueryPartial = { eligible: [], found: 0, skipped: 0, rejections: emptyRejections(), failed: false };

  const result = await adapter.execute(query, signal);
  if (!result.ok) {
    const error = result.error;
    switch (error.kind) {
      case 'AuthFailure':
        partial.failed = true;
        return { partial, fatal: error };
      // Zero offers for this query, not a failure.
      case 'NotFound':
        logger.debug(`No data for ${describe(query)}`, { status: error.status });
        return { partial };
      case 'Malformed':
        logger.warn(`Unreadable response for ${describe(query)}`, { reason: error.message });
        return { partial };
      default:
        partial.failed = true;
        logger.warn(`Dropped ${describe(query)}`, { kind: error.kind, reason: error.message, attempts: error.attempts });
        return { partial };
    }
  }

  const { offers, skipped } = normalizeOffers(result.value, query, { currency: request.currency });
  partial.found = offers.length;
  partial.skipped = skipped.length;
  for (const skip of skipped) {
    logger.debug(`Skipped item ${skip.index} of ${describe(query)}`, { reason: skip.reason });
  }

  for (const offer of offers) {
    const verdict = classifyOffer(offer, request);
    if (verdict.ok) partial.eligible.push(verdict.value);
    else partial.rejections[verdict.error]++;
  }

  return { partial };
}

// ============ Runner ============

/**
 * Execute the whole query plan. Never throws for provider failures: an
 * authentication failure aborts the run and comes back as status 'aborted'.
 */
export async function runScan(
  request: ScanRequest,
  adapter: FareProviderAdapter,
  options: ScanOptions = {}
): Promise<ScanReport> {
  const logger = options.logger ?? silentLogger;
  const concurrency = Math.max(1, Math.floor(options.concurrency ?? 1));
  const plan = planQueries(request);
  const window = { start: request.today, end: horizonEnd(request) };
  const stats = emptyStats(plan.size);

  logger.info(`Scanning ${plan.size} queries via ${adapter.providerId}`, {
    window: `${window.start}..${window.end}`,
    concurrency,
  });

  const controller = new AbortController();
  let fatal: ProviderError | undefined;

  const auth = await adapter.authenticate(controller.signal);
  if (!auth.ok) {
    if (auth.error.kind === 'AuthFailure') {
      fatal = auth.error;
    } else {
      // Token endpoint flakiness: let the queries try again on their own.
      logger.warn('Authentication failed, continuing', { kind: auth.error.kind, reason: auth.error.message });
    }
  }

  const partials: Array<QueryPartial | undefined> = new Array(plan.size);
  const queries = plan[Symbol.iterator]();

  const worker = async (): Promise<void> => {
    while (!controller.signal.aborted) {
      const next = queries.next();
      if (next.done) return;
      const query = next.value;

      stats.queriesAttempted++;
      const outcome = await processQuery(query, request, adapter, controller.signal, logger);
      partials[query.index] = outcome.partial;

      if (outcome.fatal && !fatal) {
        fatal = outcome.fatal;
        logger.error(`Authentication rejected on ${describe(query)}, aborting scan`, outcome.fatal.message);
        controller.abort();
      }
    }
  };

  if (!fatal) {
    await Promise.all(Array.from({ length: Math.min(concurrency, Math.max(plan.size, 1)) }, worker));
  }

  const eligible: EligibleOffer[] = [];
  for (const partial of partials) {
    if (!partial) continue;
    mergePartial(stats, partial);
    eligible.push(...partial.eligible);
  }

  if (fatal) {
    const report: ScanReport = {
      status: 'aborted',
      resultSet: { offers: [], window },
      buckets: [],
      stats,
      fatal,
    };
    logSummary(logger, report);
    return report;
  }

  const resultSet = buildResultSet(eligible, window);
  stats.offersUnique = resultSet.offers.length;

  const report: ScanReport = { status: 'completed', resultSet, buckets: groupByMonth(resultSet), stats };
  logSummary(logger, report);
  return report;
}

function logSummary(logger: Logger, report: ScanReport): void {
  const { stats } = report;
  logger.info(`Scan ${report.status}`, {
    attempted: `${stats.queriesAttempted}/${stats.queriesPlanned}`,
    failed: stats.queriesFailed,
    empty: stats.queriesEmpty,
    found: stats.offersFound,
    eligible: stats.offersEligible,
    unique: stats.offersUnique,
    skipped: stats.itemsSkipped,
  });
  const rejected = Object.entries(stats.rejections).filter(([, count]) => count > 0);
  if (rejected.length > 0) {
    logger.debug('Rejections', Object.fromEntries(rejected));
  }
}
