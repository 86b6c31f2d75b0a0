#!/usr/bin/env node
/**
 * Fare Watch CLI
 *
 * One batch scan: load config from the environment, query the provider for
 * every route/cabin/date combination, keep the eligible fares, render the
 * HTML report and deliver it (always to a file; email and webhook too unless
 * DRY_RUN=1).
 *
 * Exit codes: 0 success (including "no fares found"), 1 configuration or
 * authentication failure, 2 delivery failure.
 *
 * Usage:
 *   npx ts-node src/cli/fare-watch.ts
 *   npx ts-node src/cli/fare-watch.ts --today 2026-11-01 --dry-run --out report.html
 *   npm run watch-fares -- --dry-run
 */

import { ConfigError, loadConfig } from '../config/loader';
import type { AppConfig, EnvSource } from '../config/loader';
import { BrevoDeliverer, FileDeliverer } from '../delivery/brevo';
import type { Deliverer } from '../delivery/brevo';
import { WebhookDeliverer } from '../delivery/webhook';
import { Logger } from '../observability/logger';
import type { LogWriter } from '../observability/logger';
import { FareProviderAdapter } from '../providers/adapter';
import { RequestLimiter } from '../providers/limiter';
import type { Sleeper } from '../providers/limiter';
import { ProviderRegistry, createDefaultRegistry } from '../providers/registry';
import { exponentialBackoff } from '../providers/retry';
import { buildSubject, renderHtmlReport } from '../render/html-report';
import { runScan } from '../scan/runner';
import { validateIsoDate } from '../types/validation';

export const EXIT_OK = 0;
export const EXIT_FATAL = 1;
export const EXIT_DELIVERY_FAILED = 2;

export interface CliArgs {
  today?: string;
  dryRun: boolean;
  out?: string;
  help: boolean;
}

/** Collaborators a test can swap out. */
export interface CliDeps {
  env: EnvSource;
  fetchImpl?: typeof fetch;
  logWriter?: LogWriter;
  registry?: ProviderRegistry;
  sleep?: Sleeper;
}

export function parseArgs(args: string[]): CliArgs {
  const result: CliArgs = { dryRun: false, help: false };

  for (let i = 0; i < args.length; i++) {
    switch (args[i]) {
      case '--today': case '-t': result.today = args[++i]; break;
      case '--dry-run': result.dryRun = true; break;
      case '--out': case '-o': result.out = args[++i]; break;
      case '--help': case '-h': result.help = true; break;
    }
  }

  return result;
}

function applyOverrides(env: EnvSource, args: CliArgs): EnvSource {
  return {
    ...env,
    ...(args.dryRun ? { DRY_RUN: '1' } : {}),
    ...(args.out ? { OUT_FILE: args.out } : {}),
  };
}

function deliverersFor(config: AppConfig, fetchImpl?: typeof fetch): Deliverer[] {
  const { outFile, email, webhookUrl } = config.delivery;
  const deliverers: Deliverer[] = [new FileDeliverer(outFile)];
  if (email) {
    deliverers.push(new BrevoDeliverer({ ...email, fetchImpl }));
  }
  if (webhookUrl) {
    deliverers.push(new WebhookDeliverer({ url: webhookUrl, fetchImpl }));
  }
  return deliverers;
}

/**
 * Run one scan end to end and return the process exit code.
 */
export async function runFareWatch(args: CliArgs, deps: CliDeps): Promise<number> {
  const bootLogger = new Logger('fare-watch', 'info', deps.logWriter);

  let today: string | undefined;
  if (args.today !== undefined) {
    const checked = validateIsoDate(args.today, '--today');
    if (!checked.ok) {
      bootLogger.error(checked.error);
      return EXIT_FATAL;
    }
    today = checked.value;
  }

  let config: AppConfig;
  try {
    config = loadConfig(applyOverrides(deps.env, args), today);
  } catch (e) {
    if (e instanceof ConfigError) {
      bootLogger.error(e.message);
      return EXIT_FATAL;
    }
    throw e;
  }

  const logger = new Logger('fare-watch', config.logLevel, deps.logWriter);
  const { scan, execution } = config;

  const registry = deps.registry ?? createDefaultRegistry();
  const provider = registry.create(config.provider, {
    currency: scan.currency,
    airline: scan.requiredAirline,
    fetchImpl: deps.fetchImpl,
  });

  const adapter = new FareProviderAdapter(provider, {
    retry: exponentialBackoff({
      maxAttempts: execution.maxAttempts,
      baseDelayMs: execution.retryBaseDelayMs,
      maxDelayMs: execution.retryMaxDelayMs,
    }),
    limiter: new RequestLimiter({
      concurrency: execution.concurrency,
      minGapMs: execution.minRequestGapMs,
      jitterMs: execution.jitterMs,
      sleep: deps.sleep,
    }),
    logger: logger.child(provider.id),
    sleep: deps.sleep,
  });

  const report = await runScan(scan, adapter, {
    concurrency: execution.concurrency,
    logger: logger.child('scan'),
  });

  if (report.status === 'aborted') {
    logger.error('Scan aborted, nothing delivered', report.fatal?.message);
    return EXIT_FATAL;
  }

  const subject = buildSubject(scan);
  const html = renderHtmlReport(report, scan);
  logger.info(`Subject: ${subject}`);
  logger.debug('Report preview', { html: html.slice(0, 1200) });

  let exitCode = EXIT_OK;
  for (const deliverer of deliverersFor(config, deps.fetchImpl)) {
    const result = await deliverer.deliver(subject, html);
    if (result.ok) {
      logger.info(result.message);
    } else {
      logger.error('Delivery failed', result.message);
      exitCode = EXIT_DELIVERY_FAILED;
    }
  }
  return exitCode;
}

function printUsage(): void {
  console.log(`
Fare Watch - scheduled fare scan with an HTML report

Usage:
  npx ts-node src/cli/fare-watch.ts [options]

Options:
  --today, -t    Scan anchor date (YYYY-MM-DD, default: today)
  --dry-run      Skip email and webhook, only write the report file
  --out, -o      Report file path (default: OUT_FILE or out-fare-watch.html)
  --help, -h     Show this help

Environment:
  FARE_PROVIDER            amadeus | grabaseat | tequila (default: amadeus)
  AMADEUS_CLIENT_ID/SECRET required for amadeus
  TEQUILA_API_KEY          required for tequila
  ROUTES                   e.g. AKL:SYD,AKL:MEL
  CABINS                   PremiumEconomy,Business
  PE_CAP / J_CAP           price caps (default: 1300 / 1500)
  DRY_RUN                  1 to skip email and webhook (default: 1)
  BREVO_API_KEY, FROM_EMAIL, TO_EMAIL  email delivery
  WEBHOOK_URL              webhook delivery (one channel required unless DRY_RUN=1)
`);
}

async function main(): Promise<void> {
  const args = parseArgs(process.argv.slice(2));
  if (args.help) {
    printUsage();
    return;
  }
  process.exitCode = await runFareWatch(args, { env: process.env });
}

if (require.main === module) {
  main().catch((e: unknown) => {
    console.error('[fare-watch] Unexpected error:', e instanceof Error ? e.stack ?? e.message : String(e));
    process.exitCode = EXIT_FATAL;
  });
}
