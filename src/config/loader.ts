/**
 * Configuration Loader
 *
 * Reads the process environment once, validates it with zod and builds the
 * immutable ScanRequest plus the provider, execution and delivery settings.
 * Nothing else in the codebase reads process.env.
 */

import { format } from 'date-fns';
import { z } from 'zod';
import { DEFAULTS, DEFAULT_PRICE_CAPS, PROVIDER_URLS } from './constants';
import { matchCabin } from '../fares/cabin';
import type { Cabin, IsoDate, Route, ScanRequest } from '../fares/types';
import type { LogLevel } from '../observability/logger';

export const PROVIDER_IDS = ['amadeus', 'grabaseat', 'tequila'] as const;
export type ProviderId = (typeof PROVIDER_IDS)[number];

export type ProviderConfig =
  | { id: 'amadeus'; clientId: string; clientSecret: string; baseUrl: string }
  | { id: 'grabaseat'; endpoint: string }
  | { id: 'tequila'; apiKey: string; endpoint: string };

export interface ExecutionConfig {
  concurrency: number;
  minRequestGapMs: number;
  jitterMs: number;
  maxAttempts: number;
  retryBaseDelayMs: number;
  retryMaxDelayMs: number;
}

export interface EmailSettings {
  apiKey: string;
  fromEmail: string;
  fromName: string;
  toEmail: string;
}

/**
 * The report file is always written. Email and webhook are only set when
 * DRY_RUN is off.
 */
export interface DeliveryConfig {
  outFile: string;
  email?: EmailSettings;
  webhookUrl?: string;
}

export interface AppConfig {
  scan: ScanRequest;
  provider: ProviderConfig;
  execution: ExecutionConfig;
  delivery: DeliveryConfig;
  logLevel: LogLevel;
}

export type EnvSource = Record<string, string | undefined>;

/**
 * Missing or invalid configuration. Fatal: raised before any query is sent.
 */
export class ConfigError extends Error {
  readonly issues: string[];

  constructor(issues: string[]) {
    super(`Invalid configuration:\n  - ${issues.join('\n  - ')}`);
    this.name = 'ConfigError';
    this.issues = issues;
  }
}

// ============ Field Schemas ============

const TRUTHY = new Set(['1', 'true', 'yes', 'y', 'on']);

function blankToUndefined(value: unknown): unknown {
  return typeof value === 'string' && value.trim() === '' ? undefined : value;
}

function optionalString() {
  return z.preprocess(blankToUndefined, z.string().trim().optional());
}

function positiveInt(fallback: number) {
  return z.preprocess(blankToUndefined, z.coerce.number().int().positive().default(fallback));
}

function nonNegativeInt(fallback: number) {
  return z.preprocess(blankToUndefined, z.coerce.number().int().nonnegative().default(fallback));
}

function positiveAmount(fallback: number) {
  return z.preprocess(blankToUndefined, z.coerce.number().positive().finite().default(fallback));
}

function flag(fallback: boolean) {
  return z
    .preprocess(blankToUndefined, z.string().optional())
    .transform((value) => (value === undefined ? fallback : TRUTHY.has(value.trim().toLowerCase())));
}

const CodeSchema = z.string().regex(/^[A-Z0-9]{2,3}$/, 'Must be a 2-3 character code');

const RouteListSchema = z.string().transform((value, ctx): Route[] => {
  const routes: Route[] = [];
  for (const part of value.split(',')) {
    const pair = part.trim();
    if (!pair) continue;
    const [origin, destination, extra] = pair.split(':').map((s) => s.trim().toUpperCase());
    if (!origin || !destination || extra !== undefined || !/^[A-Z]{3}$/.test(origin) || !/^[A-Z]{3}$/.test(destination)) {
      ctx.addIssue({ code: z.ZodIssueCode.custom, message: `Malformed route "${pair}" (expected ORIGIN:DEST)` });
      continue;
    }
    routes.push({ origin, destination });
  }
  if (routes.length === 0) {
    ctx.addIssue({ code: z.ZodIssueCode.custom, message: 'At least one route is required' });
  }
  return routes;
});

const CabinListSchema = z.string().transform((value, ctx): Cabin[] => {
  const cabins: Cabin[] = [];
  for (const part of value.split(',')) {
    const label = part.trim();
    if (!label) continue;
    const cabin = matchCabin(label);
    if (cabin === 'Unknown') {
      ctx.addIssue({ code: z.ZodIssueCode.custom, message: `Unknown cabin "${label}"` });
      continue;
    }
    if (!cabins.includes(cabin)) cabins.push(cabin);
  }
  if (cabins.length === 0) {
    ctx.addIssue({ code: z.ZodIssueCode.custom, message: 'At least one cabin is required' });
  }
  return cabins;
});

const EnvSchema = z.object({
  FARE_PROVIDER: z.preprocess(blankToUndefined, z.enum(PROVIDER_IDS).default(DEFAULTS.provider)),
  AMADEUS_CLIENT_ID: optionalString(),
  AMADEUS_CLIENT_SECRET: optionalString(),
  AMADEUS_BASE_URL: z.preprocess(blankToUndefined, z.string().url().default(PROVIDER_URLS.amadeus)),
  GRABASEAT_ENDPOINT: z.preprocess(blankToUndefined, z.string().url().default(PROVIDER_URLS.grabaseat)),
  TEQUILA_API_KEY: optionalString(),
  TEQUILA_ENDPOINT: z.preprocess(blankToUndefined, z.string().url().default(PROVIDER_URLS.tequila)),

  ROUTES: z.preprocess(blankToUndefined, RouteListSchema.default(DEFAULTS.routes)),
  CABINS: z.preprocess(blankToUndefined, CabinListSchema.default(DEFAULTS.cabins)),
  PE_CAP: positiveAmount(DEFAULT_PRICE_CAPS.PremiumEconomy),
  J_CAP: positiveAmount(DEFAULT_PRICE_CAPS.Business),
  CURRENCY: z.preprocess(blankToUndefined, z.string().trim().toUpperCase().pipe(z.string().regex(/^[A-Z]{3}$/)).default(DEFAULTS.currency)),
  REQUIRED_AIRLINE: z.preprocess(blankToUndefined, z.string().trim().toUpperCase().pipe(CodeSchema).default(DEFAULTS.requiredAirline)),

  SCAN_MONTHS: positiveInt(DEFAULTS.scanMonths),
  MIN_RET_DAYS: nonNegativeInt(DEFAULTS.minStayNights),
  MAX_RET_DAYS: nonNegativeInt(DEFAULTS.maxStayNights),
  DATE_STEP_DAYS: positiveInt(DEFAULTS.dateStepDays),
  FLEX_DAYS: nonNegativeInt(DEFAULTS.flexDays),

  CONCURRENCY: positiveInt(DEFAULTS.concurrency),
  MIN_REQUEST_GAP_MS: nonNegativeInt(DEFAULTS.minRequestGapMs),
  REQUEST_JITTER_MS: nonNegativeInt(DEFAULTS.requestJitterMs),
  MAX_ATTEMPTS: positiveInt(DEFAULTS.maxAttempts),

  DRY_RUN: flag(DEFAULTS.dryRun),
  OUT_FILE: z.preprocess(blankToUndefined, z.string().default(DEFAULTS.outFile)),
  BREVO_API_KEY: optionalString(),
  FROM_EMAIL: optionalString(),
  FROM_NAME: z.preprocess(blankToUndefined, z.string().default(DEFAULTS.fromName)),
  TO_EMAIL: optionalString(),
  WEBHOOK_URL: z.preprocess(blankToUndefined, z.string().url().optional()),

  LOG_LEVEL: z.preprocess(
    (value) => (typeof value === 'string' ? blankToUndefined(value.trim().toLowerCase()) : value),
    z.enum(['debug', 'info', 'warn', 'error']).default(DEFAULTS.logLevel)
  ),
  DEBUG: flag(false),
});

type ParsedEnv = z.infer<typeof EnvSchema>;

function formatIssue(issue: z.ZodIssue): string {
  const field = issue.path.join('.');
  return field ? `${field}: ${issue.message}` : issue.message;
}

// ============ Builders ============

function buildProvider(env: ParsedEnv, issues: string[]): ProviderConfig | null {
  if (env.FARE_PROVIDER === 'grabaseat') {
    return { id: 'grabaseat', endpoint: env.GRABASEAT_ENDPOINT };
  }

  if (env.FARE_PROVIDER === 'tequila') {
    if (!env.TEQUILA_API_KEY) {
      issues.push('TEQUILA_API_KEY is required for the tequila provider');
      return null;
    }
    return { id: 'tequila', apiKey: env.TEQUILA_API_KEY, endpoint: env.TEQUILA_ENDPOINT };
  }

  if (!env.AMADEUS_CLIENT_ID) issues.push('AMADEUS_CLIENT_ID is required for the amadeus provider');
  if (!env.AMADEUS_CLIENT_SECRET) issues.push('AMADEUS_CLIENT_SECRET is required for the amadeus provider');
  if (!env.AMADEUS_CLIENT_ID || !env.AMADEUS_CLIENT_SECRET) return null;

  return {
    id: 'amadeus',
    clientId: env.AMADEUS_CLIENT_ID,
    clientSecret: env.AMADEUS_CLIENT_SECRET,
    baseUrl: env.AMADEUS_BASE_URL.replace(/\/+$/, ''),
  };
}

const EMAIL_VARS = ['BREVO_API_KEY', 'FROM_EMAIL', 'TO_EMAIL'] as const;

/**
 * Outside a dry run at least one channel is required: a complete Brevo set, a
 * WEBHOOK_URL, or both. A partial Brevo set is always an error.
 */
function buildDelivery(env: ParsedEnv, issues: string[]): DeliveryConfig | null {
  if (env.DRY_RUN) return { outFile: env.OUT_FILE };

  const delivery: DeliveryConfig = { outFile: env.OUT_FILE };
  if (env.WEBHOOK_URL) delivery.webhookUrl = env.WEBHOOK_URL;

  const wantsEmail = EMAIL_VARS.some((name) => env[name]) || !env.WEBHOOK_URL;
  if (!wantsEmail) return delivery;

  const unless = env.WEBHOOK_URL ? 'for email delivery' : 'unless DRY_RUN=1 or WEBHOOK_URL is set';
  for (const name of EMAIL_VARS.filter((n) => !env[n])) issues.push(`${name} is required ${unless}`);
  if (!env.BREVO_API_KEY || !env.FROM_EMAIL || !env.TO_EMAIL) return null;

  delivery.email = {
    apiKey: env.BREVO_API_KEY,
    fromEmail: env.FROM_EMAIL,
    fromName: env.FROM_NAME,
    toEmail: env.TO_EMAIL,
  };
  return delivery;
}

/**
 * Build the run configuration from environment-like values.
 *
 * @param today - Anchor date for the scan window; defaults to the local date.
 * @throws ConfigError listing every invalid or missing value.
 */
export function loadConfig(env: EnvSource, today: IsoDate = format(new Date(), 'yyyy-MM-dd')): AppConfig {
  const parsed = EnvSchema.safeParse(env);
  if (!parsed.success) {
    throw new ConfigError(parsed.error.issues.map(formatIssue));
  }

  const values = parsed.data;
  const issues: string[] = [];
  const provider = buildProvider(values, issues);
  const delivery = buildDelivery(values, issues);
  if (!provider || !delivery || issues.length > 0) {
    throw new ConfigError(issues);
  }

  const scan: ScanRequest = Object.freeze({
    routes: Object.freeze(values.ROUTES.map((r) => Object.freeze({ ...r }))),
    cabins: Object.freeze([...values.CABINS]),
    priceCaps: Object.freeze({ PremiumEconomy: values.PE_CAP, Business: values.J_CAP }),
    currency: values.CURRENCY,
    requiredAirline: values.REQUIRED_AIRLINE,
    horizonMonths: values.SCAN_MONTHS,
    stay: Object.freeze({ minNights: values.MIN_RET_DAYS, maxNights: values.MAX_RET_DAYS }),
    dateStepDays: values.DATE_STEP_DAYS,
    flexDays: values.FLEX_DAYS,
    today,
  });

  return {
    scan,
    provider,
    execution: {
      concurrency: values.CONCURRENCY,
      minRequestGapMs: values.MIN_REQUEST_GAP_MS,
      jitterMs: values.REQUEST_JITTER_MS,
      maxAttempts: values.MAX_ATTEMPTS,
      retryBaseDelayMs: DEFAULTS.retryBaseDelayMs,
      retryMaxDelayMs: DEFAULTS.retryMaxDelayMs,
    },
    delivery,
    logLevel: values.DEBUG ? 'debug' : values.LOG_LEVEL,
  };
}
