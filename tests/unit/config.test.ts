/**
 * Environment configuration loading
 */

import { describe, it, expect } from 'vitest';
import { ConfigError, loadConfig } from '../../src/config/loader';
import type { EnvSource } from '../../src/config/loader';

const TODAY = '2026-11-01';
const AMADEUS_ENV: EnvSource = { AMADEUS_CLIENT_ID: 'test-id', AMADEUS_CLIENT_SECRET: 'test-secret' };

function issuesFor(env: EnvSource): string[] {
  try {
    loadConfig(env, TODAY);
  } catch (e) {
    if (e instanceof ConfigError) return e.issues;
    throw e;
  }
  throw new Error('expected a ConfigError');
}

describe('loadConfig defaults', () => {
  const config = loadConfig(AMADEUS_ENV, TODAY);

  it('builds the default scan request', () => {
    expect(config.scan).toEqual({
      routes: [
        { origin: 'AKL', destination: 'SYD' },
        { origin: 'AKL', destination: 'MEL' },
      ],
      cabins: ['PremiumEconomy', 'Business'],
      priceCaps: { PremiumEconomy: 1300, Business: 1500 },
      currency: 'NZD',
      requiredAirline: 'NZ',
      horizonMonths: 3,
      stay: { minNights: 8, maxNights: 12 },
      dateStepDays: 10,
      flexDays: 2,
      today: TODAY,
    });
  });

  it('freezes the scan request', () => {
    expect(Object.isFrozen(config.scan)).toBe(true);
    expect(Object.isFrozen(config.scan.routes)).toBe(true);
    expect(Object.isFrozen(config.scan.priceCaps)).toBe(true);
  });

  it('uses the default provider, pacing and delivery settings', () => {
    expect(config.provider).toEqual({
      id: 'amadeus',
      clientId: 'test-id',
      clientSecret: 'test-secret',
      baseUrl: 'https://test.api.amadeus.com',
    });
    expect(config.execution).toEqual({
      concurrency: 2,
      minRequestGapMs: 400,
      jitterMs: 150,
      maxAttempts: 3,
      retryBaseDelayMs: 800,
      retryMaxDelayMs: 10_000,
    });
    expect(config.delivery).toEqual({ outFile: 'out-fare-watch.html' });
    expect(config.logLevel).toBe('info');
  });

  it('treats blank values as unset', () => {
    const blank = loadConfig({ ...AMADEUS_ENV, PE_CAP: '', ROUTES: '  ', SCAN_MONTHS: '' }, TODAY);
    expect(blank.scan.priceCaps.PremiumEconomy).toBe(1300);
    expect(blank.scan.routes).toHaveLength(2);
    expect(blank.scan.horizonMonths).toBe(3);
  });
});

describe('loadConfig overrides', () => {
  it('parses routes and cabins loosely', () => {
    const config = loadConfig({ ...AMADEUS_ENV, ROUTES: ' akl:syd , wlg:mel ', CABINS: 'business, W, Business' }, TODAY);
    expect(config.scan.routes).toEqual([
      { origin: 'AKL', destination: 'SYD' },
      { origin: 'WLG', destination: 'MEL' },
    ]);
    expect(config.scan.cabins).toEqual(['Business', 'PremiumEconomy']);
  });

  it('reads numbers and caps', () => {
    const config = loadConfig(
      { ...AMADEUS_ENV, PE_CAP: '1199.5', J_CAP: '2000', SCAN_MONTHS: '6', FLEX_DAYS: '0', CONCURRENCY: '4' },
      TODAY
    );
    expect(config.scan.priceCaps).toEqual({ PremiumEconomy: 1199.5, Business: 2000 });
    expect(config.scan.horizonMonths).toBe(6);
    expect(config.scan.flexDays).toBe(0);
    expect(config.execution.concurrency).toBe(4);
  });

  it('needs no credentials for grabaseat', () => {
    const config = loadConfig({ FARE_PROVIDER: 'grabaseat' }, TODAY);
    expect(config.provider).toEqual({
      id: 'grabaseat',
      endpoint: 'https://grabaseat.airnewzealand.co.nz/v1/flights/search',
    });
  });

  it('switches to email delivery when DRY_RUN is off', () => {
    const config = loadConfig(
      { ...AMADEUS_ENV, DRY_RUN: '0', BREVO_API_KEY: 'test-secret', FROM_EMAIL: 'from@example.test', TO_EMAIL: 'to@example.test' },
      TODAY
    );
    expect(config.delivery).toEqual({
      outFile: 'out-fare-watch.html',
      email: {
        apiKey: 'test-secret',
        fromEmail: 'from@example.test',
        fromName: 'Fare Watch',
        toEmail: 'to@example.test',
      },
    });
  });

  it('accepts a webhook as the only channel', () => {
    const config = loadConfig({ ...AMADEUS_ENV, DRY_RUN: '0', WEBHOOK_URL: 'https://hooks.example.test/catch/1' }, TODAY);
    expect(config.delivery).toEqual({ outFile: 'out-fare-watch.html', webhookUrl: 'https://hooks.example.test/catch/1' });
  });

  it('ignores the webhook on a dry run', () => {
    const config = loadConfig({ ...AMADEUS_ENV, WEBHOOK_URL: 'https://hooks.example.test/catch/1' }, TODAY);
    expect(config.delivery).toEqual({ outFile: 'out-fare-watch.html' });
  });

  it('reads the Tequila key and endpoint', () => {
    const config = loadConfig({ FARE_PROVIDER: 'tequila', TEQUILA_API_KEY: 'test-secret' }, TODAY);
    expect(config.provider).toEqual({
      id: 'tequila',
      apiKey: 'test-secret',
      endpoint: 'https://tequila-api.kiwi.com/v2/search',
    });
  });

  it('lets DEBUG force the debug level', () => {
    expect(loadConfig({ ...AMADEUS_ENV, LOG_LEVEL: 'WARN' }, TODAY).logLevel).toBe('warn');
    expect(loadConfig({ ...AMADEUS_ENV, LOG_LEVEL: 'warn', DEBUG: '1' }, TODAY).logLevel).toBe('debug');
  });
});

describe('loadConfig errors', () => {
  it('requires Amadeus credentials', () => {
    expect(issuesFor({})).toEqual([
      'AMADEUS_CLIENT_ID is required for the amadeus provider',
      'AMADEUS_CLIENT_SECRET is required for the amadeus provider',
    ]);
  });

  it('requires Brevo settings unless dry running', () => {
    expect(issuesFor({ ...AMADEUS_ENV, DRY_RUN: 'no', FROM_EMAIL: 'from@example.test' })).toEqual([
      'BREVO_API_KEY is required unless DRY_RUN=1 or WEBHOOK_URL is set',
      'TO_EMAIL is required unless DRY_RUN=1 or WEBHOOK_URL is set',
    ]);
  });

  it('rejects a partial Brevo set next to a webhook', () => {
    expect(
      issuesFor({ ...AMADEUS_ENV, DRY_RUN: '0', WEBHOOK_URL: 'https://hooks.example.test/catch/1', BREVO_API_KEY: 'test-secret' })
    ).toEqual(['FROM_EMAIL is required for email delivery', 'TO_EMAIL is required for email delivery']);
  });

  it('requires a Tequila key', () => {
    expect(issuesFor({ FARE_PROVIDER: 'tequila' })).toEqual(['TEQUILA_API_KEY is required for the tequila provider']);
  });

  it('rejects a webhook that is not a URL', () => {
    expect(issuesFor({ ...AMADEUS_ENV, DRY_RUN: '0', WEBHOOK_URL: 'not a url' })[0]).toMatch(/^WEBHOOK_URL:/);
  });

  it('rejects malformed routes and unknown cabins', () => {
    const issues = issuesFor({ ...AMADEUS_ENV, ROUTES: 'AKL-SYD', CABINS: 'First' });
    expect(issues).toContain('ROUTES: Malformed route "AKL-SYD" (expected ORIGIN:DEST)');
    expect(issues).toContain('CABINS: Unknown cabin "First"');
  });

  it('rejects non-numeric and non-positive caps', () => {
    const issues = issuesFor({ ...AMADEUS_ENV, PE_CAP: 'cheap', J_CAP: '-5' });
    expect(issues.filter((i) => i.startsWith('PE_CAP:'))).toHaveLength(1);
    expect(issues.filter((i) => i.startsWith('J_CAP:'))).toHaveLength(1);
  });

  it('rejects an unknown provider', () => {
    expect(issuesFor({ FARE_PROVIDER: 'skyscanner' })[0]).toMatch(/^FARE_PROVIDER:/);
  });

  it('is an Error listing every problem', () => {
    const error = new ConfigError(['A is wrong', 'B is missing']);
    expect(error).toBeInstanceOf(Error);
    expect(error.message).toBe('Invalid configuration:\n  - A is wrong\n  - B is missing');
  });
});
