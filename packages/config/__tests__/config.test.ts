import { describe, it, expect, afterEach, vi } from 'vitest';

import { envSchema, getConfig, loadConfig, parseIntEnv, resetConfigCache, validateConfig } from '../index';

vi.mock('@kernel/logger', () => ({
  getLogger: () => ({
    debug: vi.fn(),
    info: vi.fn(),
    warn: vi.fn(),
    error: vi.fn(),
  }),
}));

describe('envSchema', () => {
  it('fills in the launch defaults', () => {
    const config = envSchema.parse({});

    expect(config).toMatchObject({
      NODE_ENV: 'development',
      HOST: '0.0.0.0',
      PORT: 5000,
      WEB_CONCURRENCY: 2,
      REQUEST_TIMEOUT_MS: 120000,
      REPORT_STORE: 'file',
      REPORTS_DIR: 'data/reports',
      ANALYZER_TIMEOUT_MS: 90000,
      ANALYZER_MAX_RETRIES: 2,
      ANALYSIS_CONCURRENCY: 3,
    });
    expect(config.ANALYZER_SERVICE_URL).toBeUndefined();
  });

  it('coerces numeric strings', () => {
    const config = envSchema.parse({ PORT: '8080', ANALYZER_MAX_RETRIES: '0' });

    expect(config.PORT).toBe(8080);
    expect(config.ANALYZER_MAX_RETRIES).toBe(0);
  });

  it('requires DATABASE_URL for the postgres store', () => {
    const result = validateConfig({ REPORT_STORE: 'postgres' });

    expect(result).toEqual({
      valid: false,
      errors: ['DATABASE_URL: DATABASE_URL is required when REPORT_STORE=postgres'],
    });
  });

  it('rejects out-of-range values', () => {
    expect(validateConfig({ PORT: '70000' }).valid).toBe(false);
    expect(validateConfig({ ANALYSIS_CONCURRENCY: '7' }).valid).toBe(false);
    expect(validateConfig({ ANALYZER_SERVICE_URL: 'not a url' }).valid).toBe(false);
    expect(validateConfig({ REPORT_STORE: 'memory' }).valid).toBe(false);
  });
});

describe('loadConfig', () => {
  afterEach(() => {
    resetConfigCache();
  });

  it('lists every invalid variable in the error', () => {
    expect(() => loadConfig({ PORT: 'abc', NODE_ENV: 'staging' })).toThrow(/NODE_ENV: .*\n {2}PORT: /);
  });

  it('caches the last loaded configuration', () => {
    loadConfig({ PORT: '6000' });

    expect(getConfig().PORT).toBe(6000);
  });
});

describe('parseIntEnv', () => {
  afterEach(() => {
    delete process.env['TEST_INT'];
  });

  it('parses integers and falls back otherwise', () => {
    process.env['TEST_INT'] = ' 42 ';
    expect(parseIntEnv('TEST_INT', 7)).toBe(42);

    process.env['TEST_INT'] = '4.5';
    expect(parseIntEnv('TEST_INT', 7)).toBe(7);

    process.env['TEST_INT'] = '   ';
    expect(parseIntEnv('TEST_INT', 7)).toBe(7);

    delete process.env['TEST_INT'];
    expect(parseIntEnv('TEST_INT', 7)).toBe(7);
  });
});
