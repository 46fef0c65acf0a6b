import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest';
import { resetEnv, validateEnv } from './env.js';
import { ConfigurationError } from '../types/errors.js';

describe('validateEnv', () => {
  beforeEach(() => {
    resetEnv();
  });

  afterEach(() => {
    vi.unstubAllEnvs();
    resetEnv();
  });

  it('applies defaults', () => {
    const env = validateEnv();
    expect(env.NODE_ENV).toBe('test');
    expect(env.POSTGRES_PORT).toBe(5432);
    expect(env.PACKAGE_INSERT_TABLE).toBe('public.sgml_rawdata');
    expect(env.BATCH_SIZE).toBe(500);
    expect(env.PROGRESS_EVERY).toBe(2000);
    expect(env.RISK_RULES_PATH).toBe('config/risk-rules.json');
  });

  it('reads overrides', () => {
    vi.stubEnv('POSTGRES_PORT', '6543');
    vi.stubEnv('WOMEN_TABLE', 'staging.women');
    vi.stubEnv('BATCH_SIZE', '50');

    const env = validateEnv();
    expect(env.POSTGRES_PORT).toBe(6543);
    expect(env.WOMEN_TABLE).toBe('staging.women');
    expect(env.BATCH_SIZE).toBe(50);
  });

  it('caches the result until reset', () => {
    const first = validateEnv();
    vi.stubEnv('BATCH_SIZE', '7');
    expect(validateEnv()).toBe(first);
    resetEnv();
    expect(validateEnv().BATCH_SIZE).toBe(7);
  });

  it.each([
    ['POSTGRES_PORT', '70000'],
    ['INTERACTION_TABLE', 'public.x; DROP TABLE y'],
    ['BATCH_SIZE', '0'],
    ['IMPORT_CONCURRENCY', '-2'],
    ['NODE_ENV', 'staging'],
  ])('rejects %s=%s', (key, value) => {
    vi.stubEnv(key, value);
    expect(() => validateEnv()).toThrow(ConfigurationError);
  });
});
