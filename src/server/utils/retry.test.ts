import { describe, expect, it, vi } from 'vitest';
import { calculateExponentialBackoff, defaultIsRetryable, retryWithBackoff } from './retry.js';

describe('retryWithBackoff', () => {
  it('retries transient failures until the operation succeeds', async () => {
    const operation = vi
      .fn<() => Promise<string>>()
      .mockRejectedValueOnce(Object.assign(new Error('reset'), { code: 'ECONNRESET' }))
      .mockResolvedValueOnce('ok');

    await expect(retryWithBackoff(operation, { initialDelay: 1 })).resolves.toBe('ok');
    expect(operation).toHaveBeenCalledTimes(2);
  });

  it('throws non-retryable errors immediately', async () => {
    const operation = vi.fn<() => Promise<string>>().mockRejectedValue(new Error('syntax error'));

    await expect(retryWithBackoff(operation, { initialDelay: 1 })).rejects.toThrow('syntax error');
    expect(operation).toHaveBeenCalledTimes(1);
  });

  it('gives up after the configured number of retries', async () => {
    const operation = vi.fn<() => Promise<string>>().mockRejectedValue(new Error('connection lost'));

    await expect(retryWithBackoff(operation, { maxAttempts: 2, initialDelay: 1, maxDelay: 2 })).rejects.toThrow(
      'connection lost'
    );
    expect(operation).toHaveBeenCalledTimes(3);
  });

  it('uses a custom retryable predicate', async () => {
    const operation = vi.fn<() => Promise<number>>().mockRejectedValueOnce(new Error('busy')).mockResolvedValueOnce(1);

    await expect(
      retryWithBackoff(operation, { initialDelay: 1, isRetryable: error => error instanceof Error && error.message === 'busy' })
    ).resolves.toBe(1);
  });
});

describe('backoff helpers', () => {
  it('grows exponentially up to the maximum', () => {
    expect(calculateExponentialBackoff(0, 100, 2, 1000)).toBe(100);
    expect(calculateExponentialBackoff(3, 100, 2, 1000)).toBe(800);
    expect(calculateExponentialBackoff(4, 100, 2, 1000)).toBe(1000);
  });

  it('recognizes transient errors', () => {
    expect(defaultIsRetryable(Object.assign(new Error('x'), { code: 'ETIMEDOUT' }))).toBe(true);
    expect(defaultIsRetryable(new Error('Network unreachable'))).toBe(true);
    expect(defaultIsRetryable(new Error('duplicate key'))).toBe(false);
    expect(defaultIsRetryable('timeout')).toBe(false);
  });
});
