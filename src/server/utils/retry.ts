/**
 * Exponential backoff for transient database and file system failures
 */

import { logger } from './logger.js';
import { getErrorMessage } from '../types/errors.js';

export interface RetryConfig {
  /** Retries after the first call (default: 3) */
  maxAttempts?: number;
  /** Delay before the first retry in ms (default: 1000) */
  initialDelay?: number;
  /** Upper bound for any delay in ms (default: 30000) */
  maxDelay?: number;
  /** Growth factor between retries (default: 2) */
  multiplier?: number;
  isRetryable?: (error: unknown) => boolean;
}

const TRANSIENT_ERROR_CODES = new Set(['ECONNRESET', 'ETIMEDOUT', 'ECONNREFUSED', 'EPIPE', 'EAI_AGAIN']);
const TRANSIENT_MESSAGE = /timeout|connection|network|econnreset|etimedout/i;

/**
 * Socket error codes, or messages that mention a timeout, connection or network
 */
export function defaultIsRetryable(error: unknown): boolean {
  if (!(error instanceof Error)) {
    return false;
  }
  if ('code' in error && typeof error.code === 'string' && TRANSIENT_ERROR_CODES.has(error.code)) {
    return true;
  }
  return TRANSIENT_MESSAGE.test(error.message);
}

/**
 * Delay before retry number `attempt` (0-based)
 */
export function calculateExponentialBackoff(
  attempt: number,
  initialDelay: number,
  multiplier: number,
  maxDelay: number
): number {
  return Math.min(initialDelay * multiplier ** attempt, maxDelay);
}

/**
 * Run `operation`, retrying retryable failures with growing delays.
 * The last error is rethrown once the retries are used up.
 *
 * @param context - Label for log records, e.g. the first part of a query
 */
export async function retryWithBackoff<T>(
  operation: () => Promise<T>,
  config: RetryConfig = {},
  context?: string
): Promise<T> {
  const {
    maxAttempts = 3,
    initialDelay = 1000,
    maxDelay = 30000,
    multiplier = 2,
    isRetryable = defaultIsRetryable,
  } = config;

  for (let attempt = 0; ; attempt++) {
    try {
      const result = await operation();
      if (attempt > 0) {
        logger.info({ context, retries: attempt }, 'Operation succeeded after retry');
      }
      return result;
    } catch (error) {
      if (!isRetryable(error) || attempt >= maxAttempts) {
        logger.debug(
          { context, attempts: attempt + 1, error: getErrorMessage(error) },
          isRetryable(error) ? 'Retries exhausted' : 'Non-retryable error'
        );
        throw error;
      }
      const delay = calculateExponentialBackoff(attempt, initialDelay, multiplier, maxDelay);
      logger.warn({ context, attempt: attempt + 1, delay, error: getErrorMessage(error) }, 'Retrying after transient error');
      await new Promise(resolve => setTimeout(resolve, delay));
    }
  }
}
