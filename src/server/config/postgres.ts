/**
 * PostgreSQL pool shared by the package insert stores
 */

import { Pool, type PoolClient } from 'pg';
import { validateEnv } from './env.js';
import { logger } from '../utils/logger.js';
import { retryWithBackoff } from '../utils/retry.js';
import { DatabaseError, getErrorMessage } from '../types/errors.js';

let pool: Pool | null = null;

/**
 * Lazily created pool on the configured database
 */
export function getPostgresPool(): Pool {
  if (pool) {
    return pool;
  }

  const env = validateEnv();
  pool = new Pool({
    host: env.POSTGRES_HOST,
    port: env.POSTGRES_PORT,
    database: env.POSTGRES_DB,
    user: env.POSTGRES_USER,
    password: env.POSTGRES_PASSWORD,
    max: env.POSTGRES_POOL_MAX,
    idleTimeoutMillis: 30000,
    connectionTimeoutMillis: 10000,
    keepAlive: true,
  });
  pool.on('error', err => {
    logger.error({ error: err }, 'Unexpected error on idle PostgreSQL client');
  });

  logger.info(
    { host: env.POSTGRES_HOST, port: env.POSTGRES_PORT, database: env.POSTGRES_DB },
    'PostgreSQL connection pool created'
  );
  return pool;
}

export async function closePostgresPool(): Promise<void> {
  if (pool) {
    await pool.end();
    pool = null;
    logger.info('PostgreSQL connection pool closed');
  }
}

// Connection-level SQLSTATEs: admin/crash shutdown, cannot connect now, connection failures
const RETRYABLE_SQLSTATES = new Set(['57P01', '57P02', '57P03', '08001', '08003', '08006']);
const RETRYABLE_SOCKET_CODES = new Set(['ECONNREFUSED', 'ETIMEDOUT', 'ENOTFOUND', 'EAI_AGAIN']);
const RETRYABLE_MESSAGE = /econnreset|etimedout|econnrefused|connection terminated|not connected/i;

/**
 * Transient connection errors worth another attempt
 */
export function isRetryablePostgresError(error: unknown): boolean {
  if (!(error instanceof Error)) {
    return false;
  }
  const code = 'code' in error && typeof error.code === 'string' ? error.code : undefined;
  if (code && (RETRYABLE_SQLSTATES.has(code) || RETRYABLE_SOCKET_CODES.has(code))) {
    return true;
  }
  return RETRYABLE_MESSAGE.test(error.message);
}

/**
 * Run a query on the pool, retrying once on a dropped connection
 */
export async function queryPostgres<T = unknown>(text: string, params?: unknown[]): Promise<T[]> {
  const db = getPostgresPool();
  return retryWithBackoff(
    async () => {
      const result = await db.query(text, params);
      return result.rows as T[];
    },
    { maxAttempts: 1, initialDelay: 1000, maxDelay: 10000, isRetryable: isRetryablePostgresError },
    text.length > 50 ? `${text.slice(0, 50)}...` : text
  );
}

/**
 * Run `work` inside BEGIN/COMMIT on one client; any failure rolls back and
 * surfaces as a DatabaseError
 */
export async function withTransaction<T>(work: (client: PoolClient) => Promise<T>): Promise<T> {
  const client = await getPostgresPool().connect();
  try {
    await client.query('BEGIN');
    const result = await work(client);
    await client.query('COMMIT');
    return result;
  } catch (error) {
    await client.query('ROLLBACK').catch((rollbackError: unknown) => {
      logger.error({ error: getErrorMessage(rollbackError) }, 'PostgreSQL rollback failed');
    });
    throw new DatabaseError(`Transaction failed: ${getErrorMessage(error)}`, { cause: getErrorMessage(error) });
  } finally {
    client.release();
  }
}
