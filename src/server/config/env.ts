/**
 * Environment Variable Validation
 *
 * Centralized parsing of all environment variables used by the pipelines.
 * Values are parsed manually with typed defaults; invalid values are
 * collected and reported together.
 */

// Load dotenv early so scripts see .env values before validateEnv() runs
import * as dotenv from 'dotenv';
dotenv.config();

import { ConfigurationError } from '../types/errors.js';

/**
 * Helper function to safely parse a number from string with default
 */
function parseNumericEnv(value: string | undefined, defaultValue: number): number {
  if (!value) return defaultValue;
  const num = parseInt(value, 10);
  return isNaN(num) ? defaultValue : num;
}

const TABLE_NAME_PATTERN = /^[A-Za-z_][A-Za-z0-9_]*(\.[A-Za-z_][A-Za-z0-9_]*)?$/;

const NODE_ENVS = ['development', 'production', 'test'] as const;
type NodeEnv = (typeof NODE_ENVS)[number];

function isNodeEnv(value: string): value is NodeEnv {
  return (NODE_ENVS as readonly string[]).includes(value);
}

/**
 * Environment configuration type
 */
export interface Env {
  NODE_ENV: NodeEnv;
  LOG_LEVEL?: string;
  LOG_DIR: string;

  // PostgreSQL Configuration
  POSTGRES_USER: string;
  POSTGRES_PASSWORD: string;
  POSTGRES_DB: string;
  POSTGRES_HOST: string;
  POSTGRES_PORT: number;
  POSTGRES_POOL_MAX: number;

  // Source documents
  PACKAGE_INSERT_DIR: string;

  // Destination tables
  PACKAGE_INSERT_TABLE: string;
  INTERACTION_TABLE: string;
  WOMEN_TABLE: string;
  WOMEN_RISK_TABLE: string;

  // Batching and progress
  BATCH_SIZE: number;
  PROGRESS_EVERY: number;
  IMPORT_CONCURRENCY: number;

  // Classification rules
  RISK_RULES_PATH: string;
}

let validatedEnv: Env | null = null;

/**
 * Validate and parse environment variables
 *
 * @returns Validated environment configuration
 * @throws ConfigurationError if any variable is invalid
 */
export function validateEnv(): Env {
  if (validatedEnv) {
    return validatedEnv;
  }

  const errors: string[] = [];

  const nodeEnv = process.env.NODE_ENV || 'development';
  if (!isNodeEnv(nodeEnv)) {
    errors.push(`NODE_ENV: Invalid value "${nodeEnv}". Must be development, production, or test.`);
  }

  const postgresPort = parseNumericEnv(process.env.POSTGRES_PORT, 5432);
  if (postgresPort < 1 || postgresPort > 65535) {
    errors.push(`POSTGRES_PORT: Invalid value "${process.env.POSTGRES_PORT}". Must be between 1 and 65535.`);
  }

  const tables = {
    PACKAGE_INSERT_TABLE: process.env.PACKAGE_INSERT_TABLE || 'public.sgml_rawdata',
    INTERACTION_TABLE: process.env.INTERACTION_TABLE || 'public.sgml_interaction',
    WOMEN_TABLE: process.env.WOMEN_TABLE || 'public.sgml_women',
    WOMEN_RISK_TABLE: process.env.WOMEN_RISK_TABLE || 'public.sgml_women_risk_labels',
  };
  for (const [key, value] of Object.entries(tables)) {
    // Table names are interpolated into DDL, so only plain identifiers pass
    if (!TABLE_NAME_PATTERN.test(value)) {
      errors.push(`${key}: Invalid table name "${value}". Use "schema.table" with plain identifiers.`);
    }
  }

  const batchSize = parseNumericEnv(process.env.BATCH_SIZE, 500);
  if (batchSize < 1) {
    errors.push(`BATCH_SIZE: Invalid value "${process.env.BATCH_SIZE}". Must be at least 1.`);
  }

  const progressEvery = parseNumericEnv(process.env.PROGRESS_EVERY, 2000);
  if (progressEvery < 1) {
    errors.push(`PROGRESS_EVERY: Invalid value "${process.env.PROGRESS_EVERY}". Must be at least 1.`);
  }

  const importConcurrency = parseNumericEnv(process.env.IMPORT_CONCURRENCY, 4);
  if (importConcurrency < 1) {
    errors.push(`IMPORT_CONCURRENCY: Invalid value "${process.env.IMPORT_CONCURRENCY}". Must be at least 1.`);
  }

  if (errors.length > 0 || !isNodeEnv(nodeEnv)) {
    throw new ConfigurationError(
      `Environment variable validation failed:\n${errors.map(e => `  - ${e}`).join('\n')}\n\n` +
      `Please check your .env file or environment variables.`,
      { errors }
    );
  }

  validatedEnv = {
    NODE_ENV: nodeEnv,
    LOG_LEVEL: process.env.LOG_LEVEL,
    LOG_DIR: process.env.LOG_DIR || './logs',

    POSTGRES_USER: process.env.POSTGRES_USER || 'postgres',
    POSTGRES_PASSWORD: process.env.POSTGRES_PASSWORD || '',
    POSTGRES_DB: process.env.POSTGRES_DB || 'drug_data',
    POSTGRES_HOST: process.env.POSTGRES_HOST || 'localhost',
    POSTGRES_PORT: postgresPort,
    POSTGRES_POOL_MAX: parseNumericEnv(process.env.POSTGRES_POOL_MAX, 10),

    PACKAGE_INSERT_DIR: process.env.PACKAGE_INSERT_DIR || './drug_information',

    ...tables,

    BATCH_SIZE: batchSize,
    PROGRESS_EVERY: progressEvery,
    IMPORT_CONCURRENCY: importConcurrency,

    RISK_RULES_PATH: process.env.RISK_RULES_PATH || 'config/risk-rules.json',
  };

  return validatedEnv;
}

/**
 * Reset cached environment (for testing)
 */
export function resetEnv(): void {
  validatedEnv = null;
}
