#!/usr/bin/env tsx
/**
 * Import package insert XML documents into PostgreSQL
 *
 * Usage: tsx src/server/scripts/import-package-inserts.ts [rootDir]
 */

import path from 'path';
import { validateEnv } from '../config/env.js';
import { closePostgresPool } from '../config/postgres.js';
import { createPostgresPackageInsertStore } from '../etl/loaders/PostgresPackageInsertStore.js';
import { runPackageInsertImport } from '../etl/pipelines/packageInsertImportPipeline.js';
import { logger } from '../utils/logger.js';
import { getErrorMessage } from '../types/errors.js';

async function main(): Promise<void> {
  try {
    const env = validateEnv();
    const rootDir = process.argv[2] ?? env.PACKAGE_INSERT_DIR;

    const summary = await runPackageInsertImport({
      rootDir,
      store: createPostgresPackageInsertStore(env),
      failedCsvPath: path.join(env.LOG_DIR, 'failed_files.csv'),
      concurrency: env.IMPORT_CONCURRENCY,
      progressEvery: env.PROGRESS_EVERY,
    });

    console.log('\n📦 Package insert import');
    console.log(`   Files: ${summary.succeededFiles}/${summary.totalFiles} imported, ${summary.failedFiles.length} failed`);
    console.log(`   Rows written: ${summary.rowsWritten}`);
    console.log(`   Time: ${summary.totalSeconds.toFixed(2)}s (avg ${summary.averageSeconds.toFixed(2)}s per file)`);
    if (summary.failedCsvPath) {
      console.log(`   Failed files: ${summary.failedCsvPath}`);
    }
  } catch (error) {
    logger.error({ error: getErrorMessage(error) }, 'Package insert import failed');
    process.exitCode = 1;
  } finally {
    await closePostgresPool();
  }
}

void main();
