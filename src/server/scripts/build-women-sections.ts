#!/usr/bin/env tsx
/**
 * Extract pregnancy and nursing sections from stored package inserts
 *
 * Usage: tsx src/server/scripts/build-women-sections.ts
 */

import { validateEnv } from '../config/env.js';
import { closePostgresPool } from '../config/postgres.js';
import { createPostgresPackageInsertStore } from '../etl/loaders/PostgresPackageInsertStore.js';
import { runWomenSectionsPipeline } from '../etl/pipelines/womenSectionsPipeline.js';
import { logger } from '../utils/logger.js';
import { getErrorMessage } from '../types/errors.js';

async function main(): Promise<void> {
  try {
    const env = validateEnv();
    const summary = await runWomenSectionsPipeline({
      store: createPostgresPackageInsertStore(env),
      batchSize: env.BATCH_SIZE,
      progressEvery: env.PROGRESS_EVERY,
    });

    console.log('\n🤰 Pregnancy / nursing sections');
    console.log(`   Scanned: ${summary.scanned}, upserted: ${summary.upserted}, unparsed: ${summary.unparsed}`);
    console.log(`   Time: ${summary.totalSeconds.toFixed(1)}s`);
  } catch (error) {
    logger.error({ error: getErrorMessage(error) }, 'Section extraction failed');
    process.exitCode = 1;
  } finally {
    await closePostgresPool();
  }
}

void main();
