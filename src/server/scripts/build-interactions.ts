#!/usr/bin/env tsx
/**
 * Rebuild the interaction table from stored package insert rows
 *
 * Usage: tsx src/server/scripts/build-interactions.ts
 */

import { validateEnv } from '../config/env.js';
import { closePostgresPool } from '../config/postgres.js';
import { createPostgresPackageInsertStore } from '../etl/loaders/PostgresPackageInsertStore.js';
import { runInteractionPipeline } from '../etl/pipelines/interactionPipeline.js';
import { logger } from '../utils/logger.js';
import { getErrorMessage } from '../types/errors.js';

async function main(): Promise<void> {
  try {
    const env = validateEnv();
    const summary = await runInteractionPipeline({
      store: createPostgresPackageInsertStore(env),
      batchSize: env.BATCH_SIZE,
      progressEvery: env.PROGRESS_EVERY,
    });

    console.log('\n💊 Interaction table');
    console.log(`   Source: ${env.PACKAGE_INSERT_TABLE} (${summary.sourceRows} rows)`);
    console.log(`   Destination: ${env.INTERACTION_TABLE} (${summary.rowsInserted} rows)`);
    console.log(`   Time: ${summary.totalSeconds.toFixed(2)}s`);
  } catch (error) {
    logger.error({ error: getErrorMessage(error) }, 'Interaction build failed');
    process.exitCode = 1;
  } finally {
    await closePostgresPool();
  }
}

void main();
