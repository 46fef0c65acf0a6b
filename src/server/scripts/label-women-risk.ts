#!/usr/bin/env tsx
/**
 * Classify pregnancy and nursing sections and write risk labels
 *
 * Usage: tsx src/server/scripts/label-women-risk.ts [rulesPath]
 */

import { validateEnv } from '../config/env.js';
import { closePostgresPool } from '../config/postgres.js';
import { createPostgresPackageInsertStore } from '../etl/loaders/PostgresPackageInsertStore.js';
import { runWomenRiskPipeline } from '../etl/pipelines/womenRiskPipeline.js';
import { loadRiskRules } from '../services/classification/riskRules.js';
import { RiskClassificationService } from '../services/classification/RiskClassificationService.js';
import { logger } from '../utils/logger.js';
import { getErrorMessage } from '../types/errors.js';

async function main(): Promise<void> {
  try {
    const env = validateEnv();
    const classifier = new RiskClassificationService(loadRiskRules(process.argv[2] ?? env.RISK_RULES_PATH));
    const summary = await runWomenRiskPipeline({
      store: createPostgresPackageInsertStore(env),
      classifier,
      batchSize: env.BATCH_SIZE,
      progressEvery: env.PROGRESS_EVERY,
    });

    console.log(`\n🏷️  Risk labels (${summary.scheme})`);
    console.log(`   Scanned: ${summary.scanned}`);
    console.log(`   Scores updated: ${summary.scoresUpdated}, labels upserted: ${summary.labelsUpserted}`);
    console.log(`   Time: ${summary.totalSeconds.toFixed(1)}s`);
  } catch (error) {
    logger.error({ error: getErrorMessage(error) }, 'Risk labelling failed');
    process.exitCode = 1;
  } finally {
    await closePostgresPool();
  }
}

void main();
