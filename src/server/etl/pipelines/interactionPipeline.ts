/**
 * Interaction Table Pipeline
 *
 * Rebuilds the interaction table from the flattened interactions stored
 * with each package insert row.
 */

import type { InteractionRow, InteractionStore } from '../loaders/packageInsertStore.js';
import { BatchWriter } from '../loaders/BatchWriter.js';
import { buildInteractionRows } from '../transformers/interactionRows.js';
import { logger, pipelineContext } from '../../utils/logger.js';
import { ProgressTracker } from '../../utils/progress.js';

export interface InteractionPipelineOptions {
  store: InteractionStore;
  batchSize?: number;
  progressEvery?: number;
  now?: () => number;
}

export interface InteractionPipelineSummary {
  sourceRows: number;
  rowsInserted: number;
  totalSeconds: number;
}

export async function runInteractionPipeline(options: InteractionPipelineOptions): Promise<InteractionPipelineSummary> {
  return pipelineContext.run({ pipeline: 'interaction-build' }, async () => {
    const { store } = options;
    const batchSize = options.batchSize ?? 500;
    const progressEvery = options.progressEvery ?? 2000;

    await store.recreateInteractionTable();

    const progress = new ProgressTracker(0, options.now);
    const writer = new BatchWriter<InteractionRow>(batchSize, rows => store.insertInteractions(rows));
    let sourceRows = 0;

    for await (const source of store.scanInteractionSources(batchSize)) {
      sourceRows++;
      await writer.add(...buildInteractionRows(source.packageInsertNo, source.yjCode, source.interactionsFlat));

      if (sourceRows % progressEvery === 0) {
        const { rate } = progress.snapshot(sourceRows);
        logger.info({ scanned: sourceRows, inserted: writer.written, rowsPerSecond: Math.round(rate) }, 'Interaction build progress');
      }
    }
    await writer.flush();

    const summary = {
      sourceRows,
      rowsInserted: writer.written,
      totalSeconds: progress.elapsedSeconds(),
    };
    logger.info(summary, 'Interaction build summary');
    return summary;
  });
}
