/**
 * Pregnancy / Nursing Section Pipeline
 *
 * Parses the stored markup of every package insert row and writes the
 * pregnancy and nursing section texts with the ids of their source elements.
 */

import { tryParsePackageInsertXml } from '../../adapters/packageInsert/PackageInsertXmlParser.js';
import { NURSING_TAGS, PREGNANT_TAGS, extractSectionText } from '../../adapters/packageInsert/sectionLocator.js';
import type { SourceIds, StoredDocument, WomenSectionRow, WomenSectionStore } from '../loaders/packageInsertStore.js';
import { BatchWriter } from '../loaders/BatchWriter.js';
import { logger, pipelineContext } from '../../utils/logger.js';
import { ProgressTracker } from '../../utils/progress.js';

export interface WomenSectionsPipelineOptions {
  store: WomenSectionStore;
  batchSize?: number;
  progressEvery?: number;
  now?: () => number;
}

export interface WomenSectionsPipelineSummary {
  scanned: number;
  upserted: number;
  /** Rows whose stored markup was missing or could not be parsed */
  unparsed: number;
  totalSeconds: number;
}

/**
 * Section row for one stored document; unparseable markup gives empty sections
 */
export async function buildWomenSectionRow(document: StoredDocument): Promise<WomenSectionRow & { parsed: boolean }> {
  const root = await tryParsePackageInsertXml(document.docXml);
  const pregnant = extractSectionText(root, PREGNANT_TAGS);
  const nursing = extractSectionText(root, NURSING_TAGS);

  const srcIds: SourceIds = {};
  if (pregnant.sourceId) srcIds.pregnant = pregnant.sourceId;
  if (nursing.sourceId) srcIds.nursing = nursing.sourceId;

  return {
    packageInsertNo: document.packageInsertNo,
    yjCode: document.yjCode,
    brandNameJa: document.brandNameJa,
    pregnantText: pregnant.text ?? null,
    nursingText: nursing.text ?? null,
    hasPregnant: Boolean(pregnant.text),
    hasNursing: Boolean(nursing.text),
    srcIds: Object.keys(srcIds).length > 0 ? srcIds : null,
    parsed: root !== undefined,
  };
}

export async function runWomenSectionsPipeline(options: WomenSectionsPipelineOptions): Promise<WomenSectionsPipelineSummary> {
  return pipelineContext.run({ pipeline: 'women-sections' }, async () => {
    const { store } = options;
    const batchSize = options.batchSize ?? 500;
    const progressEvery = options.progressEvery ?? 2000;

    logger.info('Recreating pregnancy/nursing section table');
    await store.recreateWomenTable();

    const progress = new ProgressTracker(0, options.now);
    const writer = new BatchWriter<WomenSectionRow>(batchSize, rows => store.upsertWomenSections(rows));
    let scanned = 0;
    let unparsed = 0;

    for await (const document of store.scanDocuments(batchSize)) {
      scanned++;
      const { parsed, ...row } = await buildWomenSectionRow(document);
      if (!parsed) {
        unparsed++;
        logger.debug({ packageInsertNo: row.packageInsertNo, yjCode: row.yjCode }, 'Stored markup missing or unparseable');
      }
      await writer.add(row);

      if (scanned % progressEvery === 0) {
        const { rate } = progress.snapshot(scanned);
        logger.info({ scanned, upserted: writer.written, rowsPerSecond: Math.round(rate) }, 'Section extraction progress');
      }
    }
    await writer.flush();

    const summary = { scanned, upserted: writer.written, unparsed, totalSeconds: progress.elapsedSeconds() };
    logger.info(summary, 'Section extraction summary');
    return summary;
  });
}
