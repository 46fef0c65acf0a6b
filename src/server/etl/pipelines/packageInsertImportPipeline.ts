/**
 * Package Insert Import Pipeline
 *
 * Unpacks archives under the source folder, parses every XML document and
 * upserts one row per brand. Files that fail are listed in a CSV report and
 * do not stop the run.
 */

import * as fs from 'fs/promises';
import * as path from 'path';
import { extractAllZips, listXmlFiles } from '../../adapters/packageInsert/PackageInsertFiles.js';
import { parsePackageInsertXml } from '../../adapters/packageInsert/PackageInsertXmlParser.js';
import { extractPackageInsertRows, type PackageInsertRow } from '../../adapters/packageInsert/PackageInsertExtractor.js';
import type { PackageInsertSink } from '../loaders/packageInsertStore.js';
import { ConfigurationError, getErrorMessage } from '../../types/errors.js';
import { logger, pipelineContext } from '../../utils/logger.js';
import { mapWithConcurrency } from '../../utils/concurrency.js';
import { ProgressTracker } from '../../utils/progress.js';

export interface PackageInsertImportOptions {
  rootDir: string;
  store: PackageInsertSink;
  /** Where the failed-file report is written; omitted means no report */
  failedCsvPath?: string;
  /** Files parsed and written at the same time */
  concurrency?: number;
  /** Log a progress line every N files */
  progressEvery?: number;
  /** Unpack `.zip` archives first (default true) */
  extractArchives?: boolean;
  now?: () => number;
}

export interface FailedFile {
  file: string;
  error: string;
  exception: string;
  seconds: number;
}

export interface PackageInsertImportSummary {
  rootDir: string;
  totalFiles: number;
  succeededFiles: number;
  failedFiles: FailedFile[];
  rowsWritten: number;
  totalSeconds: number;
  averageSeconds: number;
  slowest?: { file: string; seconds: number };
  failedCsvPath?: string;
}

export const FAILED_CSV_HEADER = 'file,error,exception,seconds';

/**
 * One CSV line; newlines and commas inside the message are replaced so the
 * line keeps four columns
 */
export function formatFailedFileLine(failure: FailedFile): string {
  const message = failure.error.replace(/\r?\n/g, ' ').replace(/,/g, '，');
  return `${failure.file},${message},${failure.exception},${failure.seconds.toFixed(2)}`;
}

async function startFailedCsv(csvPath: string): Promise<void> {
  await fs.mkdir(path.dirname(csvPath), { recursive: true });
  await fs.writeFile(csvPath, `${FAILED_CSV_HEADER}\n`, 'utf-8');
}

/**
 * Read, parse and extract rows of one file
 */
export async function readPackageInsertFile(xmlPath: string): Promise<PackageInsertRow[]> {
  const docXml = await fs.readFile(xmlPath, 'utf-8');
  const root = await parsePackageInsertXml(docXml);
  return extractPackageInsertRows(root, docXml, xmlPath);
}

export async function runPackageInsertImport(options: PackageInsertImportOptions): Promise<PackageInsertImportSummary> {
  return pipelineContext.run({ pipeline: 'package-insert-import' }, () => importPackageInserts(options));
}

async function importPackageInserts(options: PackageInsertImportOptions): Promise<PackageInsertImportSummary> {
  const { rootDir, store, failedCsvPath } = options;
  const now = options.now ?? Date.now;
  const progressEvery = options.progressEvery ?? 2000;

  const stat = await fs.stat(rootDir).catch(() => undefined);
  if (!stat?.isDirectory()) {
    throw new ConfigurationError(`Package insert folder not found: ${rootDir}`, { rootDir });
  }

  if (options.extractArchives ?? true) {
    logger.info({ rootDir }, 'Extracting ZIP archives');
    const zips = await extractAllZips(rootDir);
    logger.info(
      { archives: zips.archives, extractedFiles: zips.extractedFiles, failed: zips.failed.length },
      'ZIP extraction completed'
    );
  }

  const files = await listXmlFiles(rootDir);
  const summary: PackageInsertImportSummary = {
    rootDir,
    totalFiles: files.length,
    succeededFiles: 0,
    failedFiles: [],
    rowsWritten: 0,
    totalSeconds: 0,
    averageSeconds: 0,
  };
  if (files.length === 0) {
    logger.warn({ rootDir }, 'No XML files found');
    return summary;
  }

  logger.info({ rootDir, totalFiles: files.length }, 'Starting package insert import');
  await store.recreatePackageInsertTable();
  if (failedCsvPath) {
    await startFailedCsv(failedCsvPath);
    summary.failedCsvPath = failedCsvPath;
  }

  const progress = new ProgressTracker(files.length, now);
  let finished = 0;
  let successSeconds = 0;

  await mapWithConcurrency(files, options.concurrency ?? 1, async file => {
    const startedAt = now();
    try {
      const rows = await readPackageInsertFile(file);
      const written = await store.upsertPackageInserts(rows);
      const seconds = (now() - startedAt) / 1000;
      summary.succeededFiles++;
      summary.rowsWritten += written;
      successSeconds += seconds;
      if (!summary.slowest || seconds > summary.slowest.seconds) {
        summary.slowest = { file, seconds };
      }
      logger.debug({ file, rows: written, seconds }, 'Imported package insert');
    } catch (error) {
      const seconds = (now() - startedAt) / 1000;
      const exception = error instanceof Error ? error.constructor.name : typeof error;
      const failure = { file, error: getErrorMessage(error), exception, seconds };
      summary.failedFiles.push(failure);
      logger.error({ file, error: failure.error, exception }, 'Failed to import package insert');
      if (failedCsvPath) {
        await fs.appendFile(failedCsvPath, `${formatFailedFileLine(failure)}\n`, 'utf-8');
      }
    }

    finished++;
    if (finished % progressEvery === 0 || finished === files.length) {
      logger.info(`${progress.format(finished)} ${path.basename(file)}`);
    }
  });

  summary.failedFiles.sort((a, b) => (a.file < b.file ? -1 : a.file > b.file ? 1 : 0));
  summary.totalSeconds = progress.elapsedSeconds();
  summary.averageSeconds = summary.succeededFiles > 0 ? successSeconds / summary.succeededFiles : 0;

  logger.info(
    {
      rootDir,
      totalFiles: summary.totalFiles,
      succeededFiles: summary.succeededFiles,
      errors: summary.failedFiles.length,
      rowsWritten: summary.rowsWritten,
      totalSeconds: Number(summary.totalSeconds.toFixed(2)),
      averageSeconds: Number(summary.averageSeconds.toFixed(2)),
      slowest: summary.slowest ? path.basename(summary.slowest.file) : undefined,
      failedCsvPath,
    },
    'Package insert import summary'
  );

  return summary;
}
