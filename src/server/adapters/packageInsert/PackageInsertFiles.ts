/**
 * PackageInsertFiles - Locate and unpack package insert source files
 *
 * Distribution folders contain XML documents, some of them shipped inside ZIP
 * archives. Archives are unpacked beside themselves before the XML walk.
 */

import * as fs from 'fs/promises';
import * as path from 'path';
import JSZip from 'jszip';
import { logger } from '../../utils/logger.js';
import { ArchiveExtractionError, getErrorMessage } from '../../types/errors.js';

export interface ZipExtractionSummary {
  archives: number;
  extractedFiles: number;
  skippedEntries: number;
  failed: Array<{ archivePath: string; error: string }>;
}

/**
 * All files under `rootDir` whose name ends with one of `extensions`
 * (case-insensitive), sorted by path
 */
export async function listFiles(rootDir: string, extensions: readonly string[]): Promise<string[]> {
  const wanted = extensions.map(ext => ext.toLowerCase());
  const found: string[] = [];

  const walk = async (dir: string): Promise<void> => {
    const entries = await fs.readdir(dir, { withFileTypes: true });
    for (const entry of entries) {
      const fullPath = path.join(dir, entry.name);
      if (entry.isDirectory()) {
        await walk(fullPath);
      } else if (entry.isFile() && wanted.some(ext => entry.name.toLowerCase().endsWith(ext))) {
        found.push(fullPath);
      }
    }
  };

  await walk(rootDir);
  return found.sort();
}

export function listXmlFiles(rootDir: string): Promise<string[]> {
  return listFiles(rootDir, ['.xml']);
}

/**
 * Target path of a ZIP entry, or undefined when the entry would land outside `destDir`
 */
export function resolveEntryPath(destDir: string, entryName: string): string | undefined {
  const root = path.resolve(destDir);
  const target = path.resolve(root, entryName);
  if (target !== root && target.startsWith(root + path.sep)) {
    return target;
  }
  return undefined;
}

/**
 * Unpack one archive into `destDir`
 *
 * @returns Files written and entries skipped
 * @throws ArchiveExtractionError when the archive cannot be read
 */
export async function extractZipArchive(
  archivePath: string,
  destDir: string = path.dirname(archivePath)
): Promise<{ extracted: number; skipped: number }> {
  let zip: JSZip;
  try {
    zip = await JSZip.loadAsync(await fs.readFile(archivePath));
  } catch (error) {
    throw new ArchiveExtractionError(archivePath, `Cannot open archive: ${getErrorMessage(error)}`);
  }

  let extracted = 0;
  let skipped = 0;
  for (const [entryName, file] of Object.entries(zip.files)) {
    const target = resolveEntryPath(destDir, entryName);
    if (!target) {
      skipped++;
      logger.warn({ archivePath, entryName }, 'Skipping archive entry outside the target folder');
      continue;
    }
    if (file.dir) {
      await fs.mkdir(target, { recursive: true });
      continue;
    }
    await fs.mkdir(path.dirname(target), { recursive: true });
    await fs.writeFile(target, await file.async('nodebuffer'));
    extracted++;
  }
  return { extracted, skipped };
}

/**
 * Unpack every `.zip` under `rootDir` next to itself.
 * A broken archive is logged and recorded; the remaining archives still run.
 */
export async function extractAllZips(rootDir: string): Promise<ZipExtractionSummary> {
  const archives = await listFiles(rootDir, ['.zip']);
  const summary: ZipExtractionSummary = { archives: archives.length, extractedFiles: 0, skippedEntries: 0, failed: [] };

  for (const archivePath of archives) {
    try {
      const { extracted, skipped } = await extractZipArchive(archivePath);
      summary.extractedFiles += extracted;
      summary.skippedEntries += skipped;
      logger.debug({ archivePath, extracted }, 'Extracted archive');
    } catch (error) {
      logger.error({ archivePath, error: getErrorMessage(error) }, 'Failed to extract archive');
      summary.failed.push({ archivePath, error: getErrorMessage(error) });
    }
  }

  return summary;
}
