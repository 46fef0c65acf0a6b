/**
 * Pregnancy / nursing section text, located by local tag name so that every
 * schema revision's namespace is accepted.
 */

import { findByLocalName, getAttribute, iterText, type DocumentNode } from './documentTree.js';
import { uniqueInOrder } from './partnerExtraction.js';
import { isJapanese, languageOf, normalizeProse } from './textSelection.js';

export const PREGNANT_TAGS: ReadonlySet<string> = new Set(['UseInPregnant', 'UseInPregnantWomen', 'Pregnant']);
export const NURSING_TAGS: ReadonlySet<string> = new Set([
  'UseInNursing',
  'UseInNursingMothers',
  'Nursing',
  'BreastFeeding',
]);

const LANG_LOCAL_NAME = 'Lang';
const PARAGRAPH_SEPARATOR = '\n\n';

export interface SectionExtraction {
  /** Japanese texts first, then other languages; absent when nothing was found */
  text?: string;
  /** `id` attribute of the first matching element */
  sourceId?: string;
}

/**
 * Text of every element whose local name is in `targetNames`.
 *
 * Collects the `Lang` descendants of all hits, splits them into Japanese and
 * other-language buckets, drops exact repeats within each bucket and joins
 * with blank lines. Without any `Lang` descendant the first hit's own text
 * is used.
 */
export function extractSectionText(
  root: DocumentNode | null | undefined,
  targetNames: ReadonlySet<string>
): SectionExtraction {
  const hits = findByLocalName(root, targetNames);
  if (hits.length === 0) {
    return {};
  }

  const sourceId = getAttribute(hits[0], 'id');
  const jaTexts: string[] = [];
  const otherTexts: string[] = [];

  for (const hit of hits) {
    for (const lang of findByLocalName(hit, LANG_LOCAL_NAME)) {
      const text = normalizeProse(iterText(lang));
      if (!text) {
        continue;
      }
      if (isJapanese(languageOf(lang))) {
        jaTexts.push(text);
      } else {
        otherTexts.push(text);
      }
    }
  }

  if (jaTexts.length === 0 && otherTexts.length === 0) {
    const raw = normalizeProse(iterText(hits[0]));
    return { text: raw || undefined, sourceId };
  }

  const parts: string[] = [];
  if (jaTexts.length > 0) {
    parts.push(uniqueInOrder(jaTexts).join(PARAGRAPH_SEPARATOR));
  }
  if (otherTexts.length > 0) {
    parts.push(uniqueInOrder(otherTexts).join(PARAGRAPH_SEPARATOR));
  }

  return { text: parts.join(PARAGRAPH_SEPARATOR).trim() || undefined, sourceId };
}
