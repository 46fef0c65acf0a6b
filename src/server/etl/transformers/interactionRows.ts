/**
 * Turn stored flattened interactions into one table row per record
 */

import { z } from 'zod';
import type { InteractionRow } from '../loaders/packageInsertStore.js';

const optionalText = z.string().nullish().catch(null);

/**
 * One stored record; fields of the wrong type are read as absent
 */
const storedInteractionSchema = z.object({
  category: optionalText,
  group: optionalText,
  partner: optionalText,
  symptoms: optionalText,
  mechanism: optionalText,
});

function parseStored(value: unknown): unknown {
  if (typeof value !== 'string') {
    return value;
  }
  try {
    return JSON.parse(value);
  } catch {
    return undefined;
  }
}

/**
 * @param interactionsFlat - Array of records, or its JSON text. Anything else yields no rows.
 */
export function buildInteractionRows(packageInsertNo: string, yjCode: string, interactionsFlat: unknown): InteractionRow[] {
  const items = parseStored(interactionsFlat);
  if (!Array.isArray(items)) {
    return [];
  }

  const rows: InteractionRow[] = [];
  for (const item of items) {
    if (typeof item !== 'object' || item === null || Array.isArray(item)) {
      continue;
    }
    const parsed = storedInteractionSchema.safeParse(item);
    if (!parsed.success) {
      continue;
    }
    const { category, group, partner, symptoms, mechanism } = parsed.data;
    if (!(partner || group || symptoms || mechanism)) {
      continue;
    }
    rows.push({
      packageInsertNo,
      yjCode,
      sectionType: category ?? null,
      partnerGroupJa: group ?? null,
      partnerNameJa: partner ?? null,
      symptomsMeasuresJa: symptoms ?? null,
      mechanismJa: mechanism ?? null,
    });
  }
  return rows;
}
