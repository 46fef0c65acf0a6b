/**
 * Interaction partner extraction from a `Drug` block.
 *
 * A block names a class (`DrugName/Detail`, e.g. "強い又は中程度のCYP3A阻害剤")
 * and optionally lists individual substances
 * (`DrugName/SimpleList/Item/Detail`, e.g. "イトラコナゾール").
 */

import { findAll, findFirst, type DocumentNode } from './documentTree.js';
import { normalizeLabel, selectText } from './textSelection.js';

export interface PartnerGroup {
  /** Class label; absent when the block carries none */
  group?: string;
  /** Individual substance names, first occurrence order, no repeats */
  items: string[];
}

/**
 * Normalized label text of a `Detail` element
 */
export function detailLabel(detail: DocumentNode | null | undefined): string | undefined {
  return normalizeLabel(selectText(detail));
}

/**
 * Drop repeated values, keeping the first occurrence of each
 */
export function uniqueInOrder(values: Iterable<string>): string[] {
  const seen = new Set<string>();
  const out: string[] = [];
  for (const value of values) {
    if (!seen.has(value)) {
      seen.add(value);
      out.push(value);
    }
  }
  return out;
}

/**
 * Individual substance names of a `Drug` block, deduplicated
 */
export function extractItems(drug: DocumentNode | null | undefined): string[] {
  const drugName = findFirst(drug, 'pi:DrugName');
  const labels: string[] = [];
  for (const detail of findAll(drugName, 'pi:SimpleList/pi:Item/pi:Detail')) {
    const label = detailLabel(detail);
    if (label) {
      labels.push(label);
    }
  }
  return uniqueInOrder(labels);
}

/**
 * Class label and individual names of a `Drug` block.
 *
 * The first `DrugName/Detail` that yields a usable label is the group; later
 * ones are ignored.
 */
export function extractPartnerGroupAndItems(drug: DocumentNode | null | undefined): PartnerGroup {
  const drugName = findFirst(drug, 'pi:DrugName');
  if (!drugName) {
    return { items: [] };
  }

  let group: string | undefined;
  for (const detail of findAll(drugName, 'pi:Detail')) {
    group = detailLabel(detail);
    if (group) {
      break;
    }
  }

  return { group, items: extractItems(drug) };
}
