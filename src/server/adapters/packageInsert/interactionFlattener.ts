/**
 * Flattening of the Interactions section into one record per partner.
 */

import { findAll, findFirst, type DocumentNode } from './documentTree.js';
import { extractPartnerGroupAndItems } from './partnerExtraction.js';
import { selectText, textAt } from './textSelection.js';

export const InteractionCategory = {
  CONTRAINDICATED: '併用禁忌',
  CAUTION: '併用注意',
} as const;

export type InteractionCategory = (typeof InteractionCategory)[keyof typeof InteractionCategory];

export interface InteractionRecord {
  /** Individual substance name, or the class label when the block lists none */
  partner: string;
  group?: string;
  symptoms?: string;
  mechanism?: string;
  category: InteractionCategory;
}

export interface InteractionExtraction {
  /** Narrative texts under `SummaryOfCombination`, in document order */
  summary: string[];
  flat: InteractionRecord[];
}

const CATEGORY_SECTIONS: ReadonlyArray<{ path: string; category: InteractionCategory }> = [
  { path: 'pi:Interactions/pi:ContraIndicatedCombinations//pi:Drug', category: InteractionCategory.CONTRAINDICATED },
  { path: 'pi:Interactions/pi:PrecautionsForCombinations//pi:Drug', category: InteractionCategory.CAUTION },
];

const SUMMARY_PATH = 'pi:Interactions/pi:SummaryOfCombination//pi:Detail';

/**
 * Text of a `Detail` child of `sectionName` under `drug`, falling back to the
 * direct text of the section element itself
 */
function drugSectionText(drug: DocumentNode, sectionName: string): string | undefined {
  return selectText(findFirst(drug, `${sectionName}/pi:Detail`)) ?? textAt(drug, sectionName);
}

/**
 * Records for one `Drug` block: one per individual name, or a single record
 * for the class label, or none
 */
export function flattenDrugBlock(drug: DocumentNode, category: InteractionCategory): InteractionRecord[] {
  const { group, items } = extractPartnerGroupAndItems(drug);
  const symptoms = drugSectionText(drug, 'pi:ClinSymptomsAndMeasures');
  const mechanism = drugSectionText(drug, 'pi:MechanismAndRiskFactors');

  const partners = items.length > 0 ? items : group ? [group] : [];
  return partners.map(partner => ({ partner, group, symptoms, mechanism, category }));
}

/**
 * Summary texts and flattened contraindicated/caution records of a document
 */
export function collectInteractions(root: DocumentNode | null | undefined): InteractionExtraction {
  if (!root) {
    return { summary: [], flat: [] };
  }

  const summary: string[] = [];
  for (const detail of findAll(root, SUMMARY_PATH)) {
    const text = selectText(detail);
    if (text) {
      summary.push(text);
    }
  }

  const flat: InteractionRecord[] = [];
  for (const { path, category } of CATEGORY_SECTIONS) {
    for (const drug of findAll(root, path)) {
      flat.push(...flattenDrugBlock(drug, category));
    }
  }

  return { summary, flat };
}
