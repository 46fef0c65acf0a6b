/**
 * PackageInsertExtractor - Build storage rows from a parsed package insert
 *
 * One row per brand (`ApprovalEtc/DetailBrandName`); a document without
 * brands yields a single row with an empty YJ code. Header fields are
 * shared by every row of a document.
 */

import { findAll, findFirst, type DocumentNode } from './documentTree.js';
import { serializeElement, type SerializedElement } from './elementSerializer.js';
import { collectInteractions, type InteractionRecord } from './interactionFlattener.js';
import { selectShallowText, textAt } from './textSelection.js';

export type JsonSectionKey =
  | 'approvalEtc'
  | 'indications'
  | 'infoDoseAdmin'
  | 'interactions'
  | 'adverseReactions'
  | 'composition'
  | 'properties';

/**
 * Sections stored as generic JSON
 */
const JSON_SECTIONS: ReadonlyArray<readonly [JsonSectionKey, string]> = [
  ['approvalEtc', 'pi:ApprovalEtc'],
  ['indications', 'pi:IndicationsOrEfficacy'],
  ['infoDoseAdmin', 'pi:InfoDoseAdmin'],
  ['interactions', 'pi:Interactions'],
  ['adverseReactions', 'pi:AdverseReactions'],
  ['composition', 'pi:Composition'],
  ['properties', 'pi:Properties'],
];

export interface PackageInsertHeader {
  packageInsertNo: string;
  companyIdentifier?: string;
  preparedYm?: string;
  genericNameJa?: string;
  therapeuticClassJa?: string;
}

export interface BrandFields {
  yjCode: string;
  brandNameJa?: string;
  brandNameHiragana?: string;
  trademarkEn?: string;
  standardNameJa?: string;
  approvalNo?: string;
  startMarketing?: string;
  storageMethod?: string;
  shelfLife?: string;
}

export interface PackageInsertRow extends PackageInsertHeader, BrandFields {
  sections: Partial<Record<JsonSectionKey, SerializedElement>>;
  interactionsFlat: InteractionRecord[];
  interactionSummary: string[];
  docXml: string;
  rawXmlPath: string;
}

/**
 * Shallow language-preferenced text at `path`, else the direct text of `fallbackPath`
 */
function fieldText(node: DocumentNode, path: string, fallbackPath: string): string | undefined {
  return selectShallowText(findFirst(node, path)) ?? textAt(node, fallbackPath);
}

export function extractHeader(root: DocumentNode): PackageInsertHeader {
  return {
    packageInsertNo: textAt(root, 'pi:PackageInsertNo') ?? '',
    companyIdentifier: textAt(root, 'pi:CompanyIdentifier'),
    preparedYm: textAt(root, 'pi:DateOfPreparationOrRevision/pi:PreparationOrRevision/pi:YearMonth'),
    genericNameJa: fieldText(root, 'pi:GenericName/pi:Detail', 'pi:GenericName'),
    therapeuticClassJa: fieldText(root, 'pi:TherapeuticClassification/pi:Detail', 'pi:TherapeuticClassification'),
  };
}

export function extractBrand(brand: DocumentNode): BrandFields {
  return {
    yjCode: textAt(brand, 'pi:BrandCode/pi:YJCode') ?? '',
    brandNameJa: fieldText(brand, 'pi:ApprovalBrandName', 'pi:ApprovalBrandName'),
    brandNameHiragana: textAt(brand, 'pi:BrandNameInHiragana/pi:NameInHiragana'),
    trademarkEn: textAt(brand, 'pi:TrademarkInEnglish/pi:TrademarkName'),
    standardNameJa: fieldText(
      brand,
      'pi:StandardName/pi:StandardNameCategory/pi:StandardNameDetail',
      'pi:StandardName'
    ),
    approvalNo: textAt(brand, 'pi:ApprovalAndLicenseNo/pi:ApprovalNo'),
    startMarketing: textAt(brand, 'pi:StartingDateOfMarketing'),
    storageMethod: fieldText(brand, 'pi:Storage/pi:StorageMethod', 'pi:Storage/pi:StorageMethod'),
    shelfLife: fieldText(brand, 'pi:Storage/pi:ShelfLife', 'pi:Storage/pi:ShelfLife'),
  };
}

export function extractSections(root: DocumentNode): PackageInsertRow['sections'] {
  const sections: PackageInsertRow['sections'] = {};
  for (const [key, path] of JSON_SECTIONS) {
    const serialized = serializeElement(findFirst(root, path));
    if (serialized) {
      sections[key] = serialized;
    }
  }
  return sections;
}

/**
 * Rows for one document
 *
 * @param root - Parsed document root
 * @param docXml - Original markup, stored alongside the extracted fields
 * @param rawXmlPath - Source file path
 */
export function extractPackageInsertRows(root: DocumentNode, docXml: string, rawXmlPath: string): PackageInsertRow[] {
  const header = extractHeader(root);
  const sections = extractSections(root);
  const { summary, flat } = collectInteractions(root);

  const shared = {
    ...header,
    sections,
    interactionsFlat: flat,
    interactionSummary: summary,
    docXml,
    rawXmlPath,
  };

  const brands = findAll(root, 'pi:ApprovalEtc/pi:DetailBrandName');
  if (brands.length === 0) {
    return [{ ...shared, yjCode: '' }];
  }
  return brands.map(brand => ({ ...shared, ...extractBrand(brand) }));
}
