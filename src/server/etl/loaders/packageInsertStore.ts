/**
 * Storage contracts used by the package insert pipelines.
 *
 * Each pipeline depends only on the store interface it needs; the PostgreSQL
 * implementation covers all of them.
 */

import type { PackageInsertRow } from '../../adapters/packageInsert/PackageInsertExtractor.js';
import type { EvidenceFlags } from '../../services/classification/RiskClassificationService.js';
import type { RiskScore } from '../../services/classification/riskRules.js';

/**
 * Key shared by every stored row: one package insert, one brand
 */
export interface DocumentKey {
  packageInsertNo: string;
  yjCode: string;
}

export interface StoredInteractionSource extends DocumentKey {
  /** Stored flattened interactions; JSON value or JSON text */
  interactionsFlat: unknown;
}

export interface StoredDocument extends DocumentKey {
  brandNameJa: string | null;
  docXml: string | null;
}

export interface InteractionRow extends DocumentKey {
  sectionType: string | null;
  partnerGroupJa: string | null;
  partnerNameJa: string | null;
  symptomsMeasuresJa: string | null;
  mechanismJa: string | null;
}

export interface SourceIds {
  pregnant?: string;
  nursing?: string;
}

export interface WomenSectionRow extends DocumentKey {
  brandNameJa: string | null;
  pregnantText: string | null;
  nursingText: string | null;
  hasPregnant: boolean;
  hasNursing: boolean;
  srcIds: SourceIds | null;
}

export interface WomenTextRow extends DocumentKey {
  pregnantText: string | null;
  nursingText: string | null;
}

export interface WomenScoreUpdate extends DocumentKey {
  pregnantScore: RiskScore;
  pregnantRule: string;
  nursingScore: RiskScore;
  nursingRule: string;
  overallScore: RiskScore;
  pregnantEvidence: EvidenceFlags;
  nursingEvidence: EvidenceFlags;
}

export interface RiskEvidence {
  pregnant_rule: string;
  nursing_rule: string;
  preg: Record<string, boolean | number>;
  nurs: Record<string, boolean | number>;
}

export interface RiskLabelRow extends DocumentKey {
  scheme: string;
  pregnantLabel: string;
  nursingLabel: string;
  pregnantScore: RiskScore;
  nursingScore: RiskScore;
  evidence: RiskEvidence;
}

export interface PackageInsertSink {
  /** Drop and recreate the document table */
  recreatePackageInsertTable(): Promise<void>;
  upsertPackageInserts(rows: PackageInsertRow[]): Promise<number>;
}

export interface InteractionStore {
  recreateInteractionTable(): Promise<void>;
  scanInteractionSources(batchSize: number): AsyncIterable<StoredInteractionSource>;
  insertInteractions(rows: InteractionRow[]): Promise<number>;
}

export interface WomenSectionStore {
  recreateWomenTable(): Promise<void>;
  scanDocuments(batchSize: number): AsyncIterable<StoredDocument>;
  upsertWomenSections(rows: WomenSectionRow[]): Promise<number>;
}

export interface WomenRiskStore {
  /** Recreate the label table and add score columns to the women table */
  prepareRiskTables(): Promise<void>;
  scanWomenTexts(batchSize: number): AsyncIterable<WomenTextRow>;
  updateWomenScores(rows: WomenScoreUpdate[]): Promise<number>;
  upsertRiskLabels(rows: RiskLabelRow[]): Promise<number>;
}

export type PackageInsertStore = PackageInsertSink & InteractionStore & WomenSectionStore & WomenRiskStore;
