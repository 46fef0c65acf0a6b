/**
 * In-memory package insert store for tests
 *
 * Mirrors the PostgreSQL store: rows are keyed by (package insert number,
 * YJ code), scans return key order, and `recreate*` empties the table.
 * Individual operations can be made to fail with {@link failOn}.
 */

import type { PackageInsertRow } from '../../adapters/packageInsert/PackageInsertExtractor.js';
import type {
  DocumentKey,
  InteractionRow,
  PackageInsertStore,
  RiskLabelRow,
  StoredDocument,
  StoredInteractionSource,
  WomenScoreUpdate,
  WomenSectionRow,
  WomenTextRow,
} from '../../etl/loaders/packageInsertStore.js';

type StoreOperation = keyof PackageInsertStore;

export type StoredWomenRow = WomenSectionRow & Partial<Omit<WomenScoreUpdate, keyof DocumentKey>>;

function keyOf(row: DocumentKey): string {
  return `${row.packageInsertNo}\u0000${row.yjCode}`;
}

function sortedValues<T extends DocumentKey>(map: Map<string, T>): T[] {
  return [...map.values()].sort(
    (a, b) =>
      (a.packageInsertNo < b.packageInsertNo ? -1 : a.packageInsertNo > b.packageInsertNo ? 1 : 0) ||
      (a.yjCode < b.yjCode ? -1 : a.yjCode > b.yjCode ? 1 : 0)
  );
}

export class MockPackageInsertStore implements PackageInsertStore {
  readonly packageInserts = new Map<string, PackageInsertRow>();
  /** Stored interaction sources keyed like packageInserts; seeded or derived from upserts */
  readonly interactionSources = new Map<string, StoredInteractionSource>();
  readonly interactions: InteractionRow[] = [];
  readonly women = new Map<string, StoredWomenRow>();
  readonly riskLabels = new Map<string, RiskLabelRow>();

  /** Row counts reported by each write call; upserts count distinct keys */
  readonly writes: Partial<Record<StoreOperation, number[]>> = {};

  private errorScenarios = new Map<StoreOperation, Error>();

  /**
   * Make every later call of `operation` reject with `error`
   */
  failOn(operation: StoreOperation, error: Error): void {
    this.errorScenarios.set(operation, error);
  }

  private check(operation: StoreOperation): void {
    const error = this.errorScenarios.get(operation);
    if (error) {
      throw error;
    }
  }

  private record(operation: StoreOperation, size: number): number {
    (this.writes[operation] ??= []).push(size);
    return size;
  }

  /**
   * Add a stored interaction source directly, e.g. a JSON string as read from the database
   */
  seedInteractionSource(source: StoredInteractionSource): void {
    this.interactionSources.set(keyOf(source), source);
  }

  /**
   * Add a women section row with texts only
   */
  seedWomenText(row: WomenTextRow): void {
    this.women.set(keyOf(row), {
      ...row,
      brandNameJa: null,
      hasPregnant: row.pregnantText !== null,
      hasNursing: row.nursingText !== null,
      srcIds: null,
    });
  }

  async recreatePackageInsertTable(): Promise<void> {
    this.check('recreatePackageInsertTable');
    this.packageInserts.clear();
    this.interactionSources.clear();
  }

  async upsertPackageInserts(rows: PackageInsertRow[]): Promise<number> {
    this.check('upsertPackageInserts');
    for (const row of rows) {
      this.packageInserts.set(keyOf(row), row);
      this.interactionSources.set(keyOf(row), {
        packageInsertNo: row.packageInsertNo,
        yjCode: row.yjCode,
        interactionsFlat: row.interactionsFlat,
      });
    }
    return this.record('upsertPackageInserts', new Set(rows.map(keyOf)).size);
  }

  async recreateInteractionTable(): Promise<void> {
    this.check('recreateInteractionTable');
    this.interactions.length = 0;
  }

  async *scanInteractionSources(_batchSize: number): AsyncIterable<StoredInteractionSource> {
    this.check('scanInteractionSources');
    for (const source of sortedValues(this.interactionSources)) {
      if (source.interactionsFlat !== null && source.interactionsFlat !== undefined) {
        yield source;
      }
    }
  }

  async insertInteractions(rows: InteractionRow[]): Promise<number> {
    this.check('insertInteractions');
    this.interactions.push(...rows);
    return this.record('insertInteractions', rows.length);
  }

  async recreateWomenTable(): Promise<void> {
    this.check('recreateWomenTable');
    this.women.clear();
  }

  async *scanDocuments(_batchSize: number): AsyncIterable<StoredDocument> {
    this.check('scanDocuments');
    for (const row of sortedValues(this.packageInserts)) {
      yield {
        packageInsertNo: row.packageInsertNo,
        yjCode: row.yjCode,
        brandNameJa: row.brandNameJa ?? null,
        docXml: row.docXml,
      };
    }
  }

  async upsertWomenSections(rows: WomenSectionRow[]): Promise<number> {
    this.check('upsertWomenSections');
    for (const row of rows) {
      this.women.set(keyOf(row), { ...this.women.get(keyOf(row)), ...row });
    }
    return this.record('upsertWomenSections', new Set(rows.map(keyOf)).size);
  }

  async prepareRiskTables(): Promise<void> {
    this.check('prepareRiskTables');
    this.riskLabels.clear();
  }

  async *scanWomenTexts(_batchSize: number): AsyncIterable<WomenTextRow> {
    this.check('scanWomenTexts');
    for (const row of sortedValues(this.women)) {
      yield {
        packageInsertNo: row.packageInsertNo,
        yjCode: row.yjCode,
        pregnantText: row.pregnantText,
        nursingText: row.nursingText,
      };
    }
  }

  async updateWomenScores(rows: WomenScoreUpdate[]): Promise<number> {
    this.check('updateWomenScores');
    for (const row of rows) {
      const existing = this.women.get(keyOf(row));
      if (existing) {
        this.women.set(keyOf(row), { ...existing, ...row });
      }
    }
    return this.record('updateWomenScores', new Set(rows.map(keyOf)).size);
  }

  async upsertRiskLabels(rows: RiskLabelRow[]): Promise<number> {
    this.check('upsertRiskLabels');
    for (const row of rows) {
      this.riskLabels.set(`${keyOf(row)}\u0000${row.scheme}`, row);
    }
    return this.record('upsertRiskLabels', new Set(rows.map(row => `${keyOf(row)}\u0000${row.scheme}`)).size);
  }
}
