/**
 * PostgreSQL implementation of the package insert stores.
 *
 * Tables are recreated (DROP then CREATE) at the start of each pipeline run.
 * Batches are written with multi-row VALUES statements inside a transaction;
 * scans page through rows in (package_insert_no, yj_code) order.
 */

import type { PoolClient } from 'pg';
import { queryPostgres, withTransaction } from '../../config/postgres.js';
import { validateEnv, type Env } from '../../config/env.js';
import { logger } from '../../utils/logger.js';
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
} from './packageInsertStore.js';

export interface PackageInsertTables {
  packageInsert: string;
  interaction: string;
  women: string;
  womenRisk: string;
}

/**
 * `schema.table` to `table`, for index names
 */
function baseName(table: string): string {
  const parts = table.split('.');
  return parts[parts.length - 1] ?? table;
}

/**
 * `($1, $2), ($3, $4)` style placeholders, with optional per-column casts
 */
export function valuesPlaceholders(rowCount: number, casts: readonly string[]): string {
  const tuples: string[] = [];
  for (let row = 0; row < rowCount; row++) {
    const cells = casts.map((cast, column) => `$${row * casts.length + column + 1}${cast ? `::${cast}` : ''}`);
    tuples.push(`(${cells.join(', ')})`);
  }
  return tuples.join(', ');
}

/** Bind parameters one PostgreSQL statement can carry */
export const MAX_BIND_PARAMETERS = 65535;

/**
 * Split `rows` so no statement binds more than {@link MAX_BIND_PARAMETERS}
 */
export function chunkForStatement<T>(rows: readonly T[], columnCount: number): T[][] {
  const size = Math.max(1, Math.floor(MAX_BIND_PARAMETERS / columnCount));
  const chunks: T[][] = [];
  for (let start = 0; start < rows.length; start += size) {
    chunks.push(rows.slice(start, start + size));
  }
  return chunks;
}

/**
 * One row per (package insert number, YJ code), the last one winning.
 * ON CONFLICT DO UPDATE rejects a statement that touches a key twice.
 */
export function lastPerKey<T extends DocumentKey>(rows: readonly T[], extraKey: (row: T) => string = () => ''): T[] {
  const byKey = new Map<string, T>();
  for (const row of rows) {
    const key = `${row.packageInsertNo}\u0000${row.yjCode}\u0000${extraKey(row)}`;
    byKey.delete(key);
    byKey.set(key, row);
  }
  return [...byKey.values()];
}

function json(value: unknown): string | null {
  return value === undefined ? null : JSON.stringify(value);
}

interface KeyRow {
  package_insert_no: string;
  yj_code: string;
}

export class PostgresPackageInsertStore implements PackageInsertStore {
  constructor(private readonly tables: PackageInsertTables) {}

  private async execute(sql: string, description: string): Promise<void> {
    await withTransaction(async (client: PoolClient) => {
      await client.query(sql);
    });
    logger.info({ table: description }, 'Recreated table');
  }

  /**
   * Page through `table` in key order, `batchSize` rows per query
   */
  private async *scan<T extends KeyRow>(table: string, columns: string, batchSize: number, where = 'TRUE'): AsyncGenerator<T> {
    let after: KeyRow | undefined;
    for (;;) {
      const rows: T[] = after
        ? await queryPostgres<T>(
            `SELECT ${columns} FROM ${table}
              WHERE (${where}) AND (package_insert_no, yj_code) > ($1, $2)
              ORDER BY package_insert_no, yj_code LIMIT $3`,
            [after.package_insert_no, after.yj_code, batchSize]
          )
        : await queryPostgres<T>(
            `SELECT ${columns} FROM ${table}
              WHERE (${where})
              ORDER BY package_insert_no, yj_code LIMIT $1`,
            [batchSize]
          );
      yield* rows;
      const last = rows[rows.length - 1];
      if (!last || rows.length < batchSize) {
        return;
      }
      after = last;
    }
  }

  private async insertValues(sqlHead: string, sqlTail: string, casts: readonly string[], rows: unknown[][]): Promise<number> {
    if (rows.length === 0) {
      return 0;
    }
    await withTransaction(async client => {
      for (const chunk of chunkForStatement(rows, casts.length)) {
        await client.query(`${sqlHead} VALUES ${valuesPlaceholders(chunk.length, casts)} ${sqlTail}`, chunk.flat());
      }
    });
    return rows.length;
  }

  async recreatePackageInsertTable(): Promise<void> {
    const table = this.tables.packageInsert;
    const base = baseName(table);
    await this.execute(
      `DROP TABLE IF EXISTS ${table} CASCADE;
       CREATE TABLE ${table} (
         package_insert_no     text NOT NULL,
         yj_code               text NOT NULL,
         company_identifier    text,
         prepared_ym           text,
         brand_name_ja         text,
         brand_name_hiragana   text,
         trademark_en          text,
         generic_name_ja       text,
         standard_name_ja      text,
         therapeutic_class_ja  text,
         approval_no           text,
         start_marketing       text,
         storage_method        text,
         shelf_life            text,
         approval_etc_json     jsonb,
         indications_json      jsonb,
         info_dose_admin_json  jsonb,
         interactions_json     jsonb,
         adverse_reactions_json jsonb,
         composition_json      jsonb,
         property_json         jsonb,
         interactions_flat     jsonb,
         interaction_summary   jsonb,
         doc_xml               xml,
         raw_xml_path          text,
         updated_at            timestamptz DEFAULT now(),
         CONSTRAINT ${base}_pkey PRIMARY KEY (package_insert_no, yj_code)
       );
       CREATE INDEX IF NOT EXISTS idx_${base}_pkg_no ON ${table} (package_insert_no);
       CREATE INDEX IF NOT EXISTS idx_${base}_yj ON ${table} (yj_code);
       CREATE INDEX IF NOT EXISTS idx_${base}_inter_json_gin ON ${table} USING gin (interactions_json);
       CREATE INDEX IF NOT EXISTS idx_${base}_inter_flat_gin ON ${table} USING gin (interactions_flat);`,
      table
    );
  }

  async upsertPackageInserts(rows: PackageInsertRow[]): Promise<number> {
    const casts = [
      '', '', '', '', '', '', '', '', '', '', '', '', '', '',
      'jsonb', 'jsonb', 'jsonb', 'jsonb', 'jsonb', 'jsonb', 'jsonb', 'jsonb', 'jsonb',
      'xml', '',
    ];
    return this.insertValues(
      `INSERT INTO ${this.tables.packageInsert}
        (package_insert_no, yj_code, company_identifier, prepared_ym,
         brand_name_ja, brand_name_hiragana, trademark_en,
         generic_name_ja, standard_name_ja, therapeutic_class_ja,
         approval_no, start_marketing, storage_method, shelf_life,
         approval_etc_json, indications_json, info_dose_admin_json,
         interactions_json, adverse_reactions_json, composition_json, property_json,
         interactions_flat, interaction_summary, doc_xml, raw_xml_path)`,
      `ON CONFLICT (package_insert_no, yj_code) DO UPDATE SET
         company_identifier     = EXCLUDED.company_identifier,
         prepared_ym            = EXCLUDED.prepared_ym,
         brand_name_ja          = EXCLUDED.brand_name_ja,
         brand_name_hiragana    = EXCLUDED.brand_name_hiragana,
         trademark_en           = EXCLUDED.trademark_en,
         generic_name_ja        = EXCLUDED.generic_name_ja,
         standard_name_ja       = EXCLUDED.standard_name_ja,
         therapeutic_class_ja   = EXCLUDED.therapeutic_class_ja,
         approval_no            = EXCLUDED.approval_no,
         start_marketing        = EXCLUDED.start_marketing,
         storage_method         = EXCLUDED.storage_method,
         shelf_life             = EXCLUDED.shelf_life,
         approval_etc_json      = EXCLUDED.approval_etc_json,
         indications_json       = EXCLUDED.indications_json,
         info_dose_admin_json   = EXCLUDED.info_dose_admin_json,
         interactions_json      = EXCLUDED.interactions_json,
         adverse_reactions_json = EXCLUDED.adverse_reactions_json,
         composition_json       = EXCLUDED.composition_json,
         property_json          = EXCLUDED.property_json,
         interactions_flat      = EXCLUDED.interactions_flat,
         interaction_summary    = EXCLUDED.interaction_summary,
         doc_xml                = EXCLUDED.doc_xml,
         raw_xml_path           = EXCLUDED.raw_xml_path,
         updated_at             = now()`,
      casts,
      lastPerKey(rows).map(row => [
        row.packageInsertNo,
        row.yjCode,
        row.companyIdentifier ?? null,
        row.preparedYm ?? null,
        row.brandNameJa ?? null,
        row.brandNameHiragana ?? null,
        row.trademarkEn ?? null,
        row.genericNameJa ?? null,
        row.standardNameJa ?? null,
        row.therapeuticClassJa ?? null,
        row.approvalNo ?? null,
        row.startMarketing ?? null,
        row.storageMethod ?? null,
        row.shelfLife ?? null,
        json(row.sections.approvalEtc),
        json(row.sections.indications),
        json(row.sections.infoDoseAdmin),
        json(row.sections.interactions),
        json(row.sections.adverseReactions),
        json(row.sections.composition),
        json(row.sections.properties),
        json(row.interactionsFlat),
        json(row.interactionSummary),
        row.docXml,
        row.rawXmlPath,
      ])
    );
  }

  async recreateInteractionTable(): Promise<void> {
    const table = this.tables.interaction;
    const base = baseName(table);
    await this.execute(
      `DROP TABLE IF EXISTS ${table} CASCADE;
       CREATE TABLE ${table} (
         id                    bigserial PRIMARY KEY,
         package_insert_no     text NOT NULL,
         yj_code               text NOT NULL,
         section_type          text,
         partner_group_ja      text,
         partner_name_ja       text,
         symptoms_measures_ja  text,
         mechanism_ja          text,
         created_at            timestamptz DEFAULT now()
       );
       CREATE INDEX idx_${base}_yj ON ${table} (yj_code);
       CREATE INDEX idx_${base}_pkg ON ${table} (package_insert_no);
       CREATE INDEX idx_${base}_partner ON ${table} (partner_name_ja);`,
      table
    );
  }

  async *scanInteractionSources(batchSize: number): AsyncIterable<StoredInteractionSource> {
    type Row = KeyRow & { interactions_flat: unknown };
    for await (const row of this.scan<Row>(
      this.tables.packageInsert,
      'package_insert_no, yj_code, interactions_flat',
      batchSize,
      'interactions_flat IS NOT NULL'
    )) {
      yield { packageInsertNo: row.package_insert_no, yjCode: row.yj_code, interactionsFlat: row.interactions_flat };
    }
  }

  async insertInteractions(rows: InteractionRow[]): Promise<number> {
    return this.insertValues(
      `INSERT INTO ${this.tables.interaction}
        (package_insert_no, yj_code, section_type, partner_group_ja, partner_name_ja,
         symptoms_measures_ja, mechanism_ja)`,
      '',
      ['', '', '', '', '', '', ''],
      rows.map(row => [
        row.packageInsertNo,
        row.yjCode,
        row.sectionType,
        row.partnerGroupJa,
        row.partnerNameJa,
        row.symptomsMeasuresJa,
        row.mechanismJa,
      ])
    );
  }

  async recreateWomenTable(): Promise<void> {
    const table = this.tables.women;
    const base = baseName(table);
    await this.execute(
      `DROP TABLE IF EXISTS ${table};
       CREATE TABLE ${table} (
         package_insert_no   text NOT NULL,
         yj_code             text NOT NULL,
         brand_name_ja       text,
         pregnant_text       text,
         nursing_text        text,
         has_pregnant        boolean,
         has_nursing         boolean,
         src_ids             jsonb,
         updated_at          timestamptz DEFAULT now(),
         PRIMARY KEY (package_insert_no, yj_code)
       );
       CREATE EXTENSION IF NOT EXISTS pg_trgm;
       CREATE INDEX idx_${base}_pregnant_trgm ON ${table} USING gin (pregnant_text gin_trgm_ops);
       CREATE INDEX idx_${base}_nursing_trgm ON ${table} USING gin (nursing_text gin_trgm_ops);`,
      table
    );
  }

  async *scanDocuments(batchSize: number): AsyncIterable<StoredDocument> {
    type Row = KeyRow & { brand_name_ja: string | null; doc_xml: string | null };
    for await (const row of this.scan<Row>(
      this.tables.packageInsert,
      'package_insert_no, yj_code, brand_name_ja, doc_xml::text AS doc_xml',
      batchSize
    )) {
      yield {
        packageInsertNo: row.package_insert_no,
        yjCode: row.yj_code,
        brandNameJa: row.brand_name_ja,
        docXml: row.doc_xml,
      };
    }
  }

  async upsertWomenSections(rows: WomenSectionRow[]): Promise<number> {
    return this.insertValues(
      `INSERT INTO ${this.tables.women}
        (package_insert_no, yj_code, brand_name_ja, pregnant_text, nursing_text,
         has_pregnant, has_nursing, src_ids)`,
      `ON CONFLICT (package_insert_no, yj_code) DO UPDATE
         SET brand_name_ja = EXCLUDED.brand_name_ja,
             pregnant_text = EXCLUDED.pregnant_text,
             nursing_text  = EXCLUDED.nursing_text,
             has_pregnant  = EXCLUDED.has_pregnant,
             has_nursing   = EXCLUDED.has_nursing,
             src_ids       = EXCLUDED.src_ids,
             updated_at    = now()`,
      ['', '', '', '', '', 'boolean', 'boolean', 'jsonb'],
      lastPerKey(rows).map(row => [
        row.packageInsertNo,
        row.yjCode,
        row.brandNameJa,
        row.pregnantText,
        row.nursingText,
        row.hasPregnant,
        row.hasNursing,
        row.srcIds ? JSON.stringify(row.srcIds) : null,
      ])
    );
  }

  async prepareRiskTables(): Promise<void> {
    const table = this.tables.womenRisk;
    await this.execute(
      `DROP TABLE IF EXISTS ${table};
       CREATE TABLE ${table} (
         package_insert_no text NOT NULL,
         yj_code           text NOT NULL,
         scheme            text NOT NULL,
         pregnant_label    text,
         nursing_label     text,
         pregnant_score    int,
         nursing_score     int,
         evidence_json     jsonb,
         updated_at        timestamptz DEFAULT now(),
         PRIMARY KEY (package_insert_no, yj_code, scheme)
       );
       ALTER TABLE ${this.tables.women}
         ADD COLUMN IF NOT EXISTS pregnant_score int,
         ADD COLUMN IF NOT EXISTS pregnant_rule  text,
         ADD COLUMN IF NOT EXISTS nursing_score  int,
         ADD COLUMN IF NOT EXISTS nursing_rule   text,
         ADD COLUMN IF NOT EXISTS overall_score  int,
         ADD COLUMN IF NOT EXISTS pregnant_evidence jsonb,
         ADD COLUMN IF NOT EXISTS nursing_evidence  jsonb;`,
      table
    );
  }

  async *scanWomenTexts(batchSize: number): AsyncIterable<WomenTextRow> {
    type Row = KeyRow & { pregnant_text: string | null; nursing_text: string | null };
    for await (const row of this.scan<Row>(
      this.tables.women,
      'package_insert_no, yj_code, pregnant_text, nursing_text',
      batchSize
    )) {
      yield {
        packageInsertNo: row.package_insert_no,
        yjCode: row.yj_code,
        pregnantText: row.pregnant_text,
        nursingText: row.nursing_text,
      };
    }
  }

  async updateWomenScores(rows: WomenScoreUpdate[]): Promise<number> {
    if (rows.length === 0) {
      return 0;
    }
    const casts = ['text', 'text', 'int', 'text', 'int', 'text', 'int', 'jsonb', 'jsonb'];
    const updates = lastPerKey(rows);
    await withTransaction(async client => {
      for (const chunk of chunkForStatement(updates, casts.length)) {
        await client.query(
          `UPDATE ${this.tables.women} s
              SET pregnant_score    = v.ps,
                  pregnant_rule     = v.pr,
                  nursing_score     = v.ns,
                  nursing_rule      = v.nr,
                  overall_score     = v.os,
                  pregnant_evidence = v.pe,
                  nursing_evidence  = v.ne,
                  updated_at        = now()
             FROM (VALUES ${valuesPlaceholders(chunk.length, casts)}) AS v(pin, yj, ps, pr, ns, nr, os, pe, ne)
            WHERE s.package_insert_no = v.pin AND s.yj_code = v.yj`,
          chunk.flatMap(row => [
            row.packageInsertNo,
            row.yjCode,
            row.pregnantScore,
            row.pregnantRule,
            row.nursingScore,
            row.nursingRule,
            row.overallScore,
            JSON.stringify(row.pregnantEvidence),
            JSON.stringify(row.nursingEvidence),
          ])
        );
      }
    });
    return updates.length;
  }

  async upsertRiskLabels(rows: RiskLabelRow[]): Promise<number> {
    return this.insertValues(
      `INSERT INTO ${this.tables.womenRisk}
        (package_insert_no, yj_code, scheme, pregnant_label, nursing_label,
         pregnant_score, nursing_score, evidence_json)`,
      `ON CONFLICT (package_insert_no, yj_code, scheme) DO UPDATE
         SET pregnant_label = EXCLUDED.pregnant_label,
             nursing_label  = EXCLUDED.nursing_label,
             pregnant_score = EXCLUDED.pregnant_score,
             nursing_score  = EXCLUDED.nursing_score,
             evidence_json  = EXCLUDED.evidence_json,
             updated_at     = now()`,
      ['', '', '', '', '', 'int', 'int', 'jsonb'],
      lastPerKey(rows, row => row.scheme).map(row => [
        row.packageInsertNo,
        row.yjCode,
        row.scheme,
        row.pregnantLabel,
        row.nursingLabel,
        row.pregnantScore,
        row.nursingScore,
        JSON.stringify(row.evidence),
      ])
    );
  }
}

/**
 * Store on the configured pool with table names from the environment
 */
export function createPostgresPackageInsertStore(env: Env = validateEnv()): PostgresPackageInsertStore {
  return new PostgresPackageInsertStore({
    packageInsert: env.PACKAGE_INSERT_TABLE,
    interaction: env.INTERACTION_TABLE,
    women: env.WOMEN_TABLE,
    womenRisk: env.WOMEN_RISK_TABLE,
  });
}
