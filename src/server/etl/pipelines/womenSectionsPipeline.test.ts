import { fileURLToPath } from 'url';
import { describe, expect, it } from 'vitest';
import { buildWomenSectionRow, runWomenSectionsPipeline } from './womenSectionsPipeline.js';
import { readPackageInsertFile } from './packageInsertImportPipeline.js';
import { MockPackageInsertStore } from '../../services/mocks/MockPackageInsertStore.js';

const FIXTURE_PATH = fileURLToPath(
  new URL('../../adapters/packageInsert/__fixtures__/package-insert.xml', import.meta.url)
);

const PREGNANT_TEXT =
  '妊婦又は妊娠している可能性のある女性には投与しないこと。動物実験（ラット）で催奇形性が報告されている。';
const NURSING_TEXT = '授乳しないことが望ましい。動物実験（ラット）で乳汁中への移行が認められている。';

describe('buildWomenSectionRow', () => {
  it('gives empty sections for missing markup', async () => {
    const row = await buildWomenSectionRow({ packageInsertNo: 'P1', yjCode: 'Y1', brandNameJa: null, docXml: null });

    expect(row).toEqual({
      packageInsertNo: 'P1',
      yjCode: 'Y1',
      brandNameJa: null,
      pregnantText: null,
      nursingText: null,
      hasPregnant: false,
      hasNursing: false,
      srcIds: null,
      parsed: false,
    });
  });
});

describe('runWomenSectionsPipeline', () => {
  it('extracts both sections of every stored document', async () => {
    const store = new MockPackageInsertStore();
    const rows = await readPackageInsertFile(FIXTURE_PATH);
    await store.upsertPackageInserts([...rows, { ...rows[0], packageInsertNo: '0000000', docXml: '<PackInsDocument><a></b>' }]);

    const summary = await runWomenSectionsPipeline({ store, batchSize: 2, now: () => 0 });

    expect(summary).toEqual({ scanned: 3, upserted: 3, unparsed: 1, totalSeconds: 0 });
    expect(store.writes.upsertWomenSections).toEqual([2, 1]);
    expect(store.women.get('9999999F1_1_01\u00009999999F2027')).toEqual({
      packageInsertNo: '9999999F1_1_01',
      yjCode: '9999999F2027',
      brandNameJa: 'テスト錠20mg',
      pregnantText: PREGNANT_TEXT,
      nursingText: NURSING_TEXT,
      hasPregnant: true,
      hasNursing: true,
      srcIds: { pregnant: 'preg-1', nursing: 'nurs-1' },
    });
    expect(store.women.get('0000000\u00009999999F1020')).toMatchObject({
      brandNameJa: 'テスト錠10mg',
      pregnantText: null,
      hasPregnant: false,
      srcIds: null,
    });
  });
});
