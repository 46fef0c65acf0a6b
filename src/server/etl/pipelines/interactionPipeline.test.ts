import { describe, expect, it } from 'vitest';
import { runInteractionPipeline } from './interactionPipeline.js';
import { MockPackageInsertStore } from '../../services/mocks/MockPackageInsertStore.js';

describe('runInteractionPipeline', () => {
  it('rebuilds the table from stored arrays and JSON text', async () => {
    const store = new MockPackageInsertStore();
    store.interactions.push({
      packageInsertNo: 'OLD',
      yjCode: 'OLD',
      sectionType: null,
      partnerGroupJa: null,
      partnerNameJa: 'stale',
      symptomsMeasuresJa: null,
      mechanismJa: null,
    });
    store.seedInteractionSource({
      packageInsertNo: 'P2',
      yjCode: 'Y1',
      interactionsFlat: JSON.stringify([{ partner: 'B', category: '併用注意' }]),
    });
    store.seedInteractionSource({
      packageInsertNo: 'P1',
      yjCode: 'Y1',
      interactionsFlat: [
        { partner: 'A', group: 'G', symptoms: 's', mechanism: 'm', category: '併用禁忌' },
        { category: '併用注意' },
      ],
    });
    store.seedInteractionSource({ packageInsertNo: 'P3', yjCode: 'Y1', interactionsFlat: null });

    const summary = await runInteractionPipeline({ store, batchSize: 1, now: () => 0 });

    expect(summary).toEqual({ sourceRows: 2, rowsInserted: 2, totalSeconds: 0 });
    expect(store.writes.insertInteractions).toEqual([1, 1]);
    expect(store.interactions).toEqual([
      {
        packageInsertNo: 'P1',
        yjCode: 'Y1',
        sectionType: '併用禁忌',
        partnerGroupJa: 'G',
        partnerNameJa: 'A',
        symptomsMeasuresJa: 's',
        mechanismJa: 'm',
      },
      {
        packageInsertNo: 'P2',
        yjCode: 'Y1',
        sectionType: '併用注意',
        partnerGroupJa: null,
        partnerNameJa: 'B',
        symptomsMeasuresJa: null,
        mechanismJa: null,
      },
    ]);
  });

  it('propagates store failures', async () => {
    const store = new MockPackageInsertStore();
    store.seedInteractionSource({ packageInsertNo: 'P1', yjCode: 'Y1', interactionsFlat: [{ partner: 'A' }] });
    store.failOn('insertInteractions', new Error('insert failed'));

    await expect(runInteractionPipeline({ store })).rejects.toThrow('insert failed');
  });
});
