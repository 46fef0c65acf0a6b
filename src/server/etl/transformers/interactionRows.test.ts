import { describe, expect, it } from 'vitest';
import { buildInteractionRows } from './interactionRows.js';

const record = {
  partner: 'イトラコナゾール',
  group: '強い CYP3A阻害剤',
  symptoms: 'QT延長',
  mechanism: '代謝阻害',
  category: '併用禁忌',
};

describe('buildInteractionRows', () => {
  it('maps each record to a row', () => {
    expect(buildInteractionRows('P1', 'Y1', [record])).toEqual([
      {
        packageInsertNo: 'P1',
        yjCode: 'Y1',
        sectionType: '併用禁忌',
        partnerGroupJa: '強い CYP3A阻害剤',
        partnerNameJa: 'イトラコナゾール',
        symptomsMeasuresJa: 'QT延長',
        mechanismJa: '代謝阻害',
      },
    ]);
  });

  it('accepts JSON text', () => {
    expect(buildInteractionRows('P1', 'Y1', JSON.stringify([record, record]))).toHaveLength(2);
  });

  it('skips non-objects and records without any content', () => {
    const rows = buildInteractionRows('P1', 'Y1', [
      'text',
      null,
      [record],
      { category: '併用注意' },
      { category: '併用注意', partner: '', symptoms: '' },
      { category: '併用注意', mechanism: '相加作用' },
    ]);
    expect(rows).toEqual([
      {
        packageInsertNo: 'P1',
        yjCode: 'Y1',
        sectionType: '併用注意',
        partnerGroupJa: null,
        partnerNameJa: null,
        symptomsMeasuresJa: null,
        mechanismJa: '相加作用',
      },
    ]);
  });

  it('reads fields of the wrong type as absent', () => {
    const [row] = buildInteractionRows('P1', 'Y1', [{ partner: 'A', group: 3, category: ['x'] }]);
    expect(row.partnerGroupJa).toBeNull();
    expect(row.sectionType).toBeNull();
    expect(row.partnerNameJa).toBe('A');
  });

  it.each([[undefined], [null], [''], ['{broken'], ['{"a":1}'], [{ partner: 'A' }], [42]])(
    'returns no rows for %j',
    value => {
      expect(buildInteractionRows('P1', 'Y1', value)).toEqual([]);
    }
  );
});
