import { describe, expect, it } from 'vitest';
import { InteractionCategory, collectInteractions, flattenDrugBlock } from './interactionFlattener.js';
import { jaDetail, pi } from '../../test-utils/documentNodes.js';
import type { DocumentNode } from './documentTree.js';

function drug(options: { group?: string; items?: string[]; symptoms?: DocumentNode; mechanism?: DocumentNode }) {
  const drugName = pi('DrugName', {}, [
    ...(options.group ? [jaDetail(options.group)] : []),
    pi('SimpleList', {}, (options.items ?? []).map(name => pi('Item', {}, [jaDetail(name)]))),
  ]);
  return pi('Drug', {}, [
    drugName,
    ...(options.symptoms ? [options.symptoms] : []),
    ...(options.mechanism ? [options.mechanism] : []),
  ]);
}

describe('flattenDrugBlock', () => {
  it('emits one record per substance with shared texts', () => {
    const block = drug({
      group: 'CYP3A誘導剤',
      items: ['リファンピシン', 'カルバマゼピン'],
      symptoms: pi('ClinSymptomsAndMeasures', {}, [jaDetail('作用減弱')]),
      mechanism: pi('MechanismAndRiskFactors', {}, [jaDetail('代謝促進')]),
    });

    expect(flattenDrugBlock(block, InteractionCategory.CAUTION)).toEqual([
      { partner: 'リファンピシン', group: 'CYP3A誘導剤', symptoms: '作用減弱', mechanism: '代謝促進', category: '併用注意' },
      { partner: 'カルバマゼピン', group: 'CYP3A誘導剤', symptoms: '作用減弱', mechanism: '代謝促進', category: '併用注意' },
    ]);
  });

  it('uses the class label as partner when no substance is listed', () => {
    const records = flattenDrugBlock(drug({ group: '抗コリン剤' }), InteractionCategory.CAUTION);
    expect(records).toHaveLength(1);
    expect(records[0].partner).toBe('抗コリン剤');
    expect(records[0].group).toBe('抗コリン剤');
    expect(records[0].symptoms).toBeUndefined();
  });

  it('emits nothing without group or items', () => {
    expect(flattenDrugBlock(drug({}), InteractionCategory.CONTRAINDICATED)).toEqual([]);
  });

  it('falls back to the direct text of the section element', () => {
    const block = drug({
      group: 'QT延長を起こす薬剤',
      symptoms: pi('ClinSymptomsAndMeasures', { text: ' QT延長 ' }),
      mechanism: pi('MechanismAndRiskFactors', { text: '相加作用' }, [pi('Detail', { text: '  ' })]),
    });
    const [record] = flattenDrugBlock(block, InteractionCategory.CONTRAINDICATED);
    expect(record.symptoms).toBe('QT延長');
    expect(record.mechanism).toBe('相加作用');
  });
});

describe('collectInteractions', () => {
  it('collects summary texts, contraindicated records, then caution records', () => {
    const root = pi('PackInsDocument', {}, [
      pi('Interactions', {}, [
        pi('SummaryOfCombination', {}, [jaDetail('本剤は主にCYP3A4で代謝される。'), pi('Detail', { text: ' ' })]),
        pi('PrecautionsForCombinations', {}, [drug({ group: '抗コリン剤' })]),
        pi('ContraIndicatedCombinations', {}, [
          pi('InteractionsDrugs', {}, [drug({ group: '強い CYP3A阻害剤', items: ['イトラコナゾール'] })]),
        ]),
      ]),
    ]);

    const { summary, flat } = collectInteractions(root);
    expect(summary).toEqual(['本剤は主にCYP3A4で代謝される。']);
    expect(flat.map(r => [r.category, r.partner])).toEqual([
      ['併用禁忌', 'イトラコナゾール'],
      ['併用注意', '抗コリン剤'],
    ]);
  });

  it('returns empty results without an Interactions section', () => {
    expect(collectInteractions(pi('PackInsDocument'))).toEqual({ summary: [], flat: [] });
    expect(collectInteractions(undefined)).toEqual({ summary: [], flat: [] });
  });
});
