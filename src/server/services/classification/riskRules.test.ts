import { mkdtempSync, rmSync, writeFileSync } from 'fs';
import { tmpdir } from 'os';
import path from 'path';
import { afterEach, describe, expect, it } from 'vitest';
import { RuleTable, compileRiskRules, loadRiskRules } from './riskRules.js';
import { ConfigurationError } from '../../types/errors.js';

function section(overrides: Record<string, unknown> = {}) {
  return {
    flags: 's',
    rules: [
      { score: 1, tag: 'low', pattern: 'b' },
      { score: 3, tag: 'high', pattern: 'a' },
    ],
    evidence: { hasA: 'a' },
    boostKeys: ['hasA'],
    labels: { '0': 'zero', '1': 'one', '2': 'two', '3': 'three' },
    ...overrides,
  };
}

describe('compileRiskRules', () => {
  it('compiles tables in descending score order', () => {
    const rules = compileRiskRules({ scheme: 'test', pregnancy: section(), nursing: section() });

    expect(rules.scheme).toBe('test');
    expect(rules.pregnancy.table.rules.map(rule => rule.tag)).toEqual(['high', 'low']);
    expect(rules.pregnancy.table.rules[0].pattern.flags).toBe('s');
    expect(rules.pregnancy.evidence.hasA.test('xa')).toBe(true);
    expect(rules.nursing.labels[3]).toBe('three');
  });

  it('rejects invalid configurations', () => {
    expect(() => compileRiskRules({ scheme: 'test', pregnancy: section() })).toThrow(ConfigurationError);
    expect(() =>
      compileRiskRules({ scheme: 'test', pregnancy: section({ flags: 'g' }), nursing: section() })
    ).toThrow(ConfigurationError);
    expect(() =>
      compileRiskRules({
        scheme: 'test',
        pregnancy: section({ rules: [{ score: 4, tag: 'x', pattern: 'x' }] }),
        nursing: section(),
      })
    ).toThrow(ConfigurationError);
    expect(() =>
      compileRiskRules({ scheme: 'test', pregnancy: section({ boostKeys: ['a', 'b', 'c'] }), nursing: section() })
    ).toThrow(ConfigurationError);
  });

  it('reports the offending pattern', () => {
    expect(() =>
      compileRiskRules({
        scheme: 'test',
        pregnancy: section({ rules: [{ score: 1, tag: 'broken', pattern: '(' }] }),
        nursing: section(),
      })
    ).toThrow(/Invalid pattern for "broken"/);
  });
});

describe('RuleTable', () => {
  it('keeps the given order among equal scores', () => {
    const table = RuleTable.compile([
      { score: 2, tag: 'first', pattern: 'x' },
      { score: 2, tag: 'second', pattern: 'x' },
    ]);
    expect(table.match('x')?.tag).toBe('first');
    expect(table.size).toBe(2);
    expect(RuleTable.EMPTY.match('x')).toBeUndefined();
  });

  it('cannot be reordered after construction', () => {
    const table = RuleTable.compile([{ score: 1, tag: 'only', pattern: 'x' }]);
    expect(Object.isFrozen(table.rules)).toBe(true);
  });
});

describe('loadRiskRules', () => {
  let dir: string | undefined;

  afterEach(() => {
    if (dir) {
      rmSync(dir, { recursive: true, force: true });
      dir = undefined;
    }
  });

  it('loads the bundled configuration', () => {
    const rules = loadRiskRules();
    expect(rules.scheme).toBe('toranomon');
    expect(rules.pregnancy.table.rules.map(rule => rule.tag)).toEqual([
      'contraindicated',
      'not_recommended',
      'benefit_over_risk_or_caution',
    ]);
    expect(rules.nursing.boostKeys).toEqual(['milk_transfer_detected', 'adverse_infant_effects']);
    expect(rules.pregnancy.labels).toEqual({ 0: '不明', 1: 'B', 2: 'C', 3: 'D/X' });
  });

  it('loads a configuration file from disk', () => {
    dir = mkdtempSync(path.join(tmpdir(), 'risk-rules-'));
    const file = path.join(dir, 'rules.json');
    writeFileSync(file, JSON.stringify({ scheme: 'custom', pregnancy: section(), nursing: section() }));

    expect(loadRiskRules(file).scheme).toBe('custom');
  });

  it('fails on unreadable or malformed files', () => {
    const tmp = mkdtempSync(path.join(tmpdir(), 'risk-rules-'));
    dir = tmp;
    const file = path.join(tmp, 'rules.json');
    writeFileSync(file, '{not json');

    expect(() => loadRiskRules(file)).toThrow(ConfigurationError);
    expect(() => loadRiskRules(path.join(tmp, 'missing.json'))).toThrow(ConfigurationError);
  });
});
