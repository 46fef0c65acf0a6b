import { describe, expect, it } from 'vitest';
import { PACKAGE_INSERT_NS, XML_NS } from './documentTree.js';
import { TAIL_TAG, serializeElement } from './elementSerializer.js';
import { element, pi } from '../../test-utils/documentNodes.js';

describe('serializeElement', () => {
  it('keeps attributes, trimmed text, child order and tails', () => {
    const node = pi('Parent', { attrs: { id: 'p1' }, text: '  head ' }, [
      pi('Child', { text: 'inner', tail: ' after ' }),
      pi('Child', { lang: 'ja', tail: '\n  ' }),
      element('', 'Plain', { text: 'x' }),
    ]);

    expect(serializeElement(node)).toEqual({
      tag: `{${PACKAGE_INSERT_NS}}Parent`,
      attr: { id: 'p1' },
      text: 'head',
      children: [
        { tag: `{${PACKAGE_INSERT_NS}}Child`, text: 'inner' },
        { tag: TAIL_TAG, text: 'after' },
        { tag: `{${PACKAGE_INSERT_NS}}Child`, attr: { [`{${XML_NS}}lang`]: 'ja' } },
        { tag: 'Plain', text: 'x' },
      ],
    });
  });

  it('omits empty parts', () => {
    expect(serializeElement(pi('Empty', { text: ' \n ' }))).toEqual({ tag: `{${PACKAGE_INSERT_NS}}Empty` });
  });

  it('returns undefined for an absent node', () => {
    expect(serializeElement(undefined)).toBeUndefined();
  });

  it('gives equal output for equal input', () => {
    const node = pi('A', { text: 't' }, [pi('B', { tail: 'u' })]);
    expect(JSON.stringify(serializeElement(node))).toBe(JSON.stringify(serializeElement(node)));
  });
});
