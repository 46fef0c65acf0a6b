import { describe, expect, it } from 'vitest';
import { parsePackageInsertXml, tryParsePackageInsertXml } from './PackageInsertXmlParser.js';
import { PACKAGE_INSERT_NS, XML_NS, iterText } from './documentTree.js';
import { DocumentParseError } from '../../types/errors.js';

describe('parsePackageInsertXml', () => {
  it('keeps text, tails and child order', async () => {
    const root = await parsePackageInsertXml('<p xmlns="urn:t">a<b>x</b>c<i>y</i></p>');

    expect(root.name).toEqual({ namespaceUri: 'urn:t', localName: 'p' });
    expect(root.text).toBe('a');
    expect(root.children.map(child => [child.name.localName, child.text, child.tail])).toEqual([
      ['b', 'x', 'c'],
      ['i', 'y', undefined],
    ]);
    expect(iterText(root)).toBe('axcy');
  });

  it('keys namespaced attributes in Clark notation and drops declarations', async () => {
    const root = await parsePackageInsertXml(
      `<r xmlns="${PACKAGE_INSERT_NS}" xmlns:q="urn:q" q:code="1" id="2"><Lang xml:lang="ja">和文</Lang></r>`
    );

    expect(root.name).toEqual({ namespaceUri: PACKAGE_INSERT_NS, localName: 'r' });
    expect(root.attributes).toEqual({ '{urn:q}code': '1', id: '2' });
    expect(root.children[0].attributes).toEqual({ [`{${XML_NS}}lang`]: 'ja' });
    expect(root.children[0].text).toBe('和文');
  });

  it('parses empty elements without text or children', async () => {
    const root = await parsePackageInsertXml('<r><empty/></r>');
    expect(root.children).toHaveLength(1);
    expect(root.children[0].text).toBeUndefined();
    expect(root.children[0].children).toEqual([]);
  });

  it('accepts a Buffer', async () => {
    const root = await parsePackageInsertXml(Buffer.from('<r>テキスト</r>', 'utf-8'));
    expect(root.text).toBe('テキスト');
  });

  it('rejects malformed and empty markup', async () => {
    await expect(parsePackageInsertXml('<a><b></a>')).rejects.toBeInstanceOf(DocumentParseError);
    await expect(parsePackageInsertXml('   ')).rejects.toBeInstanceOf(DocumentParseError);
  });
});

describe('tryParsePackageInsertXml', () => {
  it('returns undefined instead of throwing', async () => {
    await expect(tryParsePackageInsertXml('<a><b></a>')).resolves.toBeUndefined();
    await expect(tryParsePackageInsertXml(null)).resolves.toBeUndefined();
    await expect(tryParsePackageInsertXml('')).resolves.toBeUndefined();
  });

  it('returns the tree for valid markup', async () => {
    const root = await tryParsePackageInsertXml('<r/>');
    expect(root?.name.localName).toBe('r');
  });
});
