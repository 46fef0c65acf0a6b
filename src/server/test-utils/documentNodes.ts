/**
 * Builders for document trees used in tests
 */

import { PACKAGE_INSERT_NS, XML_NS, type DocumentNode } from '../adapters/packageInsert/documentTree.js';

export interface NodeInit {
  attrs?: Record<string, string>;
  text?: string;
  tail?: string;
  /** Shorthand for an `xml:lang` attribute */
  lang?: string;
}

/**
 * Element in the package insert namespace
 */
export function pi(localName: string, init: NodeInit = {}, children: DocumentNode[] = []): DocumentNode {
  return element(PACKAGE_INSERT_NS, localName, init, children);
}

export function element(
  namespaceUri: string,
  localName: string,
  init: NodeInit = {},
  children: DocumentNode[] = []
): DocumentNode {
  const attributes: Record<string, string> = { ...init.attrs };
  if (init.lang !== undefined) {
    attributes[`{${XML_NS}}lang`] = init.lang;
  }
  return {
    name: { namespaceUri, localName },
    attributes,
    text: init.text,
    tail: init.tail,
    children,
  };
}

/**
 * `<Lang xml:lang="...">text</Lang>`
 */
export function lang(language: string, text: string, children: DocumentNode[] = []): DocumentNode {
  return pi('Lang', { lang: language, text }, children);
}

/**
 * `<Detail><Lang xml:lang="ja">text</Lang></Detail>`
 */
export function jaDetail(text: string): DocumentNode {
  return pi('Detail', {}, [lang('ja', text)]);
}
