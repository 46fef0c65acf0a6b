/**
 * Text selection with Japanese-language preference.
 */

import { findAll, findFirst, iterText, XML_NS, type DocumentNode } from './documentTree.js';

const LANG_PATH = 'pi:Lang';
const LANG_ATTRIBUTE = `{${XML_NS}}lang`;

/** Noise tokens meaning "and others" */
const NOISE_TOKENS = ['等', 'など'];

/**
 * Language of a language-variant node (`xml:lang`, falling back to `lang`)
 */
export function languageOf(node: DocumentNode): string | undefined {
  return node.attributes[LANG_ATTRIBUTE] ?? node.attributes.lang;
}

/**
 * True for "ja", "JA", "ja-JP" and similar
 */
export function isJapanese(language: string | undefined): boolean {
  return !!language && language.toLowerCase().startsWith('ja');
}

function japaneseVariants(node: DocumentNode): DocumentNode[] {
  return findAll(node, LANG_PATH).filter(lang => isJapanese(languageOf(lang)));
}

function stripped(value: string | undefined): string | undefined {
  const s = value?.trim();
  return s ? s : undefined;
}

/**
 * Direct text of the node itself, trimmed; absent when empty
 */
export function selectDirectText(node: DocumentNode | null | undefined): string | undefined {
  if (!node) {
    return undefined;
  }
  return stripped(node.text);
}

/**
 * Best text of a node: the full subtree text of the first Japanese language
 * variant child, else the node's direct text.
 */
export function selectText(node: DocumentNode | null | undefined): string | undefined {
  if (!node) {
    return undefined;
  }
  for (const lang of japaneseVariants(node)) {
    const text = stripped(iterText(lang));
    if (text) {
      return text;
    }
  }
  return selectDirectText(node);
}

/**
 * Single-line variant of {@link selectText}: the direct text of the first
 * Japanese variant (no subtree descent), else the node's direct text.
 */
export function selectShallowText(node: DocumentNode | null | undefined): string | undefined {
  if (!node) {
    return undefined;
  }
  for (const lang of japaneseVariants(node)) {
    const text = stripped(lang.text);
    if (text) {
      return text;
    }
  }
  return selectDirectText(node);
}

/**
 * Direct text of the first element at `path` under `node`
 */
export function textAt(node: DocumentNode | null | undefined, path: string): string | undefined {
  return selectDirectText(findFirst(node, path));
}

const LEADING_SEPARATORS = /^[、，,\s]+/;
const TRAILING_SEPARATORS = /[、，,\s]+$/;
const TRAILING_NOISE = new RegExp(`(${NOISE_TOKENS.join('|')})$`);
const LEADING_NOISE = new RegExp(`^(${NOISE_TOKENS.join('|')})`);

/**
 * Clean a partner/group label.
 *
 * `イトラコナゾール等` becomes `イトラコナゾール`; a bare `等` or `など`,
 * or a label that is empty after cleaning, is absent.
 */
export function normalizeLabel(value: string | null | undefined): string | undefined {
  if (typeof value !== 'string') {
    return undefined;
  }
  let s = value.trim().replace(LEADING_SEPARATORS, '').replace(TRAILING_SEPARATORS, '');
  if (!s || NOISE_TOKENS.includes(s)) {
    return undefined;
  }
  s = s.replace(TRAILING_NOISE, '').trim();
  s = s.replace(LEADING_NOISE, '').trim();
  return s || undefined;
}

/**
 * Whitespace normalization for narrative prose: CRLF/CR become LF, runs of
 * spaces, tabs and full-width spaces collapse to one space, three or more
 * newlines collapse to two.
 */
export function normalizeProse(value: string | null | undefined): string | undefined {
  if (typeof value !== 'string') {
    return undefined;
  }
  return value
    .replace(/\r\n/g, '\n')
    .replace(/\r/g, '\n')
    .replace(/[ \t\u3000]+/g, ' ')
    .replace(/\n{3,}/g, '\n\n')
    .trim();
}
