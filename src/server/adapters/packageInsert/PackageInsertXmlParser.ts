/**
 * PackageInsertXmlParser - Parse package insert XML into a document tree
 *
 * Uses xml2js with ordered explicit children and character children so that
 * sibling order, inter-element text and namespaces survive parsing.
 */

import { parseStringPromise } from 'xml2js';
import { DocumentParseError, getErrorMessage } from '../../types/errors.js';
import { logger } from '../../utils/logger.js';
import type { DocumentNode, QualifiedName } from './documentTree.js';

const CHILDREN_KEY = '$$';
const ATTRIBUTES_KEY = '$';
const NAMESPACE_KEY = '$ns';
const NAME_KEY = '#name';
const CHAR_KEY = '_';
const TEXT_NODE_NAME = '__text__';

const XML2JS_OPTIONS = {
  explicitRoot: true,
  explicitArray: true,
  explicitChildren: true,
  preserveChildrenOrder: true,
  charsAsChildren: true,
  includeWhiteChars: true,
  mergeAttrs: false,
  trim: false,
  normalize: false,
  xmlns: true,
  attrkey: ATTRIBUTES_KEY,
  charkey: CHAR_KEY,
  childkey: CHILDREN_KEY,
  xmlnskey: NAMESPACE_KEY,
};

type RawObject = Record<string, unknown>;

function isRawObject(value: unknown): value is RawObject {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function stringField(obj: RawObject, key: string): string | undefined {
  const value = obj[key];
  return typeof value === 'string' ? value : undefined;
}

function qualifiedNameOf(raw: RawObject, fallbackName: string): QualifiedName {
  const ns = raw[NAMESPACE_KEY];
  if (isRawObject(ns)) {
    const local = stringField(ns, 'local');
    return {
      namespaceUri: stringField(ns, 'uri') ?? '',
      localName: local || stripPrefix(stringField(raw, NAME_KEY) ?? fallbackName),
    };
  }
  return { namespaceUri: '', localName: stripPrefix(stringField(raw, NAME_KEY) ?? fallbackName) };
}

function stripPrefix(name: string): string {
  return name.slice(name.indexOf(':') + 1);
}

/**
 * Attributes keyed by local name, or Clark notation when namespaced.
 * Namespace declarations are dropped.
 */
function attributesOf(raw: RawObject): Record<string, string> {
  const attrs = raw[ATTRIBUTES_KEY];
  const out: Record<string, string> = {};
  if (!isRawObject(attrs)) {
    return out;
  }

  for (const [key, value] of Object.entries(attrs)) {
    if (key === 'xmlns' || key.startsWith('xmlns:')) {
      continue;
    }
    if (typeof value === 'string') {
      out[stripPrefix(key)] = value;
      continue;
    }
    if (!isRawObject(value)) {
      continue;
    }
    const attrValue = stringField(value, 'value') ?? '';
    const uri = stringField(value, 'uri') ?? '';
    const local = stringField(value, 'local') || stripPrefix(key);
    out[uri ? `{${uri}}${local}` : local] = attrValue;
  }
  return out;
}

function toDocumentNode(raw: RawObject, fallbackName: string, tail?: string): DocumentNode {
  let text: string | undefined;
  // Element children, each with the character data that follows it
  const elements: Array<{ raw: RawObject; tail: string }> = [];

  const ordered = raw[CHILDREN_KEY];
  if (Array.isArray(ordered)) {
    for (const entry of ordered) {
      if (!isRawObject(entry)) {
        continue;
      }
      if (entry[NAME_KEY] !== TEXT_NODE_NAME) {
        elements.push({ raw: entry, tail: '' });
        continue;
      }
      const chars = stringField(entry, CHAR_KEY) ?? '';
      const previous = elements[elements.length - 1];
      if (previous) {
        previous.tail += chars;
      } else {
        text = (text ?? '') + chars;
      }
    }
  } else {
    // Empty element, or one without ordered children
    text = stringField(raw, CHAR_KEY);
  }

  return {
    name: qualifiedNameOf(raw, fallbackName),
    attributes: attributesOf(raw),
    text,
    tail,
    children: elements.map(element => toDocumentNode(element.raw, '', element.tail || undefined)),
  };
}

/**
 * Parse package insert XML into a document tree
 *
 * @param xmlContent - XML content as string or Buffer
 * @returns Root element of the document
 * @throws DocumentParseError when the markup is not well-formed
 */
export async function parsePackageInsertXml(xmlContent: string | Buffer): Promise<DocumentNode> {
  const xmlString = typeof xmlContent === 'string' ? xmlContent : xmlContent.toString('utf-8');

  let parsed: unknown;
  try {
    parsed = await parseStringPromise(xmlString, XML2JS_OPTIONS);
  } catch (error) {
    logger.debug({ error: getErrorMessage(error) }, 'Failed to parse package insert XML');
    throw new DocumentParseError(`Package insert XML parse failed: ${getErrorMessage(error)}`);
  }

  if (!isRawObject(parsed)) {
    throw new DocumentParseError('Package insert XML has no root element');
  }
  const [rootName, rootValue] = Object.entries(parsed)[0] ?? [];
  if (!rootName || !isRawObject(rootValue)) {
    throw new DocumentParseError('Package insert XML has no root element');
  }

  return toDocumentNode(rootValue, rootName);
}

/**
 * Parse markup, returning undefined instead of throwing on malformed input
 */
export async function tryParsePackageInsertXml(xmlContent: string | Buffer | null | undefined): Promise<DocumentNode | undefined> {
  if (!xmlContent) {
    return undefined;
  }
  try {
    return await parsePackageInsertXml(xmlContent);
  } catch (error) {
    if (error instanceof DocumentParseError) {
      return undefined;
    }
    throw error;
  }
}
