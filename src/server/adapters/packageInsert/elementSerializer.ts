/**
 * Generic element-to-JSON serialization.
 *
 * Keeps attributes, trimmed direct text, children in document order and the
 * text between siblings (as `__tail__` pseudo-nodes). Whitespace-only text
 * is dropped.
 */

import { clarkName, type DocumentNode } from './documentTree.js';

export const TAIL_TAG = '__tail__';

export interface SerializedElement {
  tag: string;
  attr?: Record<string, string>;
  text?: string;
  children?: SerializedNode[];
}

export interface SerializedTail {
  tag: typeof TAIL_TAG;
  text: string;
}

export type SerializedNode = SerializedElement | SerializedTail;

export function serializeElement(node: DocumentNode): SerializedElement;
export function serializeElement(node: DocumentNode | null | undefined): SerializedElement | undefined;
export function serializeElement(node: DocumentNode | null | undefined): SerializedElement | undefined {
  if (!node) {
    return undefined;
  }

  const out: SerializedElement = { tag: clarkName(node.name) };

  if (Object.keys(node.attributes).length > 0) {
    out.attr = { ...node.attributes };
  }

  const text = node.text?.trim();
  if (text) {
    out.text = text;
  }

  const children: SerializedNode[] = [];
  for (const child of node.children) {
    children.push(serializeElement(child));
    const tail = child.tail?.trim();
    if (tail) {
      children.push({ tag: TAIL_TAG, text: tail });
    }
  }
  if (children.length > 0) {
    out.children = children;
  }

  return out;
}
