/**
 * Document tree model and path accessor for package insert markup.
 *
 * Two lookup modes coexist and are kept apart:
 * - `findFirst` / `findAll` resolve ElementPath-style paths whose steps are
 *   bound to the fixed prefix table in {@link NAMESPACES};
 * - `findByLocalName` ignores namespaces and matches the local name only,
 *   for section tags whose namespace differs between schema revisions.
 */

export const PACKAGE_INSERT_NS = 'http://info.pmda.go.jp/namespace/prescription_drugs/package_insert/1.0';
export const XML_NS = 'http://www.w3.org/XML/1998/namespace';

/**
 * Prefix table used by path lookups
 */
export const NAMESPACES: Readonly<Record<string, string>> = Object.freeze({
  pi: PACKAGE_INSERT_NS,
  xml: XML_NS,
});

/**
 * Namespace URI plus local name. An empty URI means "no namespace".
 */
export interface QualifiedName {
  readonly namespaceUri: string;
  readonly localName: string;
}

/**
 * An element of a parsed document.
 *
 * `text` is the character data before the first child element; `tail` is the
 * character data after this element and before its next sibling.
 */
export interface DocumentNode {
  readonly name: QualifiedName;
  /** Namespaced attributes use Clark notation keys (`{uri}local`) */
  readonly attributes: Readonly<Record<string, string>>;
  readonly text?: string;
  readonly tail?: string;
  readonly children: readonly DocumentNode[];
}

/**
 * Clark notation of a qualified name: `{uri}local`, or `local` without namespace
 */
export function clarkName(name: QualifiedName): string {
  return name.namespaceUri ? `{${name.namespaceUri}}${name.localName}` : name.localName;
}

/**
 * Local part of a tag in Clark or prefixed notation
 */
export function localName(tag: string | undefined | null): string {
  if (!tag) {
    return '';
  }
  const afterBrace = tag.slice(tag.lastIndexOf('}') + 1);
  return afterBrace.slice(afterBrace.lastIndexOf(':') + 1);
}

/**
 * Value of an attribute given as `local`, `prefix:local` (resolved through
 * the prefix table) or Clark notation
 */
export function getAttribute(node: DocumentNode, name: string): string | undefined {
  const colon = name.indexOf(':');
  if (colon > 0 && !name.startsWith('{')) {
    const uri = NAMESPACES[name.slice(0, colon)];
    if (!uri) {
      return undefined;
    }
    return node.attributes[`{${uri}}${name.slice(colon + 1)}`];
  }
  return node.attributes[name];
}

type PathStep =
  | { kind: 'self' }
  | { kind: 'any'; descendant: boolean }
  | { kind: 'name'; descendant: boolean; name: QualifiedName };

function parsePath(path: string): PathStep[] | null {
  const steps: PathStep[] = [];
  const tokens = path.split('/');
  let descendant = false;

  for (let i = 0; i < tokens.length; i++) {
    const token = tokens[i].trim();
    if (token === '') {
      // A leading '/' is not supported; '//' marks the descendant axis
      if (i === 0 || descendant) {
        return null;
      }
      descendant = true;
      continue;
    }
    if (token === '.') {
      steps.push({ kind: 'self' });
    } else if (token === '*') {
      steps.push({ kind: 'any', descendant });
    } else {
      const colon = token.indexOf(':');
      let name: QualifiedName;
      if (colon >= 0) {
        const uri = NAMESPACES[token.slice(0, colon)];
        if (!uri) {
          return null;
        }
        name = { namespaceUri: uri, localName: token.slice(colon + 1) };
      } else {
        name = { namespaceUri: '', localName: token };
      }
      steps.push({ kind: 'name', descendant, name });
    }
    descendant = false;
  }

  return descendant ? null : steps;
}

function sameName(a: QualifiedName, b: QualifiedName): boolean {
  return a.namespaceUri === b.namespaceUri && a.localName === b.localName;
}

/**
 * Depth-first, document-order iteration over `node` and all its descendants
 */
export function* iterElements(node: DocumentNode): Generator<DocumentNode> {
  yield node;
  for (const child of node.children) {
    yield* iterElements(child);
  }
}

function* iterDescendants(node: DocumentNode): Generator<DocumentNode> {
  for (const child of node.children) {
    yield* iterElements(child);
  }
}

function applyStep(contexts: DocumentNode[], step: PathStep): DocumentNode[] {
  if (step.kind === 'self') {
    return contexts;
  }

  const seen = new Set<DocumentNode>();
  const out: DocumentNode[] = [];
  for (const context of contexts) {
    const candidates = step.descendant ? iterDescendants(context) : context.children;
    for (const candidate of candidates) {
      if (step.kind === 'name' && !sameName(candidate.name, step.name)) {
        continue;
      }
      if (!seen.has(candidate)) {
        seen.add(candidate);
        out.push(candidate);
      }
    }
  }
  return out;
}

/**
 * All elements matching `path` relative to `node`, in document order.
 * Returns an empty array for an absent node, an invalid path or no match.
 */
export function findAll(node: DocumentNode | null | undefined, path: string): DocumentNode[] {
  if (!node) {
    return [];
  }
  const steps = parsePath(path);
  if (!steps || steps.length === 0) {
    return [];
  }
  return steps.reduce<DocumentNode[]>((contexts, step) => applyStep(contexts, step), [node]);
}

/**
 * First element matching `path` relative to `node`
 */
export function findFirst(node: DocumentNode | null | undefined, path: string): DocumentNode | undefined {
  return findAll(node, path)[0];
}

/**
 * `node` and its descendants whose local name equals `name` (or is in `name`
 * when a set is given), in document order, regardless of namespace
 */
export function findByLocalName(
  node: DocumentNode | null | undefined,
  name: string | ReadonlySet<string>
): DocumentNode[] {
  if (!node) {
    return [];
  }
  const matches = typeof name === 'string'
    ? (local: string) => local === name
    : (local: string) => name.has(local);

  const hits: DocumentNode[] = [];
  for (const element of iterElements(node)) {
    if (matches(element.name.localName)) {
      hits.push(element);
    }
  }
  return hits;
}

/**
 * Concatenated character data of the subtree: own text, then each child's
 * subtree text followed by that child's tail. The node's own tail is excluded.
 */
export function iterText(node: DocumentNode): string {
  let out = node.text ?? '';
  for (const child of node.children) {
    out += iterText(child);
    out += child.tail ?? '';
  }
  return out;
}
