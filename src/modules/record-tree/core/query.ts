/**
 * Navigation helpers over the record tree.
 *
 * Paths are slash separated child tags relative to the node, optionally
 * ending in `@attribute`: `transaction/provider-org/@ref`.
 */

import type { XmlNode } from './types.js';

export const attr = (node: XmlNode | undefined, name: string): string | undefined =>
  node?.attributes[name];

export const hasAttr = (node: XmlNode, name: string): boolean => node.attributes[name] !== undefined;

export const child = (node: XmlNode | undefined, tag: string): XmlNode | undefined =>
  node?.children.find((c) => c.tag === tag);

export const children = (node: XmlNode, tag: string): XmlNode[] =>
  node.children.filter((c) => c.tag === tag);

/**
 * All descendants reached by following `path` (tags only).
 */
export const select = (node: XmlNode, path: string): XmlNode[] => {
  let current: XmlNode[] = [node];
  for (const step of path.split('/')) {
    if (step === '') continue;
    current = current.flatMap((n) => children(n, step));
  }
  return current;
};

/**
 * Attribute values at the end of `path` (e.g. `sector/@code`). Elements
 * without the attribute contribute nothing; empty values are kept.
 */
export const selectAttr = (node: XmlNode, path: string): string[] => {
  const at = path.lastIndexOf('@');
  if (at === -1) return [];
  const elementPath = path.slice(0, Math.max(0, at - 1));
  const name = path.slice(at + 1);
  const elements = elementPath === '' ? [node] : select(node, elementPath);
  const out: string[] = [];
  for (const element of elements) {
    const value = element.attributes[name];
    if (value !== undefined) out.push(value);
  }
  return out;
};

/**
 * Non-empty text of the elements at `path`.
 */
export const selectText = (node: XmlNode, path: string): string[] =>
  select(node, path)
    .map((n) => n.text)
    .filter((t): t is string => t !== null && t !== '');

export const firstAttr = (node: XmlNode, path: string): string | undefined => selectAttr(node, path)[0];

/**
 * Children with the given tag whose attribute is one of `values`. `missing`
 * controls whether elements without the attribute match as well.
 */
export const childrenWithAttr = (
  node: XmlNode,
  tag: string,
  name: string,
  values: readonly string[],
  missing = false
): XmlNode[] =>
  children(node, tag).filter((c) => {
    const value = c.attributes[name];
    return value === undefined ? missing : values.includes(value);
  });

/**
 * Key used in counters for values that may be absent.
 */
export const keyOf = (value: string | number | null | undefined): string =>
  value === null || value === undefined ? 'null' : String(value);
