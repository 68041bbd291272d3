import { err, ok, type Result } from 'neverthrow';

import { createFatalInputError, type FatalInputError } from './errors.js';

import type { XmlNode } from './types.js';

export const MAX_TREE_DEPTH = 256;

const TAG_NAME = /^[A-Za-z_][\w.:-]*$/;

/**
 * Checks that a record is a finite, acyclic tree of named elements.
 */
export const validateTree = (root: XmlNode): Result<XmlNode, FatalInputError> => {
  const ancestors = new Set<XmlNode>();

  const visit = (node: XmlNode, depth: number, path: string): FatalInputError | null => {
    if (depth > MAX_TREE_DEPTH) {
      return createFatalInputError(`Record nesting exceeds ${String(MAX_TREE_DEPTH)} levels at ${path}`);
    }
    if (!TAG_NAME.test(node.tag)) {
      return createFatalInputError(`Invalid element name '${node.tag}' at ${path}`);
    }
    if (ancestors.has(node)) {
      return createFatalInputError(`Record contains a cycle at ${path}`);
    }

    ancestors.add(node);
    for (const c of node.children) {
      const failure = visit(c, depth + 1, `${path}/${c.tag}`);
      if (failure !== null) return failure;
    }
    ancestors.delete(node);

    return null;
  };

  const failure = visit(root, 0, root.tag);
  return failure === null ? ok(root) : err(failure);
};
