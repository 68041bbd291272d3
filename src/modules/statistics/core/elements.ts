import { Decimal } from 'decimal.js';

import { mergeCounter1, type Counter1 } from '@/modules/aggregation/index.js';
import type { XmlNode } from '@/modules/record-tree/index.js';

const ONE = new Decimal(1);

/**
 * Occurrences of every element path and non-empty attribute path under
 * `node` (`iati-activity/transaction/value/@currency`). Each level returns a
 * fresh counter; sub-results are combined with the counter merge rule.
 */
export const countElementPaths = (node: XmlNode, path: string): Counter1 => {
  let counts: Counter1 = Object.fromEntries([[path, ONE]]);

  for (const element of node.children) {
    counts = mergeCounter1(counts, countElementPaths(element, `${path}/${element.tag}`));
  }

  for (const [name, value] of Object.entries(node.attributes)) {
    if (value === '') continue;
    counts = mergeCounter1(counts, Object.fromEntries([[`${path}/@${name}`, ONE]]));
  }

  return counts;
};

/**
 * Same paths as {@link countElementPaths}, each counted at most once.
 */
export const elementPresence = (counts: Counter1): Counter1 =>
  Object.fromEntries(Object.keys(counts).map((key) => [key, ONE]));
