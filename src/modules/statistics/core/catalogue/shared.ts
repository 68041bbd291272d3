import { Tally2, presence, type Counter2 } from '@/modules/aggregation/index.js';
import { attr, child, children, keyOf, selectAttr, type XmlNode } from '@/modules/record-tree/index.js';

import { elementPresence } from '../elements.js';
import { counter1Statistic, counter2Statistic } from '../registry.js';

import type { RecordFacts } from '../facts/record-facts.js';
import type { SummedDeclaration } from '../types.js';

/**
 * Statistics computed the same way for activity and organisation records.
 */
export const sharedStatistics = <F extends RecordFacts>(): SummedDeclaration<F>[] => [
  counter1Statistic<F>('reporting_orgs', (f) =>
    presence([keyOf(attr(child(f.element, 'reporting-org'), 'ref'))])
  ),

  counter1Statistic<F>('participating_orgs', (f) =>
    presence(children(f.element, 'participating-org').map((org) => keyOf(attr(org, 'ref'))))
  ),

  counter2Statistic<F>('_participating_orgs_text', (f) => {
    const tally = new Tally2();
    for (const org of children(f.element, 'participating-org')) {
      tally.row(keyOf(attr(org, 'ref'))).set(keyOf(org.text), 1);
    }
    return tally.toCounter();
  }),

  counter2Statistic<F>('_participating_orgs_by_role', (f) => {
    const tally = new Tally2();
    for (const org of children(f.element, 'participating-org')) {
      tally.row(keyOf(attr(org, 'role'))).set(keyOf(attr(org, 'ref')), 1);
    }
    return tally.toCounter();
  }),

  counter1Statistic<F>('_element_versions', (f) => presence([keyOf(attr(f.element, 'version'))])),

  counter1Statistic<F>('_major_version', (f) => presence([f.major])),

  counter1Statistic<F>('_version', (f) => presence([f.version])),

  counter1Statistic<F>('version_fallbacks', (f) =>
    f.versionFallback ? presence([keyOf(f.declaredVersion)]) : {}
  ),

  counter1Statistic<F>('elements', (f) => elementPresence(f.elementCounts.value)),

  counter1Statistic<F>('elements_total', (f) => f.elementCounts.value),
];

/**
 * Counts of the attribute values found at each of `paths`
 * (`{ path: { value: n } }`). Paths without values are left out.
 */
export const countValuesAt = (node: XmlNode, paths: readonly string[]): Counter2 => {
  const tally = new Tally2();
  for (const path of paths) {
    for (const value of selectAttr(node, path)) tally.add(path, value);
  }
  return tally.toCounter();
};
