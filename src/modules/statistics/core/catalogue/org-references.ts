import { Tally, type Counter1 } from '@/modules/aggregation/index.js';
import { attr, child, children, keyOf, type XmlNode } from '@/modules/record-tree/index.js';
import { validOrgPrefix } from '@/modules/reference-tables/index.js';

import { counter1Statistic } from '../registry.js';

import type { ActivityFacts } from '../facts/activity-facts.js';
import type { SummedDeclaration } from '../types.js';

/** `participating-org/@role` codes counted per role. */
export const PARTICIPANT_ROLES = {
  funding: '1',
  accountable: '2',
  extending: '3',
  implementing: '4',
} as const;

/**
 * Reference quality of a set of organisation elements:
 * - total_orgs: elements
 * - total_refs: with a `@ref`
 * - total_full_refs: with a non-empty `@ref`
 * - total_notself_refs: non-empty and not the reporting organisation
 * - total_valid_refs: of those, with a known identifier prefix
 */
export const referenceStats = (f: ActivityFacts, orgs: readonly XmlNode[]): Counter1 => {
  const reportingOrg = f.reportingOrgRef.value;
  const tally = new Tally()
    .set('total_orgs', orgs.length)
    .set('total_refs', 0)
    .set('total_full_refs', 0)
    .set('total_notself_refs', 0)
    .set('total_valid_refs', 0);

  for (const org of orgs) {
    const ref = attr(org, 'ref');
    if (ref === undefined) continue;
    tally.add('total_refs');
    if (ref === '') continue;
    tally.add('total_full_refs');
    if (ref === reportingOrg) continue;
    tally.add('total_notself_refs');
    if (validOrgPrefix(f.tables, f.major, ref).valid) tally.add('total_valid_refs');
  }
  return tally.toCounter();
};

/**
 * Matched identifier prefix of every non-empty, not-self reference
 * (`null` for references matching no prefix).
 */
export const prefixCounts = (f: ActivityFacts, orgs: readonly XmlNode[]): Counter1 => {
  const reportingOrg = f.reportingOrgRef.value;
  const tally = new Tally();
  for (const org of orgs) {
    const ref = attr(org, 'ref');
    if (ref === undefined || ref === '' || ref === reportingOrg) continue;
    tally.add(keyOf(validOrgPrefix(f.tables, f.major, ref).prefix));
  }
  return tally.toCounter();
};

const participants = (f: ActivityFacts, role: string): XmlNode[] =>
  children(f.element, 'participating-org').filter((org) => attr(org, 'role') === role);

const transactionOrgs = (f: ActivityFacts, tag: string): XmlNode[] =>
  f.transactions.value.flatMap((transaction) => {
    const org = child(transaction, tag);
    return org === undefined ? [] : [org];
  });

const participantStatistics = Object.entries(PARTICIPANT_ROLES).flatMap(([name, role]) => [
  counter1Statistic<ActivityFacts>(`${name}_org_transaction_stats`, (f) => referenceStats(f, participants(f, role))),
  counter1Statistic<ActivityFacts>(`${name}_org_valid_prefixes`, (f) => prefixCounts(f, participants(f, role))),
]);

const transactionStatistics = ['provider', 'receiver'].flatMap((name) => [
  counter1Statistic<ActivityFacts>(`${name}_org_transaction_stats`, (f) =>
    referenceStats(f, transactionOrgs(f, `${name}-org`))
  ),
  counter1Statistic<ActivityFacts>(`${name}_org_valid_prefixes`, (f) =>
    prefixCounts(f, transactionOrgs(f, `${name}-org`))
  ),
]);

export const orgReferenceStatistics: SummedDeclaration<ActivityFacts>[] = [
  ...participantStatistics,
  ...transactionStatistics,
];
