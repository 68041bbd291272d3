import { Tally, type Counter1 } from '@/modules/aggregation/index.js';
import { keyOf } from '@/modules/record-tree/index.js';

import type { CriterionResults } from './criteria.js';
import type { ActivityFacts } from '../facts/activity-facts.js';

/**
 * 1 per criterion that passed and whose denominator includes the activity,
 * 0 otherwise. Non-current activities contribute nothing.
 */
export const scoreCriteria = (facts: ActivityFacts, results: CriterionResults): Counter1 => {
  if (!facts.isCurrent) return {};

  const denominators = facts.denominators.value;
  const tally = new Tally();
  for (const [name, passed] of results) {
    const counted = denominators.get(name) ?? true;
    tally.set(name, passed && counted ? 1 : 0);
  }
  return tally.toCounter();
};

/**
 * Restricted denominators of a current activity; empty otherwise.
 */
export const scoreDenominators = (facts: ActivityFacts): Counter1 => {
  if (!facts.isCurrent) return {};

  const tally = new Tally();
  for (const [name, counted] of facts.denominators.value) {
    tally.set(name, counted ? 1 : 0);
  }
  return tally.toCounter();
};

export const currentActivity = (facts: ActivityFacts): Counter1 =>
  new Tally().set(keyOf(facts.identifier.value), facts.currentStatus.value).toCounter();
