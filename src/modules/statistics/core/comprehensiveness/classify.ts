import { addYears, compareDates, selectAttr } from '@/modules/record-tree/index.js';

import type { ActivityFacts } from '../facts/activity-facts.js';

/**
 * Why an activity counts as current:
 * - 0: not current
 * - 1: no planned end and an active status code
 * - 2: actual end within the last year
 * - 3: planned end today or later
 */
export type CurrentStatus = 0 | 1 | 2 | 3;

/** `activity-status/@code` values of activities still in progress. */
export const ACTIVE_STATUS_CODES: readonly string[] = ['2', '4'];

export function classifyCurrent(facts: ActivityFacts): CurrentStatus {
  const today = facts.ctx.today;
  const plannedEnds = facts.plannedEndDates.value;
  const statusCode = selectAttr(facts.element, 'activity-status/@code')[0];

  if (plannedEnds.length === 0 && statusCode !== undefined && ACTIVE_STATUS_CODES.includes(statusCode)) {
    return 1;
  }

  const yearAgo = addYears(today, -1);
  for (const actualEnd of facts.actualEndDates.value) {
    if (compareDates(actualEnd, yearAgo) >= 0 && compareDates(actualEnd, today) <= 0) {
      return 2;
    }
  }

  for (const plannedEnd of plannedEnds) {
    if (compareDates(plannedEnd, today) >= 0) return 3;
  }

  return 0;
}
