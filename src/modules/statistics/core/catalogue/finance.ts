import { Tally, Tally2, Tally3 } from '@/modules/aggregation/index.js';
import {
  attr,
  budgetYear,
  children,
  keyOf,
  plannedDisbursementYear,
  transactionDate,
} from '@/modules/record-tree/index.js';

import { counter1Statistic, counter2Statistic, counter3Statistic } from '../registry.js';

import type { ActivityFacts } from '../facts/activity-facts.js';
import type { SummedDeclaration } from '../types.js';
import type { Counter1, Counter3 } from '@/modules/aggregation/index.js';

/**
 * budget type → currency → year → amount, for budgets with a known year.
 */
const budgetSums = (f: ActivityFacts): Counter3 => {
  const tally = new Tally3();
  for (const budget of f.budgets.value) {
    const year = budgetYear(budget);
    if (year === null) continue;
    tally.add(keyOf(attr(budget, 'type')), keyOf(f.currencyOf(budget)), String(year), f.amountOf(budget));
  }
  return tally.toCounter();
};

export const financeStatistics: SummedDeclaration<ActivityFacts>[] = [
  counter2Statistic<ActivityFacts>('_spend_currency_year', (f) => {
    const tally = new Tally2();
    for (const transaction of f.transactionsOfType([f.codes.disbursement, f.codes.expenditure])) {
      tally.add(
        keyOf(transactionDate(transaction)?.year),
        keyOf(f.currencyOf(transaction)),
        f.amountOf(transaction)
      );
    }
    return tally.toCounter();
  }),

  counter2Statistic<ActivityFacts>('forwardlooking_currency_year', (f) => {
    const tally = new Tally2();
    for (const budget of f.budgets.value) {
      tally.add(keyOf(budgetYear(budget)), keyOf(f.currencyOf(budget)), f.amountOf(budget));
    }
    return tally.toCounter();
  }),

  counter3Statistic<ActivityFacts>('_sum_transactions_by_type_by_year', (f) => f.transactionSums.value),

  counter3Statistic<ActivityFacts>('sum_transactions_by_type_by_year_usd', (f) => f.transactionSumsUsd.value),

  counter2Statistic<ActivityFacts>('count_budgets_by_type_by_year', (f) => {
    const tally = new Tally2();
    for (const budget of f.budgets.value) {
      const year = budgetYear(budget);
      if (year !== null) tally.add(keyOf(attr(budget, 'type')), String(year));
    }
    return tally.toCounter();
  }),

  counter3Statistic<ActivityFacts>('sum_budgets_by_type_by_year', budgetSums),

  counter3Statistic<ActivityFacts>('sum_budgets_by_type_by_year_usd', (f) => f.toUsd(budgetSums(f), null)),

  counter1Statistic<ActivityFacts>('_count_planned_disbursements_by_year', (f) => {
    const tally = new Tally();
    for (const planned of children(f.element, 'planned-disbursement')) {
      tally.add(keyOf(plannedDisbursementYear(planned)));
    }
    return tally.toCounter();
  }),

  counter2Statistic<ActivityFacts>('_sum_planned_disbursements_by_year', (f) => {
    const tally = new Tally2();
    for (const planned of children(f.element, 'planned-disbursement')) {
      tally.add(keyOf(f.currencyOf(planned)), keyOf(plannedDisbursementYear(planned)), f.amountOf(planned));
    }
    return tally.toCounter();
  }),

  counter1Statistic<ActivityFacts>('sum_commitments_and_disbursements_by_activity_id_usd', (f): Counter1 => {
    const total = f.usdTotal(f.codes.commitment).plus(f.usdTotal(f.codes.disbursement));
    if (total.isZero()) return {};
    return Object.fromEntries([[keyOf(f.identifier.value), total]]);
  }),
];

// ─────────────────────────────────────────────────────────────────────────────
// Forward looking
// ─────────────────────────────────────────────────────────────────────────────

const perForwardYear = (f: ActivityFacts, counts: (year: number) => boolean): Counter1 => {
  const tally = new Tally();
  for (const year of f.forwardLookingYears) {
    const included = f.isForwardLookingCurrent(year) && f.forwardLookingExclusion(year) === 0;
    tally.set(String(year), included && counts(year) ? 1 : 0);
  }
  return tally.toCounter();
};

export const forwardLookingStatistics: SummedDeclaration<ActivityFacts>[] = [
  counter1Statistic<ActivityFacts>('forwardlooking_activities_current', (f) => perForwardYear(f, () => true)),

  counter1Statistic<ActivityFacts>('forwardlooking_activities_with_budgets', (f) =>
    perForwardYear(f, (year) => f.budgetYears.value.includes(year))
  ),

  counter1Statistic<ActivityFacts>('forwardlooking_activities_with_budget_not_provided', (f) =>
    perForwardYear(f, () => attr(f.element, 'budget-not-provided') !== undefined)
  ),
];
