import { Tally, Tally2, presence } from '@/modules/aggregation/index.js';
import {
  attr,
  child,
  children,
  daysBetween,
  formatDate,
  isoDate,
  keyOf,
  selectAttr,
  transactionDate,
  type CalendarDate,
} from '@/modules/record-tree/index.js';

import { counter1Statistic, counter2Statistic, numberStatistic } from '../registry.js';
import { countValuesAt } from './shared.js';

import type { ActivityFacts } from '../facts/activity-facts.js';
import type { SummedDeclaration } from '../types.js';

/** Attribute paths whose boolean-like values are counted. */
export const BOOLEAN_PATHS: readonly string[] = [
  'conditions/@attached',
  'crs-add/aidtype-flag/@significance',
  'crs-add/other-flags/@significance',
  'fss/@priority',
  '@humanitarian',
  'reporting-org/@secondary-reporter',
  'result/indicator/@ascending',
  'result/@aggregation-status',
  'transaction/@humanitarian',
];

/** Day windows of `_transaction_timing`. */
export const TIMING_WINDOWS: readonly number[] = [30, 60, 90, 180, 360];

const dateKey = (date: CalendarDate | null): string => (date === null ? 'null' : formatDate(date));

// ─────────────────────────────────────────────────────────────────────────────
// Identity
// ─────────────────────────────────────────────────────────────────────────────

export const identityStatistics: SummedDeclaration<ActivityFacts>[] = [
  numberStatistic<ActivityFacts>('activities', () => 1),

  counter1Statistic<ActivityFacts>('iati_identifiers', (f) => presence([keyOf(f.identifier.value)])),

  counter1Statistic<ActivityFacts>('hierarchies', (f) => presence([keyOf(attr(f.element, 'hierarchy'))])),

  counter1Statistic<ActivityFacts>('_currencies', (f) => {
    const currencies = f.transactions.value.flatMap((transaction) => {
      const value = child(transaction, 'value');
      if (value === undefined) return [];
      const currency = attr(value, 'currency');
      return [keyOf(currency !== undefined && currency !== '' ? currency : f.defaultCurrency)];
    });
    return presence(currencies);
  }),

  counter1Statistic<ActivityFacts>('_activities_per_year', (f) => presence([keyOf(f.startYear.value)])),

  counter1Statistic<ActivityFacts>('activities_secondary_reported', (f) =>
    f.isSecondaryReported.value ? presence([keyOf(f.identifier.value)]) : {}
  ),

  counter2Statistic<ActivityFacts>('boolean_values', (f) => countValuesAt(f.element, BOOLEAN_PATHS)),
];

// ─────────────────────────────────────────────────────────────────────────────
// Transactions
// ─────────────────────────────────────────────────────────────────────────────

const countTransactionOrgs = (f: ActivityFacts, tag: string) => {
  const tally = new Tally();
  for (const transaction of f.transactions.value) {
    const org = child(transaction, tag);
    if (org !== undefined) tally.add(keyOf(attr(org, 'ref')));
  }
  return tally.toCounter();
};

const countActivityDates = (f: ActivityFacts) => {
  const tally = new Tally2();
  for (const activityDate of children(f.element, 'activity-date')) {
    tally.add(keyOf(attr(activityDate, 'type')), dateKey(isoDate(activityDate)));
  }
  return tally.toCounter();
};

export const transactionStatistics: SummedDeclaration<ActivityFacts>[] = [
  numberStatistic<ActivityFacts>('transaction_total', (f) => f.transactions.value.length),

  counter1Statistic<ActivityFacts>('_transactions_incoming_funds', (f) => {
    const incoming = f.transactionsOfType([f.codes.incomingFunds]).length;
    const tally = new Tally().set('transactions_with_incoming_funds', incoming);
    if (incoming > 0) tally.set('activities_with_incoming_funds', 1);
    return tally.toCounter();
  }),

  counter1Statistic<ActivityFacts>('_transaction_timing', (f) => {
    const tally = new Tally();
    for (const window of TIMING_WINDOWS) tally.set(String(window), 0);
    for (const transaction of f.transactions.value) {
      const date = transactionDate(transaction);
      if (date === null) continue;
      const days = daysBetween(date, f.ctx.today);
      if (days < -1) continue;
      for (const window of TIMING_WINDOWS) {
        if (days < window) tally.add(String(window));
      }
    }
    return tally.toCounter();
  }),

  counter1Statistic<ActivityFacts>('_transaction_months', (f) => {
    const tally = new Tally();
    for (const transaction of f.transactions.value) {
      const date = transactionDate(transaction);
      if (date !== null) tally.add(String(date.month));
    }
    return tally.toCounter();
  }),

  counter1Statistic<ActivityFacts>('transaction_months_with_year', (f) => {
    const tally = new Tally();
    for (const transaction of f.transactions.value) {
      const date = transactionDate(transaction);
      if (date !== null) tally.add(`${String(date.year)}-${String(date.month).padStart(2, '0')}`);
    }
    return tally.toCounter();
  }),

  counter2Statistic<ActivityFacts>('transaction_dates', (f) => {
    const tally = new Tally2();
    for (const transaction of f.transactions.value) {
      tally.add(keyOf(f.transactionType(transaction)), dateKey(transactionDate(transaction)));
    }
    return tally.toCounter();
  }),

  counter2Statistic<ActivityFacts>('activity_dates', countActivityDates),

  counter2Statistic<ActivityFacts>('activity_dates_humanitarian', (f) => {
    const flag = attr(f.element, 'humanitarian');
    return flag === '1' || flag === 'true' ? countActivityDates(f) : {};
  }),

  counter2Statistic<ActivityFacts>('_count_transactions_by_type_by_year', (f) => {
    const tally = new Tally2();
    for (const transaction of f.transactions.value) {
      tally.add(keyOf(f.transactionType(transaction)), keyOf(transactionDate(transaction)?.year));
    }
    return tally.toCounter();
  }),

  numberStatistic<ActivityFacts>('activities_with_future_transactions', (f) =>
    f.transactions.value.some((transaction) => {
      const date = transactionDate(transaction);
      return date !== null && daysBetween(f.ctx.today, date) > 0;
    })
      ? 1
      : 0
  ),

  counter1Statistic<ActivityFacts>('provider_activity_id', (f) => {
    const own = f.identifier.value;
    const tally = new Tally();
    for (const id of selectAttr(f.element, 'transaction/provider-org/@provider-activity-id')) {
      if (id !== own) tally.add(id);
    }
    return tally.toCounter();
  }),

  counter1Statistic<ActivityFacts>('_provider_org', (f) => countTransactionOrgs(f, 'provider-org')),

  counter1Statistic<ActivityFacts>('_receiver_org', (f) => countTransactionOrgs(f, 'receiver-org')),

  counter1Statistic<ActivityFacts>('_budget_lengths', (f) => {
    const tally = new Tally();
    for (const budget of f.budgets.value) {
      const start = isoDate(child(budget, 'period-start'));
      const end = isoDate(child(budget, 'period-end'));
      if (start !== null && end !== null) tally.add(String(daysBetween(start, end)));
    }
    return tally.toCounter();
  }),
];
