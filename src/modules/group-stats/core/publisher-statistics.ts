import type { Decimal } from 'decimal.js';

import { presence, type Counter1, type DerivedValue } from '@/modules/aggregation/index.js';
import {
  addMonths,
  compareDates,
  formatDate,
  isoDateMatch,
  type CalendarDate,
} from '@/modules/record-tree/index.js';
import {
  counter1Statistic,
  counter2Statistic,
  derivedStatistic,
  numberStatistic,
  type DerivedDeclaration,
  type SummedDeclaration,
} from '@/modules/statistics/index.js';

import type { GroupFacts } from './group-facts.js';

// ─────────────────────────────────────────────────────────────────────────────
// Classifications
// ─────────────────────────────────────────────────────────────────────────────

export type Timeliness = 'Monthly' | 'Quarterly' | 'Six-monthly' | 'Annual' | 'Beyond one year';

/**
 * Reporting frequency from the aggregated transaction timing windows:
 * how many of the 30/60/90 day windows saw no transaction at all.
 */
export const classifyTimeliness = (timing: Counter1): Timeliness => {
  const count = (window: string): number => timing[window]?.toNumber() ?? 0;
  const emptyWindows = ['30', '60', '90'].filter((window) => count(window) === 0).length;

  if (emptyWindows <= 1) return 'Monthly';
  if (emptyWindows <= 2) return 'Quarterly';
  if (count('180') !== 0) return 'Six-monthly';
  if (count('360') !== 0) return 'Annual';
  return 'Beyond one year';
};

export type Timelag = 'One month' | 'A quarter' | 'Six months' | 'One year' | 'More than one year';

/** The twelve `YYYY-MM` months before the month of `today`, most recent first. */
export const previousMonths = (today: CalendarDate): string[] =>
  Array.from({ length: 12 }, (_, i) => {
    const month = addMonths({ year: today.year, month: today.month, day: 1 }, -(i + 1));
    return `${String(month.year)}-${String(month.month).padStart(2, '0')}`;
  });

/**
 * How far behind the publisher's transactions lag, from the months in which
 * transactions were reported.
 */
export const classifyTimelag = (monthsWithYear: Counter1, today: CalendarDate): Timelag => {
  const reported = previousMonths(today).map((month) => monthsWithYear[month] !== undefined);
  const lastQuarter = reported.slice(0, 3).filter(Boolean).length;

  if (lastQuarter >= 2) return 'One month';
  if (lastQuarter >= 1) return 'A quarter';
  if (reported.slice(0, 6).includes(true)) return 'Six months';
  if (reported.includes(true)) return 'One year';
  return 'More than one year';
};

export type TransactionAlignment = 'Monthly' | 'Quarterly' | 'Annually' | '';

export const classifyTransactionAlignment = (months: Counter1): TransactionAlignment => {
  const keys = Object.keys(months);
  if (keys.length === 12) return 'Monthly';
  const quarters = new Set(keys.map((month) => Math.floor((Number(month) - 1) / 3)));
  if (quarters.size === 4) return 'Quarterly';
  if (keys.length >= 1) return 'Annually';
  return '';
};

/**
 * Median budget length in days from a length → count histogram. When the
 * median falls between two lengths it is their mean.
 */
export const budgetLengthMedian = (lengths: Counter1): number | null => {
  const bins = Object.entries(lengths)
    .map(([length, count]) => ({ length: Number(length), count: count.toNumber() }))
    .filter((bin) => Number.isInteger(bin.length))
    .sort((a, b) => a.length - b.length);
  const half = bins.reduce((sum, bin) => sum + bin.count, 0) / 2;

  let seen = 0;
  let median: number | null = null;
  for (const bin of bins) {
    seen += bin.count;
    if (seen < half) continue;
    median = median === null ? bin.length : (median + bin.length) / 2;
    if (seen !== half) break;
  }
  return median;
};

export type BudgetAlignment = 'Not known' | 'Quarterly' | 'Annually' | 'Beyond one year';

export const classifyBudgetAlignment = (median: number | null): BudgetAlignment => {
  if (median === null) return 'Not known';
  if (median < 100) return 'Quarterly';
  if (median < 370) return 'Annually';
  return 'Beyond one year';
};

// ─────────────────────────────────────────────────────────────────────────────
// Dates
// ─────────────────────────────────────────────────────────────────────────────

const datesOf = (keys: Iterable<string>): CalendarDate[] => {
  const dates: CalendarDate[] = [];
  for (const key of keys) {
    const date = isoDateMatch(key);
    if (date !== null) dates.push(date);
  }
  return dates;
};

const extreme = (dates: readonly CalendarDate[], pick: 'min' | 'max'): CalendarDate | null =>
  dates.reduce<CalendarDate | null>((best, date) => {
    if (best === null) return date;
    const order = compareDates(date, best);
    return (pick === 'min' ? order < 0 : order > 0) ? date : best;
  }, null);

/**
 * Earliest and latest activity dates, overall and per date type.
 */
export const dateExtremes = (activityDates: Readonly<Record<string, Counter1>>): DerivedValue => {
  const minByType: Record<string, string> = {};
  const maxByType: Record<string, string> = {};
  const mins: CalendarDate[] = [];
  const maxes: CalendarDate[] = [];

  for (const [type, dates] of Object.entries(activityDates)) {
    const parsed = datesOf(Object.keys(dates));
    const min = extreme(parsed, 'min');
    const max = extreme(parsed, 'max');
    if (min === null || max === null) continue;
    minByType[type] = formatDate(min);
    maxByType[type] = formatDate(max);
    mins.push(min);
    maxes.push(max);
  }

  const overallMin = extreme(mins, 'min');
  const overallMax = extreme(maxes, 'max');
  return {
    min: { overall: overallMin === null ? null : formatDate(overallMin), by_type: minByType },
    max: { overall: overallMax === null ? null : formatDate(overallMax), by_type: maxByType },
  };
};

const transactionDates = (f: GroupFacts): CalendarDate[] =>
  Object.values(f.counter2('transaction_dates')).flatMap((dates) => datesOf(Object.keys(dates)));

// ─────────────────────────────────────────────────────────────────────────────
// Reference spend
// ─────────────────────────────────────────────────────────────────────────────

const REFERENCE_SPEND_YEARS = [2014, 2015] as const;

/**
 * Published reference spend of the publisher converted to USD, with the
 * official forecast as published. Amounts are decimal strings, `''` when
 * not published.
 */
export const referenceSpendUsd = (f: GroupFacts): DerivedValue => {
  const spend = f.ctx.tables.referenceSpend.get(f.key);
  if (spend === undefined) return { spend_data_error_reported: 0, DAC: 0 };

  const amounts: Record<number, Decimal | null> = { 2014: spend.spend2014, 2015: spend.spend2015 };
  const forecasts: Record<number, Decimal | null> = { 2014: null, 2015: spend.officialForecast2015 };
  const out: Record<string, DerivedValue> = {};
  for (const year of REFERENCE_SPEND_YEARS) {
    const amount = amounts[year] ?? null;
    const forecast = forecasts[year] ?? null;
    out[String(year)] = {
      ref_spend: amount === null ? '' : f.ctx.converter.toUSD(spend.currency, amount, year).toFixed(),
      official_forecast: forecast === null ? '' : forecast.toFixed(),
    };
  }
  out['spend_data_error_reported'] = spend.spendDataErrorReported ? 1 : 0;
  out['DAC'] = spend.dac ? 1 : 0;
  return out;
};

// ─────────────────────────────────────────────────────────────────────────────
// Declarations
// ─────────────────────────────────────────────────────────────────────────────

const duplicates = (counts: Counter1): Counter1 =>
  Object.fromEntries(Object.entries(counts).filter(([, count]) => count.gt(1)));

/**
 * Statistics computed from one publisher's aggregate and summed across
 * publishers.
 */
export const PUBLISHER_STATISTICS: readonly SummedDeclaration<GroupFacts>[] = [
  numberStatistic<GroupFacts>('publishers', () => 1),

  counter1Statistic<GroupFacts>('publishers_per_version', (f) => presence(Object.keys(f.counter1('versions')))),

  counter1Statistic<GroupFacts>('publishers_validation', (f) =>
    presence([f.counter1('validation')['fail'] === undefined ? 'pass' : 'fail'])
  ),

  counter1Statistic<GroupFacts>('publisher_has_org_file', (f) =>
    presence([f.number('organisation_files').gt(0) ? 'yes' : 'no'])
  ),

  numberStatistic<GroupFacts>('publisher_unique_identifiers', (f) => Object.keys(f.counter1('iati_identifiers')).length),

  counter1Statistic<GroupFacts>('publisher_duplicate_identifiers', (f) => duplicates(f.counter1('iati_identifiers'))),

  counter1Statistic<GroupFacts>('provider_activity_id_without_own', (f) => {
    const own = f.counter1('iati_identifiers');
    return Object.fromEntries(
      Object.entries(f.counter1('provider_activity_id')).filter(([id]) => own[id] === undefined)
    );
  }),

  counter2Statistic<GroupFacts>('sum_commitments_and_disbursements_by_activity_id_by_publisher_id_usd', (f) =>
    Object.fromEntries([[f.key, f.counter1('sum_commitments_and_disbursements_by_activity_id_usd')]])
  ),

  counter2Statistic<GroupFacts>('iati_identifiers_by_publisher_id', (f) =>
    Object.fromEntries([[f.key, f.counter1('iati_identifiers')]])
  ),
];

/**
 * Statistics derived from one publisher's aggregate; never summed.
 */
export const PUBLISHER_DERIVED_STATISTICS: readonly DerivedDeclaration<GroupFacts>[] = [
  derivedStatistic<GroupFacts>('timelag', (f) =>
    classifyTimelag(f.counter1('transaction_months_with_year'), f.ctx.today)
  ),

  derivedStatistic<GroupFacts>('timeliness_transactions', (f) => classifyTimeliness(f.counter1('_transaction_timing'))),

  derivedStatistic<GroupFacts>('transaction_alignment', (f) =>
    classifyTransactionAlignment(f.counter1('_transaction_months'))
  ),

  derivedStatistic<GroupFacts>('budget_length_median', (f) => budgetLengthMedian(f.counter1('_budget_lengths'))),

  derivedStatistic<GroupFacts>('budget_alignment', (f) =>
    classifyBudgetAlignment(budgetLengthMedian(f.counter1('_budget_lengths')))
  ),

  derivedStatistic<GroupFacts>('date_extremes', (f) => dateExtremes(f.counter2('activity_dates'))),

  derivedStatistic<GroupFacts>('most_recent_transaction_date', (f) => {
    const past = transactionDates(f).filter((date) => compareDates(date, f.ctx.today) <= 0);
    const latest = extreme(past, 'max');
    return latest === null ? null : formatDate(latest);
  }),

  derivedStatistic<GroupFacts>('latest_transaction_date', (f) => {
    const latest = extreme(transactionDates(f), 'max');
    return latest === null ? null : formatDate(latest);
  }),

  derivedStatistic<GroupFacts>('reference_spend_data_usd', referenceSpendUsd),
];
