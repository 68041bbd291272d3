import { Decimal } from 'decimal.js';

import { derivedStatistic, type DerivedDeclaration } from '@/modules/statistics/index.js';

import type { GroupFacts } from './group-facts.js';
import type { Counter1, Counter2, DerivedValue } from '@/modules/aggregation/index.js';

const ZERO = new Decimal(0);

/**
 * Per publisher sum of the values whose activity id passes `include`.
 */
const sumByPublisher = (byPublisher: Counter2, include: (activityId: string) => boolean): Map<string, Decimal> => {
  const out = new Map<string, Decimal>();
  for (const [publisher, byActivity] of Object.entries(byPublisher)) {
    for (const [activityId, value] of Object.entries(byActivity)) {
      if (!include(activityId)) continue;
      out.set(publisher, (out.get(publisher) ?? ZERO).plus(value));
    }
  }
  return out;
};

export interface TraceabilityTotals {
  readonly traceableActivities: ReadonlyMap<string, Decimal>;
  readonly totalActivities: ReadonlyMap<string, Decimal>;
  readonly traceableSpend: ReadonlyMap<string, Decimal>;
  readonly totalSpend: ReadonlyMap<string, Decimal>;
}

/**
 * Activities (and their USD commitments and disbursements) that another
 * publisher names as a provider activity, against the publisher's totals.
 */
export const traceabilityTotals = (f: GroupFacts): TraceabilityTotals => {
  const referenced = f.counter1('provider_activity_id_without_own');
  const isReferenced = (id: string): boolean => referenced[id] !== undefined;
  const identifiers = f.counter2('iati_identifiers_by_publisher_id');
  const spend = f.counter2('sum_commitments_and_disbursements_by_activity_id_by_publisher_id_usd');

  return {
    traceableActivities: sumByPublisher(identifiers, isReferenced),
    totalActivities: sumByPublisher(identifiers, () => true),
    traceableSpend: sumByPublisher(spend, isReferenced),
    totalSpend: sumByPublisher(spend, () => true),
  };
};

/**
 * Formats like a `%.{digits}g` conversion: `digits` significant digits,
 * trailing zeros dropped, exponent notation for very small or large values.
 */
export const formatSignificant = (value: Decimal, digits = 2): string => {
  if (value.isZero()) return '0';
  const rounded = value.toSignificantDigits(digits, Decimal.ROUND_HALF_EVEN);
  const exponent = rounded.e;
  if (exponent < -4 || exponent >= digits) {
    const mantissa = rounded.div(new Decimal(10).pow(exponent)).toString();
    const sign = exponent < 0 ? '-' : '+';
    return `${mantissa}e${sign}${String(Math.abs(exponent)).padStart(2, '0')}`;
  }
  return rounded.toFixed();
};

export type TraceablePercentage = {
  readonly traceable_activities: number;
  readonly total_activities: number;
  readonly activities_percentage: string;
  readonly traceable_spend: string;
  readonly total_spend: string;
  /** Empty when the publisher reports no spend */
  readonly spend_percentage: string;
};

/**
 * Traceability per publisher. Publishers without activities or without
 * traceable activities are left out.
 */
export const traceablePercentages = (totals: TraceabilityTotals): Record<string, TraceablePercentage> => {
  const out = new Map<string, TraceablePercentage>();
  for (const [publisher, totalActivities] of totals.totalActivities) {
    const traceableActivities = totals.traceableActivities.get(publisher) ?? ZERO;
    if (totalActivities.isZero() || traceableActivities.isZero()) continue;

    const activitiesPercentage = traceableActivities.div(totalActivities).times(100);
    const traceableSpend = totals.traceableSpend.get(publisher) ?? ZERO;
    const totalSpend = totals.totalSpend.get(publisher) ?? ZERO;

    out.set(publisher, {
      traceable_activities: traceableActivities.toNumber(),
      total_activities: totalActivities.toNumber(),
      activities_percentage: activitiesPercentage.eq(100) ? '100.0' : formatSignificant(activitiesPercentage),
      traceable_spend: traceableSpend.toFixed(),
      total_spend: totalSpend.toFixed(),
      spend_percentage: totalSpend.isZero() ? '' : formatSignificant(traceableSpend.div(totalSpend).times(100)),
    });
  }
  return Object.fromEntries(out);
};

const counts = (values: ReadonlyMap<string, Decimal>): Record<string, DerivedValue> =>
  Object.fromEntries([...values].map(([key, value]) => [key, value.toNumber()]));

const amounts = (values: ReadonlyMap<string, Decimal>): Record<string, DerivedValue> =>
  Object.fromEntries([...values].map(([key, value]) => [key, value.toFixed()]));

const duplicates = (identifiers: Counter1): Record<string, DerivedValue> =>
  Object.fromEntries(
    Object.entries(identifiers)
      .filter(([, count]) => count.gt(1))
      .map(([id, count]) => [id, count.toNumber()])
  );

export const CORPUS_DERIVED_STATISTICS: readonly DerivedDeclaration<GroupFacts>[] = [
  derivedStatistic<GroupFacts>('unique_identifiers', (f) => Object.keys(f.counter1('iati_identifiers')).length),

  derivedStatistic<GroupFacts>('duplicate_identifiers', (f) => duplicates(f.counter1('iati_identifiers'))),

  derivedStatistic<GroupFacts>('traceable_activities_by_publisher_id', (f) =>
    counts(traceabilityTotals(f).traceableActivities)
  ),

  derivedStatistic<GroupFacts>('traceable_activities_by_publisher_id_denominator', (f) =>
    counts(traceabilityTotals(f).totalActivities)
  ),

  derivedStatistic<GroupFacts>('traceable_sum_commitments_and_disbursements_by_publisher_id', (f) =>
    amounts(traceabilityTotals(f).traceableSpend)
  ),

  derivedStatistic<GroupFacts>('traceable_sum_commitments_and_disbursements_by_publisher_id_denominator', (f) =>
    amounts(traceabilityTotals(f).totalSpend)
  ),

  derivedStatistic<GroupFacts>('traceable_percentages', (f) => traceablePercentages(traceabilityTotals(f))),
];
