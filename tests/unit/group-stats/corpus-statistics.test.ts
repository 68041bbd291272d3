import { Decimal } from 'decimal.js';
import { describe, expect, it } from 'vitest';

import { createSilentLogger } from '@/infra/logger/index.js';
import { counterOf, type StatMap } from '@/modules/aggregation/index.js';
import {
  CORPUS_DERIVED_STATISTICS,
  deriveStatistics,
  formatSignificant,
  GroupFacts,
  traceabilityTotals,
  traceablePercentages,
} from '@/modules/group-stats/index.js';

import { counter2Of, makeContext } from '../../fixtures/builders.js';

const corpusStats: StatMap = {
  iati_identifiers: { shape: 'counter1', value: counterOf({ 'A-1': 1, 'A-2': 1, 'B-1': 2 }) },
  provider_activity_id_without_own: { shape: 'counter1', value: counterOf({ 'A-1': 1 }) },
  iati_identifiers_by_publisher_id: {
    shape: 'counter2',
    value: counter2Of({ 'pub-a': { 'A-1': 1, 'A-2': 1 }, 'pub-b': { 'B-1': 1 } }),
  },
  sum_commitments_and_disbursements_by_activity_id_by_publisher_id_usd: {
    shape: 'counter2',
    value: counter2Of({ 'pub-a': { 'A-1': 300, 'A-2': 100 } }),
  },
};

const facts = new GroupFacts('corpus', corpusStats, makeContext());

describe('formatSignificant', () => {
  it('keeps two significant digits', () => {
    expect(formatSignificant(new Decimal(50))).toBe('50');
    expect(formatSignificant(new Decimal(0.5))).toBe('0.5');
    expect(formatSignificant(new Decimal(0))).toBe('0');
  });

  it('rounds half to even', () => {
    expect(formatSignificant(new Decimal(12.5))).toBe('12');
    expect(formatSignificant(new Decimal(99.5))).toBe('1e+02');
  });

  it('switches to exponent notation for large and small values', () => {
    expect(formatSignificant(new Decimal(150))).toBe('1.5e+02');
    expect(formatSignificant(new Decimal('0.00001234'))).toBe('1.2e-05');
  });
});

describe('traceabilityTotals', () => {
  it('sums referenced activities and spend per publisher', () => {
    const totals = traceabilityTotals(facts);

    expect(totals.traceableActivities.get('pub-a')?.toFixed()).toBe('1');
    expect(totals.traceableActivities.has('pub-b')).toBe(false);
    expect(totals.totalActivities.get('pub-b')?.toFixed()).toBe('1');
    expect(totals.traceableSpend.get('pub-a')?.toFixed()).toBe('300');
    expect(totals.totalSpend.get('pub-a')?.toFixed()).toBe('400');
  });
});

describe('traceablePercentages', () => {
  it('leaves out publishers without traceable activities', () => {
    expect(traceablePercentages(traceabilityTotals(facts))).toEqual({
      'pub-a': {
        traceable_activities: 1,
        total_activities: 2,
        activities_percentage: '50',
        traceable_spend: '300',
        total_spend: '400',
        spend_percentage: '75',
      },
    });
  });

  it('prints a full share as 100.0 and leaves the spend share empty without spend', () => {
    const percentages = traceablePercentages({
      traceableActivities: new Map([['pub-c', new Decimal(3)]]),
      totalActivities: new Map([['pub-c', new Decimal(3)]]),
      traceableSpend: new Map<string, Decimal>(),
      totalSpend: new Map<string, Decimal>(),
    });

    expect(percentages['pub-c']?.activities_percentage).toBe('100.0');
    expect(percentages['pub-c']?.spend_percentage).toBe('');
  });

  it('keeps publisher ids that collide with object members', () => {
    const percentages = traceablePercentages({
      traceableActivities: new Map([['__proto__', new Decimal(1)]]),
      totalActivities: new Map([['__proto__', new Decimal(2)]]),
      traceableSpend: new Map<string, Decimal>(),
      totalSpend: new Map<string, Decimal>(),
    });

    expect(Object.keys(percentages)).toEqual(['__proto__']);
    expect(Object.getPrototypeOf(percentages)).toBe(Object.prototype);
  });
});

describe('corpus statistics', () => {
  it('derives identifier and traceability statistics from the corpus aggregate', () => {
    const derived = deriveStatistics(CORPUS_DERIVED_STATISTICS, facts, createSilentLogger());

    expect(derived).toEqual({
      unique_identifiers: 3,
      duplicate_identifiers: { 'B-1': 2 },
      traceable_activities_by_publisher_id: { 'pub-a': 1 },
      traceable_activities_by_publisher_id_denominator: { 'pub-a': 2, 'pub-b': 1 },
      traceable_sum_commitments_and_disbursements_by_publisher_id: { 'pub-a': '300' },
      traceable_sum_commitments_and_disbursements_by_publisher_id_denominator: { 'pub-a': '400' },
      traceable_percentages: {
        'pub-a': {
          traceable_activities: 1,
          total_activities: 2,
          activities_percentage: '50',
          traceable_spend: '300',
          total_spend: '400',
          spend_percentage: '75',
        },
      },
    });
  });
});
