import { Decimal } from 'decimal.js';
import { describe, expect, it } from 'vitest';

import { createSilentLogger } from '@/infra/logger/index.js';
import { counterOf, type StatMap } from '@/modules/aggregation/index.js';
import {
  budgetLengthMedian,
  classifyBudgetAlignment,
  classifyTimelag,
  classifyTimeliness,
  classifyTransactionAlignment,
  dateExtremes,
  deriveStatistics,
  GroupFacts,
  previousMonths,
  PUBLISHER_DERIVED_STATISTICS,
  PUBLISHER_STATISTICS,
  referenceSpendUsd,
} from '@/modules/group-stats/index.js';
import { statMapToJson } from '@/modules/pipeline/index.js';
import { derivedStatistic, evaluateDeclarations } from '@/modules/statistics/index.js';

import { counter2Of, makeContext, makeTables, TEST_TODAY } from '../../fixtures/builders.js';

import type { ReferenceSpendRow } from '@/modules/reference-tables/index.js';

describe('classifyTimeliness', () => {
  it('grades by the number of empty 30, 60 and 90 day windows', () => {
    expect(classifyTimeliness(counterOf({ '30': 2, '60': 2, '90': 2 }))).toBe('Monthly');
    expect(classifyTimeliness(counterOf({ '60': 1, '90': 1 }))).toBe('Monthly');
    expect(classifyTimeliness(counterOf({ '90': 1, '180': 1 }))).toBe('Quarterly');
    expect(classifyTimeliness(counterOf({ '180': 1, '360': 1 }))).toBe('Six-monthly');
    expect(classifyTimeliness(counterOf({ '360': 1 }))).toBe('Annual');
    expect(classifyTimeliness({})).toBe('Beyond one year');
  });
});

describe('previousMonths', () => {
  it('lists the twelve months before the current one', () => {
    expect(previousMonths(TEST_TODAY)).toEqual([
      '2024-05',
      '2024-04',
      '2024-03',
      '2024-02',
      '2024-01',
      '2023-12',
      '2023-11',
      '2023-10',
      '2023-09',
      '2023-08',
      '2023-07',
      '2023-06',
    ]);
  });
});

describe('classifyTimelag', () => {
  const timelag = (months: Record<string, number>) => classifyTimelag(counterOf(months), TEST_TODAY);

  it('grades by the most recent months with transactions', () => {
    expect(timelag({ '2024-05': 1, '2024-04': 3 })).toBe('One month');
    expect(timelag({ '2024-03': 1 })).toBe('A quarter');
    expect(timelag({ '2024-01': 1 })).toBe('Six months');
    expect(timelag({ '2023-07': 1 })).toBe('One year');
    expect(timelag({ '2022-01': 4 })).toBe('More than one year');
  });

  it('ignores the current month', () => {
    expect(timelag({ '2024-06': 10 })).toBe('More than one year');
  });
});

describe('classifyTransactionAlignment', () => {
  it('grades by the months and quarters covered', () => {
    const everyMonth = Object.fromEntries(Array.from({ length: 12 }, (_, i) => [String(i + 1), 1]));

    expect(classifyTransactionAlignment(counterOf(everyMonth))).toBe('Monthly');
    expect(classifyTransactionAlignment(counterOf({ '1': 1, '4': 1, '7': 1, '10': 1 }))).toBe('Quarterly');
    expect(classifyTransactionAlignment(counterOf({ '6': 3 }))).toBe('Annually');
    expect(classifyTransactionAlignment({})).toBe('');
  });
});

describe('budgetLengthMedian', () => {
  it('takes the middle length of the histogram', () => {
    expect(budgetLengthMedian(counterOf({ '365': 3 }))).toBe(365);
    expect(budgetLengthMedian(counterOf({ '30': 1, '90': 1, '365': 1 }))).toBe(90);
  });

  it('averages the two middle lengths of an even count', () => {
    expect(budgetLengthMedian(counterOf({ '90': 1, '365': 1 }))).toBe(227.5);
  });

  it('is null without budgets', () => {
    expect(budgetLengthMedian({})).toBeNull();
  });
});

describe('classifyBudgetAlignment', () => {
  it('grades the median budget length', () => {
    expect(classifyBudgetAlignment(null)).toBe('Not known');
    expect(classifyBudgetAlignment(90)).toBe('Quarterly');
    expect(classifyBudgetAlignment(365)).toBe('Annually');
    expect(classifyBudgetAlignment(370)).toBe('Beyond one year');
  });
});

describe('dateExtremes', () => {
  it('finds the earliest and latest date overall and per type', () => {
    const extremes = dateExtremes(
      counter2Of({
        '1': { '2021-05-05': 1, '2020-01-01': 2 },
        '3': { '2025-12-31': 1, null: 1 },
        '2': { null: 1 },
      })
    );

    expect(extremes).toEqual({
      min: { overall: '2020-01-01', by_type: { '1': '2020-01-01', '3': '2025-12-31' } },
      max: { overall: '2025-12-31', by_type: { '1': '2021-05-05', '3': '2025-12-31' } },
    });
  });

  it('reports null extremes without dates', () => {
    expect(dateExtremes({})).toEqual({
      min: { overall: null, by_type: {} },
      max: { overall: null, by_type: {} },
    });
  });
});

describe('referenceSpendUsd', () => {
  const row: ReferenceSpendRow = {
    publisherName: 'Example Agency',
    registryId: 'example-agency',
    spend2014: '1,000',
    dacStatus: 'DAC',
    spend2015: '',
    officialForecast2015: '2,500.5',
    currency: 'EUR',
    spendDataError: 'N',
  };
  const ctx = makeContext({ tables: makeTables({ referenceSpend: [row] }) });

  it('converts published spend to USD', () => {
    expect(referenceSpendUsd(new GroupFacts('example-agency', {}, ctx))).toEqual({
      '2014': { ref_spend: '1250', official_forecast: '' },
      '2015': { ref_spend: '', official_forecast: '2500.5' },
      spend_data_error_reported: 0,
      DAC: 1,
    });
  });

  it('reports only the flags for publishers without reference spend', () => {
    expect(referenceSpendUsd(new GroupFacts('unknown', {}, ctx))).toEqual({
      spend_data_error_reported: 0,
      DAC: 0,
    });
  });
});

describe('publisher statistics', () => {
  const stats: StatMap = {
    versions: { shape: 'counter1', value: counterOf({ '2.03': 1, '1.05': 1 }) },
    validation: { shape: 'counter1', value: counterOf({ pass: 2, fail: 1 }) },
    organisation_files: { shape: 'number', value: new Decimal(0) },
    iati_identifiers: { shape: 'counter1', value: counterOf({ 'A-1': 1, 'A-2': 2 }) },
    provider_activity_id: { shape: 'counter1', value: counterOf({ 'A-1': 1, 'B-9': 1 }) },
    sum_commitments_and_disbursements_by_activity_id_usd: { shape: 'counter1', value: counterOf({ 'A-1': 300 }) },
  };

  it('computes summed statistics from the publisher aggregate', () => {
    const facts = new GroupFacts('pub-a', stats, makeContext());

    expect(statMapToJson(evaluateDeclarations(PUBLISHER_STATISTICS, facts, createSilentLogger()))).toEqual({
      publishers: '1',
      publishers_per_version: { '2.03': '1', '1.05': '1' },
      publishers_validation: { fail: '1' },
      publisher_has_org_file: { no: '1' },
      publisher_unique_identifiers: '2',
      publisher_duplicate_identifiers: { 'A-2': '2' },
      provider_activity_id_without_own: { 'B-9': '1' },
      sum_commitments_and_disbursements_by_activity_id_by_publisher_id_usd: { 'pub-a': { 'A-1': '300' } },
      iati_identifiers_by_publisher_id: { 'pub-a': { 'A-1': '1', 'A-2': '2' } },
      statistic_anomalies: {},
    });
  });

  it('derives classifications and dates from the publisher aggregate', () => {
    const facts = new GroupFacts(
      'pub-a',
      {
        transaction_months_with_year: { shape: 'counter1', value: counterOf({ '2024-05': 1, '2024-04': 1 }) },
        _transaction_timing: { shape: 'counter1', value: counterOf({ '30': 1, '60': 1, '90': 1 }) },
        _transaction_months: { shape: 'counter1', value: counterOf({ '6': 1 }) },
        _budget_lengths: { shape: 'counter1', value: counterOf({ '365': 2 }) },
        activity_dates: { shape: 'counter2', value: counter2Of({ '2': { '2023-01-01': 1 } }) },
        transaction_dates: {
          shape: 'counter2',
          value: counter2Of({ '2': { '2024-02-01': 1, '2024-07-01': 1 }, '3': { '2024-06-01': 1, null: 1 } }),
        },
      },
      makeContext()
    );

    expect(deriveStatistics(PUBLISHER_DERIVED_STATISTICS, facts, createSilentLogger())).toEqual({
      timelag: 'One month',
      timeliness_transactions: 'Monthly',
      transaction_alignment: 'Annually',
      budget_length_median: 365,
      budget_alignment: 'Annually',
      date_extremes: {
        min: { overall: '2023-01-01', by_type: { '2': '2023-01-01' } },
        max: { overall: '2023-01-01', by_type: { '2': '2023-01-01' } },
      },
      most_recent_transaction_date: '2024-06-01',
      latest_transaction_date: '2024-07-01',
      reference_spend_data_usd: { spend_data_error_reported: 0, DAC: 0 },
    });
  });

  it('reads statistics of another shape as their identity', () => {
    const facts = new GroupFacts('pub-a', { versions: { shape: 'number', value: new Decimal(3) } }, makeContext());

    expect(facts.counter1('versions')).toEqual({});
    expect(facts.number('versions').toFixed()).toBe('3');
    expect(facts.counter2('missing')).toEqual({});
  });
});

describe('deriveStatistics', () => {
  it('yields null for a derivation that throws', () => {
    const declarations = [
      derivedStatistic<string>('length', (value) => value.length),
      derivedStatistic<string>('broken', () => {
        throw new Error('not available');
      }),
    ];

    expect(deriveStatistics(declarations, 'abc', createSilentLogger())).toEqual({ length: 3, broken: null });
  });
});
