/**
 * Test data builders/factories
 * Provides sensible defaults for reference data, contexts and records
 */

import { Decimal } from 'decimal.js';

import { createSilentLogger } from '@/infra/logger/index.js';
import { counterOf, type Counter2 } from '@/modules/aggregation/index.js';
import {
  buildExchangeRateTable,
  createCurrencyConverter,
  type CurrencyConverter,
  type ExchangeRateRow,
} from '@/modules/currency/index.js';
import { parseXmlElement, type CalendarDate, type RecordInput, type XmlNode } from '@/modules/record-tree/index.js';
import {
  createReferenceTables,
  type ReferenceTables,
  type ReferenceTablesInput,
} from '@/modules/reference-tables/index.js';
import {
  ActivityFacts,
  OrganisationFacts,
  createStatisticsRegistry,
  evaluateRecord,
  type EvaluationContext,
  type StatisticsRegistry,
} from '@/modules/statistics/index.js';

import { makeSchemaValidator } from './fakes.js';

import type { StatsEngine } from '@/modules/pipeline/index.js';

export const TEST_TODAY: CalendarDate = { year: 2024, month: 6, day: 15 };

const VERSIONS = ['1.01', '1.02', '1.03', '1.04', '1.05', '2.01', '2.02', '2.03'];

const CODELISTS = {
  Version: VERSIONS,
  ActivityStatus: ['1', '2', '3', '4', '5', '6'],
  Currency: ['EUR', 'GBP', 'USD', 'KES'],
  Sector: ['11110', '12220', '72010', '73010'],
  SectorCategory: ['111', '122', '720'],
  DocumentCategory: ['A01', 'A02', 'A12'],
  AidType: ['A01', 'C01', 'D01'],
  BudgetNotProvided: ['1', '2', '3'],
  OrganisationRegistrationAgency: ['GB-CHC', 'GB-COH', 'XM-DAC'],
  CRSChannelCode: ['21000', '41114'],
};

/**
 * Reference tables with small codelists, the same for both major versions.
 */
export const makeTables = (overrides: Partial<ReferenceTablesInput> = {}): ReferenceTables =>
  createReferenceTables({
    codelists: { '1': CODELISTS, '2': CODELISTS },
    countryLanguages: [
      { country: 'KE', language: 'sw' },
      { country: 'KE', language: 'en' },
      { country: 'SN', language: 'fr' },
    ],
    ...overrides,
  });

export const rate = (currency: string, value: string, year: number): ExchangeRateRow => ({
  currency,
  rate: new Decimal(value),
  date: `${String(year)}-12-31`,
});

/**
 * Converter with EUR at 0.8 per USD (2013, 2014), GBP at 0.5 (2014) and USD at 1.
 */
export const makeConverter = (
  rows: readonly ExchangeRateRow[] = [
    rate('EUR', '0.8', 2013),
    rate('EUR', '0.8', 2014),
    rate('GBP', '0.5', 2014),
    rate('USD', '1', 2013),
    rate('USD', '1', 2014),
  ]
): CurrencyConverter => createCurrencyConverter(buildExchangeRateTable(rows));

export const makeContext = (overrides: Partial<EvaluationContext> = {}): EvaluationContext => ({
  tables: makeTables(),
  converter: makeConverter(),
  today: TEST_TODAY,
  usdClampYear: null,
  logger: createSilentLogger(),
  ...overrides,
});

export const makeRegistry = (): StatisticsRegistry => createStatisticsRegistry()._unsafeUnwrap();

export const makeEngine = (overrides: Partial<StatsEngine> = {}): StatsEngine => ({
  registry: makeRegistry(),
  context: makeContext(),
  validator: makeSchemaValidator(),
  ...overrides,
});

/**
 * Parses an XML fragment into a record tree.
 */
export const xml = (source: string): XmlNode => parseXmlElement(source)._unsafeUnwrap();

/**
 * An `iati-activity` element wrapping `body`.
 */
export const activityXml = (body: string, attributes = ''): string =>
  `<iati-activity${attributes === '' ? '' : ` ${attributes}`}>${body}</iati-activity>`;

export const makeActivity = (body: string, attributes = ''): XmlNode => xml(activityXml(body, attributes));

interface ActivityOptions {
  attributes?: string;
  version?: string | null;
  context?: EvaluationContext;
}

export const activityRecord = (body: string, options: ActivityOptions = {}): RecordInput => ({
  kind: 'activity',
  element: makeActivity(body, options.attributes ?? ''),
  documentVersion: options.version === undefined ? '2.03' : options.version,
});

export const activityFacts = (body: string, options: ActivityOptions = {}): ActivityFacts =>
  new ActivityFacts(
    makeActivity(body, options.attributes ?? ''),
    options.version === undefined ? '2.03' : options.version,
    options.context ?? makeContext()
  );

export const organisationFacts = (body: string, version: string | null = '2.03'): OrganisationFacts =>
  new OrganisationFacts(xml(`<iati-organisation>${body}</iati-organisation>`), version, makeContext());

/**
 * Every registered statistic of one activity, with decimals as strings.
 */
export const activityStats = (body: string, options: ActivityOptions = {}): Record<string, unknown> => {
  const stats = evaluateRecord(
    activityRecord(body, options),
    makeRegistry(),
    options.context ?? makeContext()
  )._unsafeUnwrap();
  return Object.fromEntries(Object.entries(stats).map(([name, result]) => [name, plain(result.value)]));
};

/**
 * Activities document with the given version and records.
 */
export const activitiesDocument = (records: readonly string[], version: string | null = '2.03'): string =>
  `<?xml version="1.0" encoding="UTF-8"?>\n<iati-activities${
    version === null ? '' : ` version="${version}"`
  }>${records.join('')}</iati-activities>`;

/**
 * Two-level counter from plain numbers.
 */
export const counter2Of = (entries: Readonly<Record<string, Readonly<Record<string, number>>>>): Counter2 =>
  Object.fromEntries(Object.entries(entries).map(([key, inner]) => [key, counterOf(inner)]));

/**
 * Decimal-valued objects as plain strings, for readable assertions.
 */
export const plain = (value: unknown): unknown => {
  if (Decimal.isDecimal(value)) return value.toFixed();
  if (typeof value === 'object' && value !== null) {
    return Object.fromEntries(Object.entries(value).map(([key, inner]) => [key, plain(inner)]));
  }
  return value;
};
