import { describe, expect, it } from 'vitest';

import {
  createReferenceTables,
  isCodeIn,
  languagesFor,
  parsePublishedAmount,
  toCodelistPaths,
  validOrgPrefix,
  type ReferenceSpendRow,
} from '@/modules/reference-tables/index.js';

import { makeTables } from '../../fixtures/builders.js';

const spendRow = (overrides: Partial<ReferenceSpendRow> = {}): ReferenceSpendRow => ({
  publisherName: 'Example Agency',
  registryId: 'example-agency',
  spend2014: '1,000',
  dacStatus: 'DAC member',
  spend2015: '',
  officialForecast2015: '2,500.5',
  currency: 'EUR',
  spendDataError: '',
  ...overrides,
});

describe('toCodelistPaths', () => {
  it('keeps unconditional attribute mappings on activities as relative paths', () => {
    const paths = toCodelistPaths([
      { path: '//iati-activity/sector/@code', codelist: 'Sector' },
      { path: '//iati-activity/sector/@code', codelist: 'Sector', condition: "@vocabulary = '1'" },
      { path: '//iati-activity/@default-currency', codelist: 'Currency' },
      { path: '//iati-activity/activity-status/@code', codelist: 'ActivityStatus', condition: '' },
      { path: '//iati-organisation/reporting-org/@type', codelist: 'OrganisationType' },
      { path: '//iati-activity/sector', codelist: 'Sector' },
    ]);

    expect(paths).toEqual(['sector/@code', '@default-currency', 'activity-status/@code']);
  });
});

describe('parsePublishedAmount', () => {
  it('drops thousands separators', () => {
    expect(parsePublishedAmount('1,250,000')?.toFixed()).toBe('1250000');
    expect(parsePublishedAmount(' 12.5 ')?.toFixed()).toBe('12.5');
  });

  it('returns null for missing figures', () => {
    expect(parsePublishedAmount('')).toBeNull();
    expect(parsePublishedAmount('n/a')).toBeNull();
  });
});

describe('createReferenceTables', () => {
  it('orders organisation prefixes: agencies longest first, then channel codes', () => {
    const tables = createReferenceTables({
      codelists: {
        '1': {},
        '2': { OrganisationRegistrationAgency: ['GB', 'GB-CHC', 'XM-DAC'], CRSChannelCode: ['41114', '21000'] },
      },
    });

    expect(tables.orgIdPrefixes['2']).toEqual(['GB-CHC', 'XM-DAC', 'GB', '21000', '41114']);
    expect(tables.orgIdPrefixes['1']).toEqual([]);
  });

  it('groups languages by country', () => {
    const tables = makeTables();

    expect(languagesFor(tables, 'KE')).toEqual(['sw', 'en']);
    expect(languagesFor(tables, 'FR')).toEqual([]);
  });

  it('parses reference spend and applies registry renames', () => {
    const tables = createReferenceTables({
      codelists: { '1': {}, '2': {} },
      referenceSpend: [
        spendRow({ registryId: 'old-agency' }),
        spendRow({ registryId: 'foundation', dacStatus: 'Other', spendDataError: 'Y', spend2014: 'n/a' }),
      ],
      registryIdMatches: { 'old-agency': 'example-agency' },
    });

    const agency = tables.referenceSpend.get('example-agency');
    expect(tables.referenceSpend.has('old-agency')).toBe(false);
    expect(agency?.spend2014?.toFixed()).toBe('1000');
    expect(agency?.spend2015).toBeNull();
    expect(agency?.officialForecast2015?.toFixed()).toBe('2500.5');
    expect(agency?.dac).toBe(true);
    expect(agency?.spendDataErrorReported).toBe(false);

    const foundation = tables.referenceSpend.get('foundation');
    expect(foundation?.spend2014).toBeNull();
    expect(foundation?.dac).toBe(false);
    expect(foundation?.spendDataErrorReported).toBe(true);
  });

  it('looks up registry renames by own keys only', () => {
    const tables = createReferenceTables({
      codelists: { '1': {}, '2': {} },
      referenceSpend: [spendRow({ registryId: 'constructor' })],
      registryIdMatches: {},
    });

    expect([...tables.referenceSpend.keys()]).toEqual(['constructor']);
  });
});

describe('lookups', () => {
  const tables = makeTables();

  it('checks codes against the codelist of a major version', () => {
    expect(isCodeIn(tables, '2', 'Currency', 'EUR')).toBe(true);
    expect(isCodeIn(tables, '2', 'Currency', 'eur')).toBe(false);
    expect(isCodeIn(tables, '2', 'Currency', null)).toBe(false);
    expect(isCodeIn(tables, '1', 'Currency', undefined)).toBe(false);
  });

  it('matches organisation references against known prefixes', () => {
    expect(validOrgPrefix(tables, '2', 'GB-COH-123456')).toEqual({ valid: true, prefix: 'GB-COH' });
    expect(validOrgPrefix(tables, '2', '21000-fund')).toEqual({ valid: true, prefix: '21000' });
    expect(validOrgPrefix(tables, '2', 'ZZ-123')).toEqual({ valid: false, prefix: null });
  });
});
