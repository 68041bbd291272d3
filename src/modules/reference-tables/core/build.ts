import { Decimal } from 'decimal.js';

import type {
  CodelistMappingEntry,
  CodelistName,
  CodelistSet,
  MajorVersion,
  ReferenceSpend,
  ReferenceSpendRow,
  ReferenceTables,
  ReferenceTablesInput,
} from './types.js';

const RECORD_PATH_PREFIX = '//iati-activity/';

const buildCodelistSet = (lists: Partial<Record<CodelistName, readonly string[]>>): CodelistSet => {
  const set = (name: CodelistName): ReadonlySet<string> => new Set(lists[name] ?? []);
  return {
    Version: set('Version'),
    ActivityStatus: set('ActivityStatus'),
    Currency: set('Currency'),
    Sector: set('Sector'),
    SectorCategory: set('SectorCategory'),
    DocumentCategory: set('DocumentCategory'),
    AidType: set('AidType'),
    BudgetNotProvided: set('BudgetNotProvided'),
    OrganisationRegistrationAgency: set('OrganisationRegistrationAgency'),
    CRSChannelCode: set('CRSChannelCode'),
  };
};

const buildPrefixList = (codelists: CodelistSet): string[] => {
  const agencies = [...codelists.OrganisationRegistrationAgency].sort(
    (a, b) => b.length - a.length || a.localeCompare(b)
  );
  const channels = [...codelists.CRSChannelCode].sort((a, b) => a.localeCompare(b));
  return [...agencies, ...channels];
};

/**
 * Keeps unconditional mappings on activity descendants and makes their
 * paths record-relative (`//iati-activity/sector/@code` → `sector/@code`).
 */
export const toCodelistPaths = (mappings: readonly CodelistMappingEntry[]): string[] => {
  const paths = new Set<string>();
  for (const mapping of mappings) {
    if (mapping.condition !== undefined && mapping.condition !== '') continue;
    if (!mapping.path.startsWith(RECORD_PATH_PREFIX)) continue;
    const relative = mapping.path.slice(RECORD_PATH_PREFIX.length);
    if (relative.includes('@')) paths.add(relative);
  }
  return [...paths];
};

/**
 * Parses a published amount such as `1,234.5`; anything else is null.
 */
export const parsePublishedAmount = (raw: string): Decimal | null => {
  const cleaned = raw.replace(/,/g, '').trim();
  if (!/^[+-]?([0-9]+(\.[0-9]*)?|\.[0-9]+)([eE][+-]?[0-9]+)?$/.test(cleaned)) return null;
  return new Decimal(cleaned);
};

const buildReferenceSpend = (
  rows: readonly ReferenceSpendRow[],
  registryIdMatches: Readonly<Record<string, string>>
): Map<string, ReferenceSpend> => {
  const renames = new Map(Object.entries(registryIdMatches));
  const out = new Map<string, ReferenceSpend>();
  for (const row of rows) {
    const registryId = renames.get(row.registryId) ?? row.registryId;
    out.set(registryId, {
      publisherName: row.publisherName,
      spend2014: parsePublishedAmount(row.spend2014),
      spend2015: parsePublishedAmount(row.spend2015),
      officialForecast2015: parsePublishedAmount(row.officialForecast2015),
      currency: row.currency,
      spendDataErrorReported: row.spendDataError === 'Y',
      dac: row.dacStatus.includes('DAC'),
    });
  }
  return out;
};

/**
 * Builds the immutable lookup structures from raw reference data.
 */
export function createReferenceTables(input: ReferenceTablesInput): ReferenceTables {
  const codelists: Record<MajorVersion, CodelistSet> = {
    '1': buildCodelistSet(input.codelists['1']),
    '2': buildCodelistSet(input.codelists['2']),
  };

  const countryLanguages = new Map<string, string[]>();
  for (const { country, language } of input.countryLanguages ?? []) {
    const languages = countryLanguages.get(country);
    if (languages === undefined) {
      countryLanguages.set(country, [language]);
    } else {
      languages.push(language);
    }
  }

  return {
    codelists,
    orgIdPrefixes: {
      '1': buildPrefixList(codelists['1']),
      '2': buildPrefixList(codelists['2']),
    },
    countryLanguages,
    referenceSpend: buildReferenceSpend(input.referenceSpend ?? [], input.registryIdMatches ?? {}),
    codelistPaths: {
      '1': toCodelistPaths(input.codelistMappings?.['1'] ?? []),
      '2': toCodelistPaths(input.codelistMappings?.['2'] ?? []),
    },
  };
}
