import type { Decimal } from 'decimal.js';

export const MAJOR_VERSIONS = ['1', '2'] as const;

export type MajorVersion = (typeof MAJOR_VERSIONS)[number];

export const CODELIST_NAMES = [
  'Version',
  'ActivityStatus',
  'Currency',
  'Sector',
  'SectorCategory',
  'DocumentCategory',
  'AidType',
  'BudgetNotProvided',
  'OrganisationRegistrationAgency',
  'CRSChannelCode',
] as const;

export type CodelistName = (typeof CODELIST_NAMES)[number];

export type CodelistSet = Readonly<Record<CodelistName, ReadonlySet<string>>>;

/**
 * Externally published spend figures for one publisher.
 */
export interface ReferenceSpend {
  readonly publisherName: string;
  readonly spend2014: Decimal | null;
  readonly spend2015: Decimal | null;
  readonly officialForecast2015: Decimal | null;
  readonly currency: string;
  readonly spendDataErrorReported: boolean;
  readonly dac: boolean;
}

/**
 * Read-only lookup data shared by every evaluation. Built once at start-up.
 */
export interface ReferenceTables {
  readonly codelists: Readonly<Record<MajorVersion, CodelistSet>>;
  /**
   * Organisation identifier prefixes per major version: registration agency
   * codes (longest first) followed by CRS channel codes.
   */
  readonly orgIdPrefixes: Readonly<Record<MajorVersion, readonly string[]>>;
  /** ISO 3166-1 country code → ISO 639-1 language codes */
  readonly countryLanguages: ReadonlyMap<string, readonly string[]>;
  /** Publisher registry id → reference spend */
  readonly referenceSpend: ReadonlyMap<string, ReferenceSpend>;
  /** Record-relative attribute paths whose values come from a codelist */
  readonly codelistPaths: Readonly<Record<MajorVersion, readonly string[]>>;
}

// ─────────────────────────────────────────────────────────────────────────────
// Raw inputs
// ─────────────────────────────────────────────────────────────────────────────

export interface CodelistMappingEntry {
  path: string;
  codelist?: string | undefined;
  condition?: string | undefined;
}

/**
 * Row of the reference spend sheet. Amounts are kept as published
 * (possibly with thousands separators) and parsed on build.
 */
export interface ReferenceSpendRow {
  publisherName: string;
  registryId: string;
  spend2014: string;
  dacStatus: string;
  spend2015: string;
  officialForecast2015: string;
  currency: string;
  spendDataError: string;
}

export interface ReferenceTablesInput {
  codelists: Record<MajorVersion, Partial<Record<CodelistName, readonly string[]>>>;
  codelistMappings?: Partial<Record<MajorVersion, readonly CodelistMappingEntry[]>>;
  countryLanguages?: readonly { country: string; language: string }[];
  referenceSpend?: readonly ReferenceSpendRow[];
  /** Previous registry id → current registry id */
  registryIdMatches?: Readonly<Record<string, string>>;
}
