import { child, type XmlNode } from '@/modules/record-tree/index.js';

import { countElementPaths } from '../elements.js';
import { lazy } from '../lazy.js';

import type { EvaluationContext } from '../types.js';
import type { MajorVersion, ReferenceTables } from '@/modules/reference-tables/index.js';

/** Version assumed when a document declares none or an unknown one. */
export const LEGACY_VERSION = '1.01';

/** Versions that define the `@humanitarian` attribute. */
export const HUMANITARIAN_VERSIONS: readonly string[] = ['2.02', '2.03'];

/**
 * Codes whose spelling changed between major versions.
 */
export interface VersionCodes {
  readonly plannedStart: string;
  readonly actualStart: string;
  readonly plannedEnd: string;
  readonly actualEnd: string;
  readonly incomingFunds: string;
  readonly commitment: string;
  readonly disbursement: string;
  readonly expenditure: string;
  readonly dac5: string;
  readonly dac3: string;
  readonly funding: string;
  readonly extending: string;
  readonly implementing: string;
}

export const VERSION_CODES: Readonly<Record<MajorVersion, VersionCodes>> = {
  '1': {
    plannedStart: 'start-planned',
    actualStart: 'start-actual',
    plannedEnd: 'end-planned',
    actualEnd: 'end-actual',
    incomingFunds: 'IF',
    commitment: 'C',
    disbursement: 'D',
    expenditure: 'E',
    dac5: 'DAC',
    dac3: 'DAC-3',
    funding: 'Funding',
    extending: 'Extending',
    implementing: 'Implementing',
  },
  '2': {
    plannedStart: '1',
    actualStart: '2',
    plannedEnd: '3',
    actualEnd: '4',
    incomingFunds: '1',
    commitment: '2',
    disbursement: '3',
    expenditure: '4',
    dac5: '1',
    dac3: '2',
    funding: '1',
    extending: '3',
    implementing: '4',
  },
};

export interface ResolvedVersion {
  readonly version: string;
  readonly major: MajorVersion;
  /** True when the declared version was absent or unknown */
  readonly fallback: boolean;
}

export const majorVersionOf = (version: string): MajorVersion =>
  version.startsWith('2.') ? '2' : '1';

/**
 * Declared document version if the Version codelist knows it, otherwise the
 * legacy version.
 */
export const resolveVersion = (
  declared: string | null,
  tables: ReferenceTables
): ResolvedVersion => {
  const known = declared !== null && declared !== '' && tables.codelists['2'].Version.has(declared);
  const version = known ? declared : LEGACY_VERSION;
  return { version, major: majorVersionOf(version), fallback: !known };
};

/**
 * Facts shared by activity and organisation records. Every derived value is
 * computed at most once per record.
 */
export class RecordFacts {
  readonly version: string;
  readonly major: MajorVersion;
  readonly versionFallback: boolean;
  readonly codes: VersionCodes;

  constructor(
    readonly element: XmlNode,
    readonly declaredVersion: string | null,
    readonly ctx: EvaluationContext
  ) {
    const resolved = resolveVersion(declaredVersion, ctx.tables);
    this.version = resolved.version;
    this.major = resolved.major;
    this.versionFallback = resolved.fallback;
    this.codes = VERSION_CODES[resolved.major];
  }

  get tables(): ReferenceTables {
    return this.ctx.tables;
  }

  readonly identifier = lazy((): string | null => {
    const text = child(this.element, 'iati-identifier')?.text;
    return text === undefined || text === null ? null : text;
  });

  /** Every element and attribute path under the record, with occurrence counts */
  readonly elementCounts = lazy(() => countElementPaths(this.element, this.element.tag));
}

export class OrganisationFacts extends RecordFacts {}
