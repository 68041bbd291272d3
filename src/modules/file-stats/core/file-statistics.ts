import { Decimal } from 'decimal.js';

import { presence, Tally2, type Counter2, type StatMap } from '@/modules/aggregation/index.js';
import { keyOf, selectAttr, type ParsedDocument } from '@/modules/record-tree/index.js';
import {
  counter1Statistic,
  counter2Statistic,
  counter3Statistic,
  numberStatistic,
  resolveVersion,
  type SummedDeclaration,
} from '@/modules/statistics/index.js';

import type { SchemaValidator } from './ports.js';
import type { MajorVersion, ReferenceTables } from '@/modules/reference-tables/index.js';

/** Declared versions validated against the 1.01 schema. */
export const LEGACY_SCHEMA_VERSIONS: readonly string[] = ['1', '1.0', '1.00'];

const LEGACY_SCHEMA = '1.01';

/**
 * One parsed source document with what its statistics need.
 */
export class FileFacts {
  readonly major: MajorVersion;
  readonly version: string;

  constructor(
    readonly document: ParsedDocument,
    readonly validator: SchemaValidator,
    readonly tables: ReferenceTables
  ) {
    const resolved = resolveVersion(document.version, tables);
    this.major = resolved.major;
    this.version = resolved.version;
  }

  /** Version the document is validated against. */
  get schemaVersion(): string {
    const declared = this.document.version;
    return declared === null || LEGACY_SCHEMA_VERSIONS.includes(declared) ? LEGACY_SCHEMA : declared;
  }

  /**
   * True when the document declares a version and its activities declare
   * some other set of versions.
   */
  get versionMismatch(): boolean {
    const declared = this.document.version;
    const recordVersions = new Set(selectAttr(this.document.root, 'iati-activity/@version'));
    if (declared === null || recordVersions.size === 0) return false;
    return recordVersions.size !== 1 || !recordVersions.has(declared);
  }

  get passesSchema(): boolean {
    const kind = this.document.kind;
    return kind !== null && this.validator.validate(this.document.root, this.schemaVersion, kind);
  }

  /** Codelist-bearing path → value → occurrences over every activity. */
  get codelistValues(): Counter2 {
    if (this.document.kind !== 'activity') return {};
    const paths = this.tables.codelistPaths[this.major];
    const tally = new Tally2();
    for (const record of this.document.records) {
      for (const path of paths) {
        for (const value of selectAttr(record.element, path)) tally.add(path, value);
      }
    }
    return tally.toCounter();
  }
}

// ─────────────────────────────────────────────────────────────────────────────
// Statistics
// ─────────────────────────────────────────────────────────────────────────────

export const FILE_STATISTICS: readonly SummedDeclaration<FileFacts>[] = [
  counter1Statistic<FileFacts>('versions', (f) => presence([keyOf(f.document.version)])),

  counter1Statistic<FileFacts>('version_mismatch', (f) => presence([f.versionMismatch ? 'true' : 'false'])),

  counter1Statistic<FileFacts>('validation', (f) => presence([f.passesSchema ? 'pass' : 'fail'])),

  numberStatistic<FileFacts>('activity_files', (f) => (f.document.kind === 'activity' ? 1 : 0)),

  numberStatistic<FileFacts>('organisation_files', (f) => (f.document.kind === 'organisation' ? 1 : 0)),

  numberStatistic<FileFacts>('nonstandardroots', (f) => (f.document.kind === null ? 1 : 0)),

  numberStatistic<FileFacts>('empty', () => 0),

  numberStatistic<FileFacts>('invalidxml', () => 0),

  counter2Statistic<FileFacts>('codelist_values', (f) => f.codelistValues),

  counter3Statistic<FileFacts>('codelist_values_by_major_version', (f) =>
    f.document.kind === 'activity' ? Object.fromEntries([[f.major, f.codelistValues]]) : {}
  ),
];

/**
 * File statistics of a source that could not be parsed: an empty file or
 * malformed XML. Every other file statistic takes its identity.
 */
export const unreadableFileStatistics = (reason: 'empty' | 'invalidxml'): StatMap => ({
  empty: { shape: 'number', value: new Decimal(reason === 'empty' ? 1 : 0) },
  invalidxml: { shape: 'number', value: new Decimal(reason === 'invalidxml' ? 1 : 0) },
});
