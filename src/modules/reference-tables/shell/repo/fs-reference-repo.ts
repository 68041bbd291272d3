import fs from 'node:fs/promises';
import path from 'node:path';

import { Type, type Static, type TSchema } from '@sinclair/typebox';
import { TypeCompiler, type TypeCheck } from '@sinclair/typebox/compiler';
import { parse as parseCsv } from 'csv-parse/sync';
import { err, ok, type Result } from 'neverthrow';

import {
  createReadFailure,
  describeUnknownError,
  formatSchemaErrors,
  type LoaderError,
} from '@/common/types/errors.js';

import { createReferenceTables } from '../../core/build.js';
import {
  CODELIST_NAMES,
  MAJOR_VERSIONS,
  type CodelistName,
  type MajorVersion,
  type ReferenceSpendRow,
  type ReferenceTables,
  type ReferenceTablesInput,
} from '../../core/types.js';

// ─────────────────────────────────────────────────────────────────────────────
// File schemas
// ─────────────────────────────────────────────────────────────────────────────

const CodelistFileSchema = Type.Object({
  data: Type.Array(Type.Object({ code: Type.String() })),
});

const CodelistMappingFileSchema = Type.Array(
  Type.Object({
    path: Type.String({ minLength: 1 }),
    codelist: Type.Optional(Type.String()),
    condition: Type.Optional(Type.String()),
  })
);

/** Header-less rows; only the leading columns are read. */
const CountryLanguageRowsSchema = Type.Array(Type.Array(Type.String(), { minItems: 3 }));

/** Header-less rows of the reference spend sheet (13 columns or more). */
const ReferenceSpendRowsSchema = Type.Array(Type.Array(Type.String(), { minItems: 13 }));

const RegistryIdMatchesSchema = Type.Array(
  Type.Object({
    previous_registry_id: Type.String({ minLength: 1 }),
    current_registry_id: Type.String({ minLength: 1 }),
  })
);

const codelistValidator = TypeCompiler.Compile(CodelistFileSchema);
const mappingValidator = TypeCompiler.Compile(CodelistMappingFileSchema);
const countryLanguageValidator = TypeCompiler.Compile(CountryLanguageRowsSchema);
const referenceSpendValidator = TypeCompiler.Compile(ReferenceSpendRowsSchema);
const registryIdValidator = TypeCompiler.Compile(RegistryIdMatchesSchema);

export const REFERENCE_FILES = {
  codelist: (major: MajorVersion, name: CodelistName) => path.join('codelists', major, `${name}.json`),
  codelistMapping: (major: MajorVersion) => `mapping-${major}.json`,
  countryLanguages: 'country_lang_map.csv',
  referenceSpend: 'reference_spend_data.csv',
  registryIdMatches: 'registry_id_relationships.csv',
} as const;

// ─────────────────────────────────────────────────────────────────────────────
// Helpers
// ─────────────────────────────────────────────────────────────────────────────

const readText = async (filePath: string): Promise<Result<string, LoaderError>> => {
  try {
    return ok(await fs.readFile(filePath, 'utf8'));
  } catch (error) {
    return err(createReadFailure(filePath, error));
  }
};

const checkWith = <T extends TSchema>(
  validator: TypeCheck<T>,
  value: unknown,
  filePath: string
): Result<Static<T>, LoaderError> => {
  if (!validator.Check(value)) {
    return err({
      type: 'SchemaValidationError',
      message: `Schema validation failed for ${filePath}`,
      path: filePath,
      details: formatSchemaErrors(validator.Errors(value)),
    });
  }
  return ok(value);
};

const parseJson = (contents: string, filePath: string): Result<unknown, LoaderError> => {
  try {
    const parsed: unknown = JSON.parse(contents);
    return ok(parsed);
  } catch (error) {
    return err({
      type: 'ParseError',
      message: `Failed to parse JSON at ${filePath}: ${describeUnknownError(error)}`,
      path: filePath,
    });
  }
};

const parseCsvContents = (
  contents: string,
  filePath: string,
  options: { columns: boolean; fromLine?: number }
): Result<unknown, LoaderError> => {
  try {
    const parsed: unknown = parseCsv(contents, {
      columns: options.columns,
      from_line: options.fromLine ?? 1,
      skip_empty_lines: true,
      relax_column_count: true,
      trim: true,
    });
    return ok(parsed);
  } catch (error) {
    return err({
      type: 'ParseError',
      message: `Failed to parse CSV at ${filePath}: ${describeUnknownError(error)}`,
      path: filePath,
    });
  }
};

const loadJsonFile = async <T extends TSchema>(
  filePath: string,
  validator: TypeCheck<T>
): Promise<Result<Static<T>, LoaderError>> => {
  const contents = await readText(filePath);
  return contents
    .andThen((text) => parseJson(text, filePath))
    .andThen((value) => checkWith(validator, value, filePath));
};

const toReferenceSpendRow = (cells: readonly string[]): ReferenceSpendRow => ({
  publisherName: cells[0] ?? '',
  registryId: cells[1] ?? '',
  spend2014: cells[2] ?? '',
  dacStatus: cells[3] ?? '',
  spend2015: cells[6] ?? '',
  officialForecast2015: cells[10] ?? '',
  currency: cells[11] ?? '',
  spendDataError: cells[12] ?? '',
});

// ─────────────────────────────────────────────────────────────────────────────
// Loaders
// ─────────────────────────────────────────────────────────────────────────────

const loadCodelists = async (
  rootDir: string
): Promise<Result<ReferenceTablesInput['codelists'], LoaderError>> => {
  const codelists: ReferenceTablesInput['codelists'] = { '1': {}, '2': {} };

  for (const major of MAJOR_VERSIONS) {
    for (const name of CODELIST_NAMES) {
      const filePath = path.join(rootDir, REFERENCE_FILES.codelist(major, name));
      const result = await loadJsonFile(filePath, codelistValidator);
      if (result.isErr()) return err(result.error);
      codelists[major][name] = result.value.data.map((entry) => entry.code);
    }
  }

  return ok(codelists);
};

const loadCodelistMappings = async (
  rootDir: string
): Promise<Result<NonNullable<ReferenceTablesInput['codelistMappings']>, LoaderError>> => {
  const mappings: NonNullable<ReferenceTablesInput['codelistMappings']> = {};

  for (const major of MAJOR_VERSIONS) {
    const filePath = path.join(rootDir, REFERENCE_FILES.codelistMapping(major));
    const result = await loadJsonFile(filePath, mappingValidator);
    if (result.isErr()) return err(result.error);
    mappings[major] = result.value;
  }

  return ok(mappings);
};

const loadCountryLanguages = async (
  rootDir: string
): Promise<Result<{ country: string; language: string }[], LoaderError>> => {
  const filePath = path.join(rootDir, REFERENCE_FILES.countryLanguages);
  const contents = await readText(filePath);
  return contents
    .andThen((text) => parseCsvContents(text, filePath, { columns: false }))
    .andThen((rows) => checkWith(countryLanguageValidator, rows, filePath))
    .map((rows) =>
      rows.map((cells) => ({ country: cells[0] ?? '', language: cells[2] ?? '' }))
    );
};

const loadReferenceSpend = async (
  rootDir: string
): Promise<Result<ReferenceSpendRow[], LoaderError>> => {
  const filePath = path.join(rootDir, REFERENCE_FILES.referenceSpend);
  const contents = await readText(filePath);
  return contents
    .andThen((text) => parseCsvContents(text, filePath, { columns: false, fromLine: 2 }))
    .andThen((rows) => checkWith(referenceSpendValidator, rows, filePath))
    .map((rows) => rows.map(toReferenceSpendRow));
};

/**
 * Registry id renames are optional; a missing file means no renames.
 */
const loadRegistryIdMatches = async (
  rootDir: string
): Promise<Result<Record<string, string>, LoaderError>> => {
  const filePath = path.join(rootDir, REFERENCE_FILES.registryIdMatches);
  const contents = await readText(filePath);
  if (contents.isErr()) {
    return contents.error.type === 'NotFound' ? ok({}) : err(contents.error);
  }

  return parseCsvContents(contents.value, filePath, { columns: true })
    .andThen((rows) => checkWith(registryIdValidator, rows, filePath))
    .map((rows) =>
      Object.fromEntries(rows.map((row) => [row.previous_registry_id, row.current_registry_id]))
    );
};

/**
 * Loads every reference table under `rootDir` and builds the lookups.
 *
 * Layout:
 * - `codelists/{1,2}/<Name>.json` (`{ "data": [{ "code": ... }] }`)
 * - `mapping-{1,2}.json` (codelist path mappings)
 * - `country_lang_map.csv` (`country,name,language`, no header)
 * - `reference_spend_data.csv` (one header line)
 * - `registry_id_relationships.csv` (optional)
 */
export const loadReferenceTables = async (
  rootDir: string
): Promise<Result<ReferenceTables, LoaderError>> => {
  const codelists = await loadCodelists(rootDir);
  if (codelists.isErr()) return err(codelists.error);

  const codelistMappings = await loadCodelistMappings(rootDir);
  if (codelistMappings.isErr()) return err(codelistMappings.error);

  const countryLanguages = await loadCountryLanguages(rootDir);
  if (countryLanguages.isErr()) return err(countryLanguages.error);

  const referenceSpend = await loadReferenceSpend(rootDir);
  if (referenceSpend.isErr()) return err(referenceSpend.error);

  const registryIdMatches = await loadRegistryIdMatches(rootDir);
  if (registryIdMatches.isErr()) return err(registryIdMatches.error);

  return ok(
    createReferenceTables({
      codelists: codelists.value,
      codelistMappings: codelistMappings.value,
      countryLanguages: countryLanguages.value,
      referenceSpend: referenceSpend.value,
      registryIdMatches: registryIdMatches.value,
    })
  );
};
