import fs from 'node:fs/promises';

import { Type } from '@sinclair/typebox';
import { TypeCompiler } from '@sinclair/typebox/compiler';
import { parse as parseCsv } from 'csv-parse/sync';
import { Decimal } from 'decimal.js';
import { err, ok, type Result } from 'neverthrow';

import {
  createReadFailure,
  describeUnknownError,
  formatSchemaErrors,
  type LoaderError,
} from '@/common/types/errors.js';

import { buildExchangeRateTable } from '../../core/converter.js';

import type { ExchangeRateRow, ExchangeRateTable } from '../../core/types.js';

/**
 * Columns of the exchange rate CSV (`Currency,Rate,Date,...`); extra
 * columns are ignored.
 */
const ExchangeRateCsvSchema = Type.Array(
  Type.Object({
    Currency: Type.String({ minLength: 1 }),
    Rate: Type.String({ pattern: '^-?[0-9]+(\\.[0-9]+)?([eE][+-]?[0-9]+)?$' }),
    Date: Type.String({ pattern: '^[0-9]{4}' }),
  })
);

const validator = TypeCompiler.Compile(ExchangeRateCsvSchema);

export const parseExchangeRatesCsv = (
  contents: string,
  filePath: string
): Result<ExchangeRateTable, LoaderError> => {
  let parsed: unknown;
  try {
    parsed = parseCsv(contents, { columns: true, skip_empty_lines: true, trim: true });
  } catch (error) {
    return err({
      type: 'ParseError',
      message: `Failed to parse CSV at ${filePath}: ${describeUnknownError(error)}`,
      path: filePath,
    });
  }

  if (!validator.Check(parsed)) {
    return err({
      type: 'SchemaValidationError',
      message: `Schema validation failed for ${filePath}`,
      path: filePath,
      details: formatSchemaErrors(validator.Errors(parsed)),
    });
  }

  const rows: ExchangeRateRow[] = parsed.map((row) => ({
    currency: row.Currency,
    rate: new Decimal(row.Rate),
    date: row.Date,
  }));

  return ok(buildExchangeRateTable(rows));
};

/**
 * Reads the yearly exchange rate table from disk.
 */
export const loadExchangeRates = async (
  filePath: string
): Promise<Result<ExchangeRateTable, LoaderError>> => {
  let contents: string;
  try {
    contents = await fs.readFile(filePath, 'utf8');
  } catch (error) {
    return err(createReadFailure(filePath, error));
  }

  return parseExchangeRatesCsv(contents, filePath);
};
