/**
 * Shared error types and helpers for the reference-data loaders
 */

import type { ValueError } from '@sinclair/typebox/errors';

/**
 * Errors raised while loading static reference files (codelists, rate tables).
 */
export type LoaderError =
  | { readonly type: 'NotFound'; readonly message: string; readonly path: string }
  | { readonly type: 'ReadError'; readonly message: string; readonly path: string }
  | { readonly type: 'ParseError'; readonly message: string; readonly path: string }
  | {
      readonly type: 'SchemaValidationError';
      readonly message: string;
      readonly path: string;
      readonly details: string[];
    };

export const formatSchemaErrors = (errors: Iterable<ValueError>): string[] =>
  Array.from(errors).map((error) => `${error.path}: ${error.message}`);

export const describeUnknownError = (error: unknown): string =>
  error instanceof Error ? error.message : String(error);

/**
 * Maps a failed fs read to a loader error.
 */
export const createReadFailure = (filePath: string, error: unknown): LoaderError => {
  const code =
    typeof error === 'object' && error !== null && 'code' in error ? error.code : undefined;

  if (code === 'ENOENT') {
    return { type: 'NotFound', message: `File not found at ${filePath}`, path: filePath };
  }

  return {
    type: 'ReadError',
    message: `Failed to read ${filePath}: ${describeUnknownError(error)}`,
    path: filePath,
  };
};
