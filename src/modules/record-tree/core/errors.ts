/**
 * Record tree errors.
 */

/**
 * The record is not a usable tree. Only this error aborts the evaluation
 * of a record; the rest of the corpus is unaffected.
 */
export interface FatalInputError {
  readonly type: 'FatalInputError';
  readonly message: string;
}

/**
 * A whole source document could not be read as XML.
 */
export interface InvalidDocumentError {
  readonly type: 'InvalidDocumentError';
  readonly message: string;
  readonly line?: number | undefined;
}

export const createFatalInputError = (message: string): FatalInputError => ({
  type: 'FatalInputError',
  message,
});

export const createInvalidDocumentError = (message: string, line?: number): InvalidDocumentError => ({
  type: 'InvalidDocumentError',
  message,
  line,
});
