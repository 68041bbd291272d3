// Types
export type { XmlNode, RecordKind, RecordInput, CalendarDate } from './core/types.js';
export { RECORD_TAGS } from './core/types.js';

// Errors
export type { FatalInputError, InvalidDocumentError } from './core/errors.js';
export { createFatalInputError, createInvalidDocumentError } from './core/errors.js';

// Navigation
export {
  attr,
  hasAttr,
  child,
  children,
  select,
  selectAttr,
  selectText,
  firstAttr,
  childrenWithAttr,
  keyOf,
} from './core/query.js';

// Dates
export {
  isValidCalendarDate,
  isoDateMatch,
  isoDate,
  toEpochDay,
  fromEpochDay,
  compareDates,
  daysBetween,
  addYears,
  addMonths,
  formatDate,
  transactionDate,
  budgetYear,
  plannedDisbursementYear,
} from './core/dates.js';

// Values
export {
  parseDecimal,
  isXsdDecimal,
  isXsdDate,
  isValidDateElement,
  isValidValueElement,
  isValidUrlElement,
  isValidCoordinates,
} from './core/values.js';

// Validation
export { validateTree, MAX_TREE_DEPTH } from './core/tree-validation.js';

// XML adapter
export {
  parseXmlDocument,
  parseXmlElement,
  type ParsedDocument,
} from './shell/xml/document-parser.js';
