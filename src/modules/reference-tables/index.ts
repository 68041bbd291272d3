// Types
export type {
  MajorVersion,
  CodelistName,
  CodelistSet,
  ReferenceSpend,
  ReferenceTables,
  ReferenceTablesInput,
  ReferenceSpendRow,
  CodelistMappingEntry,
} from './core/types.js';
export { MAJOR_VERSIONS, CODELIST_NAMES } from './core/types.js';

// Logic
export { createReferenceTables, toCodelistPaths, parsePublishedAmount } from './core/build.js';
export { isCodeIn, validOrgPrefix, languagesFor, type OrgPrefixMatch } from './core/lookups.js';

// Repository
export { loadReferenceTables, REFERENCE_FILES } from './shell/repo/fs-reference-repo.js';
