export type { SchemaValidator } from './core/ports.js';
export {
  FileFacts,
  FILE_STATISTICS,
  LEGACY_SCHEMA_VERSIONS,
  unreadableFileStatistics,
} from './core/file-statistics.js';
