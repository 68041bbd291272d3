export type {
  StatsEngine,
  SourceFile,
  PublisherInput,
  HierarchyLevel,
  GroupAggregate,
  PublisherReport,
  CorpusReport,
} from './core/types.js';
export {
  aggregateRecords,
  aggregateFile,
  aggregatePublisher,
  aggregateCorpus,
  SKIPPED_RECORDS_STATISTIC,
  CORPUS_KEY,
} from './core/aggregate.js';
export { toDocument, statMapToJson, resultToJson } from './core/document.js';
