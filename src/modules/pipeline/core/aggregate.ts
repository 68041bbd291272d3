import { Decimal } from 'decimal.js';
import { err, ok, type Result } from 'neverthrow';

import { createChildLogger } from '@/infra/logger/index.js';
import { foldStatMaps, type ShapeMismatchError, type StatMap } from '@/modules/aggregation/index.js';
import { FILE_STATISTICS, FileFacts, unreadableFileStatistics } from '@/modules/file-stats/index.js';
import {
  CORPUS_DERIVED_STATISTICS,
  deriveStatistics,
  GroupFacts,
  PUBLISHER_DERIVED_STATISTICS,
  PUBLISHER_STATISTICS,
} from '@/modules/group-stats/index.js';
import { parseXmlDocument, type RecordInput } from '@/modules/record-tree/index.js';
import { evaluateDeclarations, evaluateRecord } from '@/modules/statistics/index.js';

import type {
  CorpusReport,
  GroupAggregate,
  PublisherInput,
  PublisherReport,
  SourceFile,
  StatsEngine,
} from './types.js';

/** Records that could not be evaluated, per aggregate. */
export const SKIPPED_RECORDS_STATISTIC = 'skipped_records';

export const CORPUS_KEY = 'corpus';

const withLogger = (engine: StatsEngine, context: Record<string, unknown>): StatsEngine => ({
  ...engine,
  context: { ...engine.context, logger: createChildLogger(engine.context.logger, context) },
});

/**
 * Evaluates and folds records. A record whose evaluation fails is skipped,
 * logged and counted; the others are unaffected.
 */
export const aggregateRecords = (
  records: Iterable<RecordInput>,
  engine: StatsEngine
): Result<StatMap, ShapeMismatchError> => {
  const { logger } = engine.context;
  const maps: StatMap[] = [];
  let skipped = 0;

  for (const record of records) {
    const result = evaluateRecord(record, engine.registry, engine.context);
    if (result.isErr()) {
      skipped += 1;
      logger.warn({ err: result.error }, 'Skipping record');
      continue;
    }
    maps.push(result.value);
  }

  maps.push({ [SKIPPED_RECORDS_STATISTIC]: { shape: 'number', value: new Decimal(skipped) } });
  return foldStatMaps(maps);
};

/**
 * File statistics plus the fold of the file's records. Empty and malformed
 * sources are counted as such and contribute no records.
 */
export const aggregateFile = (
  file: SourceFile,
  engine: StatsEngine
): Result<GroupAggregate, ShapeMismatchError> => {
  const fileEngine = withLogger(engine, { file: file.name });
  const { logger, tables } = fileEngine.context;
  const toAggregate = (stats: StatMap): GroupAggregate => ({ level: 'file', key: file.name, stats, derived: {} });

  if (file.source.trim() === '') {
    logger.warn('Empty source file');
    return ok(toAggregate(unreadableFileStatistics('empty')));
  }

  const parsed = parseXmlDocument(file.source);
  if (parsed.isErr()) {
    logger.warn({ err: parsed.error }, 'Invalid XML, skipping file');
    return ok(toAggregate(unreadableFileStatistics('invalidxml')));
  }

  const document = parsed.value;
  const fileStats = evaluateDeclarations(
    FILE_STATISTICS,
    new FileFacts(document, fileEngine.validator, tables),
    logger
  );

  return aggregateRecords(document.records, fileEngine)
    .andThen((recordStats) => foldStatMaps([fileStats, recordStats]))
    .map(toAggregate);
};

/**
 * Folds a publisher's files, then adds the statistics computed from the
 * publisher aggregate itself.
 */
export const aggregatePublisher = (
  publisher: PublisherInput,
  engine: StatsEngine
): Result<PublisherReport, ShapeMismatchError> => {
  const publisherEngine = withLogger(engine, { publisher: publisher.id });
  const { context } = publisherEngine;

  const files: GroupAggregate[] = [];
  for (const file of publisher.files) {
    const aggregate = aggregateFile(file, publisherEngine);
    if (aggregate.isErr()) return err(aggregate.error);
    files.push(aggregate.value);
  }

  return foldStatMaps(files.map((file) => file.stats)).andThen((filesStats) => {
    const facts = new GroupFacts(publisher.id, filesStats, context);
    const publisherStats = evaluateDeclarations(PUBLISHER_STATISTICS, facts, context.logger);

    return foldStatMaps([filesStats, publisherStats]).map((stats): PublisherReport => ({
      aggregate: {
        level: 'publisher',
        key: publisher.id,
        stats,
        derived: deriveStatistics(PUBLISHER_DERIVED_STATISTICS, facts, context.logger),
      },
      files,
    }));
  });
};

/**
 * Aggregates every publisher and folds them into the corpus aggregate.
 */
export const aggregateCorpus = (
  publishers: Iterable<PublisherInput>,
  engine: StatsEngine
): Result<CorpusReport, ShapeMismatchError> => {
  const { logger } = engine.context;
  const reports: PublisherReport[] = [];

  for (const publisher of publishers) {
    const report = aggregatePublisher(publisher, engine);
    if (report.isErr()) return err(report.error);
    reports.push(report.value);
  }

  return foldStatMaps(reports.map((report) => report.aggregate.stats)).map((stats): CorpusReport => {
    const facts = new GroupFacts(CORPUS_KEY, stats, engine.context);
    logger.info({ publishers: reports.length }, 'Corpus aggregated');
    return {
      corpus: {
        level: 'corpus',
        key: CORPUS_KEY,
        stats,
        derived: deriveStatistics(CORPUS_DERIVED_STATISTICS, facts, logger),
      },
      publishers: reports,
    };
  });
};
