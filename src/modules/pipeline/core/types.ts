import type { DerivedValue, StatMap } from '@/modules/aggregation/index.js';
import type { SchemaValidator } from '@/modules/file-stats/index.js';
import type { EvaluationContext, StatisticsRegistry } from '@/modules/statistics/index.js';

/**
 * Everything needed to evaluate and aggregate a corpus. Built once by the
 * composition root.
 */
export interface StatsEngine {
  readonly registry: StatisticsRegistry;
  readonly context: EvaluationContext;
  readonly validator: SchemaValidator;
}

export interface SourceFile {
  readonly name: string;
  /** Raw document text */
  readonly source: string;
}

export interface PublisherInput {
  /** Registry id of the publisher */
  readonly id: string;
  readonly files: Iterable<SourceFile>;
}

export type HierarchyLevel = 'file' | 'publisher' | 'corpus';

export interface GroupAggregate {
  readonly level: HierarchyLevel;
  readonly key: string;
  readonly stats: StatMap;
  readonly derived: Readonly<Record<string, DerivedValue>>;
}

export interface PublisherReport {
  readonly aggregate: GroupAggregate;
  readonly files: readonly GroupAggregate[];
}

export interface CorpusReport {
  readonly corpus: GroupAggregate;
  readonly publishers: readonly PublisherReport[];
}
