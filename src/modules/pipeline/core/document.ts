import type { CorpusReport, GroupAggregate } from './types.js';
import type { Counter1, DerivedValue, StatMap, StatResult } from '@/modules/aggregation/index.js';

const counter1ToJson = (counter: Counter1): Record<string, string> =>
  Object.fromEntries(Object.entries(counter).map(([key, value]) => [key, value.toFixed()]));

/**
 * Plain JSON form of a result; decimals become strings in normal notation.
 */
export const resultToJson = (result: StatResult): DerivedValue => {
  switch (result.shape) {
    case 'number':
      return result.value.toFixed();
    case 'counter1':
      return counter1ToJson(result.value);
    case 'counter2':
      return Object.fromEntries(
        Object.entries(result.value).map(([key, inner]) => [key, counter1ToJson(inner)])
      );
    case 'counter3':
      return Object.fromEntries(
        Object.entries(result.value).map(([key, table]) => [
          key,
          Object.fromEntries(Object.entries(table).map(([inner, counter]) => [inner, counter1ToJson(counter)])),
        ])
      );
  }
};

export const statMapToJson = (stats: StatMap): Record<string, DerivedValue> =>
  Object.fromEntries(Object.entries(stats).map(([name, result]) => [name, resultToJson(result)]));

const aggregateToJson = (aggregate: GroupAggregate): Record<string, DerivedValue> => ({
  ...statMapToJson(aggregate.stats),
  ...aggregate.derived,
});

/**
 * Serialisable view of a corpus report:
 * `{ corpus, publishers: { <id>: { ...stats, files: { <name>: stats } } } }`.
 */
export const toDocument = (report: CorpusReport): Record<string, DerivedValue> => {
  const publishers = Object.fromEntries(
    report.publishers.map((publisher) => [
      publisher.aggregate.key,
      {
        ...aggregateToJson(publisher.aggregate),
        files: Object.fromEntries(publisher.files.map((file) => [file.key, aggregateToJson(file)])),
      },
    ])
  );
  return { corpus: aggregateToJson(report.corpus), publishers };
};
