import { describe, expect, it } from 'vitest';

import {
  aggregateCorpus,
  aggregateFile,
  aggregateRecords,
  CORPUS_KEY,
  statMapToJson,
  toDocument,
  type PublisherInput,
} from '@/modules/pipeline/index.js';

import { makeSchemaValidator } from '../../fixtures/fakes.js';
import { activitiesDocument, activityRecord, activityXml, makeActivity, makeEngine } from '../../fixtures/builders.js';

const transaction = (type: string, date: string, value: string, extra = ''): string =>
  `<transaction><transaction-type code="${type}"/><transaction-date iso-date="${date}"/>` +
  `<value>${value}</value>${extra}</transaction>`;

const PUBLISHERS: PublisherInput[] = [
  {
    id: 'pub-a',
    files: [
      {
        name: 'a1.xml',
        source: activitiesDocument([
          activityXml(
            '<iati-identifier>pub-a-1</iati-identifier>' + transaction('2', '2014-03-01', '100'),
            'default-currency="EUR"'
          ),
          activityXml(
            '<iati-identifier>pub-a-2</iati-identifier>' +
              transaction('1', '2014-04-01', '10', '<provider-org provider-activity-id="pub-b-1"/>'),
            'default-currency="USD"'
          ),
        ]),
      },
      { name: 'empty.xml', source: '' },
      { name: 'broken.xml', source: '<iati-activities>' },
    ],
  },
  {
    id: 'pub-b',
    files: [
      {
        name: 'b.xml',
        source: activitiesDocument([
          activityXml(
            '<iati-identifier>pub-b-1</iati-identifier>' +
              transaction('2', '2014-01-01', '80') +
              transaction('3', '2014-02-01', '20'),
            'default-currency="USD"'
          ),
          activityXml(
            '<iati-identifier>pub-b-2</iati-identifier>' + transaction('2', '2014-05-01', '100'),
            'default-currency="USD"'
          ),
        ]),
      },
    ],
  },
];

describe('aggregateRecords', () => {
  it('skips and counts records that cannot be evaluated', () => {
    const stats = aggregateRecords(
      [
        activityRecord('<iati-identifier>X-1</iati-identifier>'),
        { kind: 'organisation', element: makeActivity(''), documentVersion: '2.03' },
      ],
      makeEngine()
    )._unsafeUnwrap();

    const json = statMapToJson(stats);
    expect(json['activities']).toBe('1');
    expect(json['skipped_records']).toBe('1');
    expect(json['organisations']).toBeUndefined();
  });

  it('counts no skipped records for an empty file', () => {
    expect(statMapToJson(aggregateRecords([], makeEngine())._unsafeUnwrap())).toEqual({ skipped_records: '0' });
  });
});

describe('aggregateFile', () => {
  it('adds file statistics to the fold of its records', () => {
    const source = activitiesDocument([activityXml('<iati-identifier>F-1</iati-identifier>')], '2.02');
    const aggregate = aggregateFile({ name: 'f.xml', source }, makeEngine())._unsafeUnwrap();
    const json = statMapToJson(aggregate.stats);

    expect(aggregate.level).toBe('file');
    expect(aggregate.key).toBe('f.xml');
    expect(json['activities']).toBe('1');
    expect(json['activity_files']).toBe('1');
    expect(json['versions']).toEqual({ '2.02': '1' });
    expect(json['iati_identifiers']).toEqual({ 'F-1': '1' });
  });

  it('validates the document once', () => {
    const validator = makeSchemaValidator();
    aggregateFile({ name: 'f.xml', source: activitiesDocument([]) }, makeEngine({ validator }));

    expect(validator.calls.map((call) => call.version)).toEqual(['2.03']);
  });

  it('counts empty and malformed sources without records', () => {
    const engine = makeEngine();

    expect(statMapToJson(aggregateFile({ name: 'e.xml', source: '  \n' }, engine)._unsafeUnwrap().stats)).toEqual({
      empty: '1',
      invalidxml: '0',
    });
    expect(
      statMapToJson(aggregateFile({ name: 'b.xml', source: '<iati-activities>' }, engine)._unsafeUnwrap().stats)
    ).toEqual({ empty: '0', invalidxml: '1' });
  });
});

describe('aggregateCorpus', () => {
  const report = aggregateCorpus(PUBLISHERS, makeEngine())._unsafeUnwrap();
  const corpus = statMapToJson(report.corpus.stats);

  it('sums record, file and publisher statistics into the corpus', () => {
    expect(report.corpus.key).toBe(CORPUS_KEY);
    expect(corpus['activities']).toBe('4');
    expect(corpus['publishers']).toBe('2');
    expect(corpus['activity_files']).toBe('2');
    expect(corpus['empty']).toBe('1');
    expect(corpus['invalidxml']).toBe('1');
    expect(corpus['skipped_records']).toBe('0');
    expect(corpus['statistic_anomalies']).toEqual({});
    expect(corpus['publishers_validation']).toEqual({ pass: '2' });
  });

  it('keeps one aggregate per publisher and file', () => {
    expect(report.publishers.map((publisher) => publisher.aggregate.key)).toEqual(['pub-a', 'pub-b']);
    expect(report.publishers[0]?.files.map((file) => file.key)).toEqual(['a1.xml', 'empty.xml', 'broken.xml']);
  });

  it('derives publisher statistics', () => {
    expect(report.publishers[0]?.aggregate.derived['timelag']).toBe('More than one year');
    const pubB = statMapToJson(report.publishers[1]?.aggregate.stats ?? {});

    expect(pubB['sum_commitments_and_disbursements_by_activity_id_by_publisher_id_usd']).toEqual({
      'pub-b': { 'pub-b-1': '100', 'pub-b-2': '100' },
    });
  });

  it('derives traceability across publishers', () => {
    expect(report.corpus.derived['traceable_percentages']).toEqual({
      'pub-b': {
        traceable_activities: 1,
        total_activities: 2,
        activities_percentage: '50',
        traceable_spend: '100',
        total_spend: '200',
        spend_percentage: '50',
      },
    });
    expect(report.corpus.derived['unique_identifiers']).toBe(4);
  });

  it('serialises the report as one document', () => {
    const document = toDocument(report);

    expect(document).toMatchObject({
      corpus: { activities: '4', publishers: '2' },
      publishers: {
        'pub-a': {
          activities: '2',
          files: { 'empty.xml': { empty: '1', invalidxml: '0' } },
        },
      },
    });
  });
});
