import { err, ok, type Result } from 'neverthrow';

import { describeUnknownError } from '@/common/types/errors.js';
import { createChildLogger, type Logger } from '@/infra/logger/index.js';
import {
  conformsTo,
  identity,
  Tally,
  type StatMap,
  type StatResult,
} from '@/modules/aggregation/index.js';
import {
  child,
  createFatalInputError,
  RECORD_TAGS,
  validateTree,
  type FatalInputError,
  type RecordInput,
} from '@/modules/record-tree/index.js';

import { ActivityFacts } from './facts/activity-facts.js';
import { OrganisationFacts, type RecordFacts } from './facts/record-facts.js';

import type { StatisticsRegistry } from './statistics-registry.js';
import type { EvaluationContext, SummedDeclaration } from './types.js';

/** Statistic counting, per statistic name, the values replaced by identity. */
export const ANOMALIES_STATISTIC = 'statistic_anomalies';

const computeDeclaration = <F>(declaration: SummedDeclaration<F>, facts: F): StatResult => {
  switch (declaration.shape) {
    case 'number':
      return { shape: declaration.shape, value: declaration.compute(facts) };
    case 'counter1':
      return { shape: declaration.shape, value: declaration.compute(facts) };
    case 'counter2':
      return { shape: declaration.shape, value: declaration.compute(facts) };
    case 'counter3':
      return { shape: declaration.shape, value: declaration.compute(facts) };
  }
};

/**
 * Runs each declaration once against `facts`, isolating failures.
 */
export const evaluateDeclarations = <F>(
  declarations: readonly SummedDeclaration<F>[],
  facts: F,
  logger: Logger
): StatMap => {
  const stats: Record<string, StatResult> = {};
  const anomalies = new Tally();

  const replaceWithIdentity = (declaration: SummedDeclaration<F>, reason: string): void => {
    logger.warn({ statistic: declaration.name, reason }, 'Statistic replaced by identity');
    anomalies.add(declaration.name);
    stats[declaration.name] = identity(declaration.shape);
  };

  for (const declaration of declarations) {
    let result: StatResult;
    try {
      result = computeDeclaration(declaration, facts);
    } catch (error) {
      replaceWithIdentity(declaration, describeUnknownError(error));
      continue;
    }

    if (!conformsTo(declaration.shape, result.value)) {
      replaceWithIdentity(declaration, `value is not a ${declaration.shape}`);
      continue;
    }
    stats[declaration.name] = result;
  }

  stats[ANOMALIES_STATISTIC] = { shape: 'counter1', value: anomalies.toCounter() };
  return stats;
};

/**
 * Computes every statistic of one record.
 *
 * Only a record that is not a usable tree, or whose root does not match its
 * kind, fails; a statistic that throws or returns a value of the wrong shape
 * is replaced by its identity and counted under `statistic_anomalies`.
 */
export function evaluateRecord(
  input: RecordInput,
  registry: StatisticsRegistry,
  ctx: EvaluationContext
): Result<StatMap, FatalInputError> {
  const validated = validateTree(input.element);
  if (validated.isErr()) return err(validated.error);

  const expectedTag = RECORD_TAGS[input.kind].record;
  if (input.element.tag !== expectedTag) {
    return err(
      createFatalInputError(`Expected <${expectedTag}> for a ${input.kind} record, got <${input.element.tag}>`)
    );
  }

  const identifier = child(input.element, 'iati-identifier')?.text ?? null;
  const recordCtx: EvaluationContext = {
    ...ctx,
    logger: createChildLogger(ctx.logger, { record: identifier }),
  };

  if (input.kind === 'activity') {
    const facts = new ActivityFacts(input.element, input.documentVersion, recordCtx);
    logVersionFallback(facts);
    return ok(evaluateDeclarations(registry.activity, facts, recordCtx.logger));
  }

  const facts = new OrganisationFacts(input.element, input.documentVersion, recordCtx);
  logVersionFallback(facts);
  return ok(evaluateDeclarations(registry.organisation, facts, recordCtx.logger));
}

const logVersionFallback = (facts: RecordFacts): void => {
  if (!facts.versionFallback) return;
  facts.ctx.logger.warn(
    { declaredVersion: facts.declaredVersion, version: facts.version },
    'Unknown or missing document version, using legacy version'
  );
};
