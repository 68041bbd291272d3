/**
 * Composition root: loads the reference data once and wires the engine.
 */

import { err, ok, type Result } from 'neverthrow';

import { createCurrencyConverter, loadExchangeRates } from '../modules/currency/index.js';
import { isoDateMatch, type CalendarDate } from '../modules/record-tree/index.js';
import { loadReferenceTables } from '../modules/reference-tables/index.js';
import {
  createStatisticsRegistry,
  type DuplicateStatisticError,
  type StatisticsRegistryOptions,
} from '../modules/statistics/index.js';

import type { LoaderError } from '../common/types/errors.js';
import type { AppConfig } from '../infra/config/index.js';
import type { Logger } from '../infra/logger/index.js';
import type { SchemaValidator } from '../modules/file-stats/index.js';
import type { StatsEngine } from '../modules/pipeline/index.js';

export interface StatsEngineDeps {
  logger: Logger;
  validator: SchemaValidator;
  /** Replaces the built-in statistic declarations */
  statistics?: StatisticsRegistryOptions;
  /** Clock used when no reference date is configured */
  now?: () => Date;
}

export interface InvalidTodayError {
  readonly type: 'InvalidToday';
  readonly message: string;
}

export type EngineBuildError = LoaderError | DuplicateStatisticError | InvalidTodayError;

const resolveToday = (configured: string | undefined, now: () => Date): Result<CalendarDate, InvalidTodayError> => {
  if (configured === undefined) {
    const date = now();
    return ok({ year: date.getUTCFullYear(), month: date.getUTCMonth() + 1, day: date.getUTCDate() });
  }
  const today = isoDateMatch(configured);
  return today === null
    ? err({ type: 'InvalidToday', message: `STATS_TODAY is not a calendar date: ${configured}` })
    : ok(today);
};

/**
 * Loads reference tables and exchange rates and returns a ready engine.
 */
export const buildStatsEngine = async (
  config: AppConfig,
  deps: StatsEngineDeps
): Promise<Result<StatsEngine, EngineBuildError>> => {
  const { logger } = deps;

  const today = resolveToday(config.evaluation.today, deps.now ?? (() => new Date()));
  if (today.isErr()) return err(today.error);

  const registry = createStatisticsRegistry(deps.statistics);
  if (registry.isErr()) return err(registry.error);

  const tables = await loadReferenceTables(config.referenceData.rootDir);
  if (tables.isErr()) {
    logger.error({ err: tables.error }, 'Failed to load reference tables');
    return err(tables.error);
  }

  const rates = await loadExchangeRates(config.referenceData.exchangeRatesFile);
  if (rates.isErr()) {
    logger.error({ err: rates.error }, 'Failed to load exchange rates');
    return err(rates.error);
  }

  logger.info(
    { today: today.value, currencies: rates.value.size, usdClampYear: config.evaluation.usdClampYear ?? null },
    'Statistics engine ready'
  );

  return ok({
    registry: registry.value,
    validator: deps.validator,
    context: {
      tables: tables.value,
      converter: createCurrencyConverter(rates.value),
      today: today.value,
      usdClampYear: config.evaluation.usdClampYear ?? null,
      logger,
    },
  });
};
