import type { Result } from 'neverthrow';

import { ACTIVITY_STATISTICS, ORGANISATION_STATISTICS } from './catalogue/index.js';
import { ensureUniqueNames, type DuplicateStatisticError } from './registry.js';

import type { ActivityFacts } from './facts/activity-facts.js';
import type { OrganisationFacts } from './facts/record-facts.js';
import type { SummedDeclaration } from './types.js';

/**
 * Summed statistics evaluated per record, by record kind.
 */
export interface StatisticsRegistry {
  readonly activity: readonly SummedDeclaration<ActivityFacts>[];
  readonly organisation: readonly SummedDeclaration<OrganisationFacts>[];
}

export interface StatisticsRegistryOptions {
  activity?: readonly SummedDeclaration<ActivityFacts>[];
  organisation?: readonly SummedDeclaration<OrganisationFacts>[];
}

/**
 * Registry of the built-in statistics, or of the given declarations.
 * Fails when a name is declared twice for the same record kind.
 */
export const createStatisticsRegistry = (
  options: StatisticsRegistryOptions = {}
): Result<StatisticsRegistry, DuplicateStatisticError> =>
  ensureUniqueNames('activity', options.activity ?? ACTIVITY_STATISTICS).andThen((activity) =>
    ensureUniqueNames('organisation', options.organisation ?? ORGANISATION_STATISTICS).map(
      (organisation) => ({ activity, organisation })
    )
  );
