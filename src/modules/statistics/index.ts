// Types
export type {
  EvaluationContext,
  SummedDeclaration,
  DerivedDeclaration,
  NumberInput,
} from './core/types.js';

// Declarations
export {
  numberStatistic,
  counter1Statistic,
  counter2Statistic,
  counter3Statistic,
  derivedStatistic,
  ensureUniqueNames,
  type DuplicateStatisticError,
} from './core/registry.js';
export {
  createStatisticsRegistry,
  type StatisticsRegistry,
  type StatisticsRegistryOptions,
} from './core/statistics-registry.js';
export {
  ACTIVITY_STATISTICS,
  ORGANISATION_STATISTICS,
  countValuesAt,
  humanitarianFlags,
  referenceStats,
  prefixCounts,
  PARTICIPANT_ROLES,
  HUMANITARIAN_SECTORS_3_DIGIT,
  HUMANITARIAN_SECTORS_5_DIGIT,
} from './core/catalogue/index.js';

// Facts
export {
  RecordFacts,
  OrganisationFacts,
  resolveVersion,
  majorVersionOf,
  LEGACY_VERSION,
  HUMANITARIAN_VERSIONS,
  VERSION_CODES,
  type VersionCodes,
  type ResolvedVersion,
} from './core/facts/record-facts.js';
export { ActivityFacts, SPENT_COMMITMENT_RATIO, FORWARD_LOOKING_END_MONTHS } from './core/facts/activity-facts.js';
export { countElementPaths, elementPresence } from './core/elements.js';
export { Lazy, lazy } from './core/lazy.js';

// Comprehensiveness
export { classifyCurrent, ACTIVE_STATUS_CODES, type CurrentStatus } from './core/comprehensiveness/classify.js';
export {
  CRITERIA,
  CRITERION_NAMES,
  OVERRIDDEN_DENOMINATORS,
  percentagesSumTo100,
  isRecipientLanguageUsed,
  type CriterionName,
  type ComprehensivenessCriterion,
} from './core/comprehensiveness/criteria.js';
export { scoreCriteria, scoreDenominators, currentActivity } from './core/comprehensiveness/score.js';

// Evaluation
export { evaluateRecord, evaluateDeclarations, ANOMALIES_STATISTIC } from './core/evaluate.js';
