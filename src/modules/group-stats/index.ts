export { GroupFacts } from './core/group-facts.js';
export { deriveStatistics } from './core/derive.js';
export {
  PUBLISHER_STATISTICS,
  PUBLISHER_DERIVED_STATISTICS,
  classifyTimeliness,
  classifyTimelag,
  classifyTransactionAlignment,
  classifyBudgetAlignment,
  budgetLengthMedian,
  previousMonths,
  dateExtremes,
  referenceSpendUsd,
  type Timeliness,
  type Timelag,
  type TransactionAlignment,
  type BudgetAlignment,
} from './core/publisher-statistics.js';
export {
  CORPUS_DERIVED_STATISTICS,
  traceabilityTotals,
  traceablePercentages,
  formatSignificant,
  type TraceabilityTotals,
  type TraceablePercentage,
} from './core/corpus-statistics.js';
