import { currentActivity, scoreCriteria, scoreDenominators } from '../comprehensiveness/score.js';
import { counter1Statistic, numberStatistic } from '../registry.js';

import type { ActivityFacts } from '../facts/activity-facts.js';
import type { SummedDeclaration } from '../types.js';

export const comprehensivenessStatistics: SummedDeclaration<ActivityFacts>[] = [
  counter1Statistic<ActivityFacts>('comprehensiveness', (f) => scoreCriteria(f, f.presence.value)),

  counter1Statistic<ActivityFacts>('comprehensiveness_with_validation', (f) => scoreCriteria(f, f.validity.value)),

  counter1Statistic<ActivityFacts>('comprehensiveness_denominators', scoreDenominators),

  numberStatistic<ActivityFacts>('comprehensiveness_denominator_default', (f) => (f.isCurrent ? 1 : 0)),

  counter1Statistic<ActivityFacts>('_comprehensiveness_current_activities', currentActivity),
];
