import { numberStatistic } from '../registry.js';
import { identityStatistics, transactionStatistics } from './activity.js';
import { comprehensivenessStatistics } from './comprehensiveness.js';
import { financeStatistics, forwardLookingStatistics } from './finance.js';
import { humanitarianStatistics } from './humanitarian.js';
import { orgReferenceStatistics } from './org-references.js';
import { sharedStatistics } from './shared.js';

import type { ActivityFacts } from '../facts/activity-facts.js';
import type { OrganisationFacts } from '../facts/record-facts.js';
import type { SummedDeclaration } from '../types.js';

export const ACTIVITY_STATISTICS: readonly SummedDeclaration<ActivityFacts>[] = [
  ...identityStatistics,
  ...sharedStatistics<ActivityFacts>(),
  ...transactionStatistics,
  ...financeStatistics,
  ...forwardLookingStatistics,
  ...humanitarianStatistics,
  ...orgReferenceStatistics,
  ...comprehensivenessStatistics,
];

export const ORGANISATION_STATISTICS: readonly SummedDeclaration<OrganisationFacts>[] = [
  numberStatistic<OrganisationFacts>('organisations', () => 1),
  ...sharedStatistics<OrganisationFacts>(),
];

export { countValuesAt } from './shared.js';
export { humanitarianFlags, HUMANITARIAN_SECTORS_3_DIGIT, HUMANITARIAN_SECTORS_5_DIGIT } from './humanitarian.js';
export { referenceStats, prefixCounts, PARTICIPANT_ROLES } from './org-references.js';
