import { counterOf } from '@/modules/aggregation/index.js';
import { attr, children, childrenWithAttr, selectAttr, type XmlNode } from '@/modules/record-tree/index.js';

import { HUMANITARIAN_VERSIONS } from '../facts/record-facts.js';
import { counter1Statistic } from '../registry.js';

import type { ActivityFacts } from '../facts/activity-facts.js';
import type { SummedDeclaration } from '../types.js';

export const HUMANITARIAN_SECTORS_5_DIGIT: readonly string[] = [
  '72010',
  '72011',
  '72012',
  '72040',
  '72050',
  '73010',
  '74010',
  '74020',
];

export const HUMANITARIAN_SECTORS_3_DIGIT: readonly string[] = ['720', '730', '740'];

const CLUSTERS_VOCABULARY = '10';
const GLIDE_VOCABULARY = '1-2';
const HRP_VOCABULARY = '2-1';

const isTrue = (value: string | undefined): boolean => value === '1' || value === 'true';
const isFalse = (value: string | undefined): boolean => value === '0' || value === 'false';

const hasSectorIn = (node: XmlNode, f: ActivityFacts): boolean => {
  const fiveDigit = childrenWithAttr(node, 'sector', 'vocabulary', [f.codes.dac5], true);
  const threeDigit = childrenWithAttr(node, 'sector', 'vocabulary', [f.codes.dac3]);
  return (
    fiveDigit.some((s) => HUMANITARIAN_SECTORS_5_DIGIT.includes(attr(s, 'code') ?? '')) ||
    threeDigit.some((s) => HUMANITARIAN_SECTORS_3_DIGIT.includes(attr(s, 'code') ?? ''))
  );
};

const allNonEmpty = (values: readonly string[]): boolean =>
  values.length > 0 && values.every((v) => v !== '');

/**
 * Humanitarian markers of one activity. An explicit `@humanitarian="0"` on
 * the activity overrides every other signal.
 */
export const humanitarianFlags = (f: ActivityFacts): Record<string, number> => {
  const flagsDefined = HUMANITARIAN_VERSIONS.includes(f.version);
  const activityFlag = attr(f.element, 'humanitarian');
  const vetoed = isFalse(activityFlag);

  const transactionFlagged = selectAttr(f.element, 'transaction/@humanitarian').some(isTrue);
  const byAttribute = flagsDefined && (isTrue(activityFlag) || (transactionFlagged && !vetoed));

  const transactionsWithSectors = f.transactions.value.filter((t) => !isFalse(attr(t, 'humanitarian')));
  const bySector =
    hasSectorIn(f.element, f) ||
    (f.major === '2' && transactionsWithSectors.some((t) => hasSectorIn(t, f)));

  const isHumanitarian = (byAttribute || bySector) && !vetoed;

  const scopeVocabularies = selectAttr(f.element, 'humanitarian-scope/@vocabulary');
  const hasScope =
    allNonEmpty(selectAttr(f.element, 'humanitarian-scope/@type')) &&
    allNonEmpty(selectAttr(f.element, 'humanitarian-scope/@code'));
  const usesClusters = children(f.element, 'sector').some(
    (s) => attr(s, 'vocabulary') === CLUSTERS_VOCABULARY
  );
  const usesGlide = scopeVocabularies.includes(GLIDE_VOCABULARY);
  const usesHrp = scopeVocabularies.includes(HRP_VOCABULARY);

  const marker = (condition: boolean, humanitarian: boolean): number =>
    flagsDefined && condition && isHumanitarian === humanitarian ? 1 : 0;

  return {
    is_humanitarian: isHumanitarian ? 1 : 0,
    is_humanitarian_by_attrib: byAttribute ? 1 : 0,
    contains_humanitarian_scope: marker(hasScope, true),
    contains_humanitarian_scope_without_humanitarian: marker(hasScope, false),
    uses_humanitarian_clusters_vocab: marker(usesClusters, true),
    uses_humanitarian_clusters_vocab_without_humanitarian: marker(usesClusters, false),
    uses_humanitarian_glide_codes: marker(usesGlide, true),
    uses_humanitarian_glide_codes_without_humanitarian: marker(usesGlide, false),
    uses_humanitarian_hrp_codes: marker(usesHrp, true),
    uses_humanitarian_hrp_codes_without_humanitarian: marker(usesHrp, false),
  };
};

export const humanitarianStatistics: SummedDeclaration<ActivityFacts>[] = [
  counter1Statistic<ActivityFacts>('humanitarian', (f) => counterOf(humanitarianFlags(f))),
];
