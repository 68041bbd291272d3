/**
 * Comprehensiveness criteria.
 *
 * Each criterion has a presence check (the data is there) and a validity
 * check (the data is also well formed: codelist values, dates, decimals,
 * percentage splits). Three criteria only count for activities where they
 * apply; see {@link denominatorsFor}.
 */

import { Decimal } from 'decimal.js';

import { isCodeIn, languagesFor, type CodelistName } from '@/modules/reference-tables/index.js';
import {
  attr,
  child,
  children,
  daysBetween,
  compareDates,
  isValidCoordinates,
  isValidDateElement,
  isValidUrlElement,
  isValidValueElement,
  parseDecimal,
  select,
  selectAttr,
  selectText,
  type XmlNode,
} from '@/modules/record-tree/index.js';

import type { ActivityFacts } from '../facts/activity-facts.js';

export const CRITERION_NAMES = [
  'version',
  'reporting-org',
  'iati-identifier',
  'participating-org',
  'title',
  'description',
  'activity-status',
  'activity-date',
  'sector',
  'country_or_region',
  'transaction_commitment',
  'transaction_spend',
  'transaction_currency',
  'transaction_traceability',
  'budget',
  'budget_not_provided',
  'contact-info',
  'location',
  'location_point_pos',
  'sector_dac',
  'capital-spend',
  'document-link',
  'activity-website',
  'recipient_language',
  'conditions_attached',
  'result_indicator',
  'aid_type',
] as const;

export type CriterionName = (typeof CRITERION_NAMES)[number];

/** Criteria whose denominator is restricted to applicable activities. */
export const OVERRIDDEN_DENOMINATORS = [
  'recipient_language',
  'transaction_spend',
  'transaction_traceability',
] as const satisfies readonly CriterionName[];

export type OverriddenCriterion = (typeof OVERRIDDEN_DENOMINATORS)[number];

export interface ComprehensivenessCriterion {
  readonly name: CriterionName;
  readonly present: (facts: ActivityFacts) => boolean;
  /** Extra checks on top of presence; presence alone when absent */
  readonly valid?: (facts: ActivityFacts) => boolean;
}

/** Days an activity must have been running before spend is expected. */
export const SPEND_EXPECTED_AFTER_DAYS = 365;

/** Transaction types with the same code in every version */
const INCOMING_COMMITMENT_TYPE = '11';
const INCOMING_PLEDGE_TYPE = '13';

const DOCUMENT_CATEGORY_WEBSITE = 'A12';

// ─────────────────────────────────────────────────────────────────────────────
// Helpers
// ─────────────────────────────────────────────────────────────────────────────

const allTrueAndNotEmpty = (values: readonly boolean[]): boolean =>
  values.length > 0 && values.every(Boolean);

const nonEmpty = (values: readonly unknown[]): boolean => values.length > 0;

/** Text of the element, inside `narrative` children from version 2. */
const hasText = (facts: ActivityFacts, tag: string): boolean =>
  facts.major === '2'
    ? selectText(facts.element, `${tag}/narrative`).length > 0
    : selectText(facts.element, tag).length > 0;

const percentageSum = (elements: readonly XmlNode[]): Decimal =>
  elements.reduce(
    (sum, element) => sum.plus(parseDecimal(attr(element, 'percentage')) ?? 0),
    new Decimal(0)
  );

const splitIsComplete = (elements: readonly XmlNode[]): boolean =>
  elements.length === 1 || percentageSum(elements).eq(100);

/**
 * Percentages of the elements add up to 100, per `@vocabulary` when
 * `byVocabulary` is set. Single entries and empty lists pass.
 */
export const percentagesSumTo100 = (elements: readonly XmlNode[], byVocabulary: boolean): boolean => {
  if (elements.length === 0) return true;
  if (!byVocabulary) return splitIsComplete(elements);

  const groups = new Map<string | undefined, XmlNode[]>();
  for (const element of elements) {
    const vocabulary = attr(element, 'vocabulary');
    const group = groups.get(vocabulary);
    if (group === undefined) {
      groups.set(vocabulary, [element]);
    } else {
      group.push(element);
    }
  }
  return [...groups.values()].every(splitIsComplete);
};

const dacSectors = (node: XmlNode, facts: ActivityFacts): XmlNode[] =>
  children(node, 'sector').filter((sector) => {
    const vocabulary = attr(sector, 'vocabulary');
    return vocabulary === undefined || vocabulary === facts.codes.dac5 || vocabulary === facts.codes.dac3;
  });

const everyTransaction = (facts: ActivityFacts, check: (transaction: XmlNode) => boolean): boolean =>
  facts.major !== '1' && allTrueAndNotEmpty(facts.transactions.value.map(check));

const commitments = (facts: ActivityFacts): XmlNode[] =>
  facts.transactionsOfType([facts.codes.commitment, INCOMING_COMMITMENT_TYPE]);

const spending = (facts: ActivityFacts): XmlNode[] =>
  facts.transactionsOfType([facts.codes.disbursement, facts.codes.expenditure]);

const incoming = (facts: ActivityFacts): XmlNode[] =>
  facts.transactionsOfType([facts.codes.incomingFunds, INCOMING_COMMITMENT_TYPE, INCOMING_PLEDGE_TYPE]);

const websites = (facts: ActivityFacts): XmlNode[] =>
  facts.major === '1'
    ? children(facts.element, 'activity-website')
    : children(facts.element, 'document-link').filter((link) =>
        children(link, 'category').some((c) => attr(c, 'code') === DOCUMENT_CATEGORY_WEBSITE)
      );

const locations = (facts: ActivityFacts): XmlNode[] => [
  ...select(facts.element, 'location/point/pos'),
  ...select(facts.element, 'location/name'),
  ...select(facts.element, 'location/description'),
  ...select(facts.element, 'location/location-administrative'),
];

/** Transactions with a valid value and at least one valid date. */
const transactionsAreValid = (transactions: readonly XmlNode[]): boolean =>
  transactions.every((t) => isValidValueElement(child(t, 'value'))) &&
  allTrueAndNotEmpty(
    transactions.map((t) =>
      t.children.some(
        (c) => (c.tag === 'transaction-date' || c.tag === 'value') && isValidDateElement(c)
      )
    )
  );

/**
 * Languages of a title or description: `narrative/@xml:lang` from version 2,
 * the element's own `@xml:lang` before, falling back to the activity's.
 */
const languagesOf = (facts: ActivityFacts, element: XmlNode): string[] => {
  const fallback = attr(facts.element, 'xml:lang');
  const langs = new Set<string>();
  const targets = facts.major === '2' ? children(element, 'narrative') : [element];
  for (const target of targets) {
    const lang = attr(target, 'xml:lang') ?? fallback;
    if (lang !== undefined) langs.add(lang);
  }
  return [...langs];
};

/**
 * With exactly one recipient country, both title and description use one of
 * that country's languages.
 */
export const isRecipientLanguageUsed = (facts: ActivityFacts): boolean => {
  const countries = children(facts.element, 'recipient-country');
  if (countries.length !== 1) return false;

  const code = attr(countries[0], 'code');
  const countryLangs = code === undefined ? [] : languagesFor(facts.tables, code);
  const usesCountryLanguage = (tag: string): boolean =>
    children(facts.element, tag)
      .flatMap((element) => languagesOf(facts, element))
      .some((lang) => countryLangs.includes(lang));

  return usesCountryLanguage('title') && usesCountryLanguage('description');
};

const inCodelist =
  (facts: ActivityFacts, codelist: CodelistName) =>
  (code: string | undefined): boolean =>
    isCodeIn(facts.tables, facts.major, codelist, code);

// ─────────────────────────────────────────────────────────────────────────────
// Criteria
// ─────────────────────────────────────────────────────────────────────────────

export const CRITERIA: readonly ComprehensivenessCriterion[] = [
  {
    name: 'version',
    present: (f) => f.declaredVersion !== null,
    valid: (f) =>
      f.declaredVersion !== null && f.tables.codelists[f.major].Version.has(f.declaredVersion),
  },
  {
    name: 'reporting-org',
    present: (f) => nonEmpty(selectAttr(f.element, 'reporting-org/@ref')) && hasText(f, 'reporting-org'),
  },
  {
    name: 'iati-identifier',
    present: (f) => selectText(f.element, 'iati-identifier').length > 0,
    valid: (f) => {
      if (f.major === '1') return true;
      const identifier = f.identifier.value ?? '';
      const reportingRef = attr(child(f.element, 'reporting-org'), 'ref');
      const previousRefs = children(f.element, 'other-identifier')
        .filter((o) => attr(o, 'type') === 'B1')
        .flatMap((o) => {
          const ref = attr(o, 'ref');
          return ref === undefined ? [] : [ref];
        });
      return (
        (reportingRef !== undefined && reportingRef !== '' && identifier.startsWith(reportingRef)) ||
        previousRefs.some((ref) => identifier.startsWith(ref))
      );
    },
  },
  {
    name: 'participating-org',
    present: (f) => child(f.element, 'participating-org') !== undefined,
    valid: (f) =>
      selectAttr(f.element, 'participating-org/@role').includes(f.codes.funding),
  },
  { name: 'title', present: (f) => hasText(f, 'title') },
  { name: 'description', present: (f) => hasText(f, 'description') },
  {
    name: 'activity-status',
    present: (f) => child(f.element, 'activity-status') !== undefined,
    valid: (f) =>
      allTrueAndNotEmpty(selectAttr(f.element, 'activity-status/@code').map(inCodelist(f, 'ActivityStatus'))),
  },
  {
    name: 'activity-date',
    present: (f) => child(f.element, 'activity-date') !== undefined,
    valid: (f) =>
      nonEmpty([...f.activityDates(f.codes.plannedStart), ...f.activityDates(f.codes.actualStart)]) &&
      allTrueAndNotEmpty(children(f.element, 'activity-date').map(isValidDateElement)),
  },
  {
    name: 'sector',
    present: (f) =>
      child(f.element, 'sector') !== undefined ||
      everyTransaction(f, (t) => child(t, 'sector') !== undefined),
    valid: (f) => percentagesSumTo100(children(f.element, 'sector'), true),
  },
  {
    name: 'country_or_region',
    present: (f) =>
      child(f.element, 'recipient-country') !== undefined ||
      child(f.element, 'recipient-region') !== undefined ||
      everyTransaction(
        f,
        (t) => child(t, 'recipient-country') !== undefined || child(t, 'recipient-region') !== undefined
      ),
    valid: (f) =>
      percentagesSumTo100(
        f.element.children.filter((c) => c.tag === 'recipient-country' || c.tag === 'recipient-region'),
        false
      ),
  },
  {
    name: 'transaction_commitment',
    present: (f) => nonEmpty(commitments(f)),
    valid: (f) => transactionsAreValid(commitments(f)),
  },
  {
    name: 'transaction_spend',
    present: (f) => nonEmpty(spending(f)),
    valid: (f) => transactionsAreValid(spending(f)),
  },
  {
    name: 'transaction_currency',
    present: (f) =>
      allTrueAndNotEmpty(
        f.transactions.value.map(
          (t) =>
            nonEmpty(selectAttr(t, 'value/@value-date')) &&
            (f.defaultCurrency !== null || nonEmpty(selectAttr(t, 'value/@currency')))
        )
      ),
    valid: (f) =>
      f.transactions.value.every((t) => {
        const currencies = [
          ...(f.defaultCurrency === null ? [] : [f.defaultCurrency]),
          ...selectAttr(t, 'value/@currency'),
        ];
        return (
          children(t, 'value').every(isValidDateElement) &&
          currencies.every(inCodelist(f, 'Currency'))
        );
      }),
  },
  {
    name: 'transaction_traceability',
    present: (f) =>
      allTrueAndNotEmpty(
        incoming(f).map((t) => nonEmpty(selectAttr(t, 'provider-org/@provider-activity-id')))
      ) || f.isDonorPublisher.value,
  },
  {
    name: 'budget',
    present: (f) => nonEmpty(f.budgets.value),
    valid: (f) =>
      f.budgets.value.every(
        (b) =>
          isValidDateElement(child(b, 'period-start')) &&
          isValidDateElement(child(b, 'period-end')) &&
          isValidDateElement(child(b, 'value')) &&
          isValidValueElement(child(b, 'value'))
      ),
  },
  {
    name: 'budget_not_provided',
    present: (f) => attr(f.element, 'budget-not-provided') !== undefined,
    valid: (f) => {
      const code = parseDecimal(attr(f.element, 'budget-not-provided'));
      return code !== null && code.isInteger() && inCodelist(f, 'BudgetNotProvided')(code.toFixed());
    },
  },
  { name: 'contact-info', present: (f) => nonEmpty(select(f.element, 'contact-info/email')) },
  { name: 'location', present: (f) => nonEmpty(locations(f)) },
  {
    name: 'location_point_pos',
    present: (f) => nonEmpty(select(f.element, 'location/point/pos')),
    valid: (f) =>
      allTrueAndNotEmpty(select(f.element, 'location/point/pos').map((pos) => isValidCoordinates(pos.text))),
  },
  {
    name: 'sector_dac',
    present: (f) =>
      nonEmpty(dacSectors(f.element, f)) ||
      everyTransaction(f, (t) => nonEmpty(dacSectors(t, f))),
    valid: (f) => {
      const sectors = children(f.element, 'sector');
      const fiveDigit = sectors.filter((s) => {
        const vocabulary = attr(s, 'vocabulary');
        return vocabulary === undefined || vocabulary === f.codes.dac5;
      });
      const threeDigit = sectors.filter((s) => attr(s, 'vocabulary') === f.codes.dac3);
      return (
        fiveDigit.every((s) => inCodelist(f, 'Sector')(attr(s, 'code'))) &&
        threeDigit.every((s) => inCodelist(f, 'SectorCategory')(attr(s, 'code')))
      );
    },
  },
  { name: 'capital-spend', present: (f) => nonEmpty(selectAttr(f.element, 'capital-spend/@percentage')) },
  {
    name: 'document-link',
    present: (f) => child(f.element, 'document-link') !== undefined,
    valid: (f) =>
      allTrueAndNotEmpty(
        children(f.element, 'document-link').map(
          (link) =>
            isValidUrlElement(link) && inCodelist(f, 'DocumentCategory')(attr(child(link, 'category'), 'code'))
        )
      ),
  },
  {
    name: 'activity-website',
    present: (f) => nonEmpty(websites(f)),
    valid: (f) => allTrueAndNotEmpty(websites(f).map(isValidUrlElement)),
  },
  { name: 'recipient_language', present: isRecipientLanguageUsed },
  { name: 'conditions_attached', present: (f) => nonEmpty(selectAttr(f.element, 'conditions/@attached')) },
  { name: 'result_indicator', present: (f) => nonEmpty(select(f.element, 'result/indicator')) },
  {
    name: 'aid_type',
    present: (f) =>
      allTrueAndNotEmpty(selectAttr(f.element, 'default-aid-type/@code').map((code) => code !== '')) ||
      allTrueAndNotEmpty(f.transactions.value.map((t) => nonEmpty(selectAttr(t, 'aid-type/@code')))),
    valid: (f) => {
      const isAidType = inCodelist(f, 'AidType');
      return (
        allTrueAndNotEmpty(selectAttr(f.element, 'default-aid-type/@code').map(isAidType)) ||
        allTrueAndNotEmpty(f.transactions.value.map((t) => selectAttr(t, 'aid-type/@code').some(isAidType)))
      );
    },
  },
];

// ─────────────────────────────────────────────────────────────────────────────
// Evaluation
// ─────────────────────────────────────────────────────────────────────────────

export type CriterionResults = ReadonlyMap<CriterionName, boolean>;

export const presenceChecks = (facts: ActivityFacts): CriterionResults =>
  new Map(
    CRITERIA.map((criterion): [CriterionName, boolean] => [criterion.name, criterion.present(facts)])
  );

export const validityChecks = (facts: ActivityFacts): CriterionResults => {
  const presence = facts.presence.value;
  return new Map(
    CRITERIA.map((criterion): [CriterionName, boolean] => {
      const present = presence.get(criterion.name) ?? false;
      const valid = present && (criterion.valid === undefined || criterion.valid(facts));
      return [criterion.name, valid];
    })
  );
};

/**
 * Whether the activity belongs in the denominator of each restricted
 * criterion.
 */
export const denominatorsFor = (facts: ActivityFacts): ReadonlyMap<CriterionName, boolean> => {
  const start = facts.startDate.value;
  const today = facts.ctx.today;

  return new Map<CriterionName, boolean>([
    ['recipient_language', children(facts.element, 'recipient-country').length === 1],
    [
      'transaction_spend',
      start !== null && compareDates(start, today) < 0 && daysBetween(start, today) > SPEND_EXPECTED_AFTER_DAYS,
    ],
    ['transaction_traceability', nonEmpty(incoming(facts)) || facts.isDonorPublisher.value],
  ]);
};
