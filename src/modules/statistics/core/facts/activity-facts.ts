import { Decimal } from 'decimal.js';

import { Tally3, type Counter3 } from '@/modules/aggregation/index.js';
import {
  addMonths,
  attr,
  budgetYear,
  child,
  children,
  compareDates,
  isoDate,
  keyOf,
  parseDecimal,
  selectAttr,
  transactionDate,
  type CalendarDate,
  type XmlNode,
} from '@/modules/record-tree/index.js';

import { classifyCurrent, type CurrentStatus } from '../comprehensiveness/classify.js';
import {
  denominatorsFor,
  presenceChecks,
  validityChecks,
  type CriterionResults,
} from '../comprehensiveness/criteria.js';
import { lazy } from '../lazy.js';
import { RecordFacts } from './record-facts.js';

const ZERO = new Decimal(0);

/** Share of commitments already spent above which an activity leaves forward-looking counts. */
export const SPENT_COMMITMENT_RATIO = 0.9;

/** Activities ending within this many months are excluded from forward-looking counts. */
export const FORWARD_LOOKING_END_MONTHS = 6;

/**
 * 0 when the activity counts for forward-looking statistics, 1 when it ends
 * too soon, 2 when most of its commitments are already spent.
 */
export type ForwardLookingExclusion = 0 | 1 | 2;

export class ActivityFacts extends RecordFacts {
  // ───────────────────────────────────────────────────────────────────────────
  // Elements
  // ───────────────────────────────────────────────────────────────────────────

  readonly transactions = lazy(() => children(this.element, 'transaction'));

  readonly budgets = lazy(() => children(this.element, 'budget'));

  get defaultCurrency(): string | null {
    return attr(this.element, 'default-currency') ?? null;
  }

  /** `value/@currency` of a transaction, budget or planned disbursement, else the default currency. */
  currencyOf(node: XmlNode): string | null {
    return selectAttr(node, 'value/@currency')[0] ?? this.defaultCurrency;
  }

  transactionType(transaction: XmlNode): string | null {
    return attr(child(transaction, 'transaction-type'), 'code') ?? null;
  }

  transactionsOfType(codes: readonly string[]): XmlNode[] {
    return this.transactions.value.filter((t) => {
      const type = this.transactionType(t);
      return type !== null && codes.includes(type);
    });
  }

  /** Amount of a `value` child; absent or unparsable amounts are zero. */
  amountOf(node: XmlNode): Decimal {
    const text = child(node, 'value')?.text;
    const amount = parseDecimal(text);
    if (amount === null && text != null) {
      this.ctx.logger.debug({ value: text }, 'Unparsable amount counted as zero');
    }
    return amount ?? ZERO;
  }

  activityDates(type: string): XmlNode[] {
    return children(this.element, 'activity-date').filter((d) => attr(d, 'type') === type);
  }

  private datesOf(type: string): CalendarDate[] {
    return this.activityDates(type)
      .map((d) => isoDate(d))
      .filter((d): d is CalendarDate => d !== null);
  }

  // ───────────────────────────────────────────────────────────────────────────
  // Organisations
  // ───────────────────────────────────────────────────────────────────────────

  /** First non-empty `reporting-org/@ref`. */
  readonly reportingOrgRef = lazy((): string | null => {
    for (const org of children(this.element, 'reporting-org')) {
      const ref = attr(org, 'ref');
      if (ref !== undefined && ref !== '') return ref;
    }
    return null;
  });

  readonly isSecondaryReported = lazy((): boolean => {
    const secondary = attr(child(this.element, 'reporting-org'), 'secondary-reporter');
    return secondary === '1' || secondary === 'true';
  });

  /**
   * The reporting organisation appears as a funding or extending
   * participant and not as an implementing one.
   */
  readonly isDonorPublisher = lazy((): boolean => {
    const ref = selectAttr(this.element, 'reporting-org/@ref')[0];
    if (ref === undefined) return false;

    const refsWithRole = (role: string): string[] =>
      children(this.element, 'participating-org')
        .filter((org) => attr(org, 'role') === role)
        .flatMap((org) => {
          const value = attr(org, 'ref');
          return value === undefined ? [] : [value];
        });

    const donorRefs = [...refsWithRole(this.codes.funding), ...refsWithRole(this.codes.extending)];
    return donorRefs.includes(ref) && !refsWithRole(this.codes.implementing).includes(ref);
  });

  // ───────────────────────────────────────────────────────────────────────────
  // Dates
  // ───────────────────────────────────────────────────────────────────────────

  /** Actual start date, else planned start date (first of each). */
  readonly startDate = lazy((): CalendarDate | null => {
    const first =
      this.activityDates(this.codes.actualStart)[0] ?? this.activityDates(this.codes.plannedStart)[0];
    return isoDate(first);
  });

  /** Year of the actual (else planned) start, read strictly from `@iso-date`. */
  readonly startYear = lazy((): number | null => {
    const first =
      this.activityDates(this.codes.actualStart)[0] ?? this.activityDates(this.codes.plannedStart)[0];
    const raw = attr(first, 'iso-date')?.replace(/Z$/, '');
    if (raw === undefined || !/^[0-9]{4}-[0-9]{2}-[0-9]{2}$/.test(raw)) return null;
    return isoDate(first)?.year ?? null;
  });

  /** Actual end date, else planned end date. */
  readonly endDate = lazy((): CalendarDate | null => {
    const first =
      this.activityDates(this.codes.actualEnd)[0] ?? this.activityDates(this.codes.plannedEnd)[0];
    return isoDate(first);
  });

  readonly plannedEndDates = lazy(() => this.datesOf(this.codes.plannedEnd));

  readonly actualEndDates = lazy(() => this.datesOf(this.codes.actualEnd));

  // ───────────────────────────────────────────────────────────────────────────
  // Finance
  // ───────────────────────────────────────────────────────────────────────────

  /** type → currency → year → amount, for incoming funds, commitments, disbursements and expenditure. */
  readonly transactionSums = lazy((): Counter3 => {
    const { incomingFunds, commitment, disbursement, expenditure } = this.codes;
    const tally = new Tally3();
    for (const transaction of this.transactionsOfType([incomingFunds, commitment, disbursement, expenditure])) {
      const year = transactionDate(transaction)?.year;
      if (year === undefined) continue;
      tally.add(
        keyOf(this.transactionType(transaction)),
        keyOf(this.currencyOf(transaction)),
        String(year),
        this.amountOf(transaction)
      );
    }
    return tally.toCounter();
  });

  /** type → `USD` → year → amount converted at the year's rate, years capped at the clamp year. */
  readonly transactionSumsUsd = lazy(() => this.toUsd(this.transactionSums.value, this.ctx.usdClampYear));

  /**
   * Re-keys a type → currency → year table to type → `USD` → year.
   * Amounts without a currency are dropped.
   */
  toUsd(table: Counter3, clampYear: number | null): Counter3 {
    const tally = new Tally3();
    for (const [type, currencies] of Object.entries(table)) {
      for (const [currency, years] of Object.entries(currencies)) {
        if (currency === 'null') continue;
        for (const [yearKey, amount] of Object.entries(years)) {
          const year = clampYear === null ? Number(yearKey) : Math.min(Number(yearKey), clampYear);
          const usd = this.ctx.converter.toUSD(currency, amount, year);
          if (usd.isZero() && !amount.isZero()) {
            this.ctx.logger.debug({ currency, year }, 'No exchange rate, USD amount counted as zero');
          }
          tally.add(type, 'USD', String(year), usd);
        }
      }
    }
    return tally.toCounter();
  }

  /** Total USD value of one transaction type. */
  usdTotal(type: string): Decimal {
    const years = this.transactionSumsUsd.value[type]?.['USD'] ?? {};
    return Object.values(years).reduce((sum, value) => sum.plus(value), ZERO);
  }

  private usdValue(transaction: XmlNode): Decimal | null {
    const currency = this.currencyOf(transaction);
    const amount = parseDecimal(child(transaction, 'value')?.text);
    const date = transactionDate(transaction);
    if (currency === null || amount === null || date === null) return null;
    return this.ctx.converter.toUSD(currency, amount, date.year);
  }

  /**
   * Disbursements and expenditure up to `year` over all commitments, in USD.
   * Null when there are no positive commitments.
   */
  commitmentSpendRatio(year: number): number | null {
    let committed = ZERO;
    for (const transaction of this.transactionsOfType([this.codes.commitment])) {
      committed = committed.plus(this.usdValue(transaction) ?? ZERO);
    }
    if (committed.lte(0)) return null;

    let spent = ZERO;
    for (const transaction of this.transactionsOfType([this.codes.disbursement, this.codes.expenditure])) {
      const date = transactionDate(transaction);
      if (date === null || date.year > year) continue;
      spent = spent.plus(this.usdValue(transaction) ?? ZERO);
    }
    return spent.div(committed).toNumber();
  }

  // ───────────────────────────────────────────────────────────────────────────
  // Forward looking
  // ───────────────────────────────────────────────────────────────────────────

  readonly budgetYears = lazy(() =>
    this.budgets.value.map((budget) => budgetYear(budget)).filter((y): y is number => y !== null)
  );

  forwardLookingExclusion(year: number): ForwardLookingExclusion {
    const end = this.endDate.value;
    if (end !== null && compareDates(addMonths(this.ctx.today, FORWARD_LOOKING_END_MONTHS), end) > 0) {
      return 1;
    }
    const ratio = this.commitmentSpendRatio(year);
    return ratio !== null && ratio >= SPENT_COMMITMENT_RATIO ? 2 : 0;
  }

  /** No end dates at all, or some planned/actual end in `year` or later. */
  isForwardLookingCurrent(year: number): boolean {
    const endYears = [...this.plannedEndDates.value, ...this.actualEndDates.value].map((d) => d.year);
    return endYears.length === 0 || endYears.some((endYear) => endYear >= year);
  }

  /** The current year and the two following. */
  get forwardLookingYears(): number[] {
    const year = this.ctx.today.year;
    return [year, year + 1, year + 2];
  }

  // ───────────────────────────────────────────────────────────────────────────
  // Comprehensiveness
  // ───────────────────────────────────────────────────────────────────────────

  readonly currentStatus = lazy((): CurrentStatus => classifyCurrent(this));

  get isCurrent(): boolean {
    return this.currentStatus.value !== 0;
  }

  readonly presence = lazy((): CriterionResults => presenceChecks(this));

  readonly validity = lazy((): CriterionResults => validityChecks(this));

  readonly denominators = lazy(() => denominatorsFor(this));
}
