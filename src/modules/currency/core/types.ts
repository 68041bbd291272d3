import type { Decimal } from 'decimal.js';

/**
 * Yearly exchange rates keyed by ISO currency code, then by year.
 * Rates are expressed as units of local currency per USD.
 */
export type ExchangeRateTable = ReadonlyMap<string, ReadonlyMap<number, Decimal>>;

/**
 * One observation from a rate source (the date only contributes its year).
 */
export interface ExchangeRateRow {
  currency: string;
  rate: Decimal;
  date: string;
}

export interface CurrencyConverter {
  /**
   * Converts an amount to USD using the rate of the given year.
   * Unknown currencies, uncovered years and zero rates convert to 0.
   */
  toUSD(currency: string, amount: Decimal, year: number): Decimal;
  /** Last year with a rate for the currency, if any */
  latestYear(currency: string): number | undefined;
}
