import { Decimal } from 'decimal.js';

import type { CurrencyConverter, ExchangeRateRow, ExchangeRateTable } from './types.js';

/**
 * Builds a rate table from rate observations. A later row for the same
 * currency and year replaces an earlier one; rows whose date has no
 * leading year are ignored.
 */
export function buildExchangeRateTable(rows: readonly ExchangeRateRow[]): ExchangeRateTable {
  const table = new Map<string, Map<number, Decimal>>();

  for (const row of rows) {
    const year = Number.parseInt(row.date.substring(0, 4), 10);
    if (Number.isNaN(year)) continue;

    let years = table.get(row.currency);
    if (years === undefined) {
      years = new Map();
      table.set(row.currency, years);
    }
    years.set(year, row.rate);
  }

  return table;
}

function findLatestYear(years: ReadonlyMap<number, Decimal>): number | undefined {
  let latest: number | undefined;
  for (const year of years.keys()) {
    if (latest === undefined || year > latest) latest = year;
  }
  return latest;
}

/**
 * Creates a converter over an immutable rate table.
 *
 * Years after the last year known for a currency use that last rate, so
 * recent data is not lost to publication lag of the rate source. Every
 * other gap (unknown currency, year before coverage or missing inside it,
 * zero rate) contributes 0 rather than failing.
 *
 * @example
 * ```typescript
 * const converter = createCurrencyConverter(
 *   buildExchangeRateTable([{ currency: 'EUR', rate: new Decimal('0.8'), date: '2013-12-31' }])
 * );
 * converter.toUSD('EUR', new Decimal(100), 2013); // 125
 * converter.toUSD('EUR', new Decimal(100), 2020); // 125 (clamped to 2013)
 * converter.toUSD('GBP', new Decimal(100), 2013); // 0
 * ```
 */
export function createCurrencyConverter(table: ExchangeRateTable): CurrencyConverter {
  const latestYears = new Map<string, number>();
  for (const [currency, years] of table) {
    const latest = findLatestYear(years);
    if (latest !== undefined) latestYears.set(currency, latest);
  }

  const zero = new Decimal(0);

  return {
    toUSD(currency: string, amount: Decimal, year: number): Decimal {
      const years = table.get(currency);
      const latest = latestYears.get(currency);
      if (years === undefined || latest === undefined) return zero;

      const rate = years.get(Math.min(year, latest));
      if (rate === undefined || rate.isZero()) return zero;

      return amount.div(rate);
    },

    latestYear(currency: string): number | undefined {
      return latestYears.get(currency);
    },
  };
}
