import { Decimal } from 'decimal.js';
import { describe, expect, it } from 'vitest';

import { buildExchangeRateTable, createCurrencyConverter } from '@/modules/currency/index.js';

import { makeConverter, rate } from '../../fixtures/builders.js';

describe('buildExchangeRateTable', () => {
  it('keys rates by currency and year', () => {
    const table = buildExchangeRateTable([rate('EUR', '0.8', 2013), rate('EUR', '0.75', 2014)]);

    expect(table.get('EUR')?.get(2013)?.toFixed()).toBe('0.8');
    expect(table.get('EUR')?.get(2014)?.toFixed()).toBe('0.75');
  });

  it('lets a later row for the same year replace an earlier one', () => {
    const table = buildExchangeRateTable([rate('EUR', '0.8', 2013), rate('EUR', '0.9', 2013)]);

    expect(table.get('EUR')?.get(2013)?.toFixed()).toBe('0.9');
  });

  it('ignores rows whose date has no year', () => {
    const table = buildExchangeRateTable([{ currency: 'EUR', rate: new Decimal('0.8'), date: 'n/a' }]);

    expect(table.size).toBe(0);
  });
});

describe('createCurrencyConverter', () => {
  const converter = makeConverter();

  it('divides by the rate of the year', () => {
    expect(converter.toUSD('EUR', new Decimal(100), 2013).toFixed()).toBe('125');
    expect(converter.toUSD('GBP', new Decimal(100), 2014).toFixed()).toBe('200');
  });

  it('uses the latest known rate for later years', () => {
    expect(converter.toUSD('EUR', new Decimal(100), 2020).toFixed()).toBe('125');
  });

  it('converts years before coverage to zero', () => {
    expect(converter.toUSD('GBP', new Decimal(100), 2013).toFixed()).toBe('0');
  });

  it('converts unknown currencies to zero', () => {
    expect(converter.toUSD('XYZ', new Decimal(100), 2013).toFixed()).toBe('0');
  });

  it('converts with a zero rate to zero', () => {
    const zeroRate = createCurrencyConverter(buildExchangeRateTable([rate('JPY', '0', 2014)]));

    expect(zeroRate.toUSD('JPY', new Decimal(100), 2014).toFixed()).toBe('0');
  });

  it('reports the latest year per currency', () => {
    expect(converter.latestYear('EUR')).toBe(2014);
    expect(converter.latestYear('XYZ')).toBeUndefined();
  });
});
