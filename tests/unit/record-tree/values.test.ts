import { describe, expect, it } from 'vitest';

import {
  isValidCoordinates,
  isValidDateElement,
  isValidUrlElement,
  isValidValueElement,
  isXsdDate,
  isXsdDecimal,
  parseDecimal,
} from '@/modules/record-tree/index.js';

import { xml } from '../../fixtures/builders.js';

describe('parseDecimal', () => {
  it('parses plain and exponent amounts', () => {
    expect(parseDecimal(' 1000.50 ')?.toFixed()).toBe('1000.5');
    expect(parseDecimal('1e3')?.toFixed()).toBe('1000');
    expect(parseDecimal('-5')?.toFixed()).toBe('-5');
  });

  it('returns null for anything else', () => {
    expect(parseDecimal('1,000')).toBeNull();
    expect(parseDecimal('')).toBeNull();
    expect(parseDecimal(undefined)).toBeNull();
  });
});

describe('lexical checks', () => {
  it('accepts xsd decimals without exponent', () => {
    expect(isXsdDecimal('10.5')).toBe(true);
    expect(isXsdDecimal('1e3')).toBe(false);
  });

  it('accepts xsd dates with an optional zone', () => {
    expect(isXsdDate('2024-01-01')).toBe(true);
    expect(isXsdDate('2024-01-01Z')).toBe(true);
    expect(isXsdDate('2024-01-01+02:00')).toBe(true);
    expect(isXsdDate('2024-01-01T00:00:00')).toBe(false);
    expect(isXsdDate('2023-02-29')).toBe(false);
  });
});

describe('element checks', () => {
  it('checks the date attribute of date-bearing elements', () => {
    expect(isValidDateElement(xml('<period-start iso-date="2024-01-01"/>'))).toBe(true);
    expect(isValidDateElement(xml('<value value-date="2024-01-01">5</value>'))).toBe(true);
    expect(isValidDateElement(xml('<value>5</value>'))).toBe(false);
    expect(isValidDateElement(xml('<narrative iso-date="2024-01-01"/>'))).toBe(false);
    expect(isValidDateElement(undefined)).toBe(false);
  });

  it('checks value elements', () => {
    expect(isValidValueElement(xml('<value>100.25</value>'))).toBe(true);
    expect(isValidValueElement(xml('<value>1e3</value>'))).toBe(false);
    expect(isValidValueElement(xml('<value><amount>1</amount></value>'))).toBe(false);
    expect(isValidValueElement(xml('<budget>1</budget>'))).toBe(false);
  });

  it('checks URLs of links and websites', () => {
    expect(isValidUrlElement(xml('<document-link url="https://example.org/report.pdf"/>'))).toBe(true);
    expect(isValidUrlElement(xml('<document-link url="report.pdf"/>'))).toBe(false);
    expect(isValidUrlElement(xml('<activity-website>http://example.org</activity-website>'))).toBe(true);
    expect(isValidUrlElement(xml('<activity-website>example.org</activity-website>'))).toBe(false);
  });

  it('checks coordinates', () => {
    expect(isValidCoordinates('51.5 -0.12')).toBe(true);
    expect(isValidCoordinates('0 0')).toBe(false);
    expect(isValidCoordinates('91 0')).toBe(false);
    expect(isValidCoordinates('10,20')).toBe(false);
    expect(isValidCoordinates(null)).toBe(false);
  });
});
