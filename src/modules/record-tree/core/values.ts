/**
 * Lexical checks for leaf values (decimals, dates, URLs, coordinates).
 */

import { Decimal } from 'decimal.js';

import { isValidCalendarDate } from './dates.js';
import { attr } from './query.js';

import type { XmlNode } from './types.js';

const DECIMAL_TEXT = /^[+-]?([0-9]+(\.[0-9]*)?|\.[0-9]+)([eE][+-]?[0-9]+)?$/;
const XSD_DECIMAL = /^[+-]?([0-9]+(\.[0-9]*)?|\.[0-9]+)$/;
const XSD_DATE = /^(-?[0-9]{4,})-([0-9]{2})-([0-9]{2})(Z|[+-][0-9]{2}:[0-9]{2})?$/;

/**
 * Parses a monetary amount. Returns null for absent or unparsable text.
 */
export const parseDecimal = (text: string | null | undefined): Decimal | null => {
  if (text === null || text === undefined) return null;
  const trimmed = text.trim();
  if (!DECIMAL_TEXT.test(trimmed)) return null;
  return new Decimal(trimmed);
};

export const isXsdDecimal = (text: string): boolean => XSD_DECIMAL.test(text.trim());

export const isXsdDate = (text: string): boolean => {
  const match = XSD_DATE.exec(text.trim());
  if (match === null) return false;
  return isValidCalendarDate(
    Number.parseInt(match[1] ?? '', 10),
    Number.parseInt(match[2] ?? '', 10),
    Number.parseInt(match[3] ?? '', 10)
  );
};

const DATE_ATTRIBUTE: Record<string, string> = {
  'activity-date': 'iso-date',
  'transaction-date': 'iso-date',
  'period-start': 'iso-date',
  'period-end': 'iso-date',
  value: 'value-date',
};

/**
 * A date-bearing element carries its required date attribute as a valid
 * `xsd:date`.
 */
export const isValidDateElement = (element: XmlNode | undefined): boolean => {
  if (element === undefined) return false;
  const name = DATE_ATTRIBUTE[element.tag];
  if (name === undefined) return false;
  const value = attr(element, name);
  return value !== undefined && isXsdDate(value);
};

/**
 * A `value` element holds a plain decimal and no child elements.
 */
export const isValidValueElement = (element: XmlNode | undefined): boolean => {
  if (element?.tag !== 'value') return false;
  if (element.children.length > 0) return false;
  return element.text !== null && isXsdDecimal(element.text);
};

const isAbsoluteUri = (url: string | null | undefined): boolean =>
  url !== null && url !== undefined && url !== '' && url.includes('://') && !/\s/.test(url.trim());

/**
 * Absolute URL of a `document-link` (`@url`) or `activity-website` (text).
 */
export const isValidUrlElement = (element: XmlNode | undefined): boolean => {
  if (element === undefined) return false;
  if (element.tag === 'document-link') return isAbsoluteUri(attr(element, 'url'));
  if (element.tag === 'activity-website') return isAbsoluteUri(element.text);
  return false;
};

/**
 * `lat lng` pair inside the coordinate space, excluding the 0 0 placeholder.
 */
export const isValidCoordinates = (text: string | null): boolean => {
  if (text === null) return false;
  const parts = text.split(' ');
  if (parts.length !== 2) return false;
  const lat = parseDecimal(parts[0]);
  const lng = parseDecimal(parts[1]);
  if (lat === null || lng === null) return false;
  if (lat.isZero() && lng.isZero()) return false;
  return lat.gte(-90) && lat.lte(90) && lng.gte(-180) && lng.lte(180);
};
