/**
 * Calendar date helpers.
 *
 * Dates are plain year/month/day triples; arithmetic goes through epoch days
 * computed in UTC so the host time zone never shifts a date.
 */

import { attr, child } from './query.js';

import type { CalendarDate, XmlNode } from './types.js';

const MS_PER_DAY = 24 * 60 * 60 * 1000;

const ISO_DATE_PREFIX = /^(-?[0-9]{4,})-([0-9]{2})-([0-9]{2})/;

const utcDate = (year: number, month: number, day: number): Date => {
  const date = new Date(0);
  date.setUTCFullYear(year, month - 1, day);
  return date;
};

export const isValidCalendarDate = (year: number, month: number, day: number): boolean => {
  if (month < 1 || month > 12 || day < 1) return false;
  const date = utcDate(year, month, day);
  return date.getUTCMonth() === month - 1 && date.getUTCDate() === day;
};

/**
 * Reads the leading `YYYY-MM-DD` of a string. Anything after the day
 * (time, zone) is ignored; impossible dates yield null.
 */
export const isoDateMatch = (raw: string | null | undefined): CalendarDate | null => {
  if (raw === null || raw === undefined) return null;
  const match = ISO_DATE_PREFIX.exec(raw);
  if (match === null) return null;

  const year = Number.parseInt(match[1] ?? '', 10);
  const month = Number.parseInt(match[2] ?? '', 10);
  const day = Number.parseInt(match[3] ?? '', 10);
  if (!isValidCalendarDate(year, month, day)) return null;

  return { year, month, day };
};

/**
 * Date of a date-bearing element: `@iso-date`, falling back to its text.
 */
export const isoDate = (element: XmlNode | undefined): CalendarDate | null => {
  if (element === undefined) return null;
  const raw = attr(element, 'iso-date');
  if (raw !== undefined && raw !== '') return isoDateMatch(raw);
  return isoDateMatch(element.text);
};

export const toEpochDay = (date: CalendarDate): number =>
  Math.round(utcDate(date.year, date.month, date.day).getTime() / MS_PER_DAY);

export const fromEpochDay = (epochDay: number): CalendarDate => {
  const date = new Date(epochDay * MS_PER_DAY);
  return { year: date.getUTCFullYear(), month: date.getUTCMonth() + 1, day: date.getUTCDate() };
};

export const compareDates = (a: CalendarDate, b: CalendarDate): number =>
  toEpochDay(a) - toEpochDay(b);

export const daysBetween = (from: CalendarDate, to: CalendarDate): number =>
  toEpochDay(to) - toEpochDay(from);

/**
 * Same calendar day `years` later (or earlier); February 29 becomes March 1
 * in a non-leap target year.
 */
export const addYears = (date: CalendarDate, years: number): CalendarDate => {
  const shifted = utcDate(date.year + years, date.month, date.day);
  return {
    year: shifted.getUTCFullYear(),
    month: shifted.getUTCMonth() + 1,
    day: shifted.getUTCDate(),
  };
};

/**
 * Month arithmetic that clamps to the end of the target month
 * (August 31 + 6 months = February 28/29).
 */
export const addMonths = (date: CalendarDate, months: number): CalendarDate => {
  const index = date.year * 12 + (date.month - 1) + months;
  const year = Math.floor(index / 12);
  const month = index - year * 12 + 1;
  const lastDay = utcDate(year, month + 1, 0).getUTCDate();
  return { year, month, day: Math.min(date.day, lastDay) };
};

export const formatDate = (date: CalendarDate): string => {
  const year = date.year < 0 ? `-${String(-date.year).padStart(4, '0')}` : String(date.year).padStart(4, '0');
  return `${year}-${String(date.month).padStart(2, '0')}-${String(date.day).padStart(2, '0')}`;
};

/**
 * Transaction date: `transaction-date`, otherwise `value/@value-date`.
 */
export const transactionDate = (transaction: XmlNode): CalendarDate | null => {
  const dateElement = child(transaction, 'transaction-date');
  if (dateElement !== undefined) return isoDate(dateElement);
  const value = child(transaction, 'value');
  if (value !== undefined) return isoDateMatch(attr(value, 'value-date'));
  return null;
};

/**
 * Year a budget is attributed to. A period of at most 370 days belongs to
 * the year containing its midpoint; longer or half-open periods use the
 * start year, then the end year.
 */
export const budgetYear = (budget: XmlNode): number | null => {
  const start = isoDate(child(budget, 'period-start'));
  const end = isoDate(child(budget, 'period-end'));

  if (start !== null && end !== null) {
    const length = daysBetween(start, end);
    if (length >= 0 && length <= 370) {
      return fromEpochDay(toEpochDay(start) + Math.floor(length / 2)).year;
    }
    return start.year;
  }

  return start?.year ?? end?.year ?? null;
};

export const plannedDisbursementYear = (plannedDisbursement: XmlNode): number | null => {
  const start = isoDate(child(plannedDisbursement, 'period-start'));
  if (start !== null) return start.year;
  return isoDate(child(plannedDisbursement, 'period-end'))?.year ?? null;
};
