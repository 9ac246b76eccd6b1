import {
  addDays as addCalendarDays,
  differenceInCalendarDays,
  format,
  isAfter,
  isValid,
  parseISO,
  setDate,
  startOfDay,
  startOfISOWeek,
  subDays,
} from 'date-fns';
import { UTCDate } from '@date-fns/utc';

// Calendar-day helpers. All ledger dates are UTC midnight; date-fns reads
// them through UTCDate so the host time zone never shifts a day.

export const ISO_DATE = /^\d{4}-\d{2}-\d{2}$/;

export { isAfter };

function utc(date: Date): UTCDate {
  return new UTCDate(date.getTime());
}

/**
 * Parses `YYYY-MM-DD` (or takes a Date) into a UTC-midnight Date.
 * @throws Error on anything that is not a real calendar date
 */
export function toDate(value: string | Date): Date {
  if (value instanceof Date) {
    return startOfDay(utc(value));
  }
  const trimmed = value.trim();
  const parsed = ISO_DATE.test(trimmed) ? parseISO(trimmed) : undefined;
  if (!parsed || !isValid(parsed)) {
    throw new Error(`Invalid date "${value}", expected YYYY-MM-DD`);
  }
  return new UTCDate(parsed.getFullYear(), parsed.getMonth(), parsed.getDate());
}

/** `YYYY-MM-DD`, also used as map key */
export function formatDate(date: Date): string {
  return format(utc(date), 'yyyy-MM-dd');
}

export function addDays(date: Date, days: number): Date {
  return addCalendarDays(utc(date), days);
}

/** Whole days from `from` to `to` (negative when `to` is earlier) */
export function daysBetween(from: Date, to: Date): number {
  return differenceInCalendarDays(utc(to), utc(from));
}

export function isOnOrBefore(a: Date, b: Date): boolean {
  return !isAfter(a, b);
}

/** Yesterday relative to `now`, the default end of a replay */
export function yesterday(now: Date = new Date()): Date {
  return subDays(toDate(now), 1);
}

/**
 * Thursday of the ISO week containing `date`.
 * Weekly trade volume is labelled with that Thursday.
 */
export function isoWeekThursday(date: Date): Date {
  return addCalendarDays(startOfISOWeek(utc(date)), 3);
}

/** 15th of the month containing `date` */
export function midMonth(date: Date): Date {
  return setDate(toDate(date), 15);
}
