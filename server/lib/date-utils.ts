/**
 * Date Utilities
 *
 * Ledger dates are calendar days in the reader's time zone, written as
 * "yyyy-MM-dd" strings. Day arithmetic happens on those strings so that the
 * host time zone never leaks into the result.
 */

import { TZDate } from "@date-fns/tz";
import {
  addDays,
  eachDayOfInterval,
  endOfMonth,
  format,
  isValid,
  parse,
} from "date-fns";

export const LOG_DATE_FORMAT = "yyyy-MM-dd";

export interface DateRange {
  /** First day, inclusive */
  start: string;
  /** Last day, inclusive */
  end: string;
}

/**
 * Calendar day of `instant` in `timeZone`.
 */
export function toLogDate(instant: Date, timeZone: string): string {
  return format(new TZDate(instant.getTime(), timeZone), LOG_DATE_FORMAT);
}

export function parseLogDate(logDate: string): Date {
  return parse(logDate, LOG_DATE_FORMAT, new Date(2000, 0, 1));
}

export function isLogDate(value: string): boolean {
  return (
    /^\d{4}-\d{2}-\d{2}$/.test(value) &&
    isValid(parseLogDate(value)) &&
    format(parseLogDate(value), LOG_DATE_FORMAT) === value
  );
}

export function addLogDays(logDate: string, amount: number): string {
  return format(addDays(parseLogDate(logDate), amount), LOG_DATE_FORMAT);
}

/**
 * Every day of the range, in order. Empty when the range is reversed.
 */
export function eachLogDate(range: DateRange): string[] {
  if (range.start > range.end) return [];
  return eachDayOfInterval({
    start: parseLogDate(range.start),
    end: parseLogDate(range.end),
  }).map((day) => format(day, LOG_DATE_FORMAT));
}

export function isWithinRange(logDate: string, range: DateRange): boolean {
  return logDate >= range.start && logDate <= range.end;
}

// Four digits, so years below 100 are not read as 19xx
function padYear(year: number): string {
  return year.toString().padStart(4, "0");
}

export function monthRange(year: number, month: number): DateRange {
  const start = `${padYear(year)}-${month.toString().padStart(2, "0")}-01`;
  return {
    start,
    end: format(endOfMonth(parseLogDate(start)), LOG_DATE_FORMAT),
  };
}

export function yearRange(year: number): DateRange {
  const y = padYear(year);
  return { start: `${y}-01-01`, end: `${y}-12-31` };
}
