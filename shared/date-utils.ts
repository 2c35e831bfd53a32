/**
 * Calendar-date helpers for promotion validity ranges.
 *
 * Promotion dates are plain calendar days (`YYYY-MM-DD`). Because that format
 * sorts lexicographically in chronological order, comparisons work directly on
 * the strings, both here and in SQL.
 */
import { addDays, format, isValid, parse, subDays } from "date-fns";
import { formatInTimeZone } from "date-fns-tz";

const ISO_DATE_PATTERN = /^\d{4}-\d{2}-\d{2}$/;
const ISO_DATE_FORMAT = "yyyy-MM-dd";

/**
 * True when the value is a `YYYY-MM-DD` string naming a real calendar day
 * (so `2025-02-30` is rejected).
 */
export function isIsoCalendarDate(value: string): boolean {
  if (!ISO_DATE_PATTERN.test(value)) return false;
  const parsed = parse(value, ISO_DATE_FORMAT, new Date(0));
  return isValid(parsed) && format(parsed, ISO_DATE_FORMAT) === value;
}

/**
 * Formats an instant as the calendar day it falls on, either in the given IANA
 * time zone or in the process's local zone.
 */
export function toIsoDate(instant: Date, timeZone?: string): string {
  return timeZone
    ? formatInTimeZone(instant, timeZone, ISO_DATE_FORMAT)
    : format(instant, ISO_DATE_FORMAT);
}

export function todayIsoDate(now: Date = new Date(), timeZone?: string): string {
  return toIsoDate(now, timeZone);
}

export function yesterdayIsoDate(now: Date = new Date(), timeZone?: string): string {
  const today = parse(todayIsoDate(now, timeZone), ISO_DATE_FORMAT, new Date(0));
  return format(subDays(today, 1), ISO_DATE_FORMAT);
}

/** The calendar day `days` away from `day`; negative offsets go back. */
export function shiftIsoDate(day: string, days: number): string {
  return format(addDays(parse(day, ISO_DATE_FORMAT, new Date(0)), days), ISO_DATE_FORMAT);
}

/** Inclusive on both ends. */
export function isActiveOn(
  range: { startDate: string; endDate: string },
  day: string,
): boolean {
  return range.startDate <= day && day <= range.endDate;
}

export function earlierIsoDate(a: string, b: string): string {
  return a <= b ? a : b;
}

export function isValidTimeZone(timeZone: string): boolean {
  try {
    new Intl.DateTimeFormat("en-US", { timeZone });
    return true;
  } catch {
    return false;
  }
}
