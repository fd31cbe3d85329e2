import { addDays, differenceInCalendarDays, format, isValid, parse } from "date-fns";
import { DateRange, DateString } from "@/core/calculations/type";

const DATE_FORMAT = "yyyy-MM-dd";
const DATE_PATTERN = /^\d{4}-\d{2}-\d{2}$/;

export function toDateString(d: Date): DateString {
  // local calendar day, not the UTC one
  return format(d, DATE_FORMAT);
}

export function fromDateString(s: DateString): Date {
  return parse(s, DATE_FORMAT, new Date(2000, 0, 1));
}

export function isDateString(value: string): boolean {
  if (!DATE_PATTERN.test(value)) return false;
  const parsed = fromDateString(value);
  // rejects 2024-02-30 and friends, which parse() would roll over
  return isValid(parsed) && toDateString(parsed) === value;
}

export function addDaysToDateString(s: DateString, days: number): DateString {
  return toDateString(addDays(fromDateString(s), days));
}

/** Calendar days from `from` to `to`; negative when `to` is earlier. */
export function daysBetween(from: DateString, to: DateString): number {
  return differenceInCalendarDays(fromDateString(to), fromDateString(from));
}

export function maxDateString(a: DateString, b: DateString): DateString {
  return a >= b ? a : b;
}

export function isWithinRange(date: DateString, range: DateRange): boolean {
  return date >= range.start && date <= range.end;
}

/** The `n` days ending on (and including) `end`. */
export function lastNDaysRange(end: DateString, n: number): DateRange {
  return { start: addDaysToDateString(end, -(n - 1)), end };
}
