/**
 * Calendar-date helpers. Dates travel as `yyyy-MM-dd` strings so that
 * records compare, serialize and round-trip without timezone drift.
 */

import { differenceInCalendarDays, format, isValid, parse } from "date-fns";

/** Calendar date in `yyyy-MM-dd` form */
export type IsoDate = string;

export const ISO_DATE_FORMAT = "yyyy-MM-dd";

const ISO_PREFIX = /^(\d{4}-\d{2}-\d{2})(?:[T ].*)?$/;
const DAY_FIRST = /^\d{1,2}([/.-])\d{1,2}\1\d{4}$/;
const DAY_FIRST_FORMATS: Record<string, string> = {
  "/": "d/M/yyyy",
  "-": "d-M-yyyy",
  ".": "d.M.yyyy",
};

/** Reference date for date-fns `parse`; only fields absent from the format are taken from it */
const PARSE_REFERENCE = new Date(2000, 0, 1);

/**
 * Format a local Date as an IsoDate
 */
export function toIsoDate(date: Date): IsoDate {
  return format(date, ISO_DATE_FORMAT);
}

/**
 * Local-midnight Date for an IsoDate
 * @throws RangeError if the value is not a real calendar date
 */
export function fromIsoDate(value: IsoDate): Date {
  const date = parse(value, ISO_DATE_FORMAT, PARSE_REFERENCE);
  if (!isValid(date)) {
    throw new RangeError(`Invalid date: ${value}`);
  }
  return date;
}

/**
 * True for a well-formed `yyyy-MM-dd` naming a real day
 */
export function isIsoDate(value: string): boolean {
  return /^\d{4}-\d{2}-\d{2}$/.test(value) && isValid(parse(value, ISO_DATE_FORMAT, PARSE_REFERENCE));
}

/**
 * Parse user or file input into an IsoDate.
 * Accepts ISO dates (optionally followed by a time part) and day-first
 * dates separated by `/`, `-` or `.`.
 * @returns undefined when the input is blank or not a real date
 */
export function parseDate(input: string): IsoDate | undefined {
  const value = input.trim();
  if (!value) return undefined;

  const iso = ISO_PREFIX.exec(value);
  if (iso?.[1]) {
    return isIsoDate(iso[1]) ? iso[1] : undefined;
  }

  const dayFirst = DAY_FIRST.exec(value);
  const pattern = dayFirst?.[1] ? DAY_FIRST_FORMATS[dayFirst[1]] : undefined;
  if (pattern) {
    const date = parse(value, pattern, PARSE_REFERENCE);
    return isValid(date) ? toIsoDate(date) : undefined;
  }

  return undefined;
}

/**
 * Whole calendar days from `from` to `to` (negative when `to` is earlier)
 */
export function daysBetween(from: IsoDate, to: IsoDate): number {
  return differenceInCalendarDays(fromIsoDate(to), fromIsoDate(from));
}
