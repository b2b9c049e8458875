import { addDays, differenceInCalendarDays, format, isValid, parseISO } from "date-fns";
import { ValidationError } from "./errors";

// Calendar dates travel through the library as ISO strings (YYYY-MM-DD).
export type IsoDate = string;

const ISO_DATE = /^\d{4}-\d{2}-\d{2}$/;

export function isIsoDate(value: string): boolean {
  if (!ISO_DATE.test(value)) return false;
  const d = parseISO(value);
  // parseISO rolls 2026-02-30 into March; reject anything that doesn't round-trip
  return isValid(d) && format(d, "yyyy-MM-dd") === value;
}

/** @throws ValidationError unless `value` is a real calendar date as YYYY-MM-DD */
export function requireIsoDate(value: string, label = "referenceDate"): IsoDate {
  if (!isIsoDate(value)) {
    throw new ValidationError(`${label} must be a calendar date as YYYY-MM-DD, got '${value}'`);
  }
  return value;
}

export function toDate(value: IsoDate): Date {
  return parseISO(value);
}

export function toIsoDate(d: Date): IsoDate {
  return format(d, "yyyy-MM-dd");
}

export function today(): IsoDate {
  return toIsoDate(new Date());
}

export function shiftDays(value: IsoDate, days: number): IsoDate {
  return toIsoDate(addDays(parseISO(value), days));
}

/** Whole calendar days from `from` to `to` (negative when `to` is earlier). */
export function daysBetween(from: IsoDate, to: IsoDate): number {
  return differenceInCalendarDays(parseISO(to), parseISO(from));
}

export function formatDate(value?: IsoDate | null): string {
  return value ?? "N/A";
}
