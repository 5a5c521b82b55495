// src/domain/dateUtils.ts
import type { CalendarDate, ISODate, Period, Weekday, YearFraction } from "./types";
import { InvalidDateError } from "./errors";
import { DAYS_PER_WEEK, MONTHS_PER_YEAR, REFERENCE_YEAR_DAYS } from "./constants";

const DAYS_PER_ERA = 146097; // 400 Gregorian years
const EPOCH_SHIFT = 719468; // days from 0000-03-01 to 1970-01-01
const MS_PER_DAY = 86_400_000;

/**
 * Unset / error date. Never valid; arithmetic on it returns it unchanged and
 * differences involving it are NaN. Public constructors throw instead of
 * returning it.
 */
export const INVALID_DATE: CalendarDate = Object.freeze({
  year: 0,
  month: 0,
  day: 0,
  serial: Number.NaN,
});

// ------------------------
// Field rules
// ------------------------

export function isLeapYear(year: number): boolean {
  return (year % 4 === 0 && year % 100 !== 0) || year % 400 === 0;
}

const WEEKDAYS: readonly Weekday[] = [0, 1, 2, 3, 4, 5, 6];
const MONTH_LENGTHS = [31, 28, 31, 30, 31, 30, 31, 31, 30, 31, 30, 31];

export function daysInMonth(year: number, month: number): number {
  if (month === 2 && isLeapYear(year)) return 29;
  return MONTH_LENGTHS[month - 1] ?? 0;
}

function validFields(year: number, month: number, day: number): boolean {
  return (
    Number.isInteger(year) &&
    Number.isInteger(month) &&
    Number.isInteger(day) &&
    month >= 1 &&
    month <= 12 &&
    day >= 1 &&
    day <= daysInMonth(year, month)
  );
}

export function isValidDate(date: CalendarDate): boolean {
  return (
    validFields(date.year, date.month, date.day) &&
    Number.isInteger(date.serial)
  );
}

// ------------------------
// Serial conversion
// ------------------------

// Days-from-civil over 400-year eras, so it holds for any integer year.
function serialFromFields(year: number, month: number, day: number): number {
  const y = month <= 2 ? year - 1 : year;
  const era = Math.floor(y / 400);
  const yoe = y - era * 400;
  const mp = (month + 9) % 12; // March = 0
  const doy = Math.floor((153 * mp + 2) / 5) + day - 1;
  const doe = yoe * 365 + Math.floor(yoe / 4) - Math.floor(yoe / 100) + doy;
  return era * DAYS_PER_ERA + doe - EPOCH_SHIFT;
}

/**
 * Build a date from its fields. Throws InvalidDateError rather than clamping.
 */
export function makeDate(year: number, month: number, day: number): CalendarDate {
  if (!validFields(year, month, day)) {
    throw new InvalidDateError(`${year}-${month}-${day}`, "fields out of range", {
      year,
      month,
      day,
    });
  }
  return Object.freeze({ year, month, day, serial: serialFromFields(year, month, day) });
}

export function toSerialDays(date: CalendarDate): number {
  return date.serial;
}

/**
 * Date for a serial day number. Every integer maps to exactly one date.
 */
export function fromSerialDays(serial: number): CalendarDate {
  if (!Number.isSafeInteger(serial)) {
    throw new InvalidDateError(String(serial), "serial day must be an integer");
  }
  const z = serial + EPOCH_SHIFT;
  const era = Math.floor(z / DAYS_PER_ERA);
  const doe = z - era * DAYS_PER_ERA;
  const yoe = Math.floor(
    (doe - Math.floor(doe / 1460) + Math.floor(doe / 36524) - Math.floor(doe / 146096)) / 365
  );
  const doy = doe - (365 * yoe + Math.floor(yoe / 4) - Math.floor(yoe / 100));
  const mp = Math.floor((5 * doy + 2) / 153);
  const day = doy - Math.floor((153 * mp + 2) / 5) + 1;
  const month = mp < 10 ? mp + 3 : mp - 9;
  const year = yoe + era * 400 + (month <= 2 ? 1 : 0);
  return Object.freeze({ year, month, day, serial });
}

// ------------------------
// Differences
// ------------------------

/**
 * d0 - d1 in years of REFERENCE_YEAR_DAYS days.
 */
export function dateDifference(d0: CalendarDate, d1: CalendarDate): YearFraction {
  return (d0.serial - d1.serial) / REFERENCE_YEAR_DAYS;
}

/**
 * d0 - d1 in whole days.
 */
export function daysBetween(d0: CalendarDate, d1: CalendarDate): number {
  return d0.serial - d1.serial;
}

export function compareDates(a: CalendarDate, b: CalendarDate): number {
  if (a.serial < b.serial) return -1;
  if (a.serial > b.serial) return 1;
  return 0;
}

export function isSameDay(a: CalendarDate, b: CalendarDate): boolean {
  return a.serial === b.serial;
}

// ------------------------
// Addition
// ------------------------

/**
 * Add 'days' days to date.
 */
export function addDays(date: CalendarDate, days: number): CalendarDate {
  if (!isValidDate(date)) return INVALID_DATE;
  return fromSerialDays(date.serial + days);
}

/**
 * Add a fractional number of years, rounded to the nearest whole day.
 * Inverse of dateDifference: addYears(d1, dateDifference(d0, d1)) is d0.
 */
export function addYears(date: CalendarDate, years: YearFraction): CalendarDate {
  if (!isValidDate(date)) return INVALID_DATE;
  if (!Number.isFinite(years)) {
    throw new InvalidDateError(String(years), "years must be finite");
  }
  return addDays(date, Math.round(years * REFERENCE_YEAR_DAYS));
}

/**
 * Field arithmetic on the month with year carry. The day is clamped to the
 * length of the resulting month: Jan 31 + 1 month is Feb 28 (or 29).
 */
export function addMonths(date: CalendarDate, months: number): CalendarDate {
  if (!isValidDate(date)) return INVALID_DATE;
  const total = date.year * MONTHS_PER_YEAR + (date.month - 1) + months;
  const year = Math.floor(total / MONTHS_PER_YEAR);
  const month = total - year * MONTHS_PER_YEAR + 1;
  const day = Math.min(date.day, daysInMonth(year, month));
  return makeDate(year, month, day);
}

export function addPeriod(date: CalendarDate, period: Period): CalendarDate {
  switch (period.unit) {
    case "day":
      return addDays(date, period.count);
    case "week":
      return addDays(date, period.count * DAYS_PER_WEEK);
    case "month":
      return addMonths(date, period.count);
    case "year":
      return addMonths(date, period.count * MONTHS_PER_YEAR);
  }
}

// ------------------------
// Month helpers
// ------------------------

/**
 * First day of the month.
 */
export function startOfMonth(date: CalendarDate): CalendarDate {
  return makeDate(date.year, date.month, 1);
}

/**
 * Last day of the month.
 */
export function endOfMonth(date: CalendarDate): CalendarDate {
  return makeDate(date.year, date.month, daysInMonth(date.year, date.month));
}

export function isEndOfMonth(date: CalendarDate): boolean {
  return date.day === daysInMonth(date.year, date.month);
}

export function isSameMonth(a: CalendarDate, b: CalendarDate): boolean {
  return a.year === b.year && a.month === b.month;
}

/**
 * 0 = Sunday ... 6 = Saturday. Serial 0 (1970-01-01) was a Thursday.
 */
export function dayOfWeek(date: CalendarDate): Weekday {
  return WEEKDAYS[(((date.serial + 4) % 7) + 7) % 7];
}

// ------------------------
// ISO & JavaScript Date interop
// ------------------------

/**
 * Format as ISODate "YYYY-MM-DD".
 */
export function toISODate(date: CalendarDate): ISODate {
  const sign = date.year < 0 ? "-" : "";
  const year = Math.abs(date.year).toString().padStart(4, "0");
  const month = date.month.toString().padStart(2, "0");
  const day = date.day.toString().padStart(2, "0");
  return `${sign}${year}-${month}-${day}`;
}

const ISO_PATTERN = /^(\d{4})-(\d{2})-(\d{2})$/;

/**
 * True for a well-formed "YYYY-MM-DD" string naming a real date.
 */
export function isISODate(value: string): boolean {
  const match = ISO_PATTERN.exec(value);
  if (!match) return false;
  const [, y, m, d] = match;
  return validFields(parseInt(y, 10), parseInt(m, 10), parseInt(d, 10));
}

/**
 * Parse an ISODate "YYYY-MM-DD". Throws InvalidDateError on anything else,
 * including dates like 2023-02-30.
 */
export function parseISODate(iso: ISODate): CalendarDate {
  const match = ISO_PATTERN.exec(iso);
  if (!match) {
    throw new InvalidDateError(iso, "expected YYYY-MM-DD");
  }
  const [, y, m, d] = match;
  const year = parseInt(y, 10);
  const month = parseInt(m, 10);
  const day = parseInt(d, 10);
  if (!validFields(year, month, day)) {
    throw new InvalidDateError(iso, "fields out of range");
  }
  return makeDate(year, month, day);
}

/**
 * Calendar day of a JavaScript Date, read in UTC.
 */
export function fromUTCDate(date: Date): CalendarDate {
  if (Number.isNaN(date.getTime())) {
    throw new InvalidDateError(String(date), "not a valid Date");
  }
  return makeDate(date.getUTCFullYear(), date.getUTCMonth() + 1, date.getUTCDate());
}

/**
 * JavaScript Date at UTC midnight.
 */
export function toUTCDate(date: CalendarDate): Date {
  return new Date(date.serial * MS_PER_DAY);
}
