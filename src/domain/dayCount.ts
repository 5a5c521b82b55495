// src/domain/dayCount.ts
import type { CalendarDate, DayCountConvention, DayCountFn, YearFraction } from "./types";
import { compareDates, dateDifference, daysBetween, isValidDate } from "./dateUtils";

// All conventions return d1 - d0 in years and are antisymmetric.

/**
 * Actual/Actual: true day gap over the mean Gregorian year.
 */
export function actAct(d0: CalendarDate, d1: CalendarDate): YearFraction {
  return dateDifference(d1, d0);
}

/**
 * 30/360 (bond basis). A 31st on d0 counts as the 30th; a 31st on d1 counts as
 * the 30th only when the adjusted d0 day is past the 29th. NaN for an invalid
 * date, like the other conventions.
 */
export function thirty360(d0: CalendarDate, d1: CalendarDate): YearFraction {
  if (!isValidDate(d0) || !isValidDate(d1)) return Number.NaN;
  if (compareDates(d0, d1) > 0) return -thirty360(d1, d0);

  const day0 = d0.day === 31 ? 30 : d0.day;
  const day1 = d1.day === 31 && day0 > 29 ? 30 : d1.day;

  return (
    (360 * (d1.year - d0.year) + 30 * (d1.month - d0.month) + (day1 - day0)) /
    360
  );
}

export function act360(d0: CalendarDate, d1: CalendarDate): YearFraction {
  return daysBetween(d1, d0) / 360;
}

export function act365(d0: CalendarDate, d1: CalendarDate): YearFraction {
  return daysBetween(d1, d0) / 365;
}

export const DAY_COUNTS: Readonly<Record<DayCountConvention, DayCountFn>> = {
  "ACT/ACT": actAct,
  "30/360": thirty360,
  "ACT/360": act360,
  "ACT/365": act365,
};

export const DAY_COUNT_CONVENTIONS = [
  "ACT/ACT",
  "30/360",
  "ACT/360",
  "ACT/365",
] as const satisfies readonly DayCountConvention[];

export function isDayCountConvention(value: string): value is DayCountConvention {
  return DAY_COUNT_CONVENTIONS.some((c) => c === value);
}

/**
 * Year fraction from d0 to d1 under a convention chosen at runtime.
 */
export function dayCountFraction(
  convention: DayCountConvention,
  d0: CalendarDate,
  d1: CalendarDate
): YearFraction {
  return DAY_COUNTS[convention](d0, d1);
}
