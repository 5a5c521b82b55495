// src/domain/holidays.ts
//
// Holiday rules. Each rule is a plain predicate over CalendarDate so rules,
// observed-day shifts and external holiday lists combine with `anyOf`.

import type { CalendarDate, HolidayRule, ISODate, Weekday } from "./types";
import { addDays, dayOfWeek, daysInMonth, parseISODate } from "./dateUtils";

const SUNDAY: Weekday = 0;
const MONDAY: Weekday = 1;
const FRIDAY: Weekday = 5;
const SATURDAY: Weekday = 6;

/**
 * Every year on the given month (1-12) and day.
 */
export function monthDay(month: number, day: number): HolidayRule {
  return (d) => d.month === month && d.day === day;
}

export const newYearDay: HolidayRule = monthDay(1, 1);

export const christmasDay: HolidayRule = monthDay(12, 25);

/**
 * The n-th given weekday of a month, e.g. 3rd Monday of January.
 */
export function nthWeekdayOfMonth(month: number, weekday: Weekday, n: number): HolidayRule {
  return (d) => {
    if (d.month !== month || dayOfWeek(d) !== weekday) return false;
    return Math.floor((d.day - 1) / 7) + 1 === n;
  };
}

/**
 * The last given weekday of a month, e.g. last Monday in May.
 */
export function lastWeekdayOfMonth(month: number, weekday: Weekday): HolidayRule {
  return (d) =>
    d.month === month &&
    dayOfWeek(d) === weekday &&
    d.day + 7 > daysInMonth(d.year, d.month);
}

/**
 * Observed form of a rule: a Saturday holiday is observed the Friday before,
 * a Sunday holiday the Monday after. Weekend days themselves never match; the
 * weekend rule covers them.
 */
export function observed(rule: HolidayRule): HolidayRule {
  return (d) => {
    const wd = dayOfWeek(d);
    if (wd === SATURDAY || wd === SUNDAY) return false;
    if (rule(d)) return true;
    if (wd === FRIDAY && rule(addDays(d, 1))) return true;
    if (wd === MONDAY && rule(addDays(d, -1))) return true;
    return false;
  };
}

/**
 * Holidays from an external list (exchange data, a config file, ...).
 */
export function holidayDates(dates: Iterable<CalendarDate | ISODate>): HolidayRule {
  const serials = new Set<number>();
  for (const date of dates) {
    serials.add(typeof date === "string" ? parseISODate(date).serial : date.serial);
  }
  return (d) => serials.has(d.serial);
}
