// src/domain/businessDayUS.ts
import type { Calendar, CalendarDate, HolidayRule } from "./types";
import { anyOf, isWeekend } from "./calendars";
import {
  lastWeekdayOfMonth,
  monthDay,
  nthWeekdayOfMonth,
  observed,
} from "./holidays";

const MONDAY = 1;
const THURSDAY = 4;

const US_FEDERAL_RESERVE_HOLIDAYS: HolidayRule[] = [
  // New Year's Day (Jan 1, observed)
  observed(monthDay(1, 1)),
  // MLK Day (3rd Monday in January)
  nthWeekdayOfMonth(1, MONDAY, 3),
  // Washington's Birthday (3rd Monday in February)
  nthWeekdayOfMonth(2, MONDAY, 3),
  // Memorial Day (last Monday in May)
  lastWeekdayOfMonth(5, MONDAY),
  // Juneteenth (June 19, observed)
  observed(monthDay(6, 19)),
  // Independence Day (July 4, observed)
  observed(monthDay(7, 4)),
  // Labor Day (1st Monday in September)
  nthWeekdayOfMonth(9, MONDAY, 1),
  // Columbus Day (2nd Monday in October)
  nthWeekdayOfMonth(10, MONDAY, 2),
  // Veterans Day (Nov 11, observed)
  observed(monthDay(11, 11)),
  // Thanksgiving Day (4th Thursday in November)
  nthWeekdayOfMonth(11, THURSDAY, 4),
  // Christmas Day (Dec 25, observed)
  observed(monthDay(12, 25)),
];

/**
 * Returns true if 'date' is an observed US Federal Reserve holiday.
 */
export const isUSFederalReserveHoliday: HolidayRule = anyOf(...US_FEDERAL_RESERVE_HOLIDAYS);

/** Weekends plus US Federal Reserve holidays. */
export const usFederalReserve: Calendar = anyOf(isWeekend, isUSFederalReserveHoliday);

/**
 * True if this is a US Federal Reserve business day.
 */
export function isUSFederalReserveBusinessDay(date: CalendarDate): boolean {
  return !usFederalReserve(date);
}
