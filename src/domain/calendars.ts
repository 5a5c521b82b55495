// src/domain/calendars.ts
import type { Calendar, CalendarDate } from "./types";
import { dayOfWeek } from "./dateUtils";
import { newYearDay } from "./holidays";

/**
 * Check if a date is Saturday or Sunday.
 */
export function isWeekend(date: CalendarDate): boolean {
  const day = dayOfWeek(date); // 0 = Sunday, 6 = Saturday
  return day === 0 || day === 6;
}

/** Weekends only, no holidays. */
export const weekends: Calendar = isWeekend;

/** Every day is a business day. */
export const noHolidays: Calendar = () => false;

/**
 * A date is a non-business day if any of the calendars flags it.
 */
export function anyOf(...calendars: Calendar[]): Calendar {
  if (calendars.length === 0) return noHolidays;
  if (calendars.length === 1) return calendars[0];
  return (date) => calendars.some((cal) => cal(date));
}

/** Weekends plus New Year's Day. */
export const exampleCalendar: Calendar = anyOf(isWeekend, newYearDay);

export function isBusinessDay(date: CalendarDate, calendar: Calendar = weekends): boolean {
  return !calendar(date);
}
