/**
 * Display formatting for dates. All dates are presented in the same short
 * format (D MMM 'YY). Example: `2025-01-26` becomes `26 Jan '25`.
 */
import type { CalendarDate, ISODate } from "../domain/types";
import { isISODate, isValidDate, parseISODate } from "../domain/dateUtils";

const MONTH_NAMES = [
  "Jan",
  "Feb",
  "Mar",
  "Apr",
  "May",
  "Jun",
  "Jul",
  "Aug",
  "Sep",
  "Oct",
  "Nov",
  "Dec",
];

/**
 * Format a date (or ISO date string) like "26 Jan '25". Empty input gives
 * "", a string that is not an ISO date is returned unchanged.
 */
export function formatDate(date: CalendarDate | ISODate | undefined | null): string {
  if (!date) return "";
  if (typeof date === "string") {
    return isISODate(date) ? formatDate(parseISODate(date)) : date;
  }
  if (!isValidDate(date)) return "";
  const shortYear = (Math.abs(date.year) % 100).toString().padStart(2, "0");
  return `${date.day} ${MONTH_NAMES[date.month - 1]} '${shortYear}`;
}

/**
 * Format a list of dates, comma separated.
 */
export function formatDates(dates: Iterable<CalendarDate>): string {
  return Array.from(dates, (d) => formatDate(d)).join(", ");
}
