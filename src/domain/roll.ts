// src/domain/roll.ts
import type { Calendar, CalendarDate, RollConvention } from "./types";
import { addDays, daysInMonth, isValidDate, toISODate } from "./dateUtils";
import { weekends } from "./calendars";
import { UnreachableBusinessDayError } from "./errors";
import { LONG_ROLL_DAYS, MAX_ROLL_STEPS } from "./constants";
import { logger } from "../utils/logger";

export const ROLL_CONVENTIONS = [
  "none",
  "previous",
  "following",
  "modified_following",
  "modified_previous",
] as const satisfies readonly RollConvention[];

export function isRollConvention(value: string): value is RollConvention {
  return ROLL_CONVENTIONS.some((c) => c === value);
}

export interface AdjustOptions {
  /** Days the walk may move before failing. Defaults to MAX_ROLL_STEPS. */
  maxSteps?: number;
}

/**
 * Step one day at a time (step = +1 / -1), at most 'limit' days, until the
 * calendar accepts the date. Null when it never does.
 */
function seek(
  date: CalendarDate,
  step: 1 | -1,
  calendar: Calendar,
  limit: number
): CalendarDate | null {
  let d = date;
  for (let steps = 0; steps <= limit; steps++) {
    if (!calendar(d)) {
      if (steps > LONG_ROLL_DAYS) {
        logger.debug(`Rolled ${toISODate(date)} ${steps} days to ${toISODate(d)}`);
      }
      return d;
    }
    d = addDays(d, step);
  }
  return null;
}

function walk(
  date: CalendarDate,
  step: 1 | -1,
  calendar: Calendar,
  convention: RollConvention,
  maxSteps: number
): CalendarDate {
  const found = seek(date, step, calendar, maxSteps);
  if (found) return found;
  logger.warn(
    `No business day within ${maxSteps} days of ${toISODate(date)} (${convention})`
  );
  throw new UnreachableBusinessDayError(date, convention, maxSteps);
}

/**
 * Move 'date' onto a business day of 'calendar' under 'convention'.
 *
 * - none: unchanged
 * - previous / following: nearest business day before / after
 * - modified_following: following, unless that leaves the month, then previous
 * - modified_previous: previous, unless that leaves the month, then following
 *
 * The modified conventions only search their first direction up to the month
 * boundary, so a small maxSteps still reaches the fallback. Business days come
 * back unchanged under every convention. Throws UnreachableBusinessDayError
 * when no business day is within reach.
 */
export function adjust(
  date: CalendarDate,
  convention: RollConvention,
  calendar: Calendar = weekends,
  options: AdjustOptions = {}
): CalendarDate {
  if (convention === "none" || !isValidDate(date)) return date;

  const maxSteps = options.maxSteps ?? MAX_ROLL_STEPS;

  switch (convention) {
    case "previous":
      return walk(date, -1, calendar, convention, maxSteps);
    case "following":
      return walk(date, 1, calendar, convention, maxSteps);
    case "modified_following": {
      const toMonthEnd = daysInMonth(date.year, date.month) - date.day;
      return (
        seek(date, 1, calendar, Math.min(maxSteps, toMonthEnd)) ??
        walk(date, -1, calendar, convention, maxSteps)
      );
    }
    case "modified_previous": {
      const toMonthStart = date.day - 1;
      return (
        seek(date, -1, calendar, Math.min(maxSteps, toMonthStart)) ??
        walk(date, 1, calendar, convention, maxSteps)
      );
    }
  }
}
