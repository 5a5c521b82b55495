// src/domain/schedule.ts
import type { Calendar, CalendarDate, Period, RollConvention } from "./types";
import {
  addPeriod,
  compareDates,
  daysBetween,
  isSameDay,
  isValidDate,
  toISODate,
} from "./dateUtils";
import { weekends } from "./calendars";
import { adjust } from "./roll";
import { negatePeriod, scalePeriod } from "./periods";
import { InvalidScheduleError } from "./errors";
import { DAYS_PER_WEEK, MONTHS_PER_YEAR } from "./constants";
import { logger } from "../utils/logger";

export interface ScheduleOptions {
  roll?: RollConvention;
  calendar?: Calendar;
  /** Forwarded to the roll adjuster. */
  maxRollSteps?: number;
}

/**
 * Period direction must match effective -> termination. Equal dates need a
 * zero period.
 */
export function isValidSchedule(
  effective: CalendarDate,
  termination: CalendarDate,
  period: Period
): boolean {
  if (!isValidDate(effective) || !isValidDate(termination)) return false;
  if (!Number.isInteger(period.count)) return false;

  const direction = compareDates(termination, effective);
  if (direction === 0) return period.count === 0;
  return direction === Math.sign(period.count);
}

/**
 * Periodic dates between effective and termination, built backward from
 * termination in steps of 'period'.
 *
 * The last date is always termination. The first is the earliest anchor date
 * on or after effective, so a short front stub absorbs any remainder. Anchor
 * dates are termination - k * period, each computed from termination, so
 * month-end clamping never compounds.
 *
 * Iteration is lazy and restartable. With a roll convention every yielded date
 * is adjusted; stepping always uses the unadjusted anchors. An invalid
 * configuration iterates as empty and reports itself through `error`.
 */
export class Schedule implements Iterable<CalendarDate> {
  readonly effective: CalendarDate;
  readonly termination: CalendarDate;
  readonly period: Period;
  readonly roll: RollConvention;
  readonly calendar: Calendar;
  readonly valid: boolean;
  /** Number of dates the schedule yields. */
  readonly size: number;
  private readonly maxRollSteps: number | undefined;

  constructor(
    effective: CalendarDate,
    termination: CalendarDate,
    period: Period,
    options: ScheduleOptions = {}
  ) {
    this.effective = effective;
    this.termination = termination;
    this.period = period;
    this.roll = options.roll ?? "none";
    this.calendar = options.calendar ?? weekends;
    this.maxRollSteps = options.maxRollSteps;
    this.valid = isValidSchedule(effective, termination, period);
    this.size = this.valid ? this.countPeriods() + 1 : 0;

    if (!this.valid) {
      logger.debug(
        `Empty schedule: ${period.count} ${period.unit}(s) from ` +
          `${toISODate(effective)} to ${toISODate(termination)}`
      );
    }
  }

  get error(): InvalidScheduleError | null {
    return this.valid
      ? null
      : new InvalidScheduleError(this.effective, this.termination, this.period);
  }

  /** termination - k * period */
  private anchor(k: number): CalendarDate {
    return addPeriod(this.termination, scalePeriod(negatePeriod(this.period), k));
  }

  // Largest k whose anchor is still on the termination side of effective,
  // without stepping through the anchors in between.
  private countPeriods(): number {
    const { count, unit } = this.period;
    if (count === 0) return 0;

    if (unit === "day" || unit === "week") {
      const step = unit === "week" ? count * DAYS_PER_WEEK : count;
      return Math.floor(daysBetween(this.termination, this.effective) / step);
    }

    // The month gap bounds k; anchor(k) may still fall past effective inside
    // effective's month, which leaves k - 1.
    const step = unit === "year" ? count * MONTHS_PER_YEAR : count;
    const monthGap =
      (this.termination.year - this.effective.year) * MONTHS_PER_YEAR +
      (this.termination.month - this.effective.month);
    const k = Math.floor(monthGap / step);
    const direction = Math.sign(count);
    return compareDates(this.anchor(k), this.effective) * direction >= 0 ? k : k - 1;
  }

  /** Anchor dates before any roll adjustment. */
  *unadjusted(): Generator<CalendarDate> {
    for (let k = this.size - 1; k >= 0; k--) {
      yield this.anchor(k);
    }
  }

  *[Symbol.iterator](): Generator<CalendarDate> {
    for (const date of this.unadjusted()) {
      yield adjust(date, this.roll, this.calendar, { maxSteps: this.maxRollSteps });
    }
  }

  first(): CalendarDate | null {
    if (this.size === 0) return null;
    return adjust(this.anchor(this.size - 1), this.roll, this.calendar, {
      maxSteps: this.maxRollSteps,
    });
  }

  last(): CalendarDate | null {
    if (this.size === 0) return null;
    return adjust(this.termination, this.roll, this.calendar, {
      maxSteps: this.maxRollSteps,
    });
  }

  toArray(): CalendarDate[] {
    return Array.from(this);
  }

  /** True when the first anchor date is exactly effective (no front stub). */
  get isRegular(): boolean {
    return this.size > 0 && isSameDay(this.anchor(this.size - 1), this.effective);
  }
}

export function schedule(
  effective: CalendarDate,
  termination: CalendarDate,
  period: Period,
  options?: ScheduleOptions
): Schedule {
  return new Schedule(effective, termination, period, options);
}
