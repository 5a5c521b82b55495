// src/domain/errors.ts
import type { CalendarDate, Period, RollConvention } from "./types";

/** Field values behind a rejected date. */
export interface DateFields {
  year: number;
  month: number;
  day: number;
}

/**
 * Field combination (or serial / ISO input) that is not a Gregorian date.
 */
export class InvalidDateError extends Error {
  readonly input: string;
  readonly year?: number;
  readonly month?: number;
  readonly day?: number;

  constructor(input: string, reason?: string, fields?: DateFields) {
    super(reason ? `Invalid date ${input}: ${reason}` : `Invalid date ${input}`);
    this.name = "InvalidDateError";
    this.input = input;
    this.year = fields?.year;
    this.month = fields?.month;
    this.day = fields?.day;
  }
}

/**
 * Period direction disagrees with effective -> termination. Schedules report
 * this through `Schedule.error` instead of throwing it.
 */
export class InvalidScheduleError extends Error {
  readonly effective: CalendarDate;
  readonly termination: CalendarDate;
  readonly period: Period;

  constructor(effective: CalendarDate, termination: CalendarDate, period: Period) {
    super(
      `Period ${period.count} ${period.unit}(s) does not lead from ` +
        `${fmt(effective)} to ${fmt(termination)}`
    );
    this.name = "InvalidScheduleError";
    this.effective = effective;
    this.termination = termination;
    this.period = period;
  }
}

export class UnreachableBusinessDayError extends Error {
  readonly date: CalendarDate;
  readonly convention: RollConvention;
  readonly maxSteps: number;

  constructor(date: CalendarDate, convention: RollConvention, maxSteps: number) {
    super(
      `No business day within ${maxSteps} days of ${fmt(date)} (${convention})`
    );
    this.name = "UnreachableBusinessDayError";
    this.date = date;
    this.convention = convention;
    this.maxSteps = maxSteps;
  }
}

export class ScheduleConfigError extends Error {
  readonly issues: string[];

  constructor(issues: string[]) {
    super(`Invalid schedule config: ${issues.join("; ")}`);
    this.name = "ScheduleConfigError";
    this.issues = issues;
  }
}

// dateUtils imports this module, so format locally.
function fmt(d: CalendarDate): string {
  const m = d.month.toString().padStart(2, "0");
  const day = d.day.toString().padStart(2, "0");
  return `${d.year}-${m}-${day}`;
}
