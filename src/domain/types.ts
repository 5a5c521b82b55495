// src/domain/types.ts

// Primitive aliases
export type ISODate = string; // "YYYY-MM-DD"
export type YearFraction = number; // elapsed time in years

// ------------------------
// Dates
// ------------------------

/**
 * A proleptic Gregorian calendar date.
 *
 * `serial` is the signed number of days since 1970-01-01 and always agrees
 * with the fields. Build values with `makeDate` / `fromSerialDays` rather than
 * object literals.
 */
export interface CalendarDate {
  readonly year: number;
  readonly month: number; // 1-12
  readonly day: number; // 1-31, bounded by the month length
  readonly serial: number;
}

/** 0 = Sunday ... 6 = Saturday */
export type Weekday = 0 | 1 | 2 | 3 | 4 | 5 | 6;

// ------------------------
// Periods & frequencies
// ------------------------

export type PeriodUnit = "day" | "week" | "month" | "year";

/**
 * A calendar step. The sign of `count` is the direction.
 */
export interface Period {
  readonly count: number;
  readonly unit: PeriodUnit;
}

export type Frequency =
  | "annually"
  | "semiannually"
  | "quarterly"
  | "monthly"
  | "weekly";

// ------------------------
// Calendars & rolling
// ------------------------

/**
 * True when the date is NOT a business day.
 */
export type Calendar = (date: CalendarDate) => boolean;

/**
 * True when the date is a holiday. Same shape as a calendar so rules can be
 * combined directly.
 */
export type HolidayRule = Calendar;

export type RollConvention =
  | "none"
  | "previous"
  | "following"
  | "modified_following"
  | "modified_previous";

// ------------------------
// Day counts
// ------------------------

export type DayCountConvention = "ACT/ACT" | "30/360" | "ACT/360" | "ACT/365";

export type DayCountFn = (d0: CalendarDate, d1: CalendarDate) => YearFraction;

// ------------------------
// Accrual
// ------------------------

export interface AccrualPeriod {
  start: CalendarDate;
  end: CalendarDate;
  fraction: YearFraction;
  stub: boolean;
}
