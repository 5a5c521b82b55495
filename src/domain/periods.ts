// src/domain/periods.ts
import type { Frequency, Period, PeriodUnit } from "./types";
import { MONTHS_PER_YEAR } from "./constants";

export function period(count: number, unit: PeriodUnit): Period {
  return { count, unit };
}

export const days = (n: number): Period => period(n, "day");
export const weeks = (n: number): Period => period(n, "week");
export const months = (n: number): Period => period(n, "month");
export const years = (n: number): Period => period(n, "year");

export function scalePeriod(p: Period, factor: number): Period {
  return period(p.count * factor, p.unit);
}

export function negatePeriod(p: Period): Period {
  return scalePeriod(p, -1);
}

/** Payments per year. */
export const FREQUENCIES: Readonly<Record<Frequency, number>> = {
  annually: 1,
  semiannually: 2,
  quarterly: 4,
  monthly: 12,
  weekly: 52,
};

export const FREQUENCY_NAMES = [
  "annually",
  "semiannually",
  "quarterly",
  "monthly",
  "weekly",
] as const satisfies readonly Frequency[];

/**
 * Regular coupon step for a frequency: 12/n months, or one week.
 */
export function periodFromFrequency(frequency: Frequency): Period {
  if (frequency === "weekly") return weeks(1);
  return months(MONTHS_PER_YEAR / FREQUENCIES[frequency]);
}
