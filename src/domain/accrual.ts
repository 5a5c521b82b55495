// src/domain/accrual.ts
import type { AccrualPeriod, CalendarDate, DayCountConvention } from "./types";
import type { Schedule } from "./schedule";
import { dayCountFraction } from "./dayCount";

/**
 * Split a schedule into consecutive accrual periods with their day-count
 * fractions. The first period starts at effective; when effective is not an
 * anchor date that period is the front stub.
 */
export function accrualPeriods(
  schedule: Schedule,
  convention: DayCountConvention = "ACT/ACT"
): AccrualPeriod[] {
  const dates = schedule.toArray();
  if (dates.length === 0) return [];

  const stubbed = !schedule.isRegular;
  const boundaries: CalendarDate[] = stubbed ? [schedule.effective, ...dates] : dates;

  const periods: AccrualPeriod[] = [];
  for (let i = 1; i < boundaries.length; i++) {
    const start = boundaries[i - 1];
    const end = boundaries[i];
    periods.push({
      start,
      end,
      fraction: dayCountFraction(convention, start, end),
      stub: stubbed && i === 1,
    });
  }
  return periods;
}

/**
 * Sum of the accrual fractions, i.e. the schedule's length in years under the
 * convention.
 */
export function totalAccrual(
  schedule: Schedule,
  convention: DayCountConvention = "ACT/ACT"
): number {
  return accrualPeriods(schedule, convention).reduce((sum, p) => sum + p.fraction, 0);
}
