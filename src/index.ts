export type {
  AccrualPeriod,
  Calendar,
  CalendarDate,
  DayCountConvention,
  DayCountFn,
  Frequency,
  HolidayRule,
  ISODate,
  Period,
  PeriodUnit,
  RollConvention,
  Weekday,
  YearFraction,
} from "./domain/types";

export {
  InvalidDateError,
  InvalidScheduleError,
  ScheduleConfigError,
  UnreachableBusinessDayError,
} from "./domain/errors";

export { MAX_ROLL_STEPS, REFERENCE_YEAR_DAYS } from "./domain/constants";

export {
  INVALID_DATE,
  addDays,
  addMonths,
  addPeriod,
  addYears,
  compareDates,
  dateDifference,
  dayOfWeek,
  daysBetween,
  daysInMonth,
  endOfMonth,
  fromSerialDays,
  fromUTCDate,
  isEndOfMonth,
  isISODate,
  isLeapYear,
  isSameDay,
  isSameMonth,
  isValidDate,
  makeDate,
  parseISODate,
  startOfMonth,
  toISODate,
  toSerialDays,
  toUTCDate,
} from "./domain/dateUtils";

export {
  DAY_COUNTS,
  DAY_COUNT_CONVENTIONS,
  act360,
  act365,
  actAct,
  dayCountFraction,
  isDayCountConvention,
  thirty360,
} from "./domain/dayCount";

export {
  christmasDay,
  holidayDates,
  lastWeekdayOfMonth,
  monthDay,
  newYearDay,
  nthWeekdayOfMonth,
  observed,
} from "./domain/holidays";

export {
  anyOf,
  exampleCalendar,
  isBusinessDay,
  isWeekend,
  noHolidays,
  weekends,
} from "./domain/calendars";

export {
  isUSFederalReserveBusinessDay,
  isUSFederalReserveHoliday,
  usFederalReserve,
} from "./domain/businessDayUS";

export { ROLL_CONVENTIONS, adjust, isRollConvention } from "./domain/roll";
export type { AdjustOptions } from "./domain/roll";

export {
  FREQUENCIES,
  FREQUENCY_NAMES,
  days,
  months,
  negatePeriod,
  period,
  periodFromFrequency,
  scalePeriod,
  weeks,
  years,
} from "./domain/periods";

export { Schedule, isValidSchedule, schedule } from "./domain/schedule";
export type { ScheduleOptions } from "./domain/schedule";

export { accrualPeriods, totalAccrual } from "./domain/accrual";

export {
  CALENDAR_NAMES,
  DEFAULT_CALENDAR_NAME,
  ScheduleConfigSchema,
  buildCalendar,
  parseScheduleConfig,
  scheduleFromConfig,
} from "./domain/scheduleConfig";
export type { CalendarName, ScheduleConfig, ScheduleConfigInput } from "./domain/scheduleConfig";

export { formatDate, formatDates } from "./utils/dates";
export { logger } from "./utils/logger";
