// src/domain/scheduleConfig.ts
//
// Plain (JSON-friendly) description of a schedule, validated with zod.

import { z } from "zod";
import type { Calendar, Period } from "./types";
import { isISODate, parseISODate } from "./dateUtils";
import { anyOf, exampleCalendar, noHolidays, weekends } from "./calendars";
import { usFederalReserve } from "./businessDayUS";
import { holidayDates } from "./holidays";
import { FREQUENCY_NAMES, periodFromFrequency } from "./periods";
import { ROLL_CONVENTIONS } from "./roll";
import { Schedule } from "./schedule";
import { ScheduleConfigError } from "./errors";

export const CALENDAR_NAMES = ["none", "weekends", "example", "usFederalReserve"] as const;
export type CalendarName = (typeof CALENDAR_NAMES)[number];

export const DEFAULT_CALENDAR_NAME: CalendarName = "weekends";

const NAMED_CALENDARS: Readonly<Record<CalendarName, Calendar>> = {
  none: noHolidays,
  weekends,
  example: exampleCalendar,
  usFederalReserve,
};

export const ISODateSchema = z
  .string()
  .refine(isISODate, { message: "expected a valid YYYY-MM-DD date" });

export const PeriodSchema = z.object({
  count: z.number().int(),
  unit: z.enum(["day", "week", "month", "year"]),
});

export const ScheduleConfigSchema = z
  .object({
    effective: ISODateSchema,
    termination: ISODateSchema,
    frequency: z.enum(FREQUENCY_NAMES).optional(),
    period: PeriodSchema.optional(),
    roll: z.enum(ROLL_CONVENTIONS).default("none"),
    calendar: z.enum(CALENDAR_NAMES).default(DEFAULT_CALENDAR_NAME),
    holidays: z.array(ISODateSchema).default([]),
  })
  .refine((c) => (c.frequency === undefined) !== (c.period === undefined), {
    message: "exactly one of frequency or period is required",
    path: ["frequency"],
  });

export type ScheduleConfig = z.infer<typeof ScheduleConfigSchema>;
export type ScheduleConfigInput = z.input<typeof ScheduleConfigSchema>;

/**
 * Validate an arbitrary value. Throws ScheduleConfigError listing every issue.
 */
export function parseScheduleConfig(input: unknown): ScheduleConfig {
  const result = ScheduleConfigSchema.safeParse(input);
  if (!result.success) {
    throw new ScheduleConfigError(
      result.error.issues.map((issue) =>
        issue.path.length > 0 ? `${issue.path.join(".")}: ${issue.message}` : issue.message
      )
    );
  }
  return result.data;
}

/**
 * Named calendar plus any extra holidays from the config.
 */
export function buildCalendar(config: Pick<ScheduleConfig, "calendar" | "holidays">): Calendar {
  const base = NAMED_CALENDARS[config.calendar];
  if (config.holidays.length === 0) return base;
  return anyOf(base, holidayDates(config.holidays));
}

function configPeriod(config: ScheduleConfig): Period {
  if (config.period) return config.period;
  if (config.frequency) return periodFromFrequency(config.frequency);
  throw new ScheduleConfigError(["exactly one of frequency or period is required"]);
}

export function scheduleFromConfig(input: unknown): Schedule {
  const config = parseScheduleConfig(input);
  return new Schedule(
    parseISODate(config.effective),
    parseISODate(config.termination),
    configPeriod(config),
    { roll: config.roll, calendar: buildCalendar(config) }
  );
}
