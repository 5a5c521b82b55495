// src/domain/constants.ts

/** Mean Gregorian year length in days (146097 / 400). */
export const REFERENCE_YEAR_DAYS = 365.2425;

/** Most days the roll adjuster walks before giving up. */
export const MAX_ROLL_STEPS = 366;

/** Roll walks longer than this many days are logged at debug level. */
export const LONG_ROLL_DAYS = 7;

export const MONTHS_PER_YEAR = 12;
export const DAYS_PER_WEEK = 7;
