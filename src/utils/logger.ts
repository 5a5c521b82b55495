import winston from "winston";

/*
|--------------------------------------------------------------------------
| Logger Configuration
|--------------------------------------------------------------------------
| LOG_LEVEL picks the level (default "warn"). Under NODE_ENV=test the
| logger stays silent unless LOG_LEVEL is set explicitly.
|--------------------------------------------------------------------------
*/

const { combine, timestamp, printf, errors } = winston.format;

const logFormat = printf(
  ({ level, message, timestamp, stack }) =>
    `${String(timestamp)} [${level}] ${String(stack ?? message)}`
);

const explicitLevel = process.env.LOG_LEVEL;

export const logger = winston.createLogger({
  level: explicitLevel ?? "warn",
  silent: process.env.NODE_ENV === "test" && explicitLevel === undefined,
  format: combine(errors({ stack: true }), timestamp(), logFormat),
  transports: [new winston.transports.Console()],
});
