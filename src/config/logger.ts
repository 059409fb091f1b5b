import winston from 'winston';

const { combine, timestamp, printf, colorize } = winston.format;

const isTest = process.env.NODE_ENV === 'test';

/**
 * Process-wide logger. Level comes straight from LOG_LEVEL so it is usable
 * before the environment schema has been parsed.
 */
export const logger = winston.createLogger({
  level: process.env.LOG_LEVEL ?? 'info',
  silent: isTest,
  format: combine(
    timestamp(),
    printf(({ timestamp: ts, level, message }) => `${String(ts)} ${level.toUpperCase()} ${String(message)}`),
  ),
  transports: [
    new winston.transports.Console({
      format: process.env.NODE_ENV === 'production' ? undefined : colorize({ all: true }),
    }),
  ],
});
