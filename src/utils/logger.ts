// Logger: winston logger for diagnostics
// Everything goes to stderr; stdout carries only the instruction stream.

import { createLogger, format, transports, type Logger } from 'winston';

import { parseEnumEnv } from '../config/parseEnv.js';

export const LOG_LEVELS = ['error', 'warn', 'info', 'http', 'verbose', 'debug', 'silly'] as const;

export type LogLevel = typeof LOG_LEVELS[number];

/**
 * Level named by a LOG_LEVEL value; unknown or unset falls back to warn.
 */
export function resolveLogLevel(value: string | undefined): LogLevel {
  return parseEnumEnv(value, LOG_LEVELS, 'warn');
}

export function createBuildstampLogger(level: LogLevel = 'warn', silent = false): Logger {
  return createLogger({
    level,
    silent,
    format: format.combine(
      format.timestamp(),
      format.errors({ stack: true }),
      format.json()
    ),
    transports: [
      new transports.Console({
        stderrLevels: [...LOG_LEVELS],
        format: format.combine(
          format.printf(({ timestamp, level, message, ...meta }) => {
            const metaStr = Object.keys(meta).length > 0
              ? ` ${JSON.stringify(meta)}`
              : '';
            return `${String(timestamp)} [${level}] ${String(message)}${metaStr}`;
          })
        )
      })
    ]
  });
}

// Default for library callers that pass no logger. The CLI builds its own
// after loading .env, from the level in its parsed configuration.
export const logger: Logger = createBuildstampLogger(resolveLogLevel(process.env.LOG_LEVEL));
