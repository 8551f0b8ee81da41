/**
 * JSON Log Formatter
 *
 * Formats log entries as JSON for structured logging outside development.
 */

import winston from 'winston';

/**
 * Structured JSON formatter for log files
 */
export function structuredJsonFormatter(): winston.Logform.Format {
  return winston.format.combine(
    winston.format.timestamp({
      format: 'YYYY-MM-DD HH:mm:ss.SSS',
    }),
    winston.format.errors({ stack: true }),
    winston.format.metadata({
      fillExcept: ['message', 'level', 'timestamp', 'label'],
    }),
    winston.format.json()
  );
}

/**
 * Compact JSON formatter for console output
 */
export function compactJsonFormatter(): winston.Logform.Format {
  return winston.format.combine(
    winston.format.timestamp({ format: 'YYYY-MM-DD HH:mm:ss' }),
    winston.format.errors({ stack: true }),
    winston.format.json({
      space: 0,
      replacer: (_key: string, value: unknown) => {
        // Remove null values to save space
        if (value === null) {
          return undefined;
        }
        return value;
      },
    })
  );
}
