/**
 * Console Transport Configuration
 *
 * Pretty output in development, compact JSON everywhere else unless
 * the pretty format is requested explicitly.
 */

import winston from 'winston';
import type { AppConfig } from '../../config/types.js';
import { prettyFormatter, simplePrettyFormatter } from '../formatters/pretty.formatter.js';
import { compactJsonFormatter } from '../formatters/json.formatter.js';

export function consoleTransport(
  app: Pick<AppConfig, 'environment' | 'logging'>
): winston.transports.ConsoleTransportInstance {
  const pretty = app.logging.format === 'pretty' && app.environment !== 'production';

  let format: winston.Logform.Format;
  if (pretty) {
    format = process.stderr.isTTY ? prettyFormatter() : simplePrettyFormatter();
  } else {
    format = compactJsonFormatter();
  }

  // Log lines go to stderr so command output on stdout stays clean
  return new winston.transports.Console({
    level: app.logging.level,
    format,
    stderrLevels: ['error', 'warn', 'info', 'http', 'verbose', 'debug', 'silly'],
  });
}
