/**
 * Pretty Print Log Formatter
 *
 * Formats logs in a human-readable format for development.
 * Includes colorization and structured output.
 */

import winston from 'winston';
import chalk from 'chalk';

const levelColors: Record<string, chalk.Chalk> = {
  error: chalk.red,
  warn: chalk.yellow,
  info: chalk.cyan,
  http: chalk.magenta,
  verbose: chalk.blue,
  debug: chalk.green,
  silly: chalk.gray,
};

const levelIcons: Record<string, string> = {
  error: '✖',
  warn: '⚠',
  info: 'ℹ',
  http: '⇄',
  verbose: '◆',
  debug: '●',
  silly: '○',
};

const IGNORED_KEYS = new Set(['correlationId', 'operation', 'metadata']);

function formatValue(value: unknown): string {
  return typeof value === 'object' ? JSON.stringify(value, null, 2) : String(value);
}

export function prettyFormatter(): winston.Logform.Format {
  return winston.format.combine(
    winston.format.timestamp({
      format: 'HH:mm:ss.SSS',
    }),
    winston.format.errors({ stack: true }),
    winston.format.printf((info) => {
      const { timestamp, level, message, stack, ...metadata } = info;

      const colorFn = levelColors[level] ?? chalk.white;
      const icon = levelIcons[level] ?? '•';

      let output = `${chalk.gray(String(timestamp))} ${colorFn(icon)} ${colorFn(level.toUpperCase().padEnd(5))} ${String(message)}`;

      if (typeof metadata.correlationId === 'string') {
        output += chalk.gray(` [${metadata.correlationId.slice(0, 8)}]`);
      }

      const metaKeys = Object.keys(metadata).filter(k =>
        !IGNORED_KEYS.has(k) &&
        metadata[k] !== undefined &&
        metadata[k] !== null
      );

      if (metaKeys.length > 0) {
        output += '\n' + metaKeys
          .map(key => `  ${chalk.gray(key)}: ${chalk.white(formatValue(metadata[key]))}`)
          .join('\n');
      }

      if (stack) {
        output += '\n' + chalk.red(String(stack));
      }

      return output;
    })
  );
}

/**
 * Single-line formatter without colors, for terminals that are not a TTY
 */
export function simplePrettyFormatter(): winston.Logform.Format {
  return winston.format.combine(
    winston.format.timestamp({
      format: 'YYYY-MM-DD HH:mm:ss',
    }),
    winston.format.errors({ stack: true }),
    winston.format.printf((info) => {
      const { timestamp, level, message, stack, ...metadata } = info;

      let output = `[${String(timestamp)}] ${level.toUpperCase()}: ${String(message)}`;

      if (Object.keys(metadata).length > 0) {
        output += ' ' + JSON.stringify(metadata);
      }

      if (stack) {
        output += '\n' + String(stack);
      }

      return output;
    })
  );
}
