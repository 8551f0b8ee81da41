/**
 * Error Transport Configuration
 *
 * Dedicated rotating file for error-level entries, kept longer than
 * the general log.
 */

import DailyRotateFile from 'winston-daily-rotate-file';
import path from 'path';
import type { AppConfig } from '../../config/types.js';
import { structuredJsonFormatter } from '../formatters/json.formatter.js';

export function errorTransport(logging: AppConfig['logging']): DailyRotateFile {
  return new DailyRotateFile({
    level: 'error',
    filename: path.join(logging.directory, 'error-%DATE%.log'),
    datePattern: 'YYYY-MM-DD',
    zippedArchive: true,
    maxSize: '50m',
    maxFiles: '30d',
    format: structuredJsonFormatter(),
    handleExceptions: true,
    handleRejections: true,
  });
}
