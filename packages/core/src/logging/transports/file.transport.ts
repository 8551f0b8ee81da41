/**
 * File Transport Configuration
 *
 * Daily-rotated JSON log files with compression and size limits.
 */

import DailyRotateFile from 'winston-daily-rotate-file';
import path from 'path';
import type { AppConfig } from '../../config/types.js';
import { structuredJsonFormatter } from '../formatters/json.formatter.js';

/**
 * Create rotating file transport for general logs
 */
export function fileTransport(logging: AppConfig['logging']): DailyRotateFile {
  return new DailyRotateFile({
    level: logging.level,
    filename: path.join(logging.directory, 'keymint-%DATE%.log'),
    datePattern: 'YYYY-MM-DD',
    zippedArchive: true,
    maxSize: logging.maxSize,
    maxFiles: logging.maxFiles,
    format: structuredJsonFormatter(),
  });
}
