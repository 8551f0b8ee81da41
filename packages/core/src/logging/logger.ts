/**
 * Main Logger Configuration
 *
 * Central logger instance using Winston with environment-dependent
 * transports, correlation context and specialized logging methods.
 */

import winston from 'winston';
import { config } from '../config/config.js';
import type { AppConfig } from '../config/types.js';
import { consoleTransport } from './transports/console.transport.js';
import { fileTransport } from './transports/file.transport.js';
import { errorTransport } from './transports/error.transport.js';
import { getCorrelationContext } from './context/correlation.js';
import { sanitizeMetadata } from './utils/sanitizer.js';

export type LogMetadata = Record<string, unknown>;

export type LogLevel = AppConfig['logging']['level'];

/**
 * Audit event types
 */
export enum AuditEventType {
  LICENSE_ISSUED = 'LICENSE_ISSUED',
  LICENSE_BATCH_ISSUED = 'LICENSE_BATCH_ISSUED',
  ARTIFACT_EXPORTED = 'ARTIFACT_EXPORTED',
}

export interface LoggerOptions {
  app?: Pick<AppConfig, 'environment' | 'logging'>;
  transports?: winston.transport[];
  silent?: boolean;
}

export class Logger {
  private readonly winston: winston.Logger;
  private static instance: Logger | undefined;

  constructor(options: LoggerOptions = {}) {
    const app = options.app ?? config.app;

    this.winston = winston.createLogger({
      level: app.logging.level,
      levels: winston.config.npm.levels,
      format: winston.format.combine(
        winston.format.timestamp(),
        winston.format.errors({ stack: true })
      ),
      transports: options.transports ?? Logger.getTransports(app),
      exitOnError: false,
      silent: options.silent ?? app.environment === 'test',
    });
  }

  /**
   * Get singleton instance
   */
  static getInstance(): Logger {
    if (!Logger.instance) {
      Logger.instance = new Logger();
    }
    return Logger.instance;
  }

  /**
   * Get transports based on environment
   */
  private static getTransports(app: Pick<AppConfig, 'environment' | 'logging'>): winston.transport[] {
    const transports: winston.transport[] = [consoleTransport(app)];

    if (app.logging.toFile && app.environment !== 'test') {
      transports.push(fileTransport(app.logging));
      transports.push(errorTransport(app.logging));
    }

    return transports;
  }

  /**
   * Core logging methods
   */
  error(message: string, error?: unknown, meta?: LogMetadata): void {
    this.write('error', message, { ...this.formatError(error), ...meta });
  }

  warn(message: string, meta?: LogMetadata): void {
    this.write('warn', message, meta);
  }

  info(message: string, meta?: LogMetadata): void {
    this.write('info', message, meta);
  }

  debug(message: string, meta?: LogMetadata): void {
    this.write('debug', message, meta);
  }

  verbose(message: string, meta?: LogMetadata): void {
    this.write('verbose', message, meta);
  }

  /**
   * Audit logging for issuance events
   */
  audit(event: AuditEventType, meta: LogMetadata): void {
    const auditData = {
      audit: true,
      event,
      ...meta,
    };

    // Audit entries keep holder names but never contact data
    this.write('info', `Audit: ${event}`, auditData);
  }

  /**
   * Performance logging
   */
  performance(operation: string, duration: number, meta?: LogMetadata): void {
    const threshold = typeof meta?.threshold === 'number' ? meta.threshold : 1000;
    const level = duration > threshold ? 'warn' : 'debug';

    this.write(level, `Performance: ${operation} took ${duration}ms`, {
      performance: true,
      operation,
      durationMs: duration,
      ...meta,
    });
  }

  /**
   * Measure async operation performance
   */
  async measureAsync<T>(
    operation: string,
    fn: () => Promise<T>,
    meta?: LogMetadata
  ): Promise<T> {
    const start = Date.now();
    try {
      const result = await fn();
      this.performance(operation, Date.now() - start, { ...meta, success: true });
      return result;
    } catch (error) {
      this.performance(operation, Date.now() - start, { ...meta, success: false });
      throw error;
    }
  }

  private write(
    level: LogLevel,
    message: string,
    meta: LogMetadata = {}
  ): void {
    const context = getCorrelationContext();
    this.winston.log(level, message, sanitizeMetadata({ ...context, ...meta }));
  }

  /**
   * Format error objects
   */
  private formatError(error: unknown): LogMetadata {
    if (error === undefined || error === null) return {};

    if (error instanceof Error) {
      return {
        error: {
          name: error.name,
          message: error.message,
          stack: error.stack,
          code: 'code' in error ? error.code : undefined,
          details: 'details' in error ? error.details : undefined,
        },
      };
    }

    return { error: String(error) };
  }
}

// Export singleton instance
export const logger = Logger.getInstance();
