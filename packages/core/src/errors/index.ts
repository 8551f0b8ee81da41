/**
 * Error Module Exports
 *
 * Provides custom error classes and error handling utilities.
 */

export * from './base.error.js';

import { BaseError } from './base.error.js';
import { logger } from '../logging/logger.js';

/**
 * Check if an error is operational (expected)
 */
export function isOperationalError(error: unknown): boolean {
  return error instanceof BaseError && error.isOperational;
}

/**
 * Extract error details for logging
 */
export function extractErrorDetails(error: unknown): Record<string, unknown> {
  if (error instanceof BaseError) {
    return error.toJSON();
  }

  if (error instanceof Error) {
    return {
      name: error.name,
      message: error.message,
      stack: error.stack,
    };
  }

  return {
    error: String(error),
  };
}

/**
 * Handle unhandled rejections
 */
export function handleUnhandledRejection(reason: unknown): void {
  logger.error('Unhandled rejection', reason, {
    type: 'unhandledRejection',
    reason: extractErrorDetails(reason),
  });
}

/**
 * Handle uncaught exceptions
 */
export function handleUncaughtException(error: Error): void {
  logger.error('Uncaught exception', error, {
    type: 'uncaughtException',
    error: extractErrorDetails(error),
  });

  // Give logger time to write
  setTimeout(() => {
    process.exit(1);
  }, 1000);
}

/**
 * Setup global error handlers for a command-line process
 */
export function setupGlobalErrorHandlers(): void {
  process.on('unhandledRejection', handleUnhandledRejection);
  process.on('uncaughtException', handleUncaughtException);
}
