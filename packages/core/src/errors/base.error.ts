/**
 * Base Error Classes
 *
 * Custom error classes with correlation IDs, error codes,
 * and structured error information.
 */

import { getCorrelationId } from '../logging/context/correlation.js';

export type ErrorDetails = Record<string, unknown>;

/**
 * Base error class for all application errors
 */
export abstract class BaseError extends Error {
  public readonly code: string;
  public readonly isOperational: boolean;
  public readonly correlationId?: string;
  public readonly timestamp: Date;
  public readonly details?: ErrorDetails;

  constructor(
    message: string,
    code: string,
    isOperational: boolean = true,
    details?: ErrorDetails,
    options?: { cause?: unknown }
  ) {
    super(message, options);

    this.name = this.constructor.name;
    this.code = code;
    this.isOperational = isOperational;
    this.correlationId = getCorrelationId();
    this.timestamp = new Date();
    this.details = details;

    Error.captureStackTrace(this, this.constructor);
  }

  /**
   * Convert error to JSON representation
   */
  toJSON(): Record<string, unknown> {
    return {
      name: this.name,
      message: this.message,
      code: this.code,
      correlationId: this.correlationId,
      timestamp: this.timestamp,
      details: this.details,
      ...(process.env.NODE_ENV === 'development' && { stack: this.stack }),
    };
  }
}

export interface FieldIssue {
  field: string;
  message: string;
}

/**
 * Validation error for malformed input; raised before any key is generated
 */
export class ValidationError extends BaseError {
  public readonly fields: FieldIssue[];

  constructor(message: string, fields: FieldIssue[] = []) {
    super(message, 'VALIDATION_ERROR', true, { fields });
    this.fields = fields;
  }
}

/**
 * The uniqueness guard ran out of attempts without finding a free key.
 * Nothing was written; the caller may retry the whole operation.
 */
export class CollisionExhaustedError extends BaseError {
  public readonly attempts: number;

  constructor(attempts: number) {
    super(
      `Could not generate a unique license key after ${attempts} attempts`,
      'COLLISION_EXHAUSTED',
      true,
      { attempts }
    );
    this.attempts = attempts;
  }
}

export type PersistenceFailureReason = 'duplicate_key' | 'write_failed' | 'read_failed';

/**
 * Store unreachable or constraint violated. Writes that raise this were
 * rolled back in full.
 */
export class PersistenceError extends BaseError {
  public readonly reason: PersistenceFailureReason;

  constructor(
    message: string,
    reason: PersistenceFailureReason,
    cause?: unknown,
    details?: ErrorDetails
  ) {
    super(message, 'PERSISTENCE_ERROR', true, { reason, ...details }, { cause });
    this.reason = reason;
  }
}

/**
 * Artifact encoding or export failed. The record is already durable and
 * rendering can be retried at any time.
 */
export class RenderError extends BaseError {
  constructor(message: string, cause?: unknown, details?: ErrorDetails) {
    super(message, 'RENDER_ERROR', true, details, { cause });
  }
}

/**
 * Not found error for missing resources
 */
export class NotFoundError extends BaseError {
  constructor(resource: string, identifier?: string | number) {
    const message = identifier !== undefined
      ? `${resource} ${identifier} not found`
      : `${resource} not found`;
    super(message, 'NOT_FOUND', true, { resource, identifier });
  }
}

/**
 * Internal error for unexpected failures
 */
export class InternalError extends BaseError {
  constructor(message: string = 'Internal error', details?: ErrorDetails) {
    super(message, 'INTERNAL_ERROR', false, details);
  }
}

/**
 * Configuration error for missing or invalid configuration
 */
export class ConfigurationError extends BaseError {
  constructor(message: string, details?: ErrorDetails) {
    super(message, 'CONFIGURATION_ERROR', false, details);
  }
}
