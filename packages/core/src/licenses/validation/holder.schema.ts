/**
 * Holder and Request Validation
 *
 * Structural checks re-applied by the core before any key is generated.
 * Front ends own their own messaging; these only reject malformed input.
 */

import { z } from 'zod';
import { ValidationError, type FieldIssue } from '../../errors/base.error.js';
import type { LicenseHolder } from '../../database/types/license.types.js';

export const PHONE_MIN_DIGITS = 7;
export const PHONE_MAX_DIGITS = 15;

/**
 * Number of digits left after stripping spaces, +, -, parentheses, etc.
 */
export function countPhoneDigits(phone: string): number {
  return phone.replace(/[^0-9]/g, '').length;
}

export function isValidPhone(phone: string): boolean {
  const digits = countPhoneDigits(phone);
  return digits >= PHONE_MIN_DIGITS && digits <= PHONE_MAX_DIGITS;
}

export const holderSchema = z.object({
  name: z
    .string({ required_error: 'Full name is required' })
    .trim()
    .min(1, 'Full name cannot be empty')
    .max(200, 'Full name must be at most 200 characters'),
  phone: z
    .string({ required_error: 'Phone number is required' })
    .trim()
    .refine(isValidPhone, {
      message: `Phone number must contain ${PHONE_MIN_DIGITS}-${PHONE_MAX_DIGITS} digits`,
    }),
});

export type HolderInput = z.input<typeof holderSchema>;

function toFieldIssues(error: z.ZodError): FieldIssue[] {
  return error.issues.map(issue => ({
    field: issue.path.join('.') || 'holder',
    message: issue.message,
  }));
}

/**
 * Validate and normalize holder input (trimmed name and phone)
 */
export function parseHolder(input: unknown): LicenseHolder {
  const result = holderSchema.safeParse(input);
  if (!result.success) {
    throw new ValidationError('Invalid license holder', toFieldIssues(result.error));
  }
  return result.data;
}

/**
 * Validate a batch size against the configured maximum
 */
export function parseBatchSize(count: unknown, maxBatchSize: number): number {
  const result = z
    .number({ invalid_type_error: 'Batch size must be a number' })
    .int('Batch size must be an integer')
    .min(1, 'Batch size must be at least 1')
    .max(maxBatchSize, `Batch size must be at most ${maxBatchSize}`)
    .safeParse(count);

  if (!result.success) {
    throw new ValidationError(
      'Invalid batch size',
      result.error.issues.map(issue => ({ field: 'count', message: issue.message }))
    );
  }
  return result.data;
}
