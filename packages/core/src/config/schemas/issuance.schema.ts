/**
 * Issuance Configuration Schema
 *
 * Key format and the bounds applied to generation and batch requests.
 */

import { z } from 'zod';

export const keyFormatSchema = z.object({
  alphabet: z
    .string()
    .regex(/^[A-Z0-9]+$/, 'Alphabet may only contain uppercase letters and digits')
    .default('ABCDEFGHIJKLMNOPQRSTUVWXYZ0123456789'),
  segments: z.coerce.number().int().min(1).max(16).default(4),
  segmentLength: z.coerce.number().int().min(1).max(32).default(5),
  separator: z.string().max(1).default('-'),
});

export const issuanceConfigSchema = z.object({
  keyFormat: keyFormatSchema,
  maxAttempts: z.coerce.number().int().min(1).max(100).default(10),
  maxBatchSize: z.coerce.number().int().min(1).max(100000).default(1000),
});

export type KeyFormatConfig = z.infer<typeof keyFormatSchema>;
export type IssuanceConfig = z.infer<typeof issuanceConfigSchema>;
