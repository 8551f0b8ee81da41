/**
 * Application Configuration Schema
 *
 * Defines the main application settings: identity, environment and logging.
 */

import { z } from 'zod';

export const appConfigSchema = z.object({
  name: z.string().default('Keymint'),
  version: z.string().regex(/^\d+\.\d+\.\d+$/).default('1.0.0'),
  environment: z.enum(['development', 'test', 'staging', 'production']).default('development'),

  logging: z.object({
    level: z.enum(['error', 'warn', 'info', 'http', 'verbose', 'debug', 'silly']).default('info'),
    format: z.enum(['json', 'pretty']).default('pretty'),
    directory: z.string().default('./logs'),
    maxFiles: z.coerce.number().int().min(1).default(14),
    maxSize: z.string().default('20m'),
    toFile: z.boolean().default(false),
  }),
});

export type AppConfig = z.infer<typeof appConfigSchema>;
