/**
 * Database Configuration Schema
 *
 * SQLite file location and writer lock timeout for the license store.
 */

import { z } from 'zod';

export const databaseConfigSchema = z.object({
  // ':memory:' keeps the store in process memory
  path: z.string().min(1).default('./data/licenses.db'),
  // How long a writer waits for another process to release the file
  busyTimeout: z.coerce.number().int().min(0).default(5000),
});

export type DatabaseConfig = z.infer<typeof databaseConfigSchema>;
