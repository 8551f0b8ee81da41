/**
 * License Store Contract
 *
 * The store is the final arbiter of key uniqueness: implementations enforce
 * it at write time regardless of any pre-check made by the caller.
 */

import type { LicenseRecord, NewLicenseRecord } from '../../database/types/license.types.js';

export interface LicenseStore {
  exists(key: string): Promise<boolean>;

  /**
   * Persist every record or none. A uniqueness violation, constraint
   * violation or I/O failure rolls back the whole batch and rejects
   * with PersistenceError.
   *
   * `createdAt` never moves backwards within a store: a record stamped
   * before the newest stored record is stored with that record's time.
   */
  insertAll(records: readonly NewLicenseRecord[]): Promise<LicenseRecord[]>;

  /**
   * Consistent snapshot, newest first (createdAt desc, then id desc)
   */
  listAll(): Promise<LicenseRecord[]>;

  findByKey(key: string): Promise<LicenseRecord | undefined>;

  count(): Promise<number>;
}

/**
 * Newest-first ordering shared by every store implementation
 */
export function compareNewestFirst(a: LicenseRecord, b: LicenseRecord): number {
  const byTime = b.createdAt.getTime() - a.createdAt.getTime();
  return byTime !== 0 ? byTime : b.id - a.id;
}

/**
 * Clamp a request timestamp to the newest stored one
 */
export function clampCreatedAt(createdAt: Date, newest: Date | undefined): Date {
  return newest && newest.getTime() > createdAt.getTime()
    ? new Date(newest.getTime())
    : new Date(createdAt.getTime());
}
