/**
 * In-Memory License Store
 *
 * Same contract as the SQLite store, held in process memory. Used for
 * tests and dry runs; nothing survives the process.
 */

import type { LicenseRecord, NewLicenseRecord } from '../../database/types/license.types.js';
import { PersistenceError } from '../../errors/base.error.js';
import { clampCreatedAt, compareNewestFirst, type LicenseStore } from './license-store.js';

function copyRecord<T extends NewLicenseRecord>(record: T): T {
  return {
    ...record,
    createdAt: new Date(record.createdAt.getTime()),
    ...(record.holder && { holder: { ...record.holder } }),
  };
}

export class InMemoryLicenseStore implements LicenseStore {
  private readonly byKey = new Map<string, LicenseRecord>();
  private nextId = 1;
  private newest: Date | undefined;

  async exists(key: string): Promise<boolean> {
    return this.byKey.has(key);
  }

  async insertAll(records: readonly NewLicenseRecord[]): Promise<LicenseRecord[]> {
    const seen = new Set<string>();
    for (const record of records) {
      if (this.byKey.has(record.key) || seen.has(record.key)) {
        throw new PersistenceError(
          'License key already exists; batch rolled back',
          'duplicate_key',
          undefined,
          { batchSize: records.length }
        );
      }
      seen.add(record.key);
    }

    // Validated up front, so the commit below cannot fail halfway
    const inserted = records.map((record): LicenseRecord => {
      const createdAt = clampCreatedAt(record.createdAt, this.newest);
      this.newest = createdAt;
      return { ...copyRecord(record), createdAt, id: this.nextId++ };
    });
    for (const record of inserted) {
      this.byKey.set(record.key, record);
    }

    return inserted.map(copyRecord);
  }

  async listAll(): Promise<LicenseRecord[]> {
    return [...this.byKey.values()].sort(compareNewestFirst).map(copyRecord);
  }

  async findByKey(key: string): Promise<LicenseRecord | undefined> {
    const record = this.byKey.get(key);
    return record ? copyRecord(record) : undefined;
  }

  async count(): Promise<number> {
    return this.byKey.size;
  }
}
