/**
 * SQLite License Store
 *
 * Persists licenses in the append-only `licenses` table. The UNIQUE
 * constraint on `license_key` resolves races between concurrent issuers;
 * every insertAll runs in a single transaction.
 */

import type { DatabaseHandle, SqlRow } from '../../database/client.js';
import type {
  LicenseRecord,
  LicenseRow,
  NewLicenseRecord,
} from '../../database/types/license.types.js';
import { PersistenceError } from '../../errors/base.error.js';
import { logger } from '../../logging/logger.js';
import { clampCreatedAt, type LicenseStore } from './license-store.js';

const UNIQUE_VIOLATION = /^UNIQUE constraint failed/;

/**
 * Matches on the error's shape, not its class: errors raised inside the
 * engine may come from another realm.
 */
export function isUniqueViolation(error: unknown): boolean {
  if (typeof error !== 'object' || error === null) {
    return false;
  }
  if ('code' in error && typeof error.code === 'string') {
    return (
      error.code.startsWith('SQLITE_CONSTRAINT_UNIQUE') ||
      error.code.startsWith('SQLITE_CONSTRAINT_PRIMARYKEY')
    );
  }
  return 'message' in error && typeof error.message === 'string' && UNIQUE_VIOLATION.test(error.message);
}

function toLicenseRow(row: SqlRow): LicenseRow {
  const { id, license_key, holder_name, holder_phone, created_at } = row;
  if (
    typeof id !== 'number' ||
    typeof license_key !== 'string' ||
    typeof created_at !== 'string' ||
    (holder_name !== null && typeof holder_name !== 'string') ||
    (holder_phone !== null && typeof holder_phone !== 'string')
  ) {
    throw new Error('Malformed row in licenses table');
  }
  return { id, license_key, holder_name, holder_phone, created_at };
}

export function rowToRecord(row: LicenseRow): LicenseRecord {
  return {
    id: row.id,
    key: row.license_key,
    createdAt: new Date(row.created_at),
    ...(row.holder_name !== null && row.holder_phone !== null && {
      holder: { name: row.holder_name, phone: row.holder_phone },
    }),
  };
}

export class SqliteLicenseStore implements LicenseStore {
  constructor(private readonly db: DatabaseHandle) {}

  async exists(key: string): Promise<boolean> {
    return this.read('exists', () =>
      this.db.query('SELECT 1 AS found FROM licenses WHERE license_key = ? LIMIT 1', [key]).length > 0
    );
  }

  async insertAll(records: readonly NewLicenseRecord[]): Promise<LicenseRecord[]> {
    if (records.length === 0) {
      return [];
    }

    try {
      // Any throw inside the transaction rolls back every row
      return await this.db.write(tx => {
        const latest = tx.query('SELECT MAX(created_at) AS latest FROM licenses')[0]?.latest;
        let newest = typeof latest === 'string' ? new Date(latest) : undefined;

        return records.map((record): LicenseRecord => {
          const createdAt = clampCreatedAt(record.createdAt, newest);
          newest = createdAt;
          const id = tx.query(
            `INSERT INTO licenses (license_key, holder_name, holder_phone, created_at)
             VALUES (?, ?, ?, ?) RETURNING id`,
            [
              record.key,
              record.holder?.name ?? null,
              record.holder?.phone ?? null,
              createdAt.toISOString(),
            ]
          )[0]?.id;
          if (typeof id !== 'number') {
            throw new Error('Insert returned no id');
          }
          return { ...record, createdAt, id };
        });
      });
    } catch (error) {
      if (isUniqueViolation(error)) {
        throw new PersistenceError(
          'License key already exists; batch rolled back',
          'duplicate_key',
          error,
          { batchSize: records.length }
        );
      }

      logger.error('License batch write failed', error, { batchSize: records.length });
      throw new PersistenceError(
        'Failed to persist licenses; batch rolled back',
        'write_failed',
        error,
        { batchSize: records.length }
      );
    }
  }

  async listAll(): Promise<LicenseRecord[]> {
    return this.read('listAll', () =>
      this.db
        .query('SELECT * FROM licenses ORDER BY created_at DESC, id DESC')
        .map(row => rowToRecord(toLicenseRow(row)))
    );
  }

  async findByKey(key: string): Promise<LicenseRecord | undefined> {
    return this.read('findByKey', () => {
      const [row] = this.db.query('SELECT * FROM licenses WHERE license_key = ?', [key]);
      return row ? rowToRecord(toLicenseRow(row)) : undefined;
    });
  }

  async count(): Promise<number> {
    return this.read('count', () => {
      const total = this.db.query('SELECT COUNT(*) AS total FROM licenses')[0]?.total;
      return typeof total === 'number' ? total : 0;
    });
  }

  private read<T>(operation: string, fn: () => T): T {
    try {
      return fn();
    } catch (error) {
      throw new PersistenceError(`License store ${operation} failed`, 'read_failed', error, {
        operation,
      });
    }
  }
}
