/**
 * SQLite Database Handle
 *
 * Opens the license database once per process and makes sure the
 * append-only `licenses` table exists. The engine is SQLite compiled to
 * WebAssembly, so the database lives in memory and a file-backed handle
 * writes the whole image back to disk after every committed transaction.
 *
 * Writers serialize on a `<path>.lock` file. Before each read or write the
 * handle reloads the image if another process has replaced the file.
 */

import initSqlJs from 'sql.js';
import type { Database, ParamsObject, SqlJsStatic, SqlValue } from 'sql.js';
import fs from 'fs';
import path from 'path';
import type { DatabaseConfig } from '../config/types.js';
import { logger } from '../logging/logger.js';
import { PersistenceError } from '../errors/base.error.js';

export const MEMORY_DATABASE = ':memory:';

const LOCK_RETRY_MS = 25;

export type SqlRow = ParamsObject;
export type SqlParams = SqlValue[];

let engine: Promise<SqlJsStatic> | undefined;

function loadEngine(): Promise<SqlJsStatic> {
  if (!engine) {
    engine = initSqlJs().catch((error: unknown) => {
      engine = undefined;
      throw error;
    });
  }
  return engine;
}

function errorCode(error: unknown): string | undefined {
  return typeof error === 'object' && error !== null && 'code' in error && typeof error.code === 'string'
    ? error.code
    : undefined;
}

interface FileStamp {
  mtimeMs: number;
  size: number;
}

function readStamp(file: string): FileStamp | undefined {
  try {
    const stats = fs.statSync(file);
    return { mtimeMs: stats.mtimeMs, size: stats.size };
  } catch (error) {
    if (errorCode(error) === 'ENOENT') {
      return undefined;
    }
    throw error;
  }
}

function sameStamp(a: FileStamp | undefined, b: FileStamp | undefined): boolean {
  return a?.mtimeMs === b?.mtimeMs && a?.size === b?.size;
}

function delay(ms: number): Promise<void> {
  return new Promise(resolve => setTimeout(resolve, ms));
}

function runMigrations(connection: Database): void {
  connection.exec(`
    CREATE TABLE IF NOT EXISTS licenses (
      id INTEGER PRIMARY KEY AUTOINCREMENT,
      license_key TEXT NOT NULL UNIQUE,
      holder_name TEXT,
      holder_phone TEXT,
      created_at TEXT NOT NULL,
      CHECK ((holder_name IS NULL) = (holder_phone IS NULL))
    );

    CREATE INDEX IF NOT EXISTS idx_licenses_created ON licenses(created_at DESC, id DESC);

    CREATE TRIGGER IF NOT EXISTS licenses_no_update
    BEFORE UPDATE ON licenses
    BEGIN
      SELECT RAISE(ABORT, 'licenses are append-only');
    END;

    CREATE TRIGGER IF NOT EXISTS licenses_no_delete
    BEFORE DELETE ON licenses
    BEGIN
      SELECT RAISE(ABORT, 'licenses are append-only');
    END;
  `);
}

export class DatabaseHandle {
  private closed = false;
  private stamp: FileStamp | undefined;

  constructor(
    private readonly sqlJs: SqlJsStatic,
    private connection: Database,
    readonly path: string,
    private readonly busyTimeout: number
  ) {
    this.stamp = this.isMemory() ? undefined : readStamp(path);
  }

  get open(): boolean {
    return !this.closed;
  }

  /**
   * Run a statement and collect every row it returns
   */
  query(sql: string, params: SqlParams = []): SqlRow[] {
    this.ensureOpen();
    this.refresh();
    return this.collect(sql, params);
  }

  /**
   * Run `fn` inside one transaction while holding the writer lock. Any
   * throw rolls the transaction back. A file-backed handle persists the
   * result before resolving; if that fails the committed rows are
   * discarded and the error propagates.
   */
  async write<T>(fn: (tx: Pick<DatabaseHandle, 'query'>) => T): Promise<T> {
    this.ensureOpen();
    const release = await this.acquireLock();

    try {
      this.ensureOpen();
      this.refresh();

      this.connection.exec('BEGIN');
      let result: T;
      try {
        result = fn({ query: (sql, params) => this.collect(sql, params ?? []) });
        this.connection.exec('COMMIT');
      } catch (error) {
        this.rollback();
        throw error;
      }

      this.persist();
      return result;
    } finally {
      release();
    }
  }

  close(): void {
    if (this.closed) {
      return;
    }
    this.closed = true;
    this.connection.close();
  }

  private isMemory(): boolean {
    return this.path === MEMORY_DATABASE;
  }

  private ensureOpen(): void {
    if (this.closed) {
      throw new Error('Database handle is closed');
    }
  }

  private rollback(): void {
    try {
      this.connection.exec('ROLLBACK');
    } catch (rollbackError) {
      // SQLite already rolled back on its own
      logger.debug('Rollback skipped', {
        reason: rollbackError instanceof Error ? rollbackError.message : String(rollbackError),
      });
    }
  }

  private collect(sql: string, params: SqlParams): SqlRow[] {
    const statement = this.connection.prepare(sql);
    try {
      statement.bind(params);
      const rows: SqlRow[] = [];
      while (statement.step()) {
        rows.push(statement.getAsObject());
      }
      return rows;
    } finally {
      statement.free();
    }
  }

  private refresh(): void {
    if (this.isMemory()) {
      return;
    }
    const current = readStamp(this.path);
    if (!sameStamp(current, this.stamp)) {
      this.reload(current);
    }
  }

  private reload(stamp: FileStamp | undefined): void {
    const image = stamp ? fs.readFileSync(this.path) : undefined;
    const next = new this.sqlJs.Database(image);
    runMigrations(next);
    this.connection.close();
    this.connection = next;
    this.stamp = stamp;
  }

  private persist(): void {
    if (this.isMemory()) {
      return;
    }

    const temp = `${this.path}.${process.pid}.tmp`;
    try {
      fs.writeFileSync(temp, this.connection.export());
      fs.renameSync(temp, this.path);
      this.stamp = readStamp(this.path);
    } catch (error) {
      fs.rmSync(temp, { force: true });
      this.reload(readStamp(this.path));
      throw error;
    }
  }

  private async acquireLock(): Promise<() => void> {
    if (this.isMemory()) {
      return () => undefined;
    }

    const lockFile = `${this.path}.lock`;
    const deadline = Date.now() + this.busyTimeout;

    for (;;) {
      try {
        fs.closeSync(fs.openSync(lockFile, 'wx'));
        return () => fs.rmSync(lockFile, { force: true });
      } catch (error) {
        const held = errorCode(error) === 'EEXIST';
        if (!held || Date.now() >= deadline) {
          throw held ? new Error(`Timed out waiting for database lock ${lockFile}`) : error;
        }
      }
      await delay(LOCK_RETRY_MS);
    }
  }
}

export async function openDatabase(options: DatabaseConfig): Promise<DatabaseHandle> {
  let connection: Database | undefined;

  try {
    const sql = await loadEngine();

    let image: Buffer | undefined;
    if (options.path !== MEMORY_DATABASE) {
      fs.mkdirSync(path.dirname(options.path), { recursive: true });
      image = readStamp(options.path) ? fs.readFileSync(options.path) : undefined;
    }

    connection = new sql.Database(image);
    runMigrations(connection);

    const handle = new DatabaseHandle(sql, connection, options.path, options.busyTimeout);
    logger.debug('License database opened', { path: options.path });
    return handle;
  } catch (error) {
    connection?.close();
    throw new PersistenceError(
      `Failed to open license database at ${options.path}`,
      'read_failed',
      error,
      { path: options.path }
    );
  }
}

export function closeDatabase(db: DatabaseHandle): void {
  db.close();
}
