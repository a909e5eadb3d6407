// src/db/sqlite.ts
// SQLite adapter: wraps better-sqlite3 behind the async DbAdapter interface.
//
// One connection serves the whole process, so every statement and every
// transaction is queued on a single lock. While a transaction is open nothing
// else reaches the connection; work inside it goes through the `tx` handle.

import Database from 'better-sqlite3';
import { KeyedLock } from '../utils/keyedLock';
import type { DbAdapter, RunResult } from './types';

const CONNECTION_KEY = 'connection';

/** Direct access to the connection; also the handle passed to transaction callbacks */
class SqliteConnection implements DbAdapter {
  readonly dbType = 'sqlite' as const;

  constructor(private readonly _db: Database.Database) {}

  queryOne<T = Record<string, unknown>>(sql: string, params: unknown[] = []): Promise<T | undefined> {
    const row: T | undefined = this._db.prepare(sql).get(...params) as T | undefined;
    return Promise.resolve(row);
  }

  queryAll<T = Record<string, unknown>>(sql: string, params: unknown[] = []): Promise<T[]> {
    const rows = this._db.prepare(sql).all(...params) as T[];
    return Promise.resolve(rows);
  }

  run(sql: string, params: unknown[] = []): Promise<RunResult> {
    const result = this._db.prepare(sql).run(...params);
    return Promise.resolve({
      changes: result.changes,
      lastInsertRowid: result.lastInsertRowid,
    });
  }

  exec(sql: string): Promise<void> {
    this._db.exec(sql);
    return Promise.resolve();
  }

  /** Already inside a transaction: nested work joins it */
  transaction<T>(fn: (tx: DbAdapter) => Promise<T>): Promise<T> {
    return fn(this);
  }

  close(): Promise<void> {
    return Promise.reject(new Error('cannot close the database from inside a transaction'));
  }
}

export class SqliteAdapter implements DbAdapter {
  readonly dbType = 'sqlite' as const;
  private readonly _db: Database.Database;
  private readonly _conn: SqliteConnection;
  private readonly _lock = new KeyedLock();

  constructor(db: Database.Database) {
    this._db = db;
    this._conn = new SqliteConnection(db);
  }

  queryOne<T = Record<string, unknown>>(sql: string, params: unknown[] = []): Promise<T | undefined> {
    return this.serialized(() => this._conn.queryOne<T>(sql, params));
  }

  queryAll<T = Record<string, unknown>>(sql: string, params: unknown[] = []): Promise<T[]> {
    return this.serialized(() => this._conn.queryAll<T>(sql, params));
  }

  run(sql: string, params: unknown[] = []): Promise<RunResult> {
    return this.serialized(() => this._conn.run(sql, params));
  }

  exec(sql: string): Promise<void> {
    return this.serialized(() => this._conn.exec(sql));
  }

  /**
   * better-sqlite3's db.transaction() takes sync callbacks only, so
   * BEGIN/COMMIT are issued by hand. The callback must use `tx`; calling
   * this adapter from inside it waits on the transaction itself.
   */
  transaction<T>(fn: (tx: DbAdapter) => Promise<T>): Promise<T> {
    return this.serialized(async () => {
      this._db.exec('BEGIN');
      try {
        const result = await fn(this._conn);
        this._db.exec('COMMIT');
        return result;
      } catch (e) {
        if (this._db.inTransaction) this._db.exec('ROLLBACK');
        throw e;
      }
    });
  }

  close(): Promise<void> {
    return this.serialized(async () => {
      this._db.close();
    });
  }

  private serialized<T>(fn: () => Promise<T>): Promise<T> {
    return this._lock.run(CONNECTION_KEY, fn);
  }
}
