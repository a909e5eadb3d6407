// src/db/index.ts
// Adapter factory: opens the SQLite file named by BLANKFILL_DB_PATH (or an
// in-memory database) and makes sure the schema exists.

import path from 'node:path';
import fs from 'node:fs';
import Database from 'better-sqlite3';
import { config } from '../config';
import { SqliteAdapter } from './sqlite';
import { initSchema } from './schema';

export type { DbAdapter, RunResult } from './types';
export { SqliteAdapter } from './sqlite';
export { initSchema } from './schema';

let _adapter: SqliteAdapter | null = null;

/** Open a fresh adapter on the given file (or ':memory:') with the schema applied */
export function openDatabase(dbPath: string): SqliteAdapter {
  if (dbPath !== ':memory:') {
    fs.mkdirSync(path.dirname(dbPath), { recursive: true });
  }
  const rawDb = new Database(dbPath);
  if (dbPath !== ':memory:') {
    rawDb.pragma('journal_mode = WAL');
  }
  rawDb.pragma('foreign_keys = ON');
  initSchema(rawDb);
  return new SqliteAdapter(rawDb);
}

/** Create (or return the cached) process-wide adapter */
export function createAdapter(): SqliteAdapter {
  if (!_adapter) {
    _adapter = openDatabase(config.database.path);
  }
  return _adapter;
}

/** Reset the cached adapter (for testing) */
export function resetAdapter(): void {
  _adapter = null;
}
