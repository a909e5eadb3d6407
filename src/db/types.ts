// src/db/types.ts
// Database adapter interface: async API over the SQL driver, so stores do not
// depend on better-sqlite3 directly.

export interface RunResult {
  changes: number;
  lastInsertRowid: number | bigint;
}

/**
 * Unified async database interface.
 * Query methods use '?' positional placeholders.
 */
export interface DbAdapter {
  readonly dbType: 'sqlite';

  /** First matching row, or undefined */
  queryOne<T = Record<string, unknown>>(sql: string, params?: unknown[]): Promise<T | undefined>;

  queryAll<T = Record<string, unknown>>(sql: string, params?: unknown[]): Promise<T[]>;

  /** INSERT / UPDATE / DELETE */
  run(sql: string, params?: unknown[]): Promise<RunResult>;

  /** Raw multi-statement SQL without parameters (DDL) */
  exec(sql: string): Promise<void>;

  /**
   * Run fn atomically; ROLLBACK is issued when fn throws. All work inside fn
   * goes through `tx`, and calling `tx.transaction` joins the open one.
   */
  transaction<T>(fn: (tx: DbAdapter) => Promise<T>): Promise<T>;

  close(): Promise<void>;
}
