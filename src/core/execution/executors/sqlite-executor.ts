// src/core/execution/executors/sqlite-executor.ts
import type { Database } from 'sqlite3';

import {
  type DbExecutor,
  rowsToQueryResult
} from '../db-executor.js';

export interface SqliteClientLike {
  all(
    sql: string,
    params?: unknown[]
  ): Promise<Array<Record<string, unknown>>>;
  exec(sql: string): Promise<void>;
}

/**
 * Promise facade over a callback-style `sqlite3.Database`.
 */
export const createSqliteClient = (db: Database): SqliteClientLike => ({
  all(sql, params) {
    return new Promise((resolve, reject) => {
      db.all(sql, params ?? [], (err: Error | null, rows: unknown[]) => {
        if (err) {
          reject(err);
          return;
        }

        resolve(rows as Array<Record<string, unknown>>);
      });
    });
  },
  exec(sql) {
    return new Promise((resolve, reject) => {
      db.exec(sql, err => (err ? reject(err) : resolve()));
    });
  },
});

/**
 * Creates a database executor for SQLite.
 * @param client A SQLite client instance.
 * @returns A DbExecutor implementation for SQLite.
 */
export function createSqliteExecutor(
  client: SqliteClientLike
): DbExecutor {
  return {
    async executeSql(sql, params) {
      const rows = await client.all(sql, params);
      return rowsToQueryResult(rows);
    },
    async beginTransaction() {
      await client.exec('BEGIN');
    },
    async commitTransaction() {
      await client.exec('COMMIT');
    },
    async rollbackTransaction() {
      await client.exec('ROLLBACK');
    },
  };
}
