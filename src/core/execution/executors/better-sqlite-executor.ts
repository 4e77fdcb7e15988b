// src/core/execution/executors/better-sqlite-executor.ts
import {
  type SyncDbExecutor,
  rowsToQueryResult
} from '../db-executor.js';

/**
 * The slice of a `better-sqlite3` Database the sync executor relies on.
 */
export interface BetterSqliteClientLike {
  prepare(sql: string): {
    readonly reader: boolean;
    all(...params: unknown[]): unknown[];
    run(...params: unknown[]): { changes: number };
  };
  exec(sql: string): unknown;
}

/**
 * Creates a synchronous executor for SQLite. Every call blocks the calling
 * thread until the statement has finished.
 */
export function createBetterSqliteExecutor(
  client: BetterSqliteClientLike
): SyncDbExecutor {
  return {
    executeSql(sql, params = []) {
      const stmt = client.prepare(sql);
      if (stmt.reader) {
        return rowsToQueryResult(stmt.all(...params) as Array<Record<string, unknown>>);
      }
      const { changes } = stmt.run(...params);
      return { columns: [], values: [], rowsAffected: changes };
    },
    beginTransaction() {
      client.exec('BEGIN');
    },
    commitTransaction() {
      client.exec('COMMIT');
    },
    rollbackTransaction() {
      client.exec('ROLLBACK');
    },
  };
}
