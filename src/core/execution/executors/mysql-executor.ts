// src/core/execution/executors/mysql-executor.ts
import {
  type DbExecutor,
  rowsToQueryResult
} from '../db-executor.js';

export interface MysqlClientLike {
  query(
    sql: string,
    params?: unknown[]
  ): Promise<[unknown, unknown?]>; // rows, metadata
  beginTransaction(): Promise<void>;
  commit(): Promise<void>;
  rollback(): Promise<void>;
}

const affectedRowsOf = (header: unknown): number | undefined => {
  if (typeof header === 'object' && header !== null && 'affectedRows' in header) {
    const { affectedRows } = header;
    return typeof affectedRows === 'number' ? affectedRows : undefined;
  }
  return undefined;
};

export function createMysqlExecutor(
  client: MysqlClientLike
): DbExecutor {
  return {
    async executeSql(sql, params) {
      const [rows] = await client.query(sql, params);

      if (!Array.isArray(rows)) {
        // insert/update return a result header instead of rows
        return { columns: [], values: [], rowsAffected: affectedRowsOf(rows) };
      }

      return rowsToQueryResult(rows as Array<Record<string, unknown>>);
    },
    async beginTransaction() {
      await client.beginTransaction();
    },
    async commitTransaction() {
      await client.commit();
    },
    async rollbackTransaction() {
      await client.rollback();
    },
  };
}
