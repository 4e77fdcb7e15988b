// src/core/execution/executors/postgres-executor.ts
import {
  type DbExecutor,
  createExecutorFromQueryRunner
} from '../db-executor.js';

export interface PostgresClientLike {
  query(
    text: string,
    params?: unknown[]
  ): Promise<{ rows: Array<Record<string, unknown>>; rowCount?: number | null }>;
}

export function createPostgresExecutor(
  client: PostgresClientLike
): DbExecutor {
  return createExecutorFromQueryRunner({
    async query(sql, params) {
      const { rows, rowCount } = await client.query(sql, params);
      return { rows, rowsAffected: rowCount ?? undefined };
    },
    async beginTransaction() {
      await client.query('BEGIN');
    },
    async commitTransaction() {
      await client.query('COMMIT');
    },
    async rollbackTransaction() {
      await client.query('ROLLBACK');
    },
  });
}
