// src/core/execution/db-executor.ts

// low-level canonical shape
export type QueryResult = {
  columns: string[];
  values: unknown[][];
  /** Rows changed by a write, when the driver reports it. */
  rowsAffected?: number;
};

/**
 * One physical connection, seen through the async driver.
 */
export interface DbExecutor {
  executeSql(sql: string, params?: unknown[]): Promise<QueryResult>;

  beginTransaction(): Promise<void>;
  commitTransaction(): Promise<void>;
  rollbackTransaction(): Promise<void>;
}

/**
 * One physical connection, seen through a synchronous driver.
 */
export interface SyncDbExecutor {
  executeSql(sql: string, params?: unknown[]): QueryResult;

  beginTransaction(): void;
  commitTransaction(): void;
  rollbackTransaction(): void;
}

// --- helpers ---

/**
 * Convert an array of row objects into a QueryResult.
 */
export function rowsToQueryResult(
  rows: Array<Record<string, unknown>>
): QueryResult {
  if (rows.length === 0) {
    return { columns: [], values: [] };
  }

  const columns = Object.keys(rows[0]);
  const values = rows.map(row => columns.map(c => row[c]));
  return { columns, values };
}

/**
 * Inverse of rowsToQueryResult.
 */
export function queryResultToRows(result: QueryResult): Array<Record<string, unknown>> {
  return result.values.map(values => {
    const row: Record<string, unknown> = {};
    result.columns.forEach((column, i) => {
      row[column] = values[i];
    });
    return row;
  });
}

/**
 * Minimal contract that most promise-based SQL clients can implement.
 */
export interface SimpleQueryRunner {
  query(
    sql: string,
    params?: unknown[]
  ): Promise<{ rows: Array<Record<string, unknown>>; rowsAffected?: number }>;
  beginTransaction(): Promise<void>;
  commitTransaction(): Promise<void>;
  rollbackTransaction(): Promise<void>;
}

/**
 * Generic factory: turn any SimpleQueryRunner into a DbExecutor.
 */
export function createExecutorFromQueryRunner(
  runner: SimpleQueryRunner
): DbExecutor {
  return {
    async executeSql(sql, params) {
      const { rows, rowsAffected } = await runner.query(sql, params);
      const result = rowsToQueryResult(rows);
      return rowsAffected === undefined ? result : { ...result, rowsAffected };
    },
    beginTransaction: () => runner.beginTransaction(),
    commitTransaction: () => runner.commitTransaction(),
    rollbackTransaction: () => runner.rollbackTransaction(),
  };
}
