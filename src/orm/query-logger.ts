import type { DbExecutor, SyncDbExecutor } from '../core/execution/db-executor.js';
import type { Logger } from '../core/logging/logger.js';

/**
 * Represents a single executed SQL statement
 */
export interface QueryLogEntry {
  /** The SQL text as sent to the driver */
  sql: string;
  /** Parameters bound to the statement */
  params: readonly unknown[];
}

/**
 * Function type for query logging callbacks
 * @param entry - The query log entry to process
 */
export type QueryLogger = (entry: QueryLogEntry) => void;

/**
 * Creates a wrapped executor that reports every statement once the driver
 * has completed it. Failed statements are not reported; transaction control
 * goes straight to the wrapped executor.
 */
export const createQueryLoggingExecutor = (
  executor: DbExecutor,
  logger?: QueryLogger
): DbExecutor => {
  if (!logger) {
    return executor;
  }

  return {
    async executeSql(sql, params) {
      const result = await executor.executeSql(sql, params);
      logger({ sql, params: params ?? [] });
      return result;
    },
    beginTransaction: () => executor.beginTransaction(),
    commitTransaction: () => executor.commitTransaction(),
    rollbackTransaction: () => executor.rollbackTransaction(),
  };
};

/**
 * Synchronous variant of createQueryLoggingExecutor.
 */
export const createSyncQueryLoggingExecutor = (
  executor: SyncDbExecutor,
  logger?: QueryLogger
): SyncDbExecutor => {
  if (!logger) {
    return executor;
  }

  return {
    executeSql(sql, params) {
      const result = executor.executeSql(sql, params);
      logger({ sql, params: params ?? [] });
      return result;
    },
    beginTransaction: () => executor.beginTransaction(),
    commitTransaction: () => executor.commitTransaction(),
    rollbackTransaction: () => executor.rollbackTransaction(),
  };
};

/**
 * Query logger that writes statements through a Logger, used for `echo`.
 */
export const createEchoQueryLogger = (logger: Logger): QueryLogger =>
  ({ sql, params }) => {
    if (params.length > 0) {
      logger.info(sql, params);
    } else {
      logger.info(sql);
    }
  };
