import type { SqlFamilyDialect } from '../core/dialect/sql-family.js';
import { buildInsertSql } from '../core/dialect/sql-family.js';
import { queryResultToRows, type QueryResult, type SyncDbExecutor } from '../core/execution/db-executor.js';
import { SessionClosedError } from '../core/errors.js';
import type { Logger } from '../core/logging/logger.js';
import { createSyncQueryLoggingExecutor } from './query-logger.js';
import type { PendingInsert } from './session.js';
import type { StatementEvents } from './statement-events.js';

const SAVEPOINT = 'dbscope_unit';

export interface SyncSessionBinding {
  dialect: SqlFamilyDialect;
  events: StatementEvents;
  logger: Logger;
  release(broken: boolean): void;
}

/**
 * Blocking twin of `AsyncSession`, same transaction rules.
 */
export class SyncSession {
  private readonly executor: SyncDbExecutor;
  private readonly control: SyncDbExecutor;
  private readonly binding: SyncSessionBinding;
  private pending: PendingInsert[] = [];
  private transactionOpen = false;
  private outerTransaction = false;
  private closed = false;

  constructor(executor: SyncDbExecutor, binding: SyncSessionBinding) {
    this.binding = binding;
    this.control = executor;
    this.executor = createSyncQueryLoggingExecutor(executor, entry => binding.events.emit(entry));
  }

  get isClosed(): boolean {
    return this.closed;
  }

  get inTransaction(): boolean {
    return this.transactionOpen;
  }

  get pendingCount(): number {
    return this.pending.length;
  }

  execute(sql: string, params: unknown[] = []): QueryResult {
    this.assertOpen('execute');
    this.autobegin();
    return this.executor.executeSql(sql, params);
  }

  query(sql: string, params: unknown[] = []): Array<Record<string, unknown>> {
    return queryResultToRows(this.execute(sql, params));
  }

  add(table: string, row: Record<string, unknown>): void {
    this.assertOpen('add');
    this.pending.push({ table, row: { ...row } });
  }

  flush(): void {
    this.assertOpen('flush');
    this.autobegin();
    while (this.pending.length > 0) {
      const { table, row } = this.pending[0];
      const { sql, params } = buildInsertSql(this.binding.dialect, table, row);
      this.executor.executeSql(sql, params);
      this.pending.shift();
    }
  }

  commit(): void {
    this.assertOpen('commit');
    if (this.pending.length > 0) {
      this.flush();
    }
    if (!this.transactionOpen) return;
    this.commitUnit();
    this.transactionOpen = false;
  }

  /** See `AsyncSession.beginOuterTransaction`. */
  beginOuterTransaction(): void {
    this.assertOpen('beginOuterTransaction');
    if (this.transactionOpen || this.outerTransaction) {
      throw new Error('beginOuterTransaction() must run before the session starts a transaction');
    }
    this.control.beginTransaction();
    this.outerTransaction = true;
  }

  rollback(): void {
    this.assertOpen('rollback');
    this.pending = [];
    if (!this.transactionOpen) return;
    this.transactionOpen = false;
    this.rollbackUnit();
  }

  close(): void {
    if (this.closed) return;
    this.closed = true;
    this.pending = [];

    let broken = false;
    if (this.transactionOpen || this.outerTransaction) {
      this.transactionOpen = false;
      this.outerTransaction = false;
      try {
        this.control.rollbackTransaction();
      } catch (err) {
        broken = true;
        this.binding.logger.warn('Rollback on session close failed; discarding the connection', err);
      }
    }
    this.binding.release(broken);
  }

  private autobegin(): void {
    if (this.transactionOpen) return;
    if (this.outerTransaction) {
      this.control.executeSql(`SAVEPOINT ${SAVEPOINT}`);
    } else {
      this.control.beginTransaction();
    }
    this.transactionOpen = true;
  }

  private commitUnit(): void {
    if (this.outerTransaction) {
      this.control.executeSql(`RELEASE SAVEPOINT ${SAVEPOINT}`);
    } else {
      this.control.commitTransaction();
    }
  }

  private rollbackUnit(): void {
    if (this.outerTransaction) {
      this.control.executeSql(`ROLLBACK TO SAVEPOINT ${SAVEPOINT}`);
      this.control.executeSql(`RELEASE SAVEPOINT ${SAVEPOINT}`);
    } else {
      this.control.rollbackTransaction();
    }
  }

  private assertOpen(operation: string): void {
    if (this.closed) {
      throw new SessionClosedError(operation);
    }
  }
}
