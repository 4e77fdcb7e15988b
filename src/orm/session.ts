import type { SqlFamilyDialect } from '../core/dialect/sql-family.js';
import { buildInsertSql } from '../core/dialect/sql-family.js';
import { queryResultToRows, type DbExecutor, type QueryResult } from '../core/execution/db-executor.js';
import { SessionClosedError } from '../core/errors.js';
import type { Logger } from '../core/logging/logger.js';
import { createQueryLoggingExecutor } from './query-logger.js';
import type { StatementEvents } from './statement-events.js';

export interface AsyncSessionOptions {
  /** Checked before every round-trip; an abort fails the next statement. */
  signal?: AbortSignal;
}

/**
 * What a session needs from the engine that issued it.
 */
export interface AsyncSessionBinding extends AsyncSessionOptions {
  dialect: SqlFamilyDialect;
  events: StatementEvents;
  logger: Logger;
  /** Gives the connection back; `broken` asks for it to be destroyed instead. */
  release(broken: boolean): Promise<void>;
}

const SAVEPOINT = 'dbscope_unit';

export interface PendingInsert {
  table: string;
  row: Record<string, unknown>;
}

/**
 * Unit of work bound to one pooled connection for its whole life.
 *
 * A transaction begins implicitly with the first statement or flush.
 * Rows queued with `add` are only written by `flush` or `commit`.
 */
export class AsyncSession {
  private readonly executor: DbExecutor;
  // Unreported: transaction control and savepoints.
  private readonly control: DbExecutor;
  private readonly binding: AsyncSessionBinding;
  private pending: PendingInsert[] = [];
  private transactionOpen = false;
  private outerTransaction = false;
  private closed = false;

  constructor(executor: DbExecutor, binding: AsyncSessionBinding) {
    this.binding = binding;
    this.control = executor;
    this.executor = createQueryLoggingExecutor(executor, entry => binding.events.emit(entry));
  }

  get isClosed(): boolean {
    return this.closed;
  }

  get inTransaction(): boolean {
    return this.transactionOpen;
  }

  /** Rows queued by `add` and not flushed yet. */
  get pendingCount(): number {
    return this.pending.length;
  }

  async execute(sql: string, params: unknown[] = []): Promise<QueryResult> {
    this.assertOpen('execute');
    await this.autobegin();
    this.binding.signal?.throwIfAborted();
    return this.executor.executeSql(sql, params);
  }

  /** Rows as objects keyed by column name. */
  async query(sql: string, params: unknown[] = []): Promise<Array<Record<string, unknown>>> {
    return queryResultToRows(await this.execute(sql, params));
  }

  /** Queues a row for insertion at the next flush. */
  add(table: string, row: Record<string, unknown>): void {
    this.assertOpen('add');
    this.pending.push({ table, row: { ...row } });
  }

  async flush(): Promise<void> {
    this.assertOpen('flush');
    await this.autobegin();
    while (this.pending.length > 0) {
      const { table, row } = this.pending[0];
      const { sql, params } = buildInsertSql(this.binding.dialect, table, row);
      this.binding.signal?.throwIfAborted();
      await this.executor.executeSql(sql, params);
      this.pending.shift();
    }
  }

  async commit(): Promise<void> {
    this.assertOpen('commit');
    if (this.pending.length > 0) {
      await this.flush();
    }
    if (!this.transactionOpen) return;
    this.binding.signal?.throwIfAborted();
    await this.commitUnit();
    this.transactionOpen = false;
  }

  /**
   * Opens a transaction that only `close` ends, by rolling it back. From
   * here on `commit` and `rollback` act on a savepoint inside it, so even
   * committed work is discarded with the session.
   * @throws Error when a transaction is already open
   */
  async beginOuterTransaction(): Promise<void> {
    this.assertOpen('beginOuterTransaction');
    if (this.transactionOpen || this.outerTransaction) {
      throw new Error('beginOuterTransaction() must run before the session starts a transaction');
    }
    this.binding.signal?.throwIfAborted();
    await this.control.beginTransaction();
    this.outerTransaction = true;
  }

  /** Discards pending rows and undoes the open transaction, if any. */
  async rollback(): Promise<void> {
    this.assertOpen('rollback');
    this.pending = [];
    if (!this.transactionOpen) return;
    this.transactionOpen = false;
    await this.rollbackUnit();
  }

  /**
   * Rolls back what is still open and returns the connection. Idempotent.
   * A connection whose rollback failed is destroyed rather than reused.
   */
  async close(): Promise<void> {
    if (this.closed) return;
    this.closed = true;
    this.pending = [];

    let broken = false;
    if (this.transactionOpen || this.outerTransaction) {
      this.transactionOpen = false;
      this.outerTransaction = false;
      try {
        await this.control.rollbackTransaction();
      } catch (err) {
        broken = true;
        this.binding.logger.warn('Rollback on session close failed; discarding the connection', err);
      }
    }
    await this.binding.release(broken);
  }

  private async autobegin(): Promise<void> {
    if (this.transactionOpen) return;
    this.binding.signal?.throwIfAborted();
    if (this.outerTransaction) {
      await this.control.executeSql(`SAVEPOINT ${SAVEPOINT}`);
    } else {
      await this.control.beginTransaction();
    }
    this.transactionOpen = true;
  }

  private async commitUnit(): Promise<void> {
    if (this.outerTransaction) {
      await this.control.executeSql(`RELEASE SAVEPOINT ${SAVEPOINT}`);
    } else {
      await this.control.commitTransaction();
    }
  }

  private async rollbackUnit(): Promise<void> {
    if (this.outerTransaction) {
      await this.control.executeSql(`ROLLBACK TO SAVEPOINT ${SAVEPOINT}`);
      await this.control.executeSql(`RELEASE SAVEPOINT ${SAVEPOINT}`);
    } else {
      await this.control.rollbackTransaction();
    }
  }

  private assertOpen(operation: string): void {
    if (this.closed) {
      throw new SessionClosedError(operation);
    }
  }
}
