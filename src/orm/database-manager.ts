import type { Logger } from '../core/logging/logger.js';
import { createConsoleLogger } from '../core/logging/logger.js';
import type { EngineMode } from '../core/uri/database-uri.js';
import type { AsyncEngine, SyncEngine } from './engine.js';
import { EngineRegistry, type EngineRegistryOptions } from './engine-registry.js';
import type { AsyncSession } from './session.js';
import type { SyncSession } from './sync-session.js';
import { runInTransaction, runInTransactionSync } from './transaction-runner.js';

/**
 * Options for async scopes.
 */
export interface AsyncScopeOptions {
  /** Aborting fails the pending acquire or the session's next round-trip. */
  signal?: AbortSignal;
}

type ScopeArgs<T> =
  | [mode: 'sync', autoCommit: boolean, fn: (session: SyncSession) => T, opts?: undefined]
  | [mode: 'async', autoCommit: boolean, fn: (session: AsyncSession) => Promise<T>, opts?: AsyncScopeOptions];

export interface DatabaseManagerOptions extends EngineRegistryOptions {
  /** Use an existing registry instead of building one from the other options. */
  registry?: EngineRegistry;
}

/**
 * Session factory and scope managers over an engine registry.
 *
 * Bare scopes (`withSession`, `withSyncSession`) never commit: the body
 * commits explicitly or its work is rolled back on close. Transaction
 * scopes commit on normal exit and roll back on failure, re-throwing the
 * body's own error. Every scope closes its session on every exit path.
 */
export class DatabaseManager {
  readonly registry: EngineRegistry;
  private readonly logger: Logger;

  constructor(opts: DatabaseManagerOptions = {}) {
    this.logger = opts.logger ?? createConsoleLogger({ level: 'warn' });
    this.registry = opts.registry ?? new EngineRegistry(opts);
  }

  getEngine(mode: 'sync'): SyncEngine;
  getEngine(mode: 'async'): Promise<AsyncEngine>;
  getEngine(mode: EngineMode): SyncEngine | Promise<AsyncEngine>;
  getEngine(mode: EngineMode): SyncEngine | Promise<AsyncEngine> {
    return this.registry.getEngine(mode);
  }

  /** The caller owns the session and must close it. */
  openSyncSession(): SyncSession {
    return this.registry.getSyncEngine().openSession();
  }

  /** The caller owns the session and must close it. */
  async openSession(opts: AsyncScopeOptions = {}): Promise<AsyncSession> {
    const engine = await this.registry.getAsyncEngine();
    return engine.openSession({ signal: opts.signal });
  }

  withSyncSession<T>(fn: (session: SyncSession) => T): T {
    const session = this.openSyncSession();
    try {
      return fn(session);
    } finally {
      session.close();
    }
  }

  async withSession<T>(fn: (session: AsyncSession) => Promise<T>, opts: AsyncScopeOptions = {}): Promise<T> {
    const session = await this.openSession(opts);
    try {
      return await fn(session);
    } finally {
      await session.close();
    }
  }

  /**
   * Commits when `fn` returns, rolls back when it throws.
   * @throws TypeError when `fn` returns a promise
   */
  withSyncTransaction<T>(fn: (session: SyncSession) => T): T {
    const session = this.openSyncSession();
    try {
      return runInTransactionSync(session, fn, this.logger);
    } finally {
      session.close();
    }
  }

  async withTransaction<T>(fn: (session: AsyncSession) => Promise<T>, opts: AsyncScopeOptions = {}): Promise<T> {
    const session = await this.openSession(opts);
    try {
      return await runInTransaction(session, fn, this.logger);
    } finally {
      await session.close();
    }
  }

  /**
   * Single entry point for collaborators that pick mode and commit policy
   * at run time.
   */
  scope<T>(mode: 'sync', autoCommit: boolean, fn: (session: SyncSession) => T): T;
  scope<T>(
    mode: 'async',
    autoCommit: boolean,
    fn: (session: AsyncSession) => Promise<T>,
    opts?: AsyncScopeOptions
  ): Promise<T>;
  scope<T>(...[mode, autoCommit, fn, opts]: ScopeArgs<T>): T | Promise<T> {
    if (mode === 'sync') {
      return autoCommit ? this.withSyncTransaction(fn) : this.withSyncSession(fn);
    }
    return autoCommit ? this.withTransaction(fn, opts) : this.withSession(fn, opts);
  }

  /**
   * Transaction scope for one-off scripts: the sync engine is disposed
   * once the scope has finished.
   */
  standaloneSyncTransaction<T>(fn: (session: SyncSession) => T): T {
    try {
      return this.withSyncTransaction(fn);
    } finally {
      this.registry.disposeSync();
    }
  }

  async standaloneTransaction<T>(fn: (session: AsyncSession) => Promise<T>, opts: AsyncScopeOptions = {}): Promise<T> {
    try {
      return await this.withTransaction(fn, opts);
    } finally {
      await this.registry.disposeAsync();
    }
  }

  async dispose(): Promise<void> {
    await this.registry.disposeAll();
  }
}
