import type { DatabaseConfig } from '../config/database-config.js';
import { getSqlFamilyDialect, type SqlFamilyDialect } from '../core/dialect/sql-family.js';
import { Pool } from '../core/execution/pooling/pool.js';
import type { PoolOptions, PoolStats } from '../core/execution/pooling/pool-types.js';
import { SyncPool } from '../core/execution/pooling/sync-pool.js';
import type { Logger } from '../core/logging/logger.js';
import { silentLogger } from '../core/logging/logger.js';
import {
  ASYNC_DRIVERS,
  SYNC_DRIVERS,
  isMemoryDatabase,
  parseDatabaseUri,
  redactUri,
  type DatabaseFamily,
  type EngineMode,
  type ParsedDatabaseUri,
} from '../core/uri/database-uri.js';
import {
  createAsyncConnector,
  createSyncConnector,
  toPoolAdapter,
  toSyncPoolAdapter,
  type AsyncConnection,
  type AsyncConnector,
  type SyncConnection,
  type SyncConnector,
} from './connectors.js';
import { createEchoQueryLogger } from './query-logger.js';
import { AsyncSession, type AsyncSessionOptions } from './session.js';
import { StatementEvents } from './statement-events.js';
import { SyncSession } from './sync-session.js';

type EngineConfig = Pick<
  DatabaseConfig,
  'poolSize' | 'maxOverflow' | 'acquireTimeoutMs' | 'idleTimeoutMs' | 'prePing' | 'echo'
> &
  Partial<Pick<DatabaseConfig, 'nPlusOneThreshold'>>;

export interface EngineOptions<TConnector> {
  /** URL the pool connects to; for async engines this is the translated URL. */
  url: string;
  config: EngineConfig;
  logger?: Logger;
  /** Replaces the driver-backed connector, e.g. to inject failures. */
  connector?: TConnector;
}

const poolOptionsFor = (parsed: ParsedDatabaseUri, config: EngineConfig): PoolOptions => {
  // Every connection to `:memory:` is a separate database; one shared
  // connection keeps sessions looking at the same data.
  if (isMemoryDatabase(parsed)) {
    return { max: 1, maxIdle: 1, acquireTimeoutMillis: config.acquireTimeoutMs };
  }
  return {
    max: config.poolSize + config.maxOverflow,
    maxIdle: config.poolSize,
    idleTimeoutMillis: config.idleTimeoutMs > 0 ? config.idleTimeoutMs : undefined,
    acquireTimeoutMillis: config.acquireTimeoutMs,
  };
};

/**
 * State shared by both engine flavours: parsed URL, pool sizing, the
 * statement hub and the open session count.
 */
abstract class EngineBase {
  abstract readonly mode: EngineMode;

  readonly family: DatabaseFamily;
  readonly driver: string;
  readonly url: string;
  readonly redactedUrl: string;
  readonly poolSize: number;
  readonly maxOverflow: number;
  readonly acquireTimeoutMs: number;
  /** Default threshold for analyzers attached to this engine. */
  readonly nPlusOneThreshold: number | undefined;
  /** Post-execution hook: one event per statement issued through a session. */
  readonly events: StatementEvents;
  readonly dialect: SqlFamilyDialect;

  protected readonly logger: Logger;
  protected readonly parsed: ParsedDatabaseUri;
  protected readonly poolOptions: PoolOptions;
  protected sessions = 0;
  protected disposed = false;

  protected constructor(url: string, config: EngineConfig, logger: Logger, driver: string) {
    this.parsed = parseDatabaseUri(url);
    this.family = this.parsed.family;
    this.driver = driver;
    this.url = url;
    this.redactedUrl = redactUri(url);
    this.poolSize = config.poolSize;
    this.maxOverflow = config.maxOverflow;
    this.acquireTimeoutMs = config.acquireTimeoutMs;
    this.nPlusOneThreshold = config.nPlusOneThreshold;
    this.logger = logger;
    this.events = new StatementEvents(logger);
    this.dialect = getSqlFamilyDialect(this.family);
    this.poolOptions = poolOptionsFor(this.parsed, config);

    if (config.echo) {
      this.events.on(createEchoQueryLogger(logger));
    }
  }

  /** Sessions issued by this engine and not yet closed. */
  get openSessions(): number {
    return this.sessions;
  }

  get isDisposed(): boolean {
    return this.disposed;
  }

  protected warnOpenSessions(): void {
    if (this.sessions > 0) {
      this.logger.warn(
        `Disposing ${this.mode} engine (${this.redactedUrl}) with ${this.sessions} open session(s); ` +
          'their connections are closed when the sessions close'
      );
    }
  }
}

/**
 * Pooled engine for the synchronous driver. Every call blocks until the
 * driver returns.
 */
export class SyncEngine extends EngineBase {
  readonly mode = 'sync' as const;

  private readonly pool: SyncPool<SyncConnection>;

  constructor(opts: EngineOptions<SyncConnector>) {
    const parsed = parseDatabaseUri(opts.url);
    const connector = opts.connector ?? createSyncConnector(parsed);
    super(opts.url, opts.config, opts.logger ?? silentLogger, parsed.driver ?? SYNC_DRIVERS[parsed.family] ?? 'none');

    this.pool = new SyncPool(toSyncPoolAdapter(connector, opts.config.prePing), this.poolOptions);
  }

  stats(): PoolStats {
    return this.pool.stats();
  }

  /**
   * Opens and releases one connection so a bad URL fails here rather than
   * inside the first scope.
   */
  verify(): void {
    this.pool.acquire().release();
  }

  /**
   * Checks out a connection and binds a session to it.
   * @throws PoolExhaustedError when every connection is leased
   */
  openSession(): SyncSession {
    const lease = this.pool.acquire();
    this.sessions++;
    return new SyncSession(lease.resource.executor, {
      dialect: this.dialect,
      events: this.events,
      logger: this.logger,
      release: broken => {
        this.sessions--;
        if (broken) {
          lease.destroy();
        } else {
          lease.release();
        }
      },
    });
  }

  /** Names of user tables, ordered. Not reported to statement listeners. */
  listTables(): string[] {
    const lease = this.pool.acquire();
    try {
      const result = lease.resource.executor.executeSql(this.dialect.listTablesSql);
      return result.values.map(row => String(row[0]));
    } finally {
      lease.release();
    }
  }

  dispose(): void {
    if (this.disposed) return;
    this.disposed = true;
    this.warnOpenSessions();
    this.pool.destroy();
    this.logger.debug(`Disposed sync engine (${this.redactedUrl})`);
  }
}

/**
 * Pooled engine for the async drivers. Callers suspend at connection
 * acquisition and at every statement round-trip.
 */
export class AsyncEngine extends EngineBase {
  readonly mode = 'async' as const;

  private readonly pool: Pool<AsyncConnection>;

  constructor(opts: EngineOptions<AsyncConnector>) {
    const parsed = parseDatabaseUri(opts.url);
    const connector =
      opts.connector ?? createAsyncConnector(parsed, { connectTimeoutMs: opts.config.acquireTimeoutMs });
    super(opts.url, opts.config, opts.logger ?? silentLogger, parsed.driver ?? ASYNC_DRIVERS[parsed.family]);

    this.pool = new Pool(toPoolAdapter(connector, opts.config.prePing), this.poolOptions);
  }

  stats(): PoolStats {
    return this.pool.stats();
  }

  async verify(): Promise<void> {
    const lease = await this.pool.acquire();
    await lease.release();
  }

  /**
   * Checks out a connection and binds a session to it.
   * @throws PoolExhaustedError when no connection frees up within acquireTimeoutMs
   */
  async openSession(opts: AsyncSessionOptions = {}): Promise<AsyncSession> {
    const lease = await this.pool.acquire({ signal: opts.signal });
    this.sessions++;
    return new AsyncSession(lease.resource.executor, {
      dialect: this.dialect,
      events: this.events,
      logger: this.logger,
      signal: opts.signal,
      release: async broken => {
        this.sessions--;
        if (broken) {
          await lease.destroy();
        } else {
          await lease.release();
        }
      },
    });
  }

  async listTables(): Promise<string[]> {
    const lease = await this.pool.acquire();
    try {
      const result = await lease.resource.executor.executeSql(this.dialect.listTablesSql);
      return result.values.map(row => String(row[0]));
    } finally {
      await lease.release();
    }
  }

  async dispose(): Promise<void> {
    if (this.disposed) return;
    this.disposed = true;
    this.warnOpenSessions();
    await this.pool.destroy();
    this.logger.debug(`Disposed async engine (${this.redactedUrl})`);
  }
}

export type Engine = SyncEngine | AsyncEngine;
