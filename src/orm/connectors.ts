import Database from 'better-sqlite3';
import mysql from 'mysql2/promise';
import pg from 'pg';
import sqlite3 from 'sqlite3';
import type { Database as SqliteDatabase } from 'sqlite3';

import type { DbExecutor, SyncDbExecutor } from '../core/execution/db-executor.js';
import { createBetterSqliteExecutor } from '../core/execution/executors/better-sqlite-executor.js';
import { createMysqlExecutor } from '../core/execution/executors/mysql-executor.js';
import { createPostgresExecutor } from '../core/execution/executors/postgres-executor.js';
import { createSqliteClient, createSqliteExecutor } from '../core/execution/executors/sqlite-executor.js';
import type { PoolAdapter, SyncPoolAdapter } from '../core/execution/pooling/pool-types.js';
import { ASYNC_DRIVERS, SYNC_DRIVERS, type ParsedDatabaseUri } from '../core/uri/database-uri.js';

/**
 * A physical connection as held by an async pool.
 */
export interface AsyncConnection {
  readonly id: number;
  readonly executor: DbExecutor;
  /** Cheap liveness probe used for pre-ping. */
  ping(): Promise<boolean>;
  close(): Promise<void>;
}

/**
 * A physical connection as held by a sync pool.
 */
export interface SyncConnection {
  readonly id: number;
  readonly executor: SyncDbExecutor;
  ping(): boolean;
  close(): void;
}

export type AsyncConnector = () => Promise<AsyncConnection>;
export type SyncConnector = () => SyncConnection;

let nextConnectionId = 0;

const pingWith = async (executor: DbExecutor): Promise<boolean> => {
  try {
    await executor.executeSql('SELECT 1');
    return true;
  } catch {
    // A failed probe is the answer, not an error.
    return false;
  }
};

/** The URL handed to network drivers: the scheme without its `+driver` part. */
const driverUrl = (parsed: ParsedDatabaseUri): string => `${parsed.family}://${parsed.rest}`;

const openSqlite = (filename: string): Promise<AsyncConnection> =>
  new Promise((resolve, reject) => {
    const db: SqliteDatabase = new sqlite3.Database(filename, err => {
      if (err) {
        reject(err);
        return;
      }
      const client = createSqliteClient(db);
      const executor = createSqliteExecutor(client);
      resolve({
        id: ++nextConnectionId,
        executor,
        ping: () => pingWith(executor),
        close: () =>
          new Promise<void>((res, rej) => {
            db.close(closeErr => (closeErr ? rej(closeErr) : res()));
          }),
      });
    });
  });

const openPostgres = async (url: string, connectTimeoutMs: number | undefined): Promise<AsyncConnection> => {
  const client = new pg.Client({ connectionString: url, connectionTimeoutMillis: connectTimeoutMs });
  await client.connect();
  const executor = createPostgresExecutor({
    query: (text, params) => client.query(text, params),
  });
  return {
    id: ++nextConnectionId,
    executor,
    ping: () => pingWith(executor),
    close: () => client.end(),
  };
};

const openMysql = async (url: string, connectTimeoutMs: number | undefined): Promise<AsyncConnection> => {
  const conn = await mysql.createConnection({ uri: url, connectTimeout: connectTimeoutMs });
  const executor = createMysqlExecutor({
    query: (sql, params) => conn.query(sql, params),
    beginTransaction: () => conn.beginTransaction(),
    commit: () => conn.commit(),
    rollback: () => conn.rollback(),
  });
  return {
    id: ++nextConnectionId,
    executor,
    ping: () => pingWith(executor),
    close: () => conn.end(),
  };
};

export interface AsyncConnectorOptions {
  /** Passed to the network drivers as their connect timeout. */
  connectTimeoutMs?: number;
}

/**
 * Picks the async driver for a parsed URL.
 * @throws Error when the URL names a driver other than the family's async driver
 */
export function createAsyncConnector(parsed: ParsedDatabaseUri, opts: AsyncConnectorOptions = {}): AsyncConnector {
  const expected = ASYNC_DRIVERS[parsed.family];
  if (parsed.driver !== null && parsed.driver !== expected) {
    throw new Error(`Driver "${parsed.driver}" is not supported for ${parsed.family}; use "${expected}"`);
  }

  switch (parsed.family) {
    case 'sqlite':
      return () => openSqlite(parsed.database);
    case 'postgresql':
      return () => openPostgres(driverUrl(parsed), opts.connectTimeoutMs);
    case 'mysql':
      return () => openMysql(driverUrl(parsed), opts.connectTimeoutMs);
  }
}

/**
 * Picks the sync driver for a parsed URL.
 * @throws Error when the family has no synchronous driver
 */
export function createSyncConnector(parsed: ParsedDatabaseUri): SyncConnector {
  const expected = SYNC_DRIVERS[parsed.family];
  if (expected === undefined) {
    throw new Error(`No synchronous driver exists for ${parsed.family}; use the async engine`);
  }
  if (parsed.driver !== null && parsed.driver !== expected) {
    throw new Error(`Driver "${parsed.driver}" is not supported for sync ${parsed.family}; use "${expected}"`);
  }

  return () => {
    const db = new Database(parsed.database);
    const executor = createBetterSqliteExecutor(db);
    return {
      id: ++nextConnectionId,
      executor,
      ping: () => db.open,
      close: () => {
        db.close();
      },
    };
  };
}

export const toPoolAdapter = (connect: AsyncConnector, prePing: boolean): PoolAdapter<AsyncConnection> => ({
  create: connect,
  destroy: conn => conn.close(),
  validate: prePing ? conn => conn.ping() : undefined,
});

export const toSyncPoolAdapter = (connect: SyncConnector, prePing: boolean): SyncPoolAdapter<SyncConnection> => ({
  create: connect,
  destroy: conn => conn.close(),
  validate: prePing ? conn => conn.ping() : undefined,
});
