/**
 * dbscope core exports.
 * Engine registry, sessions and transaction scopes for sync and async
 * drivers, plus N+1 statement analysis.
 */
export * from './core/errors.js';
export * from './core/uri/database-uri.js';
export * from './core/logging/logger.js';
export * from './core/dialect/sql-family.js';
export * from './config/database-config.js';

// execution abstraction + helpers
export * from './core/execution/db-executor.js';
export * from './core/execution/pooling/pool-types.js';
export * from './core/execution/pooling/pool.js';
export * from './core/execution/pooling/sync-pool.js';
export * from './core/execution/executors/postgres-executor.js';
export * from './core/execution/executors/mysql-executor.js';
export * from './core/execution/executors/sqlite-executor.js';
export * from './core/execution/executors/better-sqlite-executor.js';

// engines, sessions, scopes
export * from './orm/connectors.js';
export * from './orm/engine.js';
export * from './orm/engine-registry.js';
export * from './orm/query-logger.js';
export * from './orm/statement-events.js';
export * from './orm/session.js';
export * from './orm/sync-session.js';
export * from './orm/transaction-runner.js';
export * from './orm/database-manager.js';

export * from './diagnostics/query-analyzer.js';
export * from './testing/rollback-session.js';
