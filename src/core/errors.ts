import type { EngineMode } from './uri/database-uri.js';

export type DataAccessErrorCode =
  | 'UNSUPPORTED_SCHEME'
  | 'ENGINE_CONSTRUCTION_FAILED'
  | 'POOL_EXHAUSTED'
  | 'POOL_CLOSED'
  | 'SESSION_CLOSED';

/**
 * Base class for every error raised by the data-access runtime.
 */
export class DataAccessError extends Error {
  readonly code: DataAccessErrorCode;
  readonly retryable: boolean;

  constructor(code: DataAccessErrorCode, message: string, opts: { retryable?: boolean; cause?: unknown } = {}) {
    super(message, opts.cause === undefined ? undefined : { cause: opts.cause });
    this.name = 'DataAccessError';
    this.code = code;
    this.retryable = opts.retryable ?? false;
  }
}

export class UnsupportedSchemeError extends DataAccessError {
  readonly scheme: string;

  constructor(scheme: string) {
    super(
      'UNSUPPORTED_SCHEME',
      `Unsupported database URL scheme "${scheme}". Supported schemes: sqlite://, postgresql://, mysql://`
    );
    this.name = 'UnsupportedSchemeError';
    this.scheme = scheme;
  }
}

export class EngineConstructionError extends DataAccessError {
  readonly mode: EngineMode;

  constructor(mode: EngineMode, message: string, cause?: unknown) {
    super('ENGINE_CONSTRUCTION_FAILED', `Failed to build ${mode} engine: ${message}`, {
      retryable: true,
      cause,
    });
    this.name = 'EngineConstructionError';
    this.mode = mode;
  }
}

export class PoolExhaustedError extends DataAccessError {
  readonly timeoutMs: number;

  constructor(timeoutMs: number) {
    super('POOL_EXHAUSTED', `No pooled connection became available within ${timeoutMs}ms`, {
      retryable: true,
    });
    this.name = 'PoolExhaustedError';
    this.timeoutMs = timeoutMs;
  }
}

export class PoolClosedError extends DataAccessError {
  constructor(message = 'Pool is destroyed') {
    super('POOL_CLOSED', message);
    this.name = 'PoolClosedError';
  }
}

export class SessionClosedError extends DataAccessError {
  constructor(operation: string) {
    super('SESSION_CLOSED', `Cannot ${operation}: the session is closed`);
    this.name = 'SessionClosedError';
  }
}
