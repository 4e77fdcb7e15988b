import { UnsupportedSchemeError } from '../errors.js';

export type EngineMode = 'sync' | 'async';

export type DatabaseFamily = 'sqlite' | 'postgresql' | 'mysql';

/** Driver (npm package) used by the async engine of each family. */
export const ASYNC_DRIVERS: Readonly<Record<DatabaseFamily, string>> = {
  sqlite: 'sqlite3',
  postgresql: 'pg',
  mysql: 'mysql2',
};

/** Synchronous drivers only exist for embedded databases. */
export const SYNC_DRIVERS: Readonly<Partial<Record<DatabaseFamily, string>>> = {
  sqlite: 'better-sqlite3',
};

export interface ParsedDatabaseUri {
  family: DatabaseFamily;
  /** Driver named after `+` in the scheme, if any. */
  driver: string | null;
  scheme: string;
  /** Everything after `://`, untouched. */
  rest: string;
  /**
   * SQLite: the file path (or `:memory:`).
   * Network databases: the path segment without query string.
   */
  database: string;
}

const SCHEME_SEPARATOR = '://';

const isFamily = (value: string): value is DatabaseFamily =>
  Object.prototype.hasOwnProperty.call(ASYNC_DRIVERS, value);

const splitScheme = (uri: string): { scheme: string; rest: string } => {
  const idx = uri.indexOf(SCHEME_SEPARATOR);
  if (idx <= 0) {
    // Only the part before the first `:` or `/`; the rest may hold credentials.
    throw new UnsupportedSchemeError(/^[^:/]*/.exec(uri)?.[0] ?? '');
  }
  return { scheme: uri.slice(0, idx), rest: uri.slice(idx + SCHEME_SEPARATOR.length) };
};

/**
 * Parses a `scheme[+driver]://[user[:pass]@]host[:port]/db` URL.
 * @throws UnsupportedSchemeError when the family is unknown
 */
export function parseDatabaseUri(uri: string): ParsedDatabaseUri {
  const { scheme, rest } = splitScheme(uri);
  const [base, driver] = scheme.split('+', 2);
  if (!isFamily(base)) {
    throw new UnsupportedSchemeError(scheme);
  }

  let database: string;
  if (base === 'sqlite') {
    // sqlite:///relative.db, sqlite:////abs.db, sqlite:// and sqlite:///:memory:
    const path = rest.startsWith('/') ? rest.slice(1) : rest;
    database = path === '' ? ':memory:' : path;
  } else {
    const slash = rest.indexOf('/');
    const path = slash >= 0 ? rest.slice(slash + 1) : '';
    database = path.split('?')[0];
  }

  return { family: base, driver: driver ?? null, scheme, rest, database };
}

/**
 * Maps a sync connection URL onto the equivalent async one by swapping the
 * driver component of the scheme. Credentials, host and path are untouched.
 *
 * @example
 * toAsyncUri('sqlite:///./db.sqlite3');           // 'sqlite+sqlite3:///./db.sqlite3'
 * toAsyncUri('postgresql://u:p@localhost/app');   // 'postgresql+pg://u:p@localhost/app'
 * toAsyncUri('postgresql+pg://u:p@localhost/app'); // unchanged
 */
export function toAsyncUri(uri: string): string {
  const { scheme, rest } = splitScheme(uri);
  const base = scheme.split('+', 1)[0];
  if (!isFamily(base)) {
    throw new UnsupportedSchemeError(scheme);
  }
  return `${base}+${ASYNC_DRIVERS[base]}${SCHEME_SEPARATOR}${rest}`;
}

/** Masks the password of a URL for log output. */
export function redactUri(uri: string): string {
  return uri.replace(/(:\/\/[^:@/]+:)[^@/]*@/, '$1***@');
}

export const isMemoryDatabase = (parsed: ParsedDatabaseUri): boolean =>
  parsed.family === 'sqlite' && (parsed.database === ':memory:' || parsed.database === '');
