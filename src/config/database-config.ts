import { z } from 'zod';

/**
 * Configuration validation error with field-level details.
 */
export class ConfigError extends Error {
  readonly fields: Array<{ path: string; message: string }>;

  constructor(message: string, fields: Array<{ path: string; message: string }> = []) {
    super(message);
    this.name = 'ConfigError';
    this.fields = fields;
  }
}

const booleanFlag = z
  .union([z.boolean(), z.enum(['true', 'false', '1', '0'])])
  .transform(value => value === true || value === 'true' || value === '1');

export const DatabaseConfigSchema = z.object({
  /** Sync-mode connection URL; the async URL is derived from it. */
  url: z.string().min(1),
  /** Connections kept open in the pool. */
  poolSize: z.coerce.number().int().positive().default(5),
  /** Extra connections allowed beyond poolSize under load; closed on release. */
  maxOverflow: z.coerce.number().int().min(0).default(10),
  /** How long an async caller waits for a connection before PoolExhaustedError. */
  acquireTimeoutMs: z.coerce.number().int().positive().default(30_000),
  /** Idle connections older than this are closed; 0 keeps them forever. */
  idleTimeoutMs: z.coerce.number().int().min(0).default(0),
  /** Validate idle connections before handing them out. */
  prePing: booleanFlag.default(false),
  /** Log every executed statement. */
  echo: booleanFlag.default(false),
  /** SELECT count above which repeated patterns are reported as N+1. */
  nPlusOneThreshold: z.coerce.number().int().min(0).default(2),
});

export type DatabaseConfig = z.infer<typeof DatabaseConfigSchema>;
export type DatabaseConfigInput = z.input<typeof DatabaseConfigSchema>;

const ENV_KEYS: Record<keyof DatabaseConfig, string> = {
  url: 'DB_URL',
  poolSize: 'DB_POOL_SIZE',
  maxOverflow: 'DB_MAX_OVERFLOW',
  acquireTimeoutMs: 'DB_ACQUIRE_TIMEOUT_MS',
  idleTimeoutMs: 'DB_IDLE_TIMEOUT_MS',
  prePing: 'DB_PRE_PING',
  echo: 'DB_ECHO',
  nPlusOneThreshold: 'DB_N_PLUS_ONE_THRESHOLD',
};

/**
 * Default URL per execution environment (`EXEC_ENV`).
 */
export function defaultDatabaseUrl(execEnv: string | undefined): string {
  switch (execEnv) {
    case 'test':
      return 'sqlite:///:memory:';
    case 'dev':
      return 'sqlite:///./data/db.dev.sqlite3';
    default:
      return 'sqlite:///./data/db.sqlite3';
  }
}

/**
 * Validate and freeze a configuration object.
 * @throws ConfigError with field-level details on validation failure
 */
export function parseDatabaseConfig(input: unknown): Readonly<DatabaseConfig> {
  const result = DatabaseConfigSchema.safeParse(input);
  if (!result.success) {
    const fields = result.error.issues.map(issue => ({
      path: issue.path.join('.'),
      message: issue.message,
    }));
    throw new ConfigError(
      `Invalid database configuration: ${fields.map(f => `${f.path}: ${f.message}`).join('; ')}`,
      fields
    );
  }
  return Object.freeze(result.data);
}

/**
 * Load configuration from `DB_*` environment variables, then apply overrides.
 *
 * Pipeline: env -> overrides -> defaults -> validate -> freeze
 */
export function loadDatabaseConfig(
  env: NodeJS.ProcessEnv = process.env,
  overrides: Partial<DatabaseConfigInput> = {}
): Readonly<DatabaseConfig> {
  const fromEnv: Record<string, unknown> = {};
  for (const [key, envKey] of Object.entries(ENV_KEYS)) {
    const value = env[envKey];
    if (value !== undefined && value !== '') {
      fromEnv[key] = value;
    }
  }

  const merged: Record<string, unknown> = { ...fromEnv, ...overrides };
  if (merged.url === undefined) {
    merged.url = defaultDatabaseUrl(env.EXEC_ENV);
  }

  return parseDatabaseConfig(merged);
}
