import { loadDatabaseConfig, type DatabaseConfig } from '../config/database-config.js';
import { DataAccessError, EngineConstructionError, UnsupportedSchemeError } from '../core/errors.js';
import type { Logger } from '../core/logging/logger.js';
import { createConsoleLogger } from '../core/logging/logger.js';
import { redactUri, toAsyncUri, type EngineMode } from '../core/uri/database-uri.js';
import { AsyncEngine, SyncEngine } from './engine.js';

export type EngineState = 'uninitialized' | 'ready';

/**
 * Builds the engine for one mode. The registry calls `verify()` on the
 * result, so a factory only has to construct.
 */
export interface EngineFactories {
  sync(url: string, config: Readonly<DatabaseConfig>, logger: Logger): SyncEngine;
  async(url: string, config: Readonly<DatabaseConfig>, logger: Logger): AsyncEngine;
}

export interface EngineRegistryOptions {
  /** A fixed config, or a provider read once per construction. Defaults to the environment. */
  config?: Readonly<DatabaseConfig> | (() => Readonly<DatabaseConfig>);
  /** Defaults to a console logger at `warn`, or at `info` for engines built with `echo`. */
  logger?: Logger;
  factories?: Partial<EngineFactories>;
}

export const defaultEngineFactories: EngineFactories = {
  sync: (url, config, logger) => new SyncEngine({ url, config, logger }),
  async: (url, config, logger) => new AsyncEngine({ url, config, logger }),
};

const toConstructionError = (mode: EngineMode, err: unknown): DataAccessError => {
  // Unknown schemes are a programming error; retrying cannot help.
  if (err instanceof UnsupportedSchemeError || err instanceof EngineConstructionError) {
    return err;
  }
  const message = err instanceof Error ? err.message : String(err);
  return new EngineConstructionError(mode, message, err);
};

/**
 * Owns at most one engine per mode. Engines are built lazily on first use
 * and live until disposed; a failed construction leaves the mode
 * uninitialized so the next call tries again.
 */
export class EngineRegistry {
  private readonly configSource: () => Readonly<DatabaseConfig>;
  private readonly logger: Logger;
  private readonly loggerInjected: boolean;
  private readonly factories: EngineFactories;

  private syncEngine: SyncEngine | null = null;
  private asyncEngine: AsyncEngine | null = null;
  // Shared by concurrent first callers: exactly one construction runs.
  private asyncConstruction: Promise<AsyncEngine> | null = null;

  constructor(opts: EngineRegistryOptions = {}) {
    const { config } = opts;
    this.configSource =
      typeof config === 'function' ? config : config !== undefined ? () => config : () => loadDatabaseConfig();
    this.logger = opts.logger ?? createConsoleLogger({ level: 'warn' });
    this.loggerInjected = opts.logger !== undefined;
    this.factories = { ...defaultEngineFactories, ...opts.factories };
  }

  state(mode: EngineMode): EngineState {
    const engine = mode === 'sync' ? this.syncEngine : this.asyncEngine;
    return engine === null ? 'uninitialized' : 'ready';
  }

  /**
   * @throws EngineConstructionError when the engine cannot be built or reached
   * @throws UnsupportedSchemeError for an unknown URL scheme
   */
  getSyncEngine(): SyncEngine {
    if (this.syncEngine) {
      return this.syncEngine;
    }

    let engine: SyncEngine;
    try {
      const config = this.configSource();
      engine = this.factories.sync(config.url, config, this.engineLogger(config));
    } catch (err) {
      throw toConstructionError('sync', err);
    }

    try {
      engine.verify();
    } catch (err) {
      engine.dispose();
      throw toConstructionError('sync', err);
    }

    this.logger.debug(`Built sync engine (${engine.redactedUrl})`);
    this.syncEngine = engine;
    return engine;
  }

  /**
   * @throws EngineConstructionError when the engine cannot be built or reached
   * @throws UnsupportedSchemeError for an unknown URL scheme
   */
  async getAsyncEngine(): Promise<AsyncEngine> {
    if (this.asyncEngine) {
      return this.asyncEngine;
    }
    if (!this.asyncConstruction) {
      this.asyncConstruction = this.constructAsync().finally(() => {
        this.asyncConstruction = null;
      });
    }
    return this.asyncConstruction;
  }

  getEngine(mode: 'sync'): SyncEngine;
  getEngine(mode: 'async'): Promise<AsyncEngine>;
  getEngine(mode: EngineMode): SyncEngine | Promise<AsyncEngine>;
  getEngine(mode: EngineMode): SyncEngine | Promise<AsyncEngine> {
    return mode === 'sync' ? this.getSyncEngine() : this.getAsyncEngine();
  }

  /** Closes the sync pool. No-op when nothing was built. */
  disposeSync(): void {
    const engine = this.syncEngine;
    if (!engine) return;
    this.syncEngine = null;
    engine.dispose();
  }

  /** Closes the async pool, waiting for an in-flight construction first. */
  async disposeAsync(): Promise<void> {
    if (this.asyncConstruction) {
      try {
        await this.asyncConstruction;
      } catch (err) {
        // Nothing was built, so there is nothing to close.
        this.logger.debug('Async engine construction failed before disposal', err);
      }
    }
    const engine = this.asyncEngine;
    if (!engine) return;
    this.asyncEngine = null;
    await engine.dispose();
  }

  async dispose(mode: EngineMode): Promise<void> {
    if (mode === 'sync') {
      this.disposeSync();
    } else {
      await this.disposeAsync();
    }
  }

  async disposeAll(): Promise<void> {
    this.disposeSync();
    await this.disposeAsync();
  }

  // Echoed statements are logged at info, below the default console level.
  private engineLogger(config: Readonly<DatabaseConfig>): Logger {
    return config.echo && !this.loggerInjected ? createConsoleLogger({ level: 'info' }) : this.logger;
  }

  private async constructAsync(): Promise<AsyncEngine> {
    let engine: AsyncEngine;
    try {
      const config = this.configSource();
      const url = toAsyncUri(config.url);
      this.logger.debug(`Building async engine (${redactUri(url)})`);
      engine = this.factories.async(url, config, this.engineLogger(config));
    } catch (err) {
      throw toConstructionError('async', err);
    }

    try {
      await engine.verify();
    } catch (err) {
      await engine.dispose();
      throw toConstructionError('async', err);
    }

    this.asyncEngine = engine;
    return engine;
  }
}
