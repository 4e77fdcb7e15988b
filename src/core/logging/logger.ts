export type LogLevel = 'debug' | 'info' | 'warn' | 'error' | 'silent';

export interface Logger {
  debug(message: string, ...details: unknown[]): void;
  info(message: string, ...details: unknown[]): void;
  warn(message: string, ...details: unknown[]): void;
  error(message: string, ...details: unknown[]): void;
}

const LEVEL_ORDER: Record<LogLevel, number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40,
  silent: 100,
};

export interface ConsoleLoggerOptions {
  level?: LogLevel;
  /** Prepended to every message, e.g. `[dbscope]`. */
  prefix?: string;
  /** Defaults to the global console. */
  sink?: Pick<Console, 'debug' | 'info' | 'warn' | 'error'>;
}

export function createConsoleLogger(opts: ConsoleLoggerOptions = {}): Logger {
  const threshold = LEVEL_ORDER[opts.level ?? 'info'];
  const prefix = opts.prefix ?? '[dbscope]';
  const sink = opts.sink ?? console;

  const write = (level: Exclude<LogLevel, 'silent'>) =>
    (message: string, ...details: unknown[]): void => {
      if (LEVEL_ORDER[level] < threshold) return;
      sink[level](`${prefix} ${message}`, ...details);
    };

  return {
    debug: write('debug'),
    info: write('info'),
    warn: write('warn'),
    error: write('error'),
  };
}

export const silentLogger: Logger = {
  debug: () => { },
  info: () => { },
  warn: () => { },
  error: () => { },
};
