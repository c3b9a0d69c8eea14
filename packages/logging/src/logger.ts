/**
 * Scoped stderr logger.
 *
 * Every line is written as `[scope] message`, the same shape the rest of the
 * codebase has always used for process diagnostics. Warnings and errors carry a
 * `warn:` / `error:` prefix after the scope so they stay greppable.
 */

export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

const LEVEL_ORDER: Record<LogLevel, number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40,
};

export interface Logger {
  readonly scope: string;
  debug(message: string): void;
  info(message: string): void;
  warn(message: string): void;
  error(message: string): void;
  /** Derive a logger whose scope is `parent:sub`, sharing level and writer. */
  child(sub: string): Logger;
}

export interface LoggerOptions {
  /** Minimum level that is written. Defaults to 'info'. */
  level?: LogLevel;
  /** Line writer. Defaults to process.stderr. */
  write?: (line: string) => void;
}

export function isLogLevel(value: string): value is LogLevel {
  return value in LEVEL_ORDER;
}

export function createLogger(scope: string, options: LoggerOptions = {}): Logger {
  const level = options.level ?? 'info';
  const write = options.write ?? ((line: string) => void process.stderr.write(line));
  const threshold = LEVEL_ORDER[level];

  const emit = (lvl: LogLevel, message: string): void => {
    if (LEVEL_ORDER[lvl] < threshold) return;
    const prefix = lvl === 'warn' || lvl === 'error' ? `${lvl}: ` : '';
    write(`[${scope}] ${prefix}${message}\n`);
  };

  return {
    scope,
    debug: (message) => emit('debug', message),
    info: (message) => emit('info', message),
    warn: (message) => emit('warn', message),
    error: (message) => emit('error', message),
    child: (sub) => createLogger(`${scope}:${sub}`, { level, write }),
  };
}

/** Logger that drops everything. Handy as a default in library code and tests. */
export const silentLogger: Logger = {
  scope: 'silent',
  debug: () => undefined,
  info: () => undefined,
  warn: () => undefined,
  error: () => undefined,
  child: () => silentLogger,
};

/** Normalize an unknown thrown value into a message string. */
export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
