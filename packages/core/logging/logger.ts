/**
 * LOGGER
 *
 * Structured logger handed to every component at construction.
 * Messages carry an optional data bag instead of string-formatted values.
 */

export type LogData = Record<string, unknown>;

export interface Logger {
  info: (message: string, data?: LogData) => void;
  warn: (message: string, data?: LogData) => void;
  error: (message: string, data?: LogData) => void;
  debug: (message: string, data?: LogData) => void;
}

export interface ConsoleLoggerOptions {
  /** Emit info/debug lines (warn/error are always emitted) */
  debug?: boolean;
  scope?: string;
}

/**
 * Console-backed logger. info/debug are silent unless debug is on.
 */
export function createConsoleLogger(options: ConsoleLoggerOptions = {}): Logger {
  const prefix = options.scope ? ` [${options.scope}]` : "";
  const verbose = options.debug ?? false;

  return {
    info: (msg, data) => {
      if (verbose) console.log(`[INFO]${prefix} ${msg}`, data ?? "");
    },
    warn: (msg, data) => console.warn(`[WARN]${prefix} ${msg}`, data ?? ""),
    error: (msg, data) => console.error(`[ERROR]${prefix} ${msg}`, data ?? ""),
    debug: (msg, data) => {
      if (verbose) console.log(`[DEBUG]${prefix} ${msg}`, data ?? "");
    },
  };
}

/**
 * Wrap a logger so every message is prefixed with `[scope]`.
 */
export function scopedLogger(logger: Logger, scope: string): Logger {
  const tag = `[${scope}]`;
  return {
    info: (msg, data) => logger.info(`${tag} ${msg}`, data),
    warn: (msg, data) => logger.warn(`${tag} ${msg}`, data),
    error: (msg, data) => logger.error(`${tag} ${msg}`, data),
    debug: (msg, data) => logger.debug(`${tag} ${msg}`, data),
  };
}

export function createSilentLogger(): Logger {
  const noop = () => {};
  return { info: noop, warn: noop, error: noop, debug: noop };
}

export function describeError(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
