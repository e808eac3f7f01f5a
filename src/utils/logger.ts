/**
 * Leveled logger writing structured lines to stderr.
 *
 * stdout is reserved for command output, so every level goes to stderr.
 *
 * @module utils/logger
 */

export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

export type LogThreshold = LogLevel | 'silent';

export const LOG_THRESHOLDS: readonly LogThreshold[] = ['debug', 'info', 'warn', 'error', 'silent'];

const LEVEL_ORDER: Record<LogThreshold, number> = {
  debug: 0,
  error: 3,
  info: 1,
  silent: 4,
  warn: 2,
};

export interface Logger {
  debug(message: string, metadata?: Record<string, unknown>): void;
  info(message: string, metadata?: Record<string, unknown>): void;
  warn(message: string, metadata?: Record<string, unknown>): void;
  error(message: string, metadata?: Record<string, unknown>): void;
  child(context: Record<string, unknown>): Logger;
}

export interface LoggerOptions {
  /** Minimum level to output. Default: "warn" */
  level?: LogThreshold;
  /** Context included in every line */
  context?: Record<string, unknown>;
  /** Line sink. Default: console.error */
  write?: (line: string) => void;
}

/**
 * Formats a log line: `[level] message {json}`.
 *
 * @example
 * formatLine('warn', 'stack truncated', { branch: 'feat' }, {});
 * // '[warn] stack truncated {"branch":"feat"}'
 */
export function formatLine(
  level: LogLevel,
  message: string,
  metadata: Record<string, unknown> | undefined,
  context: Record<string, unknown>
): string {
  const merged = metadata ? { ...context, ...metadata } : context;
  if (Object.keys(merged).length > 0) {
    return `[${level}] ${message} ${JSON.stringify(merged)}`;
  }
  return `[${level}] ${message}`;
}

export function createLogger(options: LoggerOptions = {}): Logger {
  const minLevel = options.level ?? 'warn';
  const context = options.context ?? {};
  // biome-ignore lint/suspicious/noConsole: logger sink
  const write = options.write ?? ((line: string) => console.error(line));

  function log(level: LogLevel, message: string, metadata?: Record<string, unknown>): void {
    if (LEVEL_ORDER[level] < LEVEL_ORDER[minLevel]) return;
    write(formatLine(level, message, metadata, context));
  }

  return {
    child(childContext) {
      return createLogger({ context: { ...context, ...childContext }, level: minLevel, write });
    },
    debug: (message, metadata) => log('debug', message, metadata),
    error: (message, metadata) => log('error', message, metadata),
    info: (message, metadata) => log('info', message, metadata),
    warn: (message, metadata) => log('warn', message, metadata),
  };
}

/** Logger that discards everything. */
export const silentLogger: Logger = createLogger({ level: 'silent' });
