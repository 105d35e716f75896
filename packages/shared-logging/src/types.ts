/**
 * Log level enumeration.
 */
export type LogLevel = 'silent' | 'debug' | 'info' | 'warn' | 'error';

/**
 * Output format for log records.
 */
export type LogFormat = 'json' | 'pretty' | 'silent';

const LOG_LEVELS: readonly LogLevel[] = ['silent', 'debug', 'info', 'warn', 'error'];
const LOG_FORMATS: readonly LogFormat[] = ['json', 'pretty', 'silent'];

/**
 * Narrow an arbitrary string (env var, CLI flag) to a log level.
 */
export function isLogLevel(value: string | undefined): value is LogLevel {
  return LOG_LEVELS.some((level) => level === value);
}

export function isLogFormat(value: string | undefined): value is LogFormat {
  return LOG_FORMATS.some((format) => format === value);
}

/**
 * Structured logger interface supporting both simple messages and context objects.
 *
 * @example
 * ```ts
 * logger.info('Simple message');
 * logger.debug({ tiles: 16, concurrency: 4 }, 'dispatching tiles');
 * ```
 */
export interface Logger {
  debug: (contextOrMessage: Record<string, unknown> | string, message?: string) => void;
  info: (contextOrMessage: Record<string, unknown> | string, message?: string) => void;
  warn: (contextOrMessage: Record<string, unknown> | string, message?: string) => void;
  error: (contextOrMessage: Record<string, unknown> | string, message?: string) => void;
}

/**
 * No-op logger implementation (silent).
 */
export const silentLogger: Logger = {
  debug() {},
  info() {},
  warn() {},
  error() {},
};
