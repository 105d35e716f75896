import pino from 'pino';
import { isLogFormat, isLogLevel, silentLogger } from './types';
import type { LogFormat, Logger, LogLevel } from './types';

export interface CreateLoggerOptions {
  level?: LogLevel;
  format?: LogFormat;
  /** Write JSON records to this file instead of stdout */
  file?: string;
}

/**
 * Resolve the effective level: explicit option, then TILEDIFF_LOG_LEVEL, then `info`.
 */
export function resolveLogLevel(
  level: LogLevel | undefined,
  env: Record<string, string | undefined> = process.env
): LogLevel {
  if (level) return level;
  const fromEnv = env.TILEDIFF_LOG_LEVEL;
  return isLogLevel(fromEnv) ? fromEnv : 'info';
}

function resolveLogFormat(
  format: LogFormat | undefined,
  env: Record<string, string | undefined> = process.env
): LogFormat {
  if (format) return format;
  const fromEnv = env.TILEDIFF_LOG_FORMAT;
  if (isLogFormat(fromEnv)) return fromEnv;
  return env.NODE_ENV === 'production' ? 'json' : 'pretty';
}

/**
 * Creates a structured logger with context support.
 *
 * @example
 * ```ts
 * const logger = createLogger({ package: 'tilediff-cli', module: 'compare' });
 * logger.info({ diffCount: 12 }, 'comparison finished');
 * logger.warn({ error: err.message }, 'Failed to decode image');
 * ```
 */
export function createLogger(
  context: Record<string, unknown> = {},
  options: CreateLoggerOptions = {}
): Logger {
  const level = resolveLogLevel(options.level);
  const format = resolveLogFormat(options.format);

  // Silent mode: return no-op logger
  if (level === 'silent' || format === 'silent') {
    return silentLogger;
  }

  const baseOptions: pino.LoggerOptions = {
    level,
    base: context, // Attach context fields to all logs
  };

  let baseLogger: pino.Logger;
  if (options.file) {
    baseLogger = pino(baseOptions, pino.destination({ dest: options.file, sync: false }));
  } else if (format === 'json') {
    baseLogger = pino(baseOptions);
  } else {
    baseLogger = pino({
      ...baseOptions,
      transport: {
        target: 'pino-pretty',
        options: {
          colorize: true,
          translateTime: 'HH:MM:ss',
          ignore: 'pid,hostname',
        },
      },
    });
  }

  return {
    debug: (contextOrMessage: Record<string, unknown> | string, message?: string) => {
      if (typeof contextOrMessage === 'string') {
        baseLogger.debug(contextOrMessage);
      } else {
        baseLogger.debug(contextOrMessage, message ?? '');
      }
    },
    info: (contextOrMessage: Record<string, unknown> | string, message?: string) => {
      if (typeof contextOrMessage === 'string') {
        baseLogger.info(contextOrMessage);
      } else {
        baseLogger.info(contextOrMessage, message ?? '');
      }
    },
    warn: (contextOrMessage: Record<string, unknown> | string, message?: string) => {
      if (typeof contextOrMessage === 'string') {
        baseLogger.warn(contextOrMessage);
      } else {
        baseLogger.warn(contextOrMessage, message ?? '');
      }
    },
    error: (contextOrMessage: Record<string, unknown> | string, message?: string) => {
      if (typeof contextOrMessage === 'string') {
        baseLogger.error(contextOrMessage);
      } else {
        baseLogger.error(contextOrMessage, message ?? '');
      }
    },
  };
}
