/**
 * Global logger instance for CLI.
 * Initialized lazily based on CLI options and environment variables.
 */
import {
  createLogger,
  isLogFormat,
  isLogLevel,
  silentLogger,
  type CreateLoggerOptions,
  type Logger,
} from '@tilediff/shared-logging';

let globalLogger: Logger | undefined;

/**
 * Parse log-related CLI options from arguments.
 * Unknown levels and formats are ignored and fall back to the environment.
 */
export function parseLogOptions(args: string[]): CreateLoggerOptions {
  const options: CreateLoggerOptions = {};

  for (let i = 0; i < args.length; i++) {
    const arg = args[i];
    const next = args[i + 1];
    if (next === undefined) continue;
    if (arg === '--log-level') {
      if (isLogLevel(next)) options.level = next;
      i++;
    } else if (arg === '--log-format') {
      if (isLogFormat(next)) options.format = next;
      i++;
    } else if (arg === '--log-file') {
      options.file = next;
      i++;
    }
  }

  return options;
}

/**
 * Initialize the global logger with parsed options.
 */
export function initLogger(args: string[]): Logger {
  globalLogger = createLogger({ package: 'tilediff-cli' }, parseLogOptions(args));
  return globalLogger;
}

/**
 * Reset the global logger (for testing).
 */
export function resetLogger(): void {
  globalLogger = undefined;
}

/**
 * Get the global logger instance, or the silent logger outside the CLI.
 */
export function getLoggerSafe(): Logger {
  return globalLogger ?? silentLogger;
}
