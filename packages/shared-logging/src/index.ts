export { createLogger, resolveLogLevel } from './logger';
export type { CreateLoggerOptions } from './logger';
export { isLogFormat, isLogLevel, silentLogger } from './types';
export type { LogFormat, Logger, LogLevel } from './types';
