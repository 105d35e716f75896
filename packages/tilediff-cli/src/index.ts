export { buildCompareConfig, formatSummary, parseArgs, runCompare, UsageError } from './cli/compare';
export type { CompareConfig, ParsedArgs } from './cli/compare';
export { getLoggerSafe, initLogger, parseLogOptions, resetLogger } from './cli/logger';
