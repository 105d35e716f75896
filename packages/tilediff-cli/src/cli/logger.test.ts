import { silentLogger } from '@tilediff/shared-logging';
import { afterEach, describe, expect, test } from 'vitest';
import { getLoggerSafe, initLogger, parseLogOptions, resetLogger } from './logger';

afterEach(() => {
  resetLogger();
});

describe('parseLogOptions', () => {
  test('reads level, format and file', () => {
    expect(
      parseLogOptions(['a.png', '--log-level', 'debug', '--log-format', 'json', '--log-file', 'x.log'])
    ).toEqual({ level: 'debug', format: 'json', file: 'x.log' });
  });

  test('ignores unknown values', () => {
    expect(parseLogOptions(['--log-level', 'loud', '--log-format', 'xml'])).toEqual({});
  });

  test('ignores a flag without a value', () => {
    expect(parseLogOptions(['--log-level'])).toEqual({});
  });
});

describe('global logger', () => {
  test('getLoggerSafe falls back to the silent logger', () => {
    expect(getLoggerSafe()).toBe(silentLogger);
  });

  test('initLogger with silent level installs the silent logger', () => {
    const logger = initLogger(['--log-level', 'silent']);
    expect(logger).toBe(silentLogger);
    expect(getLoggerSafe()).toBe(logger);
  });
});
