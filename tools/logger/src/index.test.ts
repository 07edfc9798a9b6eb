import { afterEach, describe, expect, test, vi } from 'vitest';

import { Logger, parseLogLevel } from './index';

function createMethods() {
  return {
    debug: vi.fn(),
    info: vi.fn(),
    warn: vi.fn(),
    error: vi.fn(),
  };
}

describe('Logger', () => {
  afterEach(() => {
    vi.restoreAllMocks();
    vi.unstubAllEnvs();
  });

  test('forwards every level by default', () => {
    const methods = createMethods();
    const logger = new Logger(methods);

    logger.debug('d', 1);
    logger.info('i');
    logger.warn('w');
    logger.error('e');

    expect(methods.debug).toHaveBeenCalledWith('d', 1);
    expect(methods.info).toHaveBeenCalledWith('i');
    expect(methods.warn).toHaveBeenCalledWith('w');
    expect(methods.error).toHaveBeenCalledWith('e');
  });

  test('drops messages below the configured level', () => {
    const methods = createMethods();
    const logger = new Logger(methods, 'warn');

    logger.debug('d');
    logger.info('i');
    logger.warn('w');
    logger.error('e');

    expect(methods.debug).not.toHaveBeenCalled();
    expect(methods.info).not.toHaveBeenCalled();
    expect(methods.warn).toHaveBeenCalledWith('w');
    expect(methods.error).toHaveBeenCalledWith('e');
  });

  test('silent level drops everything', () => {
    const methods = createMethods();
    const logger = new Logger(methods, 'silent');

    logger.error('e');

    expect(methods.error).not.toHaveBeenCalled();
  });

  test('console() writes through console with the given level', () => {
    const info = vi.spyOn(console, 'info').mockImplementation(() => {});
    const debug = vi.spyOn(console, 'debug').mockImplementation(() => {});

    const logger = Logger.console('info');
    logger.info('[Test] hello');
    logger.debug('[Test] hidden');

    expect(info).toHaveBeenCalledWith('[Test] hello');
    expect(debug).not.toHaveBeenCalled();
  });

  test('console() reads the level from the environment', () => {
    vi.stubEnv('STORYCAST_LOG_LEVEL', 'error');
    const warn = vi.spyOn(console, 'warn').mockImplementation(() => {});

    Logger.console().warn('ignored');

    expect(warn).not.toHaveBeenCalled();
  });

  test('silent() produces a logger that never writes', () => {
    const error = vi.spyOn(console, 'error').mockImplementation(() => {});

    Logger.silent().error('nothing');

    expect(error).not.toHaveBeenCalled();
  });
});

describe('parseLogLevel', () => {
  test('accepts known levels case-insensitively', () => {
    expect(parseLogLevel('DEBUG')).toBe('debug');
    expect(parseLogLevel(' warn ')).toBe('warn');
  });

  test('falls back for missing or unknown values', () => {
    expect(parseLogLevel(undefined)).toBe('info');
    expect(parseLogLevel('')).toBe('info');
    expect(parseLogLevel('verbose', 'error')).toBe('error');
  });
});
