import { afterEach, describe, expect, it, vi } from 'vitest';
import { createLogger, logger, LogLevel, resolveLogLevel } from './logger';

describe('resolveLogLevel', () => {
  it('honours LOG_LEVEL', () => {
    expect(resolveLogLevel({ LOG_LEVEL: 'error' })).toBe(LogLevel.ERROR);
    expect(resolveLogLevel({ LOG_LEVEL: 'INFO', NODE_ENV: 'production' })).toBe(LogLevel.INFO);
  });

  it('falls back to the environment', () => {
    expect(resolveLogLevel({ NODE_ENV: 'production' })).toBe(LogLevel.WARN);
    expect(resolveLogLevel({ LOG_LEVEL: 'verbose' })).toBe(LogLevel.DEBUG);
  });
});

describe('createLogger', () => {
  afterEach(() => {
    logger.setLevel(LogLevel.SILENT);
  });

  it('prefixes messages with the module name', () => {
    const info = vi.spyOn(console, 'info').mockImplementation(() => undefined);
    logger.setLevel(LogLevel.DEBUG);

    createLogger('MaskStore').info('wrote masks', 3);
    expect(info).toHaveBeenCalledWith('[MaskStore] wrote masks', 3);
  });

  it('drops messages below the shared level', () => {
    const debug = vi.spyOn(console, 'log').mockImplementation(() => undefined);
    const warn = vi.spyOn(console, 'warn').mockImplementation(() => undefined);
    const log = createLogger('Encoder');
    logger.setLevel(LogLevel.WARN);

    log.debug('hidden');
    log.warn('shown');
    expect(debug).not.toHaveBeenCalled();
    expect(warn).toHaveBeenCalledWith('[Encoder] shown');
  });

  it('nests child prefixes', () => {
    const error = vi.spyOn(console, 'error').mockImplementation(() => undefined);
    logger.setLevel(LogLevel.ERROR);

    createLogger('API').child('exports').error('failed');
    expect(error).toHaveBeenCalledWith('[API:exports] failed');
  });
});
