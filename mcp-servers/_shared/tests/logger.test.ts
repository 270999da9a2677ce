import { describe, it, expect, vi, afterEach } from 'vitest';
import { createLogger, getLogLevel, setLogLevel } from '../ts/logger';

describe('createLogger', () => {
  afterEach(() => {
    setLogLevel('info');
  });

  it('writes tagged lines to stderr', () => {
    const error = vi.spyOn(console, 'error').mockImplementation(() => undefined);
    createLogger('clipboard').info('ready', 3);
    expect(error).toHaveBeenCalledWith('[clipboard]', 'INFO', 'ready', 3);
  });

  it('drops messages below the global level', () => {
    const error = vi.spyOn(console, 'error').mockImplementation(() => undefined);
    const warn = vi.spyOn(console, 'warn').mockImplementation(() => undefined);
    setLogLevel('warn');
    expect(getLogLevel()).toBe('warn');

    const log = createLogger('t');
    log.debug('hidden');
    log.info('hidden');
    log.warn('shown');

    expect(error).not.toHaveBeenCalled();
    expect(warn).toHaveBeenCalledWith('[t]', 'WARN', 'shown');
  });

  it('emits debug output once the level allows it', () => {
    const error = vi.spyOn(console, 'error').mockImplementation(() => undefined);
    setLogLevel('debug');
    createLogger('t').debug('details');
    expect(error).toHaveBeenCalledWith('[t]', 'DEBUG', 'details');
  });
});
