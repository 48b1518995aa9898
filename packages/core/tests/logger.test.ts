import { describe, it, expect, vi, afterEach } from 'vitest';
import { createLogger, setLogLevel } from '../src/logger.js';

describe('createLogger', () => {
  afterEach(() => {
    setLogLevel('warn');
    vi.restoreAllMocks();
  });

  it('prefixes lines with the upper-cased scope', () => {
    const warn = vi.spyOn(console, 'warn').mockImplementation(() => {});
    createLogger('store').warn('disk is full', 3);
    expect(warn).toHaveBeenCalledWith('[STORE]:', 'disk is full', 3);
  });

  it('drops messages below the current level', () => {
    const error = vi.spyOn(console, 'error').mockImplementation(() => {});
    const log = createLogger('store');
    log.info('hidden');
    log.debug('hidden');
    log.error('shown');
    expect(error).toHaveBeenCalledTimes(1);
    expect(error).toHaveBeenCalledWith('[STORE]:', 'shown');
  });

  it('is quiet when silent', () => {
    setLogLevel('silent');
    const error = vi.spyOn(console, 'error').mockImplementation(() => {});
    createLogger('x').error('nope');
    expect(error).not.toHaveBeenCalled();
  });

  it('shows debug output at debug level', () => {
    setLogLevel('debug');
    const error = vi.spyOn(console, 'error').mockImplementation(() => {});
    createLogger('backup').debug('copied');
    expect(error).toHaveBeenCalledWith('[BACKUP]:', 'copied');
  });
});
