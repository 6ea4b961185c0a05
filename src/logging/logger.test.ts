import { afterEach, describe, expect, it, vi } from 'vitest';
import { createLogger, isLogLevel } from './logger.js';

describe('createLogger', () => {
  afterEach(() => {
    vi.restoreAllMocks();
  });

  it('drops messages below the threshold', () => {
    const log = vi.spyOn(console, 'log').mockImplementation(() => undefined);
    const warn = vi.spyOn(console, 'warn').mockImplementation(() => undefined);

    const logger = createLogger('warn');
    logger.info('hidden');
    logger.warn('shown');

    expect(log).not.toHaveBeenCalled();
    expect(warn).toHaveBeenCalledWith('shown');
  });

  it('is silent at level silent', () => {
    const error = vi.spyOn(console, 'error').mockImplementation(() => undefined);
    createLogger('silent').error('boom', new Error('x'));
    expect(error).not.toHaveBeenCalled();
  });

  it('prints the message of an attached error', () => {
    const error = vi.spyOn(console, 'error').mockImplementation(() => undefined);
    createLogger().error('Save failed:', new Error('disk full'));
    expect(error).toHaveBeenCalledWith('Save failed:', 'disk full');
  });

  it('validates level names', () => {
    expect(isLogLevel('debug')).toBe(true);
    expect(isLogLevel('verbose')).toBe(false);
    expect(isLogLevel(3)).toBe(false);
  });
});
