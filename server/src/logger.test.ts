import { afterEach, describe, expect, it, vi } from 'vitest';
import { createLogger } from './logger';

describe('createLogger', () => {
  afterEach(() => {
    vi.restoreAllMocks();
  });

  it('prefixes level and scope', () => {
    const warn = vi.spyOn(console, 'warn').mockImplementation(() => {});
    createLogger('sync', 'debug').warn('slow response', 42);
    expect(warn).toHaveBeenCalledWith('[WARN] [sync] slow response', 42);
  });

  it('drops messages below the threshold', () => {
    const log = vi.spyOn(console, 'log').mockImplementation(() => {});
    const error = vi.spyOn(console, 'error').mockImplementation(() => {});
    const logger = createLogger('db', 'warn');

    logger.info('hidden');
    logger.debug('hidden');
    logger.error('shown');

    expect(log).not.toHaveBeenCalled();
    expect(error).toHaveBeenCalledWith('[ERROR] [db] shown');
  });
});
