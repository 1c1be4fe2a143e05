import { describe, test, expect, vi, afterEach } from 'vitest';
import { Logger } from '@lib/logger.js';

describe('Logger', () => {
  afterEach(() => {
    vi.restoreAllMocks();
  });

  test('should suppress debug output until enabled', () => {
    const debug = vi.spyOn(console, 'debug').mockImplementation(() => {});
    const logger = new Logger(false);

    logger.debug('hidden');
    expect(debug).not.toHaveBeenCalled();

    logger.setDebug(true);
    logger.debug('Schema cache hit', { key: 'users:default' });

    expect(logger.isDebugEnabled()).toBe(true);
    expect(debug).toHaveBeenCalledWith('DEBUG Schema cache hit {"key":"users:default"}');
  });

  test('should always emit warnings with the level prefix', () => {
    const warn = vi.spyOn(console, 'warn').mockImplementation(() => {});

    new Logger(false).warn('Schema cache backend write failed');

    expect(warn).toHaveBeenCalledWith('WARN Schema cache backend write failed');
  });
});
