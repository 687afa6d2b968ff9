/**
 * Unit tests for ConsoleLogger
 */

import { describe, it, expect, vi, afterEach } from 'vitest';
import { ConsoleLogger } from './ConsoleLogger';

describe('ConsoleLogger', () => {
  afterEach(() => {
    vi.restoreAllMocks();
  });

  it('should write every level by default', () => {
    const errorSpy = vi.spyOn(console, 'error').mockImplementation(() => {});
    const warnSpy = vi.spyOn(console, 'warn').mockImplementation(() => {});
    const infoSpy = vi.spyOn(console, 'info').mockImplementation(() => {});
    const debugSpy = vi.spyOn(console, 'debug').mockImplementation(() => {});
    const logger = new ConsoleLogger();

    logger.error('error message');
    logger.warn('warning message');
    logger.info('info message');
    logger.debug('debug message');

    expect(errorSpy).toHaveBeenCalledWith('error message');
    expect(warnSpy).toHaveBeenCalledWith('warning message');
    expect(infoSpy).toHaveBeenCalledWith('info message');
    expect(debugSpy).toHaveBeenCalledWith('debug message');
  });

  it('should drop messages below the minimum level', () => {
    const warnSpy = vi.spyOn(console, 'warn').mockImplementation(() => {});
    const infoSpy = vi.spyOn(console, 'info').mockImplementation(() => {});
    const debugSpy = vi.spyOn(console, 'debug').mockImplementation(() => {});
    const logger = new ConsoleLogger('warn');

    logger.debug('debug message');
    logger.info('info message');
    logger.warn('warning message');

    expect(debugSpy).not.toHaveBeenCalled();
    expect(infoSpy).not.toHaveBeenCalled();
    expect(warnSpy).toHaveBeenCalledWith('warning message');
  });

  it('should always write log() output', () => {
    const logSpy = vi.spyOn(console, 'log').mockImplementation(() => {});
    const logger = new ConsoleLogger('error');

    logger.log('plain message');

    expect(logSpy).toHaveBeenCalledWith('plain message');
  });

  it('should handle multiple arguments', () => {
    const infoSpy = vi.spyOn(console, 'info').mockImplementation(() => {});
    const logger = new ConsoleLogger();

    logger.info('message', { key: 'value' }, 123);

    expect(infoSpy).toHaveBeenCalledWith('message', { key: 'value' }, 123);
  });
});
