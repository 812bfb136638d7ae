import { describe, it, expect, vi, afterEach } from 'vitest';
import { consoleLogger, silentLogger } from '../logger.js';

describe('consoleLogger', () => {
  afterEach(() => {
    vi.restoreAllMocks();
    delete process.env['RAGCHAT_DEBUG'];
  });

  it('routes levels to the matching console methods', () => {
    const log = vi.spyOn(console, 'log').mockImplementation(() => {});
    const warn = vi.spyOn(console, 'warn').mockImplementation(() => {});
    const error = vi.spyOn(console, 'error').mockImplementation(() => {});

    consoleLogger.info('started');
    consoleLogger.warn('slow search');
    consoleLogger.error('failed');

    expect(log).toHaveBeenCalledWith('started');
    expect(warn).toHaveBeenCalledWith('slow search');
    expect(error).toHaveBeenCalledWith('failed');
  });

  it('writes debug output only when RAGCHAT_DEBUG is set', () => {
    const log = vi.spyOn(console, 'log').mockImplementation(() => {});

    consoleLogger.debug?.('hidden');
    expect(log).not.toHaveBeenCalled();

    process.env['RAGCHAT_DEBUG'] = '1';
    consoleLogger.debug?.('shown');
    expect(log).toHaveBeenCalledWith('[debug] shown');
  });
});

describe('silentLogger', () => {
  it('writes nothing', () => {
    const log = vi.spyOn(console, 'log').mockImplementation(() => {});

    silentLogger.info('x');
    silentLogger.debug?.('y');

    expect(log).not.toHaveBeenCalled();
    vi.restoreAllMocks();
  });
});
