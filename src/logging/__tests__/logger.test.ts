/**
 * Logger Tests
 */

import { describe, it, expect, vi } from 'vitest';
import { createConsoleLogger, isLogLevel, silentLogger, type LogSink } from '../logger';

function spySink(): LogSink {
  return { debug: vi.fn(), info: vi.fn(), warn: vi.fn(), error: vi.fn() };
}

describe('createConsoleLogger', () => {
  it('drops messages below the level', () => {
    const sink = spySink();
    const logger = createConsoleLogger('warn', sink);

    logger.debug('hidden');
    logger.info('hidden');
    logger.warn('shown');
    logger.error('shown too');

    expect(sink.debug).not.toHaveBeenCalled();
    expect(sink.info).not.toHaveBeenCalled();
    expect(sink.warn).toHaveBeenCalledWith('[resilience] shown');
    expect(sink.error).toHaveBeenCalledWith('[resilience] shown too');
  });

  it('passes fields when present', () => {
    const sink = spySink();
    const logger = createConsoleLogger('debug', sink, '[test]');

    logger.debug('retrying', { attempt: 2 });
    logger.info('empty', {});

    expect(sink.debug).toHaveBeenCalledWith('[test] retrying', { attempt: 2 });
    expect(sink.info).toHaveBeenCalledWith('[test] empty');
  });

  it('silent logs nothing', () => {
    const sink = spySink();
    const logger = createConsoleLogger('silent', sink);
    logger.error('nope');
    expect(sink.error).not.toHaveBeenCalled();
    expect(() => silentLogger.error('nope')).not.toThrow();
  });
});

describe('isLogLevel', () => {
  it('accepts known levels only', () => {
    expect(isLogLevel('info')).toBe(true);
    expect(isLogLevel('verbose')).toBe(false);
    expect(isLogLevel('toString')).toBe(false);
    expect(isLogLevel(3)).toBe(false);
  });
});
