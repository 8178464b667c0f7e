/**
 * Tests for logging.
 */

import { ConsoleLogger, LogLevel, NoopLogger, createLogger, createNoopLogger } from '../index';

describe('ConsoleLogger', () => {
  afterEach(() => {
    vi.restoreAllMocks();
  });

  it('should format an entry on one line', () => {
    const line = ConsoleLogger.format({
      level: LogLevel.Debug,
      message: 'Dispatching to registered parser',
      timestamp: new Date('2026-01-02T03:04:05.000Z'),
      scope: 'uri-registry',
      fields: { prefix: 'smtp' },
    });

    expect(line).toBe(
      '2026-01-02T03:04:05.000Z [DEBUG] [uri-registry] Dispatching to registered parser {"prefix":"smtp"}'
    );
  });

  it('should omit empty scope and fields', () => {
    const line = ConsoleLogger.format({
      level: LogLevel.Warn,
      message: 'hello',
      timestamp: new Date('2026-01-02T03:04:05.000Z'),
      fields: {},
    });

    expect(line).toBe('2026-01-02T03:04:05.000Z [WARN] hello');
  });

  it('should skip entries below the minimum level', () => {
    const debug = vi.spyOn(console, 'debug').mockImplementation(() => undefined);
    const warn = vi.spyOn(console, 'warn').mockImplementation(() => undefined);

    const logger = createLogger();
    logger.debug('hidden');
    logger.warn('shown');

    expect(debug).not.toHaveBeenCalled();
    expect(warn).toHaveBeenCalledTimes(1);
  });

  it('should write debug entries at debug level', () => {
    const debug = vi.spyOn(console, 'debug').mockImplementation(() => undefined);

    createLogger(LogLevel.Debug).debug('shown', { prefix: 'smtp' });

    expect(debug).toHaveBeenCalledWith(expect.stringContaining('[DEBUG] shown {"prefix":"smtp"}'));
  });

  it('should carry the scope into output', () => {
    const warn = vi.spyOn(console, 'warn').mockImplementation(() => undefined);

    new ConsoleLogger(LogLevel.Debug).withScope('uri-registry').warn('careful');

    expect(warn).toHaveBeenCalledWith(expect.stringContaining('[WARN] [uri-registry] careful'));
  });
});

describe('NoopLogger', () => {
  it('should return itself for a scope', () => {
    const logger = createNoopLogger();

    expect(logger).toBeInstanceOf(NoopLogger);
    expect(logger.withScope('x')).toBe(logger);
  });
});
