/**
 * Logger Tests
 */

import { Logger, LoggerFactory } from '../logging/logger';
import { MemoryTransport } from '../logging/MemoryTransport';

function flush(): Promise<void> {
  return new Promise((resolve) => setImmediate(resolve));
}

describe('Logger', () => {
  function createLogger(logLevel = 'info', maxEntries?: number) {
    const memory = new MemoryTransport({ maxEntries });
    const logger = new Logger({ component: 'test', memory, enableConsole: false, logLevel });
    return { logger, memory };
  }

  it('should capture entries with their component and tick', async () => {
    const { logger, memory } = createLogger();

    logger.info('Session started', { reason: 'login' });
    logger.logTick('info', 'Phase transition: wave_started', 7, { wave: 2 });
    await flush();

    expect(memory.getEntries()).toEqual([
      { level: 'info', message: 'Session started', component: 'test', tickIndex: undefined, metadata: { reason: 'login' } },
      { level: 'info', message: 'Phase transition: wave_started', component: 'test', tickIndex: 7, metadata: { wave: 2 } },
    ]);
  });

  it('should drop entries below the configured level', async () => {
    const { logger, memory } = createLogger('info');

    logger.debug('Ignored tick outside of a session');
    logger.logTick('debug', 'Cooldown paused', 3);
    await flush();

    expect(memory.getEntries()).toEqual([]);
  });

  it('should attach the error name and stack', async () => {
    const { logger, memory } = createLogger();

    logger.error('Replay failed', new TypeError('bad input'));
    await flush();

    const [entry] = memory.getEntries();
    expect(entry.level).toBe('error');
    expect(entry.message).toBe('Replay failed');
    expect(entry.metadata.errorCode).toBe('TypeError');
    expect(entry.metadata.stackTrace).toEqual(expect.stringContaining('TypeError: bad input'));
  });

  it('should attach non-error details as they are', async () => {
    const { logger, memory } = createLogger();

    logger.error('Replay failed', { code: 42 });
    logger.error('File not found: missing.yaml');
    await flush();

    expect(memory.getEntries().map((entry) => entry.metadata)).toEqual([{ errorDetails: { code: 42 } }, {}]);
  });

  it('should keep only the newest entries', async () => {
    const { logger, memory } = createLogger('info', 2);

    logger.info('first');
    logger.info('second');
    logger.info('third');
    await flush();

    expect(memory.getEntries().map((entry) => entry.message)).toEqual(['second', 'third']);
  });

  it('should hand out one logger per component', () => {
    expect(LoggerFactory.getLogger('SessionTracker')).toBe(LoggerFactory.getLogger('SessionTracker'));
    expect(LoggerFactory.getLogger('SessionTracker')).not.toBe(LoggerFactory.getLogger('replay-cli'));
  });
});
