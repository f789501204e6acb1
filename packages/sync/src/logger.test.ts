import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest';
import {
  createLogger,
  formatLogEntry,
  isLogLevel,
  noopLogger,
  type LogEntry,
  type Logger,
} from './logger.js';

function capture(options: Parameters<typeof createLogger>[0] = {}): { logger: Logger; entries: LogEntry[] } {
  const entries: LogEntry[] = [];
  const logger = createLogger({ enabled: true, ...options, handler: (entry) => entries.push(entry) });
  return { logger, entries };
}

describe('createLogger', () => {
  beforeEach(() => {
    vi.spyOn(console, 'debug').mockImplementation(() => {});
    vi.spyOn(console, 'info').mockImplementation(() => {});
    vi.spyOn(console, 'warn').mockImplementation(() => {});
    vi.spyOn(console, 'error').mockImplementation(() => {});
  });

  afterEach(() => {
    vi.restoreAllMocks();
  });

  describe('log levels', () => {
    it('should write to the console method matching the level', () => {
      const logger = createLogger({ level: 'debug', enabled: true });

      logger.debug('d');
      logger.info('i');
      logger.warn('w');
      logger.error('e');

      expect(console.debug).toHaveBeenCalledTimes(1);
      expect(console.info).toHaveBeenCalledTimes(1);
      expect(console.warn).toHaveBeenCalledTimes(1);
      expect(console.error).toHaveBeenCalledTimes(1);
    });

    it('should respect minimum log level', () => {
      const { logger, entries } = capture({ level: 'warn' });

      logger.debug('debug message');
      logger.info('info message');
      logger.warn('warn message');
      logger.error('error message');

      expect(entries.map((entry) => entry.level)).toEqual(['warn', 'error']);
    });

    it('should default to info', () => {
      const { logger, entries } = capture();

      logger.debug('hidden');
      logger.info('shown');

      expect(entries.map((entry) => entry.message)).toEqual(['shown']);
    });
  });

  describe('enabled flag', () => {
    it('should not log when disabled', () => {
      const entries: LogEntry[] = [];
      const logger = createLogger({ enabled: false, handler: (entry) => entries.push(entry) });

      logger.warn('test');
      logger.error('test');

      expect(entries).toHaveLength(0);
      expect(console.warn).not.toHaveBeenCalled();
    });
  });

  describe('entries', () => {
    it('should carry message, data and context', () => {
      const { logger, entries } = capture({ context: 'SyncManager' });

      logger.info('Applied sync event', { eventId: 'evt-1' });

      expect(entries).toHaveLength(1);
      expect(entries[0]).toMatchObject({
        level: 'info',
        message: 'Applied sync event',
        context: 'SyncManager',
        data: { eventId: 'evt-1' },
      });
      expect(entries[0]?.timestamp).toBeGreaterThan(0);
    });

    it('should attach the error to error entries', () => {
      const { logger, entries } = capture();
      const failure = new Error('disk full');

      logger.error('Failed to load entity version', failure, { entityId: 'task-1' });

      expect(entries[0]?.error).toBe(failure);
      expect(entries[0]?.data).toEqual({ entityId: 'task-1' });
    });
  });

  describe('child', () => {
    it('should nest the context under the parent', () => {
      const { logger, entries } = capture({ context: 'SyncServer' });

      logger.child('ConnectionManager').info('Client connected');

      expect(entries[0]?.context).toBe('SyncServer:ConnectionManager');
    });

    it('should use the child context alone when the parent has none', () => {
      const { logger, entries } = capture();

      logger.child('SyncGateway').info('hello');

      expect(entries[0]?.context).toBe('SyncGateway');
    });

    it('should keep the parent level and handler', () => {
      const { logger, entries } = capture({ level: 'error' });
      const child = logger.child('Inner');

      child.warn('dropped');
      child.error('kept');

      expect(entries.map((entry) => entry.message)).toEqual(['kept']);
    });
  });
});

describe('formatLogEntry', () => {
  it('should render timestamp, level, context, message and data on one line', () => {
    const line = formatLogEntry({
      level: 'warn',
      message: 'Offline queue over capacity',
      timestamp: Date.UTC(2024, 0, 2, 3, 4, 5),
      context: 'SyncServer:ConnectionManager',
      data: { dropped: 1 },
    });

    expect(line).toBe(
      '2024-01-02T03:04:05.000Z WARN [SyncServer:ConnectionManager] Offline queue over capacity {"dropped":1}'
    );
  });

  it('should omit missing context and data', () => {
    const line = formatLogEntry({ level: 'info', message: 'started', timestamp: 0 });

    expect(line).toBe('1970-01-01T00:00:00.000Z INFO started');
  });
});

describe('isLogLevel', () => {
  it('should accept known levels only', () => {
    expect(isLogLevel('debug')).toBe(true);
    expect(isLogLevel('error')).toBe(true);
    expect(isLogLevel('trace')).toBe(false);
  });
});

describe('noopLogger', () => {
  it('should drop everything and return itself as child', () => {
    vi.spyOn(console, 'info').mockImplementation(() => {});

    noopLogger.info('test');
    noopLogger.error('test', new Error('x'));

    expect(console.info).not.toHaveBeenCalled();
    expect(noopLogger.child('Any')).toBe(noopLogger);

    vi.restoreAllMocks();
  });
});
