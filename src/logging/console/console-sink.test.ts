/**
 * Unit tests for the buffered console sink
 */

import { createConsoleSink } from './console-sink';
import { createLogger } from '../logger';
import type { ConsoleSinkOptions, LogLevels } from '../types';

const LOG_LEVELS: LogLevels = {
  DEBUG: 0,
  INFO: 1,
  WARNING: 2,
  CRITICAL: 3
};

describe('createConsoleSink', () => {
  let timerCallback: (() => void) | null;
  let mockTimer: { set: ReturnType<typeof vi.fn> };
  let mockConsole: { log: ReturnType<typeof vi.fn>; warn: ReturnType<typeof vi.fn> };
  const options: ConsoleSinkOptions = { bufferSize: 10, drainInterval: 100, warnLevel: LOG_LEVELS.WARNING };

  beforeEach(() => {
    timerCallback = null;
    mockTimer = { set: vi.fn() };
    mockTimer.set.mockImplementation((_interval: number, _repeat: boolean, callback: () => void) => {
      timerCallback = callback;
    });
    mockConsole = {
      log: vi.fn(),
      warn: vi.fn()
    };
  });

  describe('write', () => {
    test('should hold entries until drained', () => {
      const sink = createConsoleSink(mockTimer, mockConsole, options);

      sink.write({ level: 1, line: 'message 1' });
      sink.write({ level: 2, line: 'message 2' });

      expect(mockConsole.log).not.toHaveBeenCalled();
      expect(mockConsole.warn).not.toHaveBeenCalled();
    });

    test('should start the drain timer once', () => {
      const sink = createConsoleSink(mockTimer, mockConsole, options);

      sink.write({ level: 1, line: 'a' });
      sink.write({ level: 1, line: 'b' });

      expect(mockTimer.set).toHaveBeenCalledTimes(1);
      expect(mockTimer.set).toHaveBeenCalledWith(100, true, expect.any(Function));
    });

    test('should drop entries when the buffer is full', () => {
      const sink = createConsoleSink(mockTimer, mockConsole, { ...options, bufferSize: 2 });

      sink.write({ level: 1, line: 'message 1' });
      sink.write({ level: 1, line: 'message 2' });
      sink.write({ level: 1, line: 'message 3' });
      sink.flush();

      expect(mockConsole.warn).toHaveBeenCalledWith('Console log buffer overflow, dropping message: message 3');
      expect(mockConsole.log.mock.calls).toEqual([['message 1'], ['message 2']]);
    });
  });

  describe('drain', () => {
    test('should write entries in order when the timer fires', () => {
      const sink = createConsoleSink(mockTimer, mockConsole, options);
      sink.write({ level: 0, line: 'first' });
      sink.write({ level: 1, line: 'second' });

      timerCallback?.();
      timerCallback?.();

      expect(mockConsole.log.mock.calls).toEqual([['first'], ['second']]);
    });

    test('should route warnings and criticals to warn', () => {
      const sink = createConsoleSink(mockTimer, mockConsole, options);
      sink.write({ level: 1, line: 'info' });
      sink.write({ level: 2, line: 'warning' });
      sink.write({ level: 3, line: 'critical' });

      sink.flush();

      expect(mockConsole.log.mock.calls).toEqual([['info']]);
      expect(mockConsole.warn.mock.calls).toEqual([['warning'], ['critical']]);
    });

    test('should honour a custom warn level', () => {
      const sink = createConsoleSink(mockTimer, mockConsole, { ...options, warnLevel: LOG_LEVELS.CRITICAL });
      sink.write({ level: 2, line: 'warning' });
      sink.write({ level: 3, line: 'critical' });

      sink.flush();

      expect(mockConsole.log.mock.calls).toEqual([['warning']]);
      expect(mockConsole.warn.mock.calls).toEqual([['critical']]);
    });

    test('should do nothing on flush when empty', () => {
      const sink = createConsoleSink(mockTimer, mockConsole, options);
      sink.flush();
      expect(mockConsole.log).not.toHaveBeenCalled();
      expect(mockConsole.warn).not.toHaveBeenCalled();
    });
  });

  describe('behind a logger', () => {
    test('should send logger warnings and criticals to warn', () => {
      const sink = createConsoleSink(mockTimer, mockConsole, options);
      const logger = createLogger({ level: LOG_LEVELS.DEBUG, levels: LOG_LEVELS, sinks: [sink] });

      logger.info('i');
      logger.warning('w');
      logger.critical('c');
      logger.flush();

      expect(mockConsole.log.mock.calls).toEqual([['ℹ️ [INFO]     i']]);
      expect(mockConsole.warn.mock.calls).toEqual([['⚠️ [WARNING]  w'], ['🚨 [CRITICAL] c']]);
    });
  });
});
