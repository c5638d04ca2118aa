/**
 * Leveled logger
 *
 * Drops entries below the configured level, tags the rest and hands them
 * to every sink. A sink that throws is reported and skipped so the other
 * sinks still receive the entry.
 */

import type { LogEntry, LogLevel, Logger, LoggerOptions } from './types';
import { formatLogMessage } from './helpers';

/**
 * Create a logger
 *
 * @example
 * ```typescript
 * const logger = createLogger({
 *   level: APP_CONSTANTS.LOG_LEVELS.WARNING,
 *   levels: APP_CONSTANTS.LOG_LEVELS,
 *   sinks: [consoleSink]
 * });
 * logger.warning('thresholds.cloudy (-10) should be below thresholds.very_cloudy (-12)');
 * logger.flush();
 * ```
 */
export function createLogger(options: LoggerOptions): Logger {
  const levels = options.levels;

  function emit(level: LogLevel, msg: string): void {
    if (level < options.level) {
      return;
    }

    const entry: LogEntry = { level: level, line: formatLogMessage(level, msg) };
    for (const sink of options.sinks) {
      try {
        sink.write(entry);
      } catch (err) {
        console.warn('Logger sink error: ' + String(err));
      }
    }
  }

  return {
    debug: function (msg: string) { emit(levels.DEBUG, msg); },
    info: function (msg: string) { emit(levels.INFO, msg); },
    warning: function (msg: string) { emit(levels.WARNING, msg); },
    critical: function (msg: string) { emit(levels.CRITICAL, msg); },
    flush: function () {
      for (const sink of options.sinks) {
        if (sink.flush) {
          sink.flush();
        }
      }
    }
  };
}
