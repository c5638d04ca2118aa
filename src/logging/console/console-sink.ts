/**
 * Buffered console sink
 *
 * Entries queue up and are written on a repeating timer, or all at once on
 * flush(). Warnings and criticals go to console.warn, everything else to
 * console.log. When the queue is full new entries are dropped with a notice.
 */

import type { TimerAPI } from '$types/common';
import type { ConsoleAPI, ConsoleSink, ConsoleSinkOptions, LogEntry } from '../types';

/**
 * Create a console sink; the drain timer starts on the first write
 */
export function createConsoleSink(
  timerApi: TimerAPI,
  consoleApi: ConsoleAPI,
  options: ConsoleSinkOptions
): ConsoleSink {
  const pending: LogEntry[] = [];
  let draining = false;

  function print(entry: LogEntry): void {
    if (entry.level >= options.warnLevel) {
      consoleApi.warn(entry.line);
    } else {
      consoleApi.log(entry.line);
    }
  }

  function flush(): void {
    for (const entry of pending.splice(0)) {
      print(entry);
    }
  }

  function write(entry: LogEntry): void {
    if (!draining) {
      draining = true;
      timerApi.set(options.drainInterval, true, flush);
    }

    if (pending.length >= options.bufferSize) {
      consoleApi.warn('Console log buffer overflow, dropping message: ' + entry.line);
      return;
    }
    pending.push(entry);
  }

  return {
    write: write,
    flush: flush
  };
}
