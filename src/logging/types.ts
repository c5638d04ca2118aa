/**
 * Logging types
 */

/**
 * Severity, higher is more severe (see APP_CONSTANTS.LOG_LEVELS)
 */
export type LogLevel = 0 | 1 | 2 | 3;

export interface LogLevels {
  DEBUG: 0;
  INFO: 1;
  WARNING: 2;
  CRITICAL: 3;
}

/**
 * A formatted line and the level it was logged at
 * Sinks route on the level, so it travels with the text
 */
export interface LogEntry {
  level: LogLevel;
  line: string;
}

export interface LogSink {
  write(entry: LogEntry): void;
  /** Synchronously write out anything still held */
  flush?(): void;
}

export interface Logger {
  debug(msg: string): void;
  info(msg: string): void;
  warning(msg: string): void;
  critical(msg: string): void;
  /** Drain every sink; call before the process exits */
  flush(): void;
}

export interface LoggerOptions {
  /** Entries below this level are dropped */
  level: LogLevel;
  levels: LogLevels;
  sinks: LogSink[];
}

export interface ConsoleSink extends LogSink {
  flush(): void;
}

export interface ConsoleSinkOptions {
  /** Entries held before new ones are dropped */
  bufferSize: number;
  /** Drain period in ms */
  drainInterval: number;
  /** Entries at or above this level go to warn(), the rest to log() */
  warnLevel: LogLevel;
}

/**
 * The part of `console` the sink writes to
 */
export interface ConsoleAPI {
  log(message: string): void;
  warn(message: string): void;
}
