/**
 * Logging: leveled logger, buffered console sink and line formatting
 */

export { formatLogMessage, fmtTemp } from './helpers';
export { createConsoleSink } from './console/console-sink';
export { createLogger } from './logger';

export type {
  LogLevel,
  LogLevels,
  LogEntry,
  LogSink,
  Logger,
  LoggerOptions,
  ConsoleSink,
  ConsoleSinkOptions,
  ConsoleAPI
} from './types';
