/**
 * Log line formatting
 */

import type { LogLevel } from './types';

// Padded so messages line up in a terminal
const LEVEL_TAGS: Readonly<Record<LogLevel, string>> = {
  0: '[DEBUG]    ',
  1: 'ℹ️ [INFO]     ',
  2: '⚠️ [WARNING]  ',
  3: '🚨 [CRITICAL] '
};

/**
 * Prefix a message with the tag of its level
 */
export function formatLogMessage(level: LogLevel, msg: string): string {
  return LEVEL_TAGS[level] + msg;
}

/**
 * Temperature in °C as it appears in log lines, e.g. "-52.90C"
 */
export function fmtTemp(value: number): string {
  return value.toFixed(2) + 'C';
}
