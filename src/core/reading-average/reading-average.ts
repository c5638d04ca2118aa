/**
 * Moving average over the last N sensor samples
 */

import type { ReadingAverageConfig, ReadingAverageResult, ReadingBufferState } from './types';
import { validateReadingAverageConfig, validateSampleValue } from './helpers';

/**
 * Create empty buffer state
 */
export function createEmptyBuffer(): ReadingBufferState {
  return { samples: [] };
}

/**
 * Add a sample and return the mean of the buffered samples (MUTABLE)
 *
 * @param buffer - Current buffer state (will be mutated)
 * @param newValue - New sample
 * @param config - Averaging configuration
 * @returns Mean and buffer full status
 * @throws {AveragingValidationError} If inputs are invalid
 */
export function updateReadingAverage(
  buffer: ReadingBufferState,
  newValue: number,
  config: ReadingAverageConfig
): ReadingAverageResult {
  validateReadingAverageConfig(config);
  validateSampleValue(newValue, 'updateReadingAverage');

  buffer.samples.push(newValue);
  while (buffer.samples.length > config.numReadings) {
    buffer.samples.shift();
  }

  let sum = 0;
  for (const sample of buffer.samples) {
    sum += sample;
  }

  return {
    value: sum / buffer.samples.length,
    bufferFull: buffer.samples.length >= config.numReadings
  };
}

/**
 * Check if buffer has reached full capacity
 */
export function isBufferFull(buffer: ReadingBufferState, config: ReadingAverageConfig): boolean {
  validateReadingAverageConfig(config);
  return buffer.samples.length >= config.numReadings;
}
