/**
 * Reading average helper functions
 */

import type { ReadingAverageConfig } from './types';
import { AveragingValidationError } from '$types/errors';
import { isFiniteNumber, isInteger } from '@utils/number';

/**
 * Validate reading average configuration
 * @throws {AveragingValidationError} If configuration is invalid
 */
export function validateReadingAverageConfig(config: ReadingAverageConfig): void {
  if (!isInteger(config.numReadings) || config.numReadings < 1) {
    throw new AveragingValidationError("numReadings must be a positive integer, got " + config.numReadings);
  }
}

/**
 * Validate a sample value
 * @throws {AveragingValidationError} If value is not a finite number
 */
export function validateSampleValue(value: number, context: string): void {
  if (!isFiniteNumber(value)) {
    throw new AveragingValidationError(context + ": sample must be a finite number, got " + value);
  }
}
