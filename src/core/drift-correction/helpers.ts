/**
 * Drift correction helper functions
 */

import type { CoefficientSet } from './types';
import { CoefficientValidationError } from '$types/errors';
import { isFiniteNumber } from '@utils/number';

export const COEFFICIENT_KEYS: readonly (keyof CoefficientSet)[] = ['K1', 'K2', 'K3', 'K4', 'K5', 'K6', 'K7'];

/**
 * Check whether a value carries all seven finite coefficients
 */
export function isCoefficientSet(value: unknown): value is CoefficientSet {
  if (typeof value !== 'object' || value === null) {
    return false;
  }
  for (const key of COEFFICIENT_KEYS) {
    if (!isFiniteNumber(Reflect.get(value, key))) {
      return false;
    }
  }
  return true;
}

/**
 * Validate a coefficient set loaded from configuration
 * @throws {CoefficientValidationError} On the first missing or non-finite coefficient
 */
export function validateCoefficientSet(coeffs: CoefficientSet): void {
  for (const key of COEFFICIENT_KEYS) {
    if (!isFiniteNumber(coeffs[key])) {
      throw new CoefficientValidationError(key + " must be a finite number, got " + coeffs[key]);
    }
  }
}
