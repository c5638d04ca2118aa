/**
 * Sky temperature drift correction
 *
 * ## Model
 * The correction term T_d(Ta) is the sum of three components:
 * - linear: (K1/100) * (Ta - K2/10)
 * - exponential: (K3/100) * exp(K4/1000 * Ta)^(K5/100), only when K3 != 0
 * - logarithmic: (K6/10) * sign(Ta - K2/10) * (log10|K2/10 - Ta| + K7/100),
 *   replaced by ±|K2/10 - Ta| (sign of K6) within 1 °C of the centre
 *
 * The corrected sky temperature is the raw reading minus T_d(Ta).
 * All functions are pure and never throw; NaN inputs propagate.
 */

import type { CoefficientSet, DriftTerms } from './types';
import { copySign } from '@utils/number';

/**
 * Exponential component, 0 when disabled or when the exponential overflows
 */
function exponentialTerm(ta: number, c: CoefficientSet): number {
  if (c.K3 === 0) {
    return 0;
  }

  const growth = Math.exp((c.K4 / 1000) * ta);
  if (growth === Infinity) {
    return 0;
  }

  const powered = Math.pow(growth, c.K5 / 100);
  if (powered === Infinity || powered === -Infinity) {
    return 0;
  }

  return (c.K3 / 100) * powered;
}

/**
 * Logarithmic component with the linear near-field fallback
 */
function logarithmicTerm(ta: number, c: CoefficientSet): number {
  const centre = c.K2 / 10;
  const delta = Math.abs(centre - ta);

  // log10 is singular at the centre
  if (delta < 1) {
    return copySign(delta, c.K6);
  }

  return (c.K6 / 10) * Math.sign(ta - centre) * (Math.log10(delta) + c.K7 / 100);
}

/**
 * Compute the drift term and its components
 *
 * @param ta - Ambient temperature in °C
 * @param coeffs - Drift-model coefficients
 * @returns Each component and their sum
 */
export function driftTerms(ta: number, coeffs: CoefficientSet): DriftTerms {
  const linear = (coeffs.K1 / 100) * (ta - coeffs.K2 / 10);
  const exponential = exponentialTerm(ta, coeffs);
  const logarithmic = logarithmicTerm(ta, coeffs);

  return {
    linear: linear,
    exponential: exponential,
    logarithmic: logarithmic,
    total: linear + exponential + logarithmic
  };
}

/**
 * Compute the drift term T_d(Ta)
 *
 * @param ta - Ambient temperature in °C
 * @param coeffs - Drift-model coefficients
 * @returns Temperature-dependent bias to subtract from the raw reading
 */
export function driftTerm(ta: number, coeffs: CoefficientSet): number {
  return driftTerms(ta, coeffs).total;
}

/**
 * Correct a raw infrared sky temperature for housing drift
 *
 * @param ts - Raw sky temperature in °C
 * @param ta - Ambient temperature in °C
 * @param coeffs - Drift-model coefficients
 * @returns Corrected sky temperature in °C
 */
export function correctSkyTemperature(ts: number, ta: number, coeffs: CoefficientSet): number {
  return ts - driftTerm(ta, coeffs);
}
