/**
 * Number utilities shared by the correction model and the validators
 */

/**
 * Check if a value is a finite number
 *
 * Unlike global isFinite(), this does NOT coerce to number first.
 * - isFiniteNumber(null) = false
 * - isFiniteNumber("5") = false
 * - isFinite("5") = true (coerces to number)
 *
 * @param value - Value to check
 * @returns true if value is a finite number
 */
export function isFiniteNumber(value: unknown): value is number {
  return typeof value === 'number' && isFinite(value);
}

/**
 * Check if a value is an integer
 *
 * @param value - Value to check
 * @returns true if value is an integer
 */
export function isInteger(value: unknown): value is number {
  return typeof value === 'number' && isFinite(value) && Math.floor(value) === value;
}

/**
 * Magnitude of `magnitude` with the sign of `sign`.
 *
 * The sign bit is honoured for zeros, so copySign(2, -0) is -2.
 */
export function copySign(magnitude: number, sign: number): number {
  const negative = sign < 0 || Object.is(sign, -0);
  const abs = Math.abs(magnitude);
  return negative ? -abs : abs;
}
