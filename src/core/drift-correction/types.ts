/**
 * Drift correction type definitions
 *
 * The infrared sensor housing biases the raw sky temperature by an amount
 * that depends on ambient temperature. Seven empirical coefficients describe
 * that bias for a given sensor unit.
 */

/**
 * Empirical drift-model coefficients
 */
export interface CoefficientSet {
  /** Linear scale (×1/100) */
  readonly K1: number;
  /** Centre offset (×1/10 °C) */
  readonly K2: number;
  /** Exponential scale (×1/100); zero disables the exponential term */
  readonly K3: number;
  /** Exponential rate (×1/1000) */
  readonly K4: number;
  /** Exponential power (×1/100) */
  readonly K5: number;
  /** Logarithmic scale (×1/10); its sign also sets the near-field sign */
  readonly K6: number;
  /** Logarithmic bias (×1/100) */
  readonly K7: number;
}

/**
 * Drift term broken into its components
 */
export interface DriftTerms {
  /** Linear ambient bias */
  linear: number;

  /** Optional exponential non-linearity (0 when K3 is zero or the exponential overflows) */
  exponential: number;

  /** Logarithmic far-field term, linear near the centre */
  logarithmic: number;

  /** Sum of the three components */
  total: number;
}
