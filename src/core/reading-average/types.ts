/**
 * Reading average type definitions
 *
 * The station captures several samples per cycle and reports their mean,
 * which damps single-sample noise from the thermopile.
 */

/**
 * Configuration for the reading average
 */
export interface ReadingAverageConfig {
  /** Number of most recent samples averaged */
  numReadings: number;
}

/**
 * Sample buffer (mutated in place)
 */
export interface ReadingBufferState {
  /** Most recent samples, oldest first */
  samples: number[];
}

/**
 * Result of adding a sample
 */
export interface ReadingAverageResult {
  /** Mean of the buffered samples */
  value: number;

  /** Whether the buffer holds numReadings samples */
  bufferFull: boolean;
}
