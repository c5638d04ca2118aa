/**
 * Sky estimate type definitions
 */

import type { ClassificationBoundaries, CloudState, CloudStateName } from '@core/cloud-state';
import type { CoefficientSet } from '@core/drift-correction';

/**
 * Corrected sky temperature and its classification for one capture
 */
export interface SkyEstimate {
  /** Raw infrared sky temperature in °C (mean when several samples were taken) */
  rawSkyTemp: number;

  /** Ambient temperature in °C */
  ambientTemp: number;

  /** Drift-corrected sky temperature in °C */
  correctedSkyTemp: number;

  state: CloudState;

  stateName: CloudStateName;
}

/**
 * Coefficients and cut points used for one estimate
 */
export interface Calibration {
  coefficients: CoefficientSet;
  /** Missing limits use the classifier defaults (-17 / -8) */
  boundaries?: Partial<ClassificationBoundaries>;
}
