/**
 * Cloud classification type definitions
 */

/**
 * Discrete cloud states, ordered from clearest to cloudiest
 */
export const CLOUD_STATE = {
  CLEAR: 0,
  CLOUDY: 1,
  VERY_CLOUDY: 2
} as const;

export type CloudStateName = keyof typeof CLOUD_STATE;

/**
 * Cloud state value (0=CLEAR, 1=CLOUDY, 2=VERY_CLOUDY)
 */
export type CloudState = (typeof CLOUD_STATE)[CloudStateName];

/**
 * Cut points of the classifier, corrected sky temperature in °C
 */
export interface ClassificationBoundaries {
  /** Readings strictly below this are CLEAR */
  clearLimit: number;

  /** Readings strictly above this are VERY_CLOUDY */
  cloudyLimit: number;
}
