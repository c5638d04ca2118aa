/**
 * Cloud state classification
 *
 * Maps a corrected sky temperature onto CLEAR / CLOUDY / VERY_CLOUDY.
 * Both limits belong to the CLOUDY band. The classifier keeps no history;
 * hysteresis is left to the safety layer.
 */

import type { ClassificationBoundaries, CloudState, CloudStateName } from './types';
import { CLOUD_STATE } from './types';

export const DEFAULT_BOUNDARIES: Readonly<ClassificationBoundaries> = {
  clearLimit: -17.0,
  cloudyLimit: -8.0
};

const STATE_NAMES: readonly CloudStateName[] = ['CLEAR', 'CLOUDY', 'VERY_CLOUDY'];

/**
 * Classify a corrected sky temperature
 *
 * The limits are not checked against each other; an inverted pair still
 * resolves to one of the three states.
 *
 * @param correctedSkyTemp - Drift-corrected sky temperature in °C
 * @param boundaries - Cut points, each defaulting independently
 * @returns Cloud state
 */
export function classifyCloudState(
  correctedSkyTemp: number,
  boundaries: Partial<ClassificationBoundaries> = {}
): CloudState {
  const clearLimit = boundaries.clearLimit ?? DEFAULT_BOUNDARIES.clearLimit;
  const cloudyLimit = boundaries.cloudyLimit ?? DEFAULT_BOUNDARIES.cloudyLimit;

  if (correctedSkyTemp < clearLimit) {
    return CLOUD_STATE.CLEAR;
  }
  if (correctedSkyTemp > cloudyLimit) {
    return CLOUD_STATE.VERY_CLOUDY;
  }
  return CLOUD_STATE.CLOUDY;
}

/**
 * Name of a cloud state
 */
export function cloudStateName(state: CloudState): CloudStateName {
  return STATE_NAMES[state];
}

/**
 * Order two cloud states; negative when `a` is clearer than `b`
 */
export function compareCloudStates(a: CloudState, b: CloudState): number {
  return a - b;
}
