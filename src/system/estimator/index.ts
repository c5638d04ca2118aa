export {
  estimateSkyCondition,
  estimateWithCalibration,
  estimateFromSamples,
  boundariesFromSettings
} from './estimator';
export type { Calibration, SkyEstimate } from './types';
