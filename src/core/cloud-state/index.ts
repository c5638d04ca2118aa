export { classifyCloudState, cloudStateName, compareCloudStates, DEFAULT_BOUNDARIES } from './cloud-state';
export { CLOUD_STATE } from './types';
export type { CloudState, CloudStateName, ClassificationBoundaries } from './types';
