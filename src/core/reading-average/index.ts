export { createEmptyBuffer, updateReadingAverage, isBufferFull } from './reading-average';
export { validateReadingAverageConfig, validateSampleValue } from './helpers';
export type { ReadingAverageConfig, ReadingBufferState, ReadingAverageResult } from './types';
