export { driftTerm, driftTerms, correctSkyTemperature } from './drift-correction';
export { isCoefficientSet, validateCoefficientSet, COEFFICIENT_KEYS } from './helpers';
export type { CoefficientSet, DriftTerms } from './types';
