export { validateSettings } from './validator';
export type { ValidationError, ValidationWarning, ValidationResult } from './types';
