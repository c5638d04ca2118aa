/**
 * Global error types for the sky-condition estimator
 * Custom errors for validation and constraint violations
 */

/**
 * Base validation error for all modules
 */
export class ValidationError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'ValidationError';
  }
}

/**
 * Error thrown when a drift-correction coefficient set is incomplete or not finite
 */
export class CoefficientValidationError extends ValidationError {
  constructor(message: string) {
    super(message);
    this.name = 'CoefficientValidationError';
  }
}

/**
 * Error thrown when reading-average configuration or samples are invalid
 */
export class AveragingValidationError extends ValidationError {
  constructor(message: string) {
    super(message);
    this.name = 'AveragingValidationError';
  }
}

/**
 * Error thrown when loaded settings fail validation
 */
export class SettingsValidationError extends ValidationError {
  /** Field-level messages, one per failed check */
  readonly problems: string[];

  constructor(problems: string[]) {
    super('Invalid settings: ' + problems.join('; '));
    this.name = 'SettingsValidationError';
    this.problems = problems;
  }
}
