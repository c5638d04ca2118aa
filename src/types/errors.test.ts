/**
 * Tests for error types
 */

import {
  ValidationError,
  CoefficientValidationError,
  AveragingValidationError,
  SettingsValidationError
} from './errors';

describe('Error Types', () => {
  describe('ValidationError', () => {
    it('should create error with correct message', () => {
      const error = new ValidationError('Test error message');
      expect(error.message).toBe('Test error message');
    });

    it('should have correct name', () => {
      expect(new ValidationError('Test').name).toBe('ValidationError');
    });

    it('should be instance of Error', () => {
      expect(new ValidationError('Test')).toBeInstanceOf(Error);
    });
  });

  describe('CoefficientValidationError', () => {
    it('should have correct name and message', () => {
      const error = new CoefficientValidationError('K3 missing');
      expect(error.name).toBe('CoefficientValidationError');
      expect(error.message).toBe('K3 missing');
    });

    it('should be instance of ValidationError', () => {
      expect(new CoefficientValidationError('Test')).toBeInstanceOf(ValidationError);
    });
  });

  describe('AveragingValidationError', () => {
    it('should have correct name', () => {
      expect(new AveragingValidationError('Test').name).toBe('AveragingValidationError');
    });

    it('should be instance of ValidationError', () => {
      expect(new AveragingValidationError('Test')).toBeInstanceOf(ValidationError);
    });
  });

  describe('SettingsValidationError', () => {
    it('should join problems into the message', () => {
      const error = new SettingsValidationError(['a is bad', 'b is bad']);
      expect(error.message).toBe('Invalid settings: a is bad; b is bad');
      expect(error.problems).toEqual(['a is bad', 'b is bad']);
    });

    it('should have correct name', () => {
      expect(new SettingsValidationError([]).name).toBe('SettingsValidationError');
    });
  });

  describe('Error inheritance chain', () => {
    it('errors can be caught as ValidationError', () => {
      let caughtError: Error | null = null;

      try {
        throw new CoefficientValidationError('Test coefficient error');
      } catch (e) {
        if (e instanceof ValidationError) {
          caughtError = e;
        }
      }

      expect(caughtError).not.toBeNull();
      expect(caughtError?.message).toBe('Test coefficient error');
    });
  });
});
