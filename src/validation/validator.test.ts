/**
 * Tests for settings validator
 */

import { validateSettings } from './validator';
import { DEFAULT_SETTINGS } from '@boot/config';
import type { WeatherSettings } from '$types';

function withThresholds(overrides: Partial<WeatherSettings['thresholds']>): WeatherSettings {
  return { ...DEFAULT_SETTINGS, thresholds: { ...DEFAULT_SETTINGS.thresholds, ...overrides } };
}

function withHeater(overrides: Partial<WeatherSettings['heater']>): WeatherSettings {
  return { ...DEFAULT_SETTINGS, heater: { ...DEFAULT_SETTINGS.heater, ...overrides } };
}

describe('validateSettings', () => {
  describe('valid configuration', () => {
    it('should return valid for the defaults', () => {
      const result = validateSettings(DEFAULT_SETTINGS);
      expect(result.valid).toBe(true);
      expect(result.errors).toHaveLength(0);
    });
  });

  describe('station settings', () => {
    it('should error on fractional num_readings', () => {
      const result = validateSettings({ ...DEFAULT_SETTINGS, num_readings: 2.5 });
      expect(result.valid).toBe(false);
      expect(result.errors[0]).toEqual({
        level: 'CRITICAL',
        field: 'num_readings',
        message: 'num_readings must be an integer (got 2.5)'
      });
    });

    it('should warn on a large num_readings', () => {
      const result = validateSettings({ ...DEFAULT_SETTINGS, num_readings: 50 });
      expect(result.valid).toBe(true);
      expect(result.warnings[0].message).toBe('num_readings is outside recommended range 3-20 (got 50)');
    });

    it('should error on an empty serial port', () => {
      const result = validateSettings({ ...DEFAULT_SETTINGS, serial_port: ' ' });
      expect(result.errors[0].message).toBe('serial_port must be a non-empty string');
    });

    it('should accept null ignore_unsafe', () => {
      expect(validateSettings({ ...DEFAULT_SETTINGS, ignore_unsafe: null }).valid).toBe(true);
      expect(validateSettings({ ...DEFAULT_SETTINGS, ignore_unsafe: true }).valid).toBe(true);
    });
  });

  describe('thresholds', () => {
    it('should warn, not fail, on inverted cloud limits', () => {
      const result = validateSettings(withThresholds({ cloudy: -10, very_cloudy: -20 }));
      expect(result.valid).toBe(true);
      expect(result.warnings).toHaveLength(1);
      expect(result.warnings[0].field).toBe('thresholds.cloudy');
    });

    it('should warn on equal cloud limits', () => {
      const result = validateSettings(withThresholds({ cloudy: -15, very_cloudy: -15 }));
      expect(result.warnings[0].message).toBe('thresholds.cloudy (-15) should be below thresholds.very_cloudy (-15)');
    });

    it('should error on non-finite cloud limits', () => {
      const result = validateSettings(withThresholds({ cloudy: NaN }));
      expect(result.valid).toBe(false);
      expect(result.errors[0].message).toBe('thresholds.cloudy must be a finite number (got NaN)');
    });

    it('should accept any finite cloud limits', () => {
      const result = validateSettings(withThresholds({ cloudy: -150, very_cloudy: 80 }));
      expect(result.valid).toBe(true);
      expect(result.warnings).toHaveLength(0);
    });

    it('should warn when the rain limit is not below the wet limit', () => {
      const result = validateSettings(withThresholds({ rainy: 2500 }));
      expect(result.warnings[0].field).toBe('thresholds.rainy');
    });
  });

  describe('heater', () => {
    it('should error on power above 100%', () => {
      const result = validateSettings(withHeater({ pwm_max: 120 }));
      expect(result.errors[0].field).toBe('heater.pwm_max');
    });

    it('should warn on unordered power levels', () => {
      const result = validateSettings(withHeater({ pwm_low: 50 }));
      expect(result.valid).toBe(true);
      expect(result.warnings[0].message).toBe(
        'heater power levels should satisfy pwm_low <= pwm_mid <= pwm_max (got 50, 40, 70)'
      );
    });

    it('should error when the impulse outlasts its cycle', () => {
      const result = validateSettings(withHeater({ impulse_duration: 700 }));
      expect(result.errors).toEqual([{
        level: 'CRITICAL',
        field: 'heater.impulse_duration',
        message: 'heater.impulse_duration must not exceed heater.impulse_cycle'
      }]);
    });
  });

  describe('location', () => {
    it('should error on out-of-range coordinates', () => {
      const result = validateSettings({
        ...DEFAULT_SETTINGS,
        location: { ...DEFAULT_SETTINGS.location, latitude: -91, longitude: 181 }
      });
      expect(result.errors.map(e => e.field)).toEqual(['location.latitude', 'location.longitude']);
    });
  });

  describe('coefficients', () => {
    it('should error on a non-finite coefficient', () => {
      const result = validateSettings({
        ...DEFAULT_SETTINGS,
        skytemp: { ...DEFAULT_SETTINGS.skytemp, K4: Infinity }
      });
      expect(result.errors).toHaveLength(1);
      expect(result.errors[0]).toEqual({
        level: 'CRITICAL',
        field: 'skytemp.K4',
        message: 'skytemp.K4 must be a finite number (got Infinity)'
      });
    });

    it('should accept large finite coefficients', () => {
      const result = validateSettings({
        ...DEFAULT_SETTINGS,
        skytemp: { ...DEFAULT_SETTINGS.skytemp, K3: 1, K4: 200000, K7: -1e9 }
      });
      expect(result.valid).toBe(true);
    });
  });
});
