/**
 * Tests for configuration module
 */

import { DEFAULT_SETTINGS, APP_CONSTANTS } from './config';
import { validateSettings } from '@validation';

describe('Configuration', () => {
  describe('DEFAULT_SETTINGS', () => {
    it('should pass validation without warnings', () => {
      const result = validateSettings(DEFAULT_SETTINGS);
      expect(result.valid).toBe(true);
      expect(result.errors).toEqual([]);
      expect(result.warnings).toEqual([]);
    });

    it('should ship the manufacturer drift coefficients', () => {
      expect(DEFAULT_SETTINGS.skytemp).toEqual({
        K1: 33, K2: 0, K3: 0, K4: 0, K5: 0, K6: 140, K7: 40
      });
    });

    it('should order the cloud thresholds', () => {
      expect(DEFAULT_SETTINGS.thresholds.cloudy).toBeLessThan(DEFAULT_SETTINGS.thresholds.very_cloudy);
    });

    it('should keep heater powers within 0-100%', () => {
      const heater = DEFAULT_SETTINGS.heater;
      for (const pwm of [heater.pwm_low, heater.pwm_mid, heater.pwm_max, heater.min_power]) {
        expect(pwm).toBeGreaterThanOrEqual(0);
        expect(pwm).toBeLessThanOrEqual(100);
      }
    });
  });

  describe('APP_CONSTANTS', () => {
    it('should define ascending log levels', () => {
      const levels = APP_CONSTANTS.LOG_LEVELS;
      expect(levels.DEBUG).toBeLessThan(levels.INFO);
      expect(levels.INFO).toBeLessThan(levels.WARNING);
      expect(levels.WARNING).toBeLessThan(levels.CRITICAL);
    });

    it('should read AAG_ variables with a double-underscore delimiter', () => {
      expect(APP_CONSTANTS.ENV_PREFIX).toBe('AAG_');
      expect(APP_CONSTANTS.ENV_NESTED_DELIMITER).toBe('__');
      expect(APP_CONSTANTS.ENV_FILE).toBe('config.env');
    });
  });
});
