import type { WeatherSettings } from '$types';
import type { ValidationError, ValidationResult, ValidationWarning } from './types';
import { COEFFICIENT_KEYS } from '@core/drift-correction/helpers';
import {
  addError,
  validateBoolean,
  validateFinite,
  validateIntegerRange,
  validateNonEmptyString,
  validateNumberRange,
  warnUnlessBelow
} from './helpers';

const UNITS = ['metric', 'imperial', 'none'];

function validateStation(settings: WeatherSettings, errors: ValidationError[], warnings: ValidationWarning[]): void {
  validateNonEmptyString(settings.serial_port, 'serial_port', errors);
  validateNumberRange(settings.safety_delay, 'safety_delay', 0, 1440, errors, warnings);
  validateNumberRange(settings.capture_delay, 'capture_delay', 1, 3600, errors, warnings, 5, 300);
  validateIntegerRange(settings.num_readings, 'num_readings', 1, 100, errors, warnings, 3, 20);
  validateNumberRange(settings.sq_reference, 'sq_reference', 0, 30, errors, warnings);
  validateNumberRange(
    settings.serial_port_open_delay_seconds, 'serial_port_open_delay_seconds', 0, 60, errors, warnings
  );
  validateNonEmptyString(settings.solo_data_file_path, 'solo_data_file_path', errors);
  validateBoolean(settings.verbose_logging, 'verbose_logging', errors);
  validateBoolean(settings.have_heater, 'have_heater', errors);
  if (settings.ignore_unsafe !== null) {
    validateBoolean(settings.ignore_unsafe, 'ignore_unsafe', errors);
  }
  if (UNITS.indexOf(settings.units) === -1) {
    addError(errors, 'units', `units must be one of ${UNITS.join(', ')} (got ${settings.units})`);
  }
}

function validateThresholds(settings: WeatherSettings, errors: ValidationError[], warnings: ValidationWarning[]): void {
  const t = settings.thresholds;

  validateFinite(t.cloudy, 'thresholds.cloudy', errors);
  validateFinite(t.very_cloudy, 'thresholds.very_cloudy', errors);
  // Inverted cloud limits still classify, but the bands swap meaning
  warnUnlessBelow(t.cloudy, t.very_cloudy, 'thresholds.cloudy', 'thresholds.very_cloudy', warnings);

  validateNumberRange(t.windy, 'thresholds.windy', 0, 300, errors, warnings);
  validateNumberRange(t.very_windy, 'thresholds.very_windy', 0, 300, errors, warnings);
  warnUnlessBelow(t.windy, t.very_windy, 'thresholds.windy', 'thresholds.very_windy', warnings);

  validateNumberRange(t.gusty, 'thresholds.gusty', 0, 300, errors, warnings);
  validateNumberRange(t.very_gusty, 'thresholds.very_gusty', 0, 300, errors, warnings);
  warnUnlessBelow(t.gusty, t.very_gusty, 'thresholds.gusty', 'thresholds.very_gusty', warnings);

  // Rain frequency falls as the sensor gets wetter
  validateIntegerRange(t.rainy, 'thresholds.rainy', 0, 10000, errors, warnings);
  validateIntegerRange(t.wet, 'thresholds.wet', 0, 10000, errors, warnings);
  warnUnlessBelow(t.rainy, t.wet, 'thresholds.rainy', 'thresholds.wet', warnings);
}

function validateHeater(settings: WeatherSettings, errors: ValidationError[], warnings: ValidationWarning[]): void {
  const h = settings.heater;

  validateNumberRange(h.rain_threshold_freq, 'heater.rain_threshold_freq', 0, 1000, errors, warnings);
  validateNumberRange(h.pwm_max, 'heater.pwm_max', 0, 100, errors, warnings);
  validateNumberRange(h.pwm_mid, 'heater.pwm_mid', 0, 100, errors, warnings);
  validateNumberRange(h.pwm_low, 'heater.pwm_low', 0, 100, errors, warnings);
  validateNumberRange(h.min_power, 'heater.min_power', 0, 100, errors, warnings);
  validateNumberRange(h.hysteresis, 'heater.hysteresis', 0, 50, errors, warnings);
  if (h.pwm_low > h.pwm_mid || h.pwm_mid > h.pwm_max) {
    warnings.push({
      level: 'WARNING',
      field: 'heater.pwm_mid',
      message: `heater power levels should satisfy pwm_low <= pwm_mid <= pwm_max (got ${h.pwm_low}, ${h.pwm_mid}, ${h.pwm_max})`
    });
  }

  validateNumberRange(h.low_temp, 'heater.low_temp', -50, 50, errors, warnings);
  validateNumberRange(h.high_temp, 'heater.high_temp', -50, 60, errors, warnings);
  validateNumberRange(h.low_delta, 'heater.low_delta', 0, 30, errors, warnings);
  validateNumberRange(h.high_delta, 'heater.high_delta', 0, 30, errors, warnings);
  warnUnlessBelow(h.low_temp, h.high_temp, 'heater.low_temp', 'heater.high_temp', warnings);

  validateNumberRange(h.impulse_temp, 'heater.impulse_temp', -50, 50, errors, warnings);
  validateNumberRange(h.impulse_duration, 'heater.impulse_duration', 0, 3600, errors, warnings);
  validateIntegerRange(h.impulse_cycle, 'heater.impulse_cycle', 1, 86400, errors, warnings);
  if (h.impulse_duration > h.impulse_cycle) {
    addError(errors, 'heater.impulse_duration', 'heater.impulse_duration must not exceed heater.impulse_cycle');
  }
}

function validateLocation(settings: WeatherSettings, errors: ValidationError[], warnings: ValidationWarning[]): void {
  const l = settings.location;

  validateNonEmptyString(l.name, 'location.name', errors);
  validateNonEmptyString(l.timezone, 'location.timezone', errors);
  validateNumberRange(l.elevation, 'location.elevation', -500, 9000, errors, warnings);
  validateNumberRange(l.latitude, 'location.latitude', -90, 90, errors, warnings);
  validateNumberRange(l.longitude, 'location.longitude', -180, 180, errors, warnings);
}

// Coefficients only need to be finite
function validateCoefficients(settings: WeatherSettings, errors: ValidationError[]): void {
  for (const key of COEFFICIENT_KEYS) {
    validateFinite(settings.skytemp[key], 'skytemp.' + key, errors);
  }
}

/**
 * Validate weather station settings
 *
 * Errors make the settings unusable; warnings flag values that work but
 * are probably not what the operator meant.
 */
export function validateSettings(settings: WeatherSettings): ValidationResult {
  const errors: ValidationError[] = [];
  const warnings: ValidationWarning[] = [];

  validateStation(settings, errors, warnings);
  validateThresholds(settings, errors, warnings);
  validateHeater(settings, errors, warnings);
  validateLocation(settings, errors, warnings);
  validateCoefficients(settings, errors);

  return {
    valid: errors.length === 0,
    errors,
    warnings
  };
}
