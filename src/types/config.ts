/**
 * Type definition for weather station settings
 */

import type { CoefficientSet } from '@core/drift-correction/types';
import type { LogLevels } from '@logging';

/**
 * Unit system used when reporting readings
 */
export type WhichUnits = 'metric' | 'imperial' | 'none';

/**
 * Safety thresholds
 * `cloudy` and `very_cloudy` are the two cut points of the cloud classifier
 */
export interface Thresholds {
  readonly cloudy: number;
  readonly very_cloudy: number;
  readonly windy: number;
  readonly very_windy: number;
  readonly gusty: number;
  readonly very_gusty: number;
  readonly wet: number;
  readonly rainy: number;
}

/**
 * Rain-sensor heater tuning
 * Parameters only; the PWM controller lives with the serial driver
 */
export interface Heater {
  // ───────── RAIN SENSOR HEATER ─────────
  /** Rain frequency below which the sensor counts as wet (Hz) */
  readonly rain_threshold_freq: number;
  /** Power while wet or raining (%) */
  readonly pwm_max: number;
  /** Power while dry and below the low temperature band (%) */
  readonly pwm_mid: number;
  /** Light keep-warm power (%) */
  readonly pwm_low: number;
  /** PWM change deadband (%) */
  readonly hysteresis: number;

  // ───────── AMBIENT TEMPERATURE BANDS ─────────
  readonly low_temp: number;
  readonly low_delta: number;
  readonly high_temp: number;
  readonly high_delta: number;

  // ───────── IMPULSE HEATING ─────────
  readonly impulse_temp: number;
  /** Seconds */
  readonly impulse_duration: number;
  /** Seconds */
  readonly impulse_cycle: number;

  /** Initial PWM set when the sensor connects (%) */
  readonly min_power: number;
}

/**
 * Observatory site
 */
export interface Location {
  readonly name: string;
  /** Metres */
  readonly elevation: number;
  readonly latitude: number;
  readonly longitude: number;
  readonly timezone: string;
}

/**
 * Complete weather station settings
 */
export interface WeatherSettings {
  readonly serial_port: string;
  /** Minutes */
  readonly safety_delay: number;
  /** Seconds */
  readonly capture_delay: number;
  readonly num_readings: number;
  readonly sq_reference: number;
  readonly ignore_unsafe: boolean | null;
  readonly verbose_logging: boolean;
  readonly serial_port_open_delay_seconds: number;
  readonly solo_data_file_path: string;
  readonly have_heater: boolean;
  readonly units: WhichUnits;
  readonly thresholds: Thresholds;
  readonly heater: Heater;
  readonly location: Location;
  readonly skytemp: CoefficientSet;
}

/**
 * Application constants
 * Internal engine constants that should rarely change
 */
export interface AppConstants {
  // ───────── LOGGING CONSTANTS ─────────
  readonly LOG_LEVELS: LogLevels;

  // ───────── SETTINGS SOURCES ─────────
  readonly ENV_PREFIX: string;
  readonly ENV_NESTED_DELIMITER: string;
  readonly ENV_FILE: string;

  // ───────── CONSOLE SINK ─────────
  readonly CONSOLE_BUFFER_SIZE: number;
  readonly CONSOLE_INTERVAL_MS: number;
}
