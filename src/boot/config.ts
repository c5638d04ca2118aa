import type { AppConstants, WeatherSettings } from '$types';

// ─────────────────────────────────────────────────────────────
// DEFAULT SETTINGS
//   What the station runs with when neither config.env nor the
//   environment overrides a field.
// ─────────────────────────────────────────────────────────────

export const DEFAULT_SETTINGS: Readonly<WeatherSettings> = {
  // serial_port
  //   Role: Device path of the sensor's serial adapter.
  serial_port: '/dev/ttyUSB0',

  // safety_delay
  //   Role: Minutes conditions must stay safe before reporting safe again.
  //   Critical: 0–1440 min.
  safety_delay: 15,

  // capture_delay
  //   Role: Seconds between captures.
  //   Critical: 1–3600 s. Recommended: 5–300 s.
  capture_delay: 30,

  // num_readings
  //   Role: Samples averaged per capture.
  //   Critical: Integer 1–100. Recommended: 3–20.
  num_readings: 10,

  // sq_reference
  //   Role: Sky-quality reference (mag/arcsec²) for the brightness sensor.
  sq_reference: 19.6,

  // ignore_unsafe
  //   Role: Report safe regardless of conditions; null leaves it to the caller.
  ignore_unsafe: null,

  verbose_logging: false,

  // serial_port_open_delay_seconds
  //   Role: Settle time after opening the port before the first command.
  //   Critical: 0–60 s.
  serial_port_open_delay_seconds: 1,

  solo_data_file_path: './',

  have_heater: false,

  units: 'metric',

  // thresholds
  //   Role: Safety limits. cloudy / very_cloudy are the cut points of the
  //   cloud classifier in corrected °C; cloudy must sit below very_cloudy.
  thresholds: {
    cloudy: -25,
    very_cloudy: -15,
    windy: 50,
    very_windy: 75,
    gusty: 100,
    very_gusty: 125,
    wet: 2200,
    rainy: 1800,
  },

  // heater
  //   Role: Rain-sensor heater tuning. Powers in %, temperatures in °C,
  //   impulse timings in seconds.
  heater: {
    rain_threshold_freq: 30.0,
    pwm_max: 70.0,
    pwm_mid: 40.0,
    pwm_low: 15.0,
    hysteresis: 5.0,
    low_temp: 0.0,
    low_delta: 6.0,
    high_temp: 20.0,
    high_delta: 4.0,
    impulse_temp: 10.0,
    impulse_duration: 60.0,
    impulse_cycle: 600,
    min_power: 15,
  },

  location: {
    name: 'AAG CloudWatcher',
    elevation: 60.0,
    latitude: 49.054,
    longitude: -122.82,
    timezone: 'America/Vancouver',
  },

  // skytemp
  //   Role: Drift-model coefficients K1–K7 of the infrared sensor.
  //   Recommended: Calibrate per unit; defaults are the manufacturer's.
  skytemp: {
    K1: 33.0,
    K2: 0.0,
    K3: 0.0,
    K4: 0.0,
    K5: 0.0,
    K6: 140.0,
    K7: 40.0,
  },
};

// ─────────────────────────────────────────────────────────────
// APPLICATION CONSTANTS
// ─────────────────────────────────────────────────────────────

export const APP_CONSTANTS: Readonly<AppConstants> = {
  LOG_LEVELS: {
    DEBUG: 0,
    INFO: 1,
    WARNING: 2,
    CRITICAL: 3,
  },

  ENV_PREFIX: 'AAG_',

  ENV_NESTED_DELIMITER: '__',

  ENV_FILE: 'config.env',

  CONSOLE_BUFFER_SIZE: 150,

  CONSOLE_INTERVAL_MS: 50,
};
