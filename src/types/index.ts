export type { SkyReading, TimerAPI } from './common';
export type { WhichUnits, Thresholds, Heater, Location, WeatherSettings, AppConstants } from './config';
export {
  ValidationError,
  CoefficientValidationError,
  AveragingValidationError,
  SettingsValidationError
} from './errors';
