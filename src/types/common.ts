/**
 * Common type definitions used throughout the project
 */

/**
 * One sample from the infrared sensor
 */
export interface SkyReading {
  /** Raw infrared sky temperature in °C */
  readonly ts: number;

  /** Ambient (sensor housing) temperature in °C */
  readonly ta: number;
}

/**
 * Timer abstraction so sinks can be driven by fake timers in tests
 */
export interface TimerAPI {
  /**
   * Set a timer
   * @param intervalMs - Interval in milliseconds
   * @param repeat - Whether to repeat the timer
   * @param callback - Function to call when timer fires
   */
  set(intervalMs: number, repeat: boolean, callback: () => void): void;
}
