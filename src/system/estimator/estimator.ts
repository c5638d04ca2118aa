/**
 * Sky condition estimation
 *
 * Runs the drift corrector with the station's coefficients, then the
 * classifier with the cloud limits from the thresholds record:
 * `thresholds.cloudy` is the CLEAR cut point and `thresholds.very_cloudy`
 * the VERY_CLOUDY one.
 */

import type { SkyReading } from '$types/common';
import type { WeatherSettings } from '$types';
import type { Logger } from '@logging';
import type { ClassificationBoundaries } from '@core/cloud-state';
import type { Calibration, SkyEstimate } from './types';
import { fmtTemp } from '@logging';
import { driftTerms } from '@core/drift-correction';
import { classifyCloudState, cloudStateName } from '@core/cloud-state';
import { createEmptyBuffer, updateReadingAverage } from '@core/reading-average';
import { AveragingValidationError } from '$types/errors';

/**
 * Classifier cut points taken from the thresholds record
 */
export function boundariesFromSettings(settings: WeatherSettings): ClassificationBoundaries {
  return {
    clearLimit: settings.thresholds.cloudy,
    cloudyLimit: settings.thresholds.very_cloudy
  };
}

/**
 * Correct one reading with explicit coefficients and classify it
 *
 * Boundaries left out fall back to the classifier defaults.
 */
export function estimateWithCalibration(
  reading: SkyReading,
  calibration: Calibration,
  logger?: Logger
): SkyEstimate {
  const terms = driftTerms(reading.ta, calibration.coefficients);
  const corrected = reading.ts - terms.total;
  const state = classifyCloudState(corrected, calibration.boundaries);

  if (logger) {
    logger.debug(
      "Drift: linear=" + terms.linear.toFixed(3) +
      " exp=" + terms.exponential.toFixed(3) +
      " log=" + terms.logarithmic.toFixed(3) +
      " total=" + terms.total.toFixed(3)
    );
    logger.debug(
      "Sky: " + fmtTemp(corrected) +
      " raw=" + fmtTemp(reading.ts) +
      " ambient=" + fmtTemp(reading.ta) +
      " => " + cloudStateName(state)
    );
  }

  return {
    rawSkyTemp: reading.ts,
    ambientTemp: reading.ta,
    correctedSkyTemp: corrected,
    state: state,
    stateName: cloudStateName(state)
  };
}

/**
 * Estimate sky condition from a single reading
 *
 * @param reading - Raw sky and ambient temperatures
 * @param settings - Station settings (coefficients and thresholds)
 * @param logger - Optional logger for the drift breakdown
 * @returns Corrected temperature and cloud state
 */
export function estimateSkyCondition(
  reading: SkyReading,
  settings: WeatherSettings,
  logger?: Logger
): SkyEstimate {
  return estimateWithCalibration(
    reading,
    { coefficients: settings.skytemp, boundaries: boundariesFromSettings(settings) },
    logger
  );
}

/**
 * Estimate sky condition from the samples of one capture
 *
 * Sky and ambient temperatures are averaged over the last
 * `settings.num_readings` samples before correction.
 *
 * @throws {AveragingValidationError} On an empty capture or a non-finite sample
 */
export function estimateFromSamples(
  samples: readonly SkyReading[],
  settings: WeatherSettings,
  logger?: Logger
): SkyEstimate {
  const config = { numReadings: settings.num_readings };
  const skyBuffer = createEmptyBuffer();
  const ambientBuffer = createEmptyBuffer();
  let ts = NaN;
  let ta = NaN;

  for (const sample of samples) {
    ts = updateReadingAverage(skyBuffer, sample.ts, config).value;
    ta = updateReadingAverage(ambientBuffer, sample.ta, config).value;
  }

  if (skyBuffer.samples.length === 0) {
    throw new AveragingValidationError("estimateFromSamples: no samples in capture");
  }

  if (logger) {
    logger.debug("Averaged " + skyBuffer.samples.length + " of " + samples.length + " samples");
  }

  return estimateSkyCondition({ ts: ts, ta: ta }, settings, logger);
}
