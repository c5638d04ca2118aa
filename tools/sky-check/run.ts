/**
 * Sky check harness
 * Corrects one reading and prints the cloud state
 */

import { APP_CONSTANTS, DEFAULT_SETTINGS } from '../../src/boot/config'
import { loadSettings } from '../../src/boot/settings'
import { createConsoleSink, createLogger } from '../../src/logging'
import { estimateSkyCondition, estimateWithCalibration } from '../../src/system/estimator'
import { ValidationError } from '../../src/types/errors'
import { createNodeTimer } from '../../src/utils/time'

import type { LoadedSettings } from '../../src/boot/settings'
import type { CloudStateName } from '../../src/core/cloud-state'
import type { Logger } from '../../src/logging'
import type { SkyEstimate } from '../../src/system/estimator'
import type { SkyCheckIO, SkyCheckOptions } from './types'

export const USAGE = 'Usage: sky-check <Ts> <Ta>'

function createCliLogger(io: SkyCheckIO, verbose: boolean): Logger {
  const levels = APP_CONSTANTS.LOG_LEVELS
  const sink = createConsoleSink(
    createNodeTimer(),
    { log: io.err, warn: io.err },
    {
      bufferSize: APP_CONSTANTS.CONSOLE_BUFFER_SIZE,
      drainInterval: APP_CONSTANTS.CONSOLE_INTERVAL_MS,
      warnLevel: levels.WARNING,
    },
  )
  return createLogger({
    level: verbose ? levels.DEBUG : levels.WARNING,
    levels: levels,
    sinks: [sink],
  })
}

function parseTemperature(value: string): number | null {
  if (value.trim() === '') return null
  const parsed = Number(value)
  return isNaN(parsed) ? null : parsed
}

function paintState(io: SkyCheckIO, name: CloudStateName): string {
  switch (name) {
    case 'CLEAR':
      return io.style.green(name)
    case 'CLOUDY':
      return io.style.yellow(name)
    case 'VERY_CLOUDY':
      return io.style.red(name)
  }
}

/**
 * Run the harness
 * @returns Process exit code
 */
export function runSkyCheck(args: string[], options: SkyCheckOptions, io: SkyCheckIO): number {
  if (args.length !== 2) {
    io.out(USAGE)
    return 1
  }

  const ts = parseTemperature(args[0])
  const ta = parseTemperature(args[1])
  if (ts === null || ta === null) {
    io.out(USAGE)
    return 1
  }

  let logger: Logger | undefined

  try {
    // Without --config the default coefficients meet the classifier's own limits
    let loaded: LoadedSettings | undefined
    if (options.config || options.envFile !== undefined) {
      loaded = loadSettings({ envFile: options.envFile })
    }

    const verbose = options.verbose === true || (loaded !== undefined && loaded.settings.verbose_logging)
    logger = createCliLogger(io, verbose)

    let estimate: SkyEstimate
    if (loaded) {
      for (const warning of loaded.warnings) {
        logger.warning(warning.message)
      }
      estimate = estimateSkyCondition({ ts: ts, ta: ta }, loaded.settings, logger)
    } else {
      estimate = estimateWithCalibration({ ts: ts, ta: ta }, { coefficients: DEFAULT_SETTINGS.skytemp }, logger)
    }

    if (options.json) {
      io.out(JSON.stringify(estimate))
    } else {
      io.out(`T_sky: ${estimate.correctedSkyTemp.toFixed(2)} °C => ${paintState(io, estimate.stateName)}`)
    }
    return 0
  } catch (error) {
    if (!(error instanceof ValidationError)) {
      throw error
    }
    io.err(io.style.red('Error:') + ' ' + error.message)
    return 1
  } finally {
    if (logger) {
      logger.flush()
    }
  }
}
