#!/usr/bin/env node
/**
 * Sky check CLI
 * Prints the drift-corrected sky temperature and cloud state for one reading
 */

import chalk from 'chalk'
import { Command } from 'commander'

import { runSkyCheck } from './run'

import type { SkyCheckIO, SkyCheckOptions } from './types'

/**
 * Build the command; `onExit` receives the exit code
 */
export function createProgram(io: SkyCheckIO, onExit: (code: number) => void): Command {
  const program = new Command()

  program
    .name('sky-check')
    .description('Correct an infrared sky temperature and classify the cloud state')
    .argument('[values...]', 'raw sky temperature and ambient temperature in °C')
    .option('-c, --config', 'use coefficients and thresholds from config.env and AAG_ variables')
    .option('-e, --env-file <path>', 'read settings from this dotenv file')
    .option('-v, --verbose', 'log the drift breakdown')
    .option('--json', 'print the estimate as JSON')
    // negative temperatures look like short options
    .allowUnknownOption()
    .action((values: string[], options: SkyCheckOptions) => {
      onExit(runSkyCheck(values, options, io))
    })

  return program
}

if (require.main === module) {
  const io: SkyCheckIO = {
    out: (line) => console.log(line),
    err: (line) => console.error(line),
    style: chalk,
  }
  createProgram(io, (code) => {
    process.exitCode = code
  }).parse(process.argv)
}
