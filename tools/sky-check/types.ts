// ==============================================================================
// SKY CHECK TYPES
// ==============================================================================

import type { Chalk } from 'chalk'

/**
 * Where the harness writes, and how it colours
 */
export interface SkyCheckIO {
  out(line: string): void
  err(line: string): void
  style: Chalk
}

/**
 * Command-line flags
 */
export interface SkyCheckOptions {
  /** Use coefficients and thresholds from config.env / AAG_ variables */
  config?: boolean
  /** dotenv file to read (implies config) */
  envFile?: string
  /** Log the drift breakdown */
  verbose?: boolean
  /** Print the estimate as JSON */
  json?: boolean
}
