/**
 * Settings loading
 *
 * Builds WeatherSettings from the defaults, an optional dotenv file and the
 * process environment (environment wins). Keys use the AAG_ prefix with `__`
 * between group and field, matched case-insensitively:
 *
 *   AAG_NUM_READINGS=5
 *   AAG_THRESHOLDS__CLOUDY=-20
 *   AAG_SKYTEMP__K1=30
 *   AAG_SKYTEMP={"K6": 120, "K7": 35}
 */

import * as fs from 'fs';
import * as path from 'path';

import * as dotenv from 'dotenv';

import type { WeatherSettings } from '$types';
import { SettingsValidationError } from '$types/errors';
import type { ValidationWarning } from '@validation';
import { validateSettings } from '@validation';
import { APP_CONSTANTS, DEFAULT_SETTINGS } from './config';

type Scalar = string | number | boolean | null;
type GroupName = 'thresholds' | 'heater' | 'location' | 'skytemp';
type EnvSource = Record<string, string | undefined>;

export interface LoadSettingsOptions {
  /** Environment to read; defaults to process.env */
  env?: EnvSource;
  /** dotenv file; defaults to config.env in the working directory, null to skip */
  envFile?: string | null;
}

export interface LoadedSettings {
  settings: WeatherSettings;
  warnings: ValidationWarning[];
}

const TRUE_WORDS = ['true', '1', 'yes', 'on'];
const FALSE_WORDS = ['false', '0', 'no', 'off'];

function isGroupName(value: string): value is GroupName {
  return value === 'thresholds' || value === 'heater' || value === 'location' || value === 'skytemp';
}

function parseBoolean(raw: string): boolean | undefined {
  const word = raw.trim().toLowerCase();
  if (TRUE_WORDS.indexOf(word) !== -1) return true;
  if (FALSE_WORDS.indexOf(word) !== -1) return false;
  return undefined;
}

/**
 * Convert a raw string to the type of the value it replaces
 */
function coerceValue(raw: string, current: unknown, envKey: string, problems: string[]): Scalar | undefined {
  if (typeof current === 'number') {
    const value = raw.trim() === '' ? NaN : Number(raw);
    if (isNaN(value)) {
      problems.push(`${envKey} must be a number (got "${raw}")`);
      return undefined;
    }
    return value;
  }

  if (typeof current === 'boolean' || current === null) {
    const word = raw.trim().toLowerCase();
    if (current === null && (word === '' || word === 'null' || word === 'none')) {
      return null;
    }
    const value = parseBoolean(raw);
    if (value === undefined) {
      problems.push(`${envKey} must be a boolean (got "${raw}")`);
    }
    return value;
  }

  if (typeof current === 'string') {
    return raw;
  }

  return undefined;
}

/**
 * Replace one field of a record, matching the field name case-insensitively
 * Unknown fields leave the record unchanged
 */
function applyOverride<T extends object>(
  target: T,
  field: string,
  raw: string,
  envKey: string,
  problems: string[]
): T {
  for (const key in target) {
    if (key.toLowerCase() !== field) {
      continue;
    }
    const value = coerceValue(raw, target[key], envKey, problems);
    if (value === undefined) {
      return target;
    }
    return { ...target, [key]: value };
  }
  return target;
}

function overrideGroup(
  settings: WeatherSettings,
  group: GroupName,
  field: string,
  raw: string,
  envKey: string,
  problems: string[]
): WeatherSettings {
  switch (group) {
    case 'thresholds':
      return { ...settings, thresholds: applyOverride(settings.thresholds, field, raw, envKey, problems) };
    case 'heater':
      return { ...settings, heater: applyOverride(settings.heater, field, raw, envKey, problems) };
    case 'location':
      return { ...settings, location: applyOverride(settings.location, field, raw, envKey, problems) };
    case 'skytemp':
      return { ...settings, skytemp: applyOverride(settings.skytemp, field, raw, envKey, problems) };
  }
}

/**
 * Apply a whole group given as a JSON object
 */
function overrideGroupJson(
  settings: WeatherSettings,
  group: GroupName,
  raw: string,
  envKey: string,
  problems: string[]
): WeatherSettings {
  let parsed: unknown;
  try {
    parsed = JSON.parse(raw);
  } catch (err) {
    problems.push(`${envKey} must be a JSON object (${String(err)})`);
    return settings;
  }
  if (typeof parsed !== 'object' || parsed === null || Array.isArray(parsed)) {
    problems.push(`${envKey} must be a JSON object`);
    return settings;
  }

  let result = settings;
  for (const [field, value] of Object.entries(parsed)) {
    result = overrideGroup(result, group, field.toLowerCase(), String(value), envKey + '.' + field, problems);
  }
  return result;
}

/**
 * Apply every prefixed variable of `vars` on top of `base`
 *
 * @param base - Settings to start from
 * @param vars - Variables, later entries win
 * @param problems - Collects parse failures
 * @returns New settings object
 */
export function applyEnvOverrides(base: WeatherSettings, vars: EnvSource, problems: string[]): WeatherSettings {
  const prefix = APP_CONSTANTS.ENV_PREFIX;
  let settings = base;

  for (const [envKey, raw] of Object.entries(vars)) {
    if (raw === undefined || envKey.toUpperCase().indexOf(prefix) !== 0) {
      continue;
    }

    const parts = envKey.slice(prefix.length).toLowerCase().split(APP_CONSTANTS.ENV_NESTED_DELIMITER);
    if (parts.length === 1) {
      const name = parts[0];
      settings = isGroupName(name)
        ? overrideGroupJson(settings, name, raw, envKey, problems)
        : applyOverride(settings, name, raw, envKey, problems);
    } else if (parts.length === 2 && isGroupName(parts[0])) {
      settings = overrideGroup(settings, parts[0], parts[1], raw, envKey, problems);
    }
  }

  return settings;
}

/**
 * Read a dotenv file
 * A missing default file is fine; a missing explicit file is a problem
 */
function readEnvFile(file: string, explicit: boolean, problems: string[]): EnvSource {
  if (!fs.existsSync(file)) {
    if (explicit) {
      problems.push(`env file not found: ${file}`);
    }
    return {};
  }
  return dotenv.parse(fs.readFileSync(file));
}

/**
 * Load and validate weather station settings
 *
 * @throws {SettingsValidationError} When a variable cannot be parsed or validation reports errors
 */
export function loadSettings(options: LoadSettingsOptions = {}): LoadedSettings {
  const problems: string[] = [];
  const env = options.env ?? process.env;

  let fileVars: EnvSource = {};
  if (options.envFile !== null) {
    const explicit = options.envFile !== undefined;
    const file = options.envFile ?? path.resolve(process.cwd(), APP_CONSTANTS.ENV_FILE);
    fileVars = readEnvFile(file, explicit, problems);
  }

  let settings = applyEnvOverrides(DEFAULT_SETTINGS, fileVars, problems);
  settings = applyEnvOverrides(settings, env, problems);

  const result = validateSettings(settings);
  for (const error of result.errors) {
    problems.push(error.message);
  }
  if (problems.length > 0) {
    throw new SettingsValidationError(problems);
  }

  return { settings: settings, warnings: result.warnings };
}
