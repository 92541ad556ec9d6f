/**
 * Tracker configuration
 * YAML file (optional) + environment overrides, validated with zod
 */

import * as fs from 'fs';
import * as YAML from 'yaml';
import { ZodError } from 'zod';
import { TrackerConfig, validateTrackerConfig } from '../spec/schema';
import { ConfigError, formatZodIssues } from './errors';

export const CONFIG_PATH_ENV = 'SPEC_TIMERS_CONFIG';

export interface LoadConfigOptions {
  /** Explicit YAML path; falls back to SPEC_TIMERS_CONFIG */
  path?: string;
  env?: NodeJS.ProcessEnv;
}

function parseBoolean(name: string, value: string): boolean {
  const normalized = value.trim().toLowerCase();
  if (normalized === 'true' || normalized === '1') return true;
  if (normalized === 'false' || normalized === '0') return false;
  throw new ConfigError(`${name} must be true or false, got "${value}"`);
}

function readConfigFile(filePath: string): Record<string, unknown> {
  if (!fs.existsSync(filePath)) {
    throw new ConfigError(`Config file not found: ${filePath}`);
  }

  let parsed: unknown;
  try {
    parsed = YAML.parse(fs.readFileSync(filePath, 'utf-8'));
  } catch (error) {
    const message = error instanceof Error ? error.message : String(error);
    throw new ConfigError(`Failed to parse ${filePath}: ${message}`);
  }

  if (parsed === null || parsed === undefined) {
    return {};
  }
  if (typeof parsed !== 'object' || Array.isArray(parsed)) {
    throw new ConfigError(`${filePath} must contain a mapping`);
  }
  return { ...parsed };
}

/**
 * Environment values win over the file
 */
function applyEnvOverrides(
  raw: Record<string, unknown>,
  env: NodeJS.ProcessEnv
): Record<string, unknown> {
  const fileDisplay = raw.display;
  const display: Record<string, unknown> =
    typeof fileDisplay === 'object' && fileDisplay !== null && !Array.isArray(fileDisplay)
      ? { ...fileDisplay }
      : {};

  if (env.SPEC_TIMERS_REGEN_FORMAT) {
    display.regenFormat = env.SPEC_TIMERS_REGEN_FORMAT.trim().toLowerCase();
  }
  if (env.SPEC_TIMERS_COOLDOWN_FORMAT) {
    display.cooldownFormat = env.SPEC_TIMERS_COOLDOWN_FORMAT.trim().toLowerCase();
  }
  if (env.SPEC_TIMERS_SHOW_REGEN) {
    display.showRegen = parseBoolean('SPEC_TIMERS_SHOW_REGEN', env.SPEC_TIMERS_SHOW_REGEN);
  }
  if (env.SPEC_TIMERS_SHOW_COOLDOWN) {
    display.showCooldown = parseBoolean('SPEC_TIMERS_SHOW_COOLDOWN', env.SPEC_TIMERS_SHOW_COOLDOWN);
  }

  const merged: Record<string, unknown> = { ...raw, display };
  if (env.LOG_LEVEL) {
    merged.logLevel = env.LOG_LEVEL.trim().toLowerCase();
  }
  return merged;
}

export function loadConfig(options: LoadConfigOptions = {}): TrackerConfig {
  const env = options.env ?? process.env;
  const filePath = options.path ?? env[CONFIG_PATH_ENV];

  const raw = filePath ? readConfigFile(filePath) : {};

  try {
    return validateTrackerConfig(applyEnvOverrides(raw, env));
  } catch (error) {
    if (error instanceof ZodError) {
      throw new ConfigError(`Invalid configuration: ${formatZodIssues(error)}`, error.issues);
    }
    throw error;
  }
}
