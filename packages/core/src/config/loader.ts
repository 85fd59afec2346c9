/**
 * @veil/core - Configuration loader
 *
 * Loads veil.json, merges it over the defaults, applies TypeBox defaults
 * and validates. Any invalid value is a ConfigurationError: processing
 * never starts on a half-valid configuration.
 */

import { readFileSync, existsSync } from 'node:fs';
import { Value } from '@sinclair/typebox/value';
import { ConfigurationError } from '../errors.js';
import { isPlainObject } from '../utils/index.js';
import { VeilConfigSchema, DEFAULT_CONFIG, type VeilConfig } from './schema.js';
import { validateConfig } from './validator.js';
import { buildPaths } from './paths.js';

/**
 * Deep-merge two objects. Arrays are replaced (not concatenated).
 */
export function deepMerge(
  base: Record<string, unknown>,
  override: Record<string, unknown>,
): Record<string, unknown> {
  const result: Record<string, unknown> = { ...base };

  for (const [key, overVal] of Object.entries(override)) {
    const baseVal = result[key];
    if (isPlainObject(overVal) && isPlainObject(baseVal)) {
      result[key] = deepMerge(baseVal, overVal);
    } else if (overVal !== undefined) {
      result[key] = overVal;
    }
  }

  return result;
}

/**
 * Resolve a raw (parsed) config into a validated VeilConfig.
 *
 * 1. Deep-merge with DEFAULT_CONFIG
 * 2. Fill TypeBox defaults
 * 3. Validate; throw ConfigurationError on any issue
 */
export function resolveConfig(raw: unknown): VeilConfig {
  let overrides: Record<string, unknown> = {};
  if (raw !== undefined) {
    if (!isPlainObject(raw)) {
      throw new ConfigurationError('Configuration must be a JSON object');
    }
    overrides = raw;
  }

  const defaults: Record<string, unknown> = { ...DEFAULT_CONFIG };
  const merged = deepMerge(defaults, overrides);
  const withDefaults = Value.Default(VeilConfigSchema, Value.Clone(merged));

  const validation = validateConfig(withDefaults);
  if (!validation.valid || validation.config === null) {
    throw new ConfigurationError('Invalid configuration', validation.errors);
  }
  return validation.config;
}

/**
 * Load the configuration file. A missing file yields the defaults.
 *
 * @param configPath - Defaults to VEIL_HOME/veil.json
 */
export function loadConfig(configPath: string = buildPaths().config): VeilConfig {
  if (!existsSync(configPath)) {
    return resolveConfig(undefined);
  }

  const text = readFileSync(configPath, 'utf-8');
  let rawJson: unknown;
  try {
    rawJson = JSON.parse(text);
  } catch (err) {
    throw new ConfigurationError(
      `Failed to parse ${configPath}: ${err instanceof Error ? err.message : String(err)}`,
    );
  }

  return resolveConfig(rawJson);
}
