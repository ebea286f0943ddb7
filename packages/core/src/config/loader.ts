/**
 * @switchyard/core - Configuration loader
 *
 * Loads switchyard.json from SWITCHYARD_HOME, merges it over the defaults
 * and validates the result.
 */

import { readFileSync, existsSync, writeFileSync } from 'node:fs';
import { DEFAULT_CONFIG, type SwitchyardConfig } from './schema.js';
import { validateConfig, type ValidationResult } from './validator.js';
import { ensureDirectories } from './paths.js';
import { isPlainObject } from '../utils/index.js';

/**
 * Deep-merge two objects.  Arrays are replaced (not concatenated).
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
 * Merge a raw user document over DEFAULT_CONFIG and validate it.
 */
export function parseConfig(rawJson: unknown): { config: SwitchyardConfig; validation: ValidationResult } {
  if (!isPlainObject(rawJson)) {
    throw new Error('Configuration root must be a JSON object');
  }

  const defaults: Record<string, unknown> = { ...DEFAULT_CONFIG };
  const merged = deepMerge(defaults, rawJson);
  const validation = validateConfig(merged);

  return { config: validation.config, validation };
}

/**
 * Load the configuration.
 *
 * 1. Read SWITCHYARD_HOME/switchyard.json (create with defaults if missing)
 * 2. Deep-merge with DEFAULT_CONFIG
 * 3. Apply TypeBox defaults and validate
 */
export function loadConfig(configPath?: string): { config: SwitchyardConfig; validation: ValidationResult } {
  const path = configPath ?? ensureDirectories().config;

  let rawJson: unknown;

  if (existsSync(path)) {
    const text = readFileSync(path, 'utf-8');
    try {
      rawJson = JSON.parse(text);
    } catch (err) {
      throw new Error(
        `Failed to parse ${path}: ${err instanceof Error ? err.message : String(err)}`,
      );
    }
  } else {
    rawJson = DEFAULT_CONFIG;
    writeFileSync(path, JSON.stringify(DEFAULT_CONFIG, null, 2), 'utf-8');
  }

  return parseConfig(rawJson);
}
