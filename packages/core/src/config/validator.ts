/**
 * @switchyard/core - Configuration validator
 *
 * Validates a SwitchyardConfig object using TypeBox and applies business
 * rules (catalog references, duplicate ids and labels).
 */

import { Value } from '@sinclair/typebox/value';
import { SwitchyardConfigSchema, type SwitchyardConfig } from './schema.js';

/** Validation result */
export interface ValidationResult {
  valid: boolean;
  errors: ValidationError[];
  warnings: ValidationWarning[];
  config: SwitchyardConfig;
}

export interface ValidationError {
  path: string;
  message: string;
}

export interface ValidationWarning {
  path: string;
  message: string;
}

/**
 * Validate and normalise a SwitchyardConfig object.
 *
 * 1. TypeBox schema check
 * 2. Provider ids must be unique
 * 3. Catalog entries must reference a declared provider
 * 4. Duplicate catalog labels are reported as warnings
 */
export function validateConfig(raw: unknown): ValidationResult {
  const errors: ValidationError[] = [];
  const warnings: ValidationWarning[] = [];

  const withDefaults = Value.Default(SwitchyardConfigSchema, Value.Clone(raw));

  for (const err of Value.Errors(SwitchyardConfigSchema, withDefaults)) {
    errors.push({ path: err.path, message: err.message });
  }

  if (errors.length > 0) {
    return { valid: false, errors, warnings, config: Value.Cast(SwitchyardConfigSchema, withDefaults) };
  }

  const config = Value.Decode(SwitchyardConfigSchema, withDefaults);

  // ----- Business rules -----
  const providerIds = new Set<string>();
  config.providers.forEach((provider, i) => {
    if (providerIds.has(provider.id)) {
      errors.push({ path: `/providers/${i}/id`, message: `Duplicate provider id "${provider.id}"` });
    }
    providerIds.add(provider.id);
  });

  const labels = new Set<string>();
  config.catalog.forEach((entry, i) => {
    if (!providerIds.has(entry.provider)) {
      errors.push({
        path: `/catalog/${i}/provider`,
        message: `Catalog entry "${entry.label}" references undeclared provider "${entry.provider}"`,
      });
    }
    if (labels.has(entry.label)) {
      warnings.push({
        path: `/catalog/${i}/label`,
        message: `Duplicate catalog label "${entry.label}"; every entry is still tried`,
      });
    }
    labels.add(entry.label);
  });

  if (config.proxy.demoteAfter < config.proxy.failureThreshold) {
    warnings.push({
      path: '/proxy/demoteAfter',
      message: `demoteAfter (${config.proxy.demoteAfter}) is below failureThreshold (${config.proxy.failureThreshold}); proxies will be deactivated before they are marked not working`,
    });
  }

  return {
    valid: errors.length === 0,
    errors,
    warnings,
    config,
  };
}
