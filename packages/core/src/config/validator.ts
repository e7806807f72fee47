/**
 * @textrelay/core - Configuration validator
 *
 * Validates a RelayConfig object using TypeBox, then applies business rules
 * (unique provider names, priority references, option allow-lists).
 */

import { Value } from '@sinclair/typebox/value';
import { DEFAULT_CONFIG, RelayConfigSchema, type RelayConfig } from './schema.js';

/** Validation result */
export interface ValidationResult {
  valid: boolean;
  errors: ValidationError[];
  warnings: ValidationWarning[];
  config: RelayConfig;
  /** True when the input failed the schema and `config` is the fallback. */
  usedDefaults: boolean;
}

export interface ValidationError {
  path: string;
  message: string;
}

export interface ValidationWarning {
  path: string;
  message: string;
}

/** Option names each provider kind can forward. Narrowed per provider by `allowedOptions`. */
export const KNOWN_PROVIDER_OPTIONS: Readonly<Record<string, readonly string[]>> = {
  openai: ['stop', 'presence_penalty', 'frequency_penalty', 'logit_bias', 'user'],
  anthropic: ['stop_sequences', 'top_p', 'top_k'],
  openrouter: ['stop', 'top_p', 'frequency_penalty', 'presence_penalty'],
  zai: ['top_p', 'stop'],
};

/**
 * Validate and normalise a RelayConfig object.
 *
 * 1. TypeBox schema check; on failure `fallback` is returned instead
 * 2. Duplicate provider names (error)
 * 3. Priority / defaultProvider references to unknown providers (warning)
 * 4. allowedOptions the provider kind does not support (warning)
 */
export function validateConfig(raw: unknown, fallback: RelayConfig = DEFAULT_CONFIG): ValidationResult {
  const errors: ValidationError[] = [];
  const warnings: ValidationWarning[] = [];

  for (const err of Value.Errors(RelayConfigSchema, raw)) {
    errors.push({ path: err.path, message: err.message });
  }

  if (errors.length > 0) {
    return {
      valid: false,
      errors,
      warnings,
      config: Value.Clone(fallback),
      usedDefaults: true,
    };
  }

  const config = Value.Decode(RelayConfigSchema, raw);

  // ----- Business rules -----
  const seen = new Set<string>();
  config.providers.forEach((provider, i) => {
    const prefix = `/providers/${i}`;

    if (seen.has(provider.name)) {
      errors.push({
        path: `${prefix}/name`,
        message: `Duplicate provider name "${provider.name}"`,
      });
    }
    seen.add(provider.name);

    const supported = KNOWN_PROVIDER_OPTIONS[provider.kind] ?? [];
    for (const option of provider.allowedOptions ?? []) {
      if (!supported.includes(option)) {
        warnings.push({
          path: `${prefix}/allowedOptions`,
          message: `Option "${option}" is not supported by ${provider.kind} providers and will be ignored`,
        });
      }
    }
  });

  config.priority.forEach((name, i) => {
    if (!seen.has(name)) {
      warnings.push({
        path: `/priority/${i}`,
        message: `Priority entry "${name}" does not match any configured provider`,
      });
    }
  });

  if (config.defaultProvider !== undefined && !seen.has(config.defaultProvider)) {
    warnings.push({
      path: '/defaultProvider',
      message: `Default provider "${config.defaultProvider}" does not match any configured provider`,
    });
  }

  return {
    valid: errors.length === 0,
    errors,
    warnings,
    config,
    usedDefaults: false,
  };
}
