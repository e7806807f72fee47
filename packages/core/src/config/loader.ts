/**
 * @textrelay/core - Configuration loader
 *
 * Loads textrelay.json, merges with defaults, applies environment overrides,
 * resolves $env: references, validates and freezes the result.
 */

import { readFileSync, existsSync } from 'node:fs';
import { readFile } from 'node:fs/promises';
import { Value } from '@sinclair/typebox/value';
import { RelayConfigSchema, DEFAULT_CONFIG, type RelayConfig } from './schema.js';
import { validateConfig, type ValidationResult } from './validator.js';
import { resolveConfigPath } from './paths.js';
import { ENV_REF_PREFIX } from './placeholder.js';
import { deepFreeze, isPlainObject } from '../utils/index.js';

type Env = Record<string, string | undefined>;

export interface LoadConfigOptions {
  /** Explicit config file path. Defaults to resolveConfigPath(env). */
  path?: string;
  /** Environment used for $env: references and overrides. Defaults to process.env. */
  env?: Env;
}

export interface LoadedConfig {
  config: Readonly<RelayConfig>;
  validation: ValidationResult;
  /** The file that was read, or null when defaults were used. */
  source: string | null;
}

/**
 * Deep-merge two objects.  Arrays are replaced (not concatenated).
 */
function deepMerge(
  base: Record<string, unknown>,
  override: Record<string, unknown>,
): Record<string, unknown> {
  const result: Record<string, unknown> = { ...base };

  for (const key of Object.keys(override)) {
    const overVal = override[key];
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
 * Recursively walk a value and replace "$env:NAME" strings with the
 * environment value. Unset variables become the empty string, which the
 * placeholder check treats as a missing credential.
 */
function resolveEnvRefs(obj: unknown, env: Env): unknown {
  if (typeof obj === 'string' && obj.startsWith(ENV_REF_PREFIX)) {
    const key = obj.slice(ENV_REF_PREFIX.length);
    return env[key] ?? '';
  }

  if (Array.isArray(obj)) {
    return obj.map((item) => resolveEnvRefs(item, env));
  }

  if (isPlainObject(obj)) {
    return Object.fromEntries(
      Object.entries(obj).map(([k, v]) => [k, resolveEnvRefs(v, env)] as const),
    );
  }

  return obj;
}

/**
 * DEFAULT_CONFIG with its $env: credentials resolved. Used when the merged
 * configuration fails the schema.
 */
function resolvedDefaults(env: Env): RelayConfig {
  const withDefaults = Value.Default(RelayConfigSchema, Value.Clone(DEFAULT_CONFIG));
  return Value.Decode(RelayConfigSchema, resolveEnvRefs(withDefaults, env));
}

/**
 * Overlay the flat environment variables the agent has always honoured.
 */
function applyEnvOverrides(merged: Record<string, unknown>, env: Env): Record<string, unknown> {
  const result = { ...merged };

  const defaultProvider = env['DEFAULT_LLM_PROVIDER']?.trim();
  if (defaultProvider) {
    result['defaultProvider'] = defaultProvider;
  }

  const priority = env['LLM_PROVIDER_PRIORITY'];
  if (priority) {
    result['priority'] = priority
      .split(',')
      .map((p) => p.trim())
      .filter((p) => p.length > 0);
  }

  const defaults = isPlainObject(result['defaults']) ? { ...result['defaults'] } : {};
  if (env['TEMPERATURE']) defaults['temperature'] = Number(env['TEMPERATURE']);
  if (env['MAX_TOKENS']) defaults['maxTokens'] = Number(env['MAX_TOKENS']);
  result['defaults'] = defaults;

  const logLevel = env['LOG_LEVEL']?.trim().toLowerCase();
  if (logLevel) {
    const logging = isPlainObject(result['logging']) ? result['logging'] : {};
    result['logging'] = { ...logging, level: logLevel };
  }

  // DEFAULT_MODEL only applies to the default provider
  const defaultModel = env['DEFAULT_MODEL']?.trim();
  const target = result['defaultProvider'];
  if (defaultModel && typeof target === 'string' && Array.isArray(result['providers'])) {
    result['providers'] = result['providers'].map((p: unknown) =>
      isPlainObject(p) && p['name'] === target ? { ...p, model: defaultModel } : p,
    );
  }

  return result;
}

/**
 * Turn parsed file contents into a validated, frozen configuration.
 *
 * 1. Deep-merge with DEFAULT_CONFIG
 * 2. Apply environment overrides
 * 3. Fill TypeBox defaults
 * 4. Resolve $env: references
 * 5. Validate, falling back to the resolved defaults on a schema failure
 */
export function buildConfig(
  rawJson: unknown,
  env: Env = process.env,
): { config: Readonly<RelayConfig>; validation: ValidationResult } {
  let fileValues: Record<string, unknown> = {};
  if (rawJson !== undefined) {
    if (!isPlainObject(rawJson)) {
      throw new Error('Configuration root must be a JSON object');
    }
    fileValues = rawJson;
  }

  const merged = deepMerge(Value.Clone(DEFAULT_CONFIG), fileValues);
  const overridden = applyEnvOverrides(merged, env);
  const withDefaults = Value.Default(RelayConfigSchema, Value.Clone(overridden));
  const resolved = resolveEnvRefs(withDefaults, env);

  const validation = validateConfig(resolved, resolvedDefaults(env));
  return { config: deepFreeze(validation.config), validation };
}

function parseConfigText(text: string, path: string): unknown {
  try {
    return JSON.parse(text);
  } catch (err) {
    throw new Error(
      `Failed to parse ${path}: ${err instanceof Error ? err.message : String(err)}`,
    );
  }
}

/**
 * Load the textrelay configuration. A missing file means "defaults only".
 */
export async function loadConfig(options: LoadConfigOptions = {}): Promise<LoadedConfig> {
  const env = options.env ?? process.env;
  const path = options.path ?? resolveConfigPath(env);

  let rawJson: unknown;
  let source: string | null = null;

  if (existsSync(path)) {
    rawJson = parseConfigText(await readFile(path, 'utf-8'), path);
    source = path;
  }

  return { ...buildConfig(rawJson, env), source };
}

/**
 * Synchronous config read, for startup code that cannot await.
 */
export function loadConfigSync(options: LoadConfigOptions = {}): LoadedConfig {
  const env = options.env ?? process.env;
  const path = options.path ?? resolveConfigPath(env);

  let rawJson: unknown;
  let source: string | null = null;

  if (existsSync(path)) {
    rawJson = parseConfigText(readFileSync(path, 'utf-8'), path);
    source = path;
  }

  return { ...buildConfig(rawJson, env), source };
}
