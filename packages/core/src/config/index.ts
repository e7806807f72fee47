export {
  RelayConfigSchema,
  ProviderKindSchema,
  DEFAULT_CONFIG,
  type RelayConfig,
  type ProviderConfig,
  type ProviderKind,
  type GenerationDefaults,
  type RetryConfig,
  type ProbeConfig,
} from './schema.js';
export { loadConfig, loadConfigSync, buildConfig, type LoadConfigOptions, type LoadedConfig } from './loader.js';
export { validateConfig, KNOWN_PROVIDER_OPTIONS, type ValidationResult, type ValidationError, type ValidationWarning } from './validator.js';
export { isPlaceholderCredential, ENV_REF_PREFIX } from './placeholder.js';
export { resolveRelayHome, resolveConfigPath, CONFIG_FILE_NAME } from './paths.js';
