/**
 * textrelay - Failover text generation across LLM providers
 *
 * @packageDocumentation
 */

export { TextRelay, type TextRelayOptions } from './relay.js';
export * from './models/index.js';

export {
  loadConfig,
  loadConfigSync,
  validateConfig,
  isPlaceholderCredential,
  DEFAULT_CONFIG,
  type RelayConfig,
  type ProviderConfig,
  type ProviderKind,
} from '@textrelay/core';

export {
  FallbackOrchestrator,
  ProviderRegistry,
  AvailabilityProbe,
  RetryPolicy,
  InMemoryStatusReporter,
  RelayError,
  ConfigurationError,
  ProviderNotConfiguredError,
  TransientError,
  PermanentError,
  ExhaustionError,
  type RequestSpec,
  type ChatMessage,
  type FallbackResult,
  type FallbackAttempt,
  type TextAdapter,
  type StatusReporter,
  type AttemptStatus,
  type AvailabilityRecord,
  type HealthReport,
} from '@textrelay/fallback';
