/**
 * @textrelay/fallback - Provider orchestration for text generation
 *
 * Priority-ordered failover across interchangeable text backends with:
 *   - An atomically refreshable provider registry
 *   - Cached availability probing with degradation tracking
 *   - Exponential-backoff retries for transient failures
 *
 * @packageDocumentation
 */

// Errors
export {
  RelayError,
  ConfigurationError,
  ProviderNotConfiguredError,
  TransientError,
  PermanentError,
  ExhaustionError,
  classifyHttpStatus,
  httpError,
  isTransient,
  type ErrorClass,
} from './errors.js';

// Contracts
export type {
  MessageRole,
  ChatMessage,
  ExtraOptions,
  RequestSpec,
  GenerationRequest,
  CallOptions,
  TextAdapter,
  AdapterFactory,
  AttemptStatus,
  StatusReporter,
} from './types.js';

// Registry
export {
  ProviderRegistry,
  resolvePriority,
  type RegistrySnapshot,
  type RefreshListener,
  type ProviderRegistryOptions,
} from './registry.js';

// Availability
export {
  AvailabilityProbe,
  type AvailabilityRecord,
  type AvailabilityProbeOptions,
  type CheckOptions,
  type HealthReport,
  type OverallStatus,
} from './probe.js';

// Retry
export {
  RetryPolicy,
  type RetryPolicyOptions,
  type RetryContext,
  type RetryRunOptions,
} from './retry.js';

// Status sink
export { safeReport, InMemoryStatusReporter, type ProviderStatusEntry } from './status.js';

// Orchestration
export {
  FallbackOrchestrator,
  validateRequest,
  resolveRequest,
  NO_PROVIDERS_MESSAGE,
  ABORTED_MESSAGE,
  type FallbackAttempt,
  type FallbackResult,
  type FallbackOrchestratorOptions,
  type GenerateOptions,
} from './orchestrator.js';
