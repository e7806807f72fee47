/**
 * @textrelay/fallback - Shared types
 *
 * The adapter contract every backend implements, the caller-facing request
 * shape and the normalised request adapters receive.
 */

import type { ProviderConfig } from '@textrelay/core';

// ---------------------------------------------------------------------------
// Requests
// ---------------------------------------------------------------------------

export type MessageRole = 'system' | 'user' | 'assistant';

export interface ChatMessage {
  role: MessageRole;
  content: string;
}

/** Opaque per-provider options, keyed by wire name (e.g. `top_p`). Filtered per provider. */
export type ExtraOptions = Readonly<Record<string, unknown>>;

/** What a caller hands to the orchestrator. Exactly one of prompt/messages is required. */
export interface RequestSpec {
  prompt?: string;
  messages?: readonly ChatMessage[];
  systemPrompt?: string;
  temperature?: number;
  maxTokens?: number;
  /** Try this provider first, if it is available. */
  provider?: string;
  options?: ExtraOptions;
}

/** A RequestSpec resolved against defaults for one provider. */
export interface GenerationRequest {
  messages: readonly ChatMessage[];
  systemPrompt?: string;
  temperature: number;
  maxTokens: number;
  options: ExtraOptions;
}

export interface CallOptions {
  /** Aborts the outbound call. */
  signal?: AbortSignal;
  /** Overrides the adapter's own timeout for this call. */
  timeoutMs?: number;
}

// ---------------------------------------------------------------------------
// Adapters
// ---------------------------------------------------------------------------

/**
 * One backend. Rejects with TransientError or PermanentError.
 */
export interface TextAdapter {
  /** Provider name from configuration (unique within a registry). */
  readonly name: string;
  readonly model: string;
  readonly config: Readonly<ProviderConfig>;
  generateText(request: GenerationRequest, options?: CallOptions): Promise<string>;
}

/** Builds an adapter from a provider's configuration. Throws ConfigurationError when it cannot. */
export type AdapterFactory<A extends TextAdapter = TextAdapter> = (config: Readonly<ProviderConfig>) => A;

// ---------------------------------------------------------------------------
// Observability
// ---------------------------------------------------------------------------

export interface AttemptStatus {
  available: boolean;
  error: string | null;
  latencyMs: number;
}

/** Optional sink receiving one event per attempt. Failures never affect results. */
export interface StatusReporter {
  report(provider: string, status: AttemptStatus): void | Promise<void>;
}
