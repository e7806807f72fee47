/**
 * @textrelay/fallback - FallbackOrchestrator
 *
 * Turns one RequestSpec into one FallbackResult:
 *
 *   SELECT    explicit provider (if any), then the priority list, de-duplicated,
 *             limited to configured providers
 *   ATTEMPT   probe availability; unavailable -> NEXT without touching the
 *             retry budget; available -> call through RetryPolicy
 *   SUCCESS   text + chosen provider
 *   NEXT      record the failure, move on
 *   EXHAUSTED { text: null, error } -- returned, never thrown
 *
 * Candidates are tried strictly one after another. Each request reads one
 * registry snapshot for its whole lifetime.
 */

import pino from 'pino';
import {
  errorMessage,
  generateId,
  withDeadline,
  type GenerationDefaults,
  type ProviderConfig,
} from '@textrelay/core';
import { ExhaustionError, PermanentError, TransientError } from './errors.js';
import type { AvailabilityProbe } from './probe.js';
import type { ProviderRegistry } from './registry.js';
import type { RetryPolicy } from './retry.js';
import { safeReport } from './status.js';
import type { GenerationRequest, RequestSpec, StatusReporter, TextAdapter } from './types.js';

// ---------------------------------------------------------------------------
// Types
// ---------------------------------------------------------------------------

/** Record of one candidate within a request. */
export interface FallbackAttempt {
  provider: string;
  success: boolean;
  /** True when the candidate was passed over without a real call. */
  skipped: boolean;
  error?: string;
  /** Outbound generation calls made (retries included). */
  calls: number;
  durationMs: number;
}

/** Exactly one of `text` and `error` is non-null. */
export interface FallbackResult {
  requestId: string;
  text: string | null;
  provider: string | null;
  error: string | null;
  attempts: FallbackAttempt[];
}

export interface FallbackOrchestratorOptions<A extends TextAdapter = TextAdapter> {
  registry: ProviderRegistry<A>;
  probe: AvailabilityProbe;
  retry: RetryPolicy;
  /** Optional per-attempt sink. */
  reporter?: StatusReporter;
  /** Deadline for one candidate, retries included (default 120 000 ms). */
  requestTimeoutMs?: number;
  /** Called whenever we fall back from one provider to the next. */
  onFallback?: (from: string, to: string, error: string) => void;
  logger?: pino.Logger;
}

export interface GenerateOptions {
  signal?: AbortSignal;
  /** Supplied by the caller for correlation; generated otherwise. */
  requestId?: string;
}

export const NO_PROVIDERS_MESSAGE = 'No LLM providers are configured';
export const ABORTED_MESSAGE = 'Request aborted';

// ---------------------------------------------------------------------------
// Request helpers
// ---------------------------------------------------------------------------

/**
 * Returns a description of what is wrong with `input`, or null when usable.
 */
export function validateRequest(input: RequestSpec): string | null {
  const hasPrompt = typeof input.prompt === 'string';
  const hasMessages = Array.isArray(input.messages);

  if (hasPrompt && hasMessages) {
    return 'Request must include either a prompt or messages, not both';
  }
  if (!hasPrompt && !hasMessages) {
    return 'Request must include a prompt or messages';
  }
  if (hasMessages && input.messages?.length === 0) {
    return 'Request messages must not be empty';
  }
  return null;
}

/**
 * Resolve a RequestSpec for one provider: the request's own values win,
 * then the provider's configured values, then the global defaults.
 */
export function resolveRequest(
  input: RequestSpec,
  provider: Readonly<ProviderConfig>,
  defaults: Readonly<GenerationDefaults>,
): GenerationRequest {
  const messages = input.messages ?? [{ role: 'user' as const, content: input.prompt ?? '' }];

  return {
    messages,
    systemPrompt: input.systemPrompt,
    temperature: input.temperature ?? provider.temperature ?? defaults.temperature,
    maxTokens: input.maxTokens ?? provider.maxTokens ?? defaults.maxTokens,
    options: input.options ?? {},
  };
}

/**
 * Whether a failed real call says something about the provider itself (and
 * should mark it unavailable), as opposed to something about this request.
 */
function reflectsProviderHealth(err: unknown): boolean {
  if (err instanceof TransientError) return true;
  if (err instanceof PermanentError) {
    return err.statusCode === 401 || err.statusCode === 403;
  }
  return false;
}

// ---------------------------------------------------------------------------
// FallbackOrchestrator
// ---------------------------------------------------------------------------

/**
 * ```ts
 * const orchestrator = new FallbackOrchestrator({ registry, probe, retry });
 * const { text, provider, error } = await orchestrator.generate({ prompt: 'Hi' });
 * if (text === null) degrade(error);
 * ```
 */
export class FallbackOrchestrator<A extends TextAdapter = TextAdapter> {
  private readonly registry: ProviderRegistry<A>;
  private readonly probe: AvailabilityProbe;
  private readonly retry: RetryPolicy;
  private readonly reporter?: StatusReporter;
  private readonly requestTimeoutMs: number;
  private readonly onFallback?: (from: string, to: string, error: string) => void;
  private readonly log: pino.Logger;

  constructor(options: FallbackOrchestratorOptions<A>) {
    this.registry = options.registry;
    this.probe = options.probe;
    this.retry = options.retry;
    this.reporter = options.reporter;
    this.requestTimeoutMs = options.requestTimeoutMs ?? 120_000;
    this.onFallback = options.onFallback;
    this.log = options.logger ?? pino({ name: '@textrelay/orchestrator' });
  }

  // -----------------------------------------------------------------------
  // Public API
  // -----------------------------------------------------------------------

  /**
   * Produce text for `input` from the first candidate that can. Never throws
   * for provider failures, exhaustion or cancellation; inspect the result.
   */
  async generate(input: RequestSpec, options: GenerateOptions = {}): Promise<FallbackResult> {
    const requestId = options.requestId ?? generateId();
    const signal = options.signal;
    const attempts: FallbackAttempt[] = [];

    const invalid = validateRequest(input);
    if (invalid) {
      this.log.warn({ requestId, error: invalid }, 'Rejected malformed request');
      return failure(requestId, invalid, attempts);
    }

    // --- SELECT ---------------------------------------------------------------
    const snap = this.registry.snapshot();
    // Availability learned on this snapshot is dropped once it is replaced
    const epoch = this.probe.currentEpoch;

    if (snap.adapters.size === 0) {
      this.log.error({ requestId }, NO_PROVIDERS_MESSAGE);
      return failure(requestId, NO_PROVIDERS_MESSAGE, attempts);
    }

    let lastError: string | undefined;

    if (input.provider !== undefined && !snap.adapters.has(input.provider)) {
      lastError = `Provider "${input.provider}" is not configured`;
      this.log.warn({ requestId, provider: input.provider }, lastError);
      attempts.push({
        provider: input.provider,
        success: false,
        skipped: true,
        error: lastError,
        calls: 0,
        durationMs: 0,
      });
    }

    const candidates = this.candidates(input.provider, snap.priority, snap.adapters);

    if (candidates.length === 0) {
      const message = lastError ?? 'None of the configured providers is in the priority list';
      this.log.error({ requestId }, message);
      return failure(requestId, message, attempts);
    }

    // --- ATTEMPT --------------------------------------------------------------
    for (const [i, adapter] of candidates.entries()) {
      if (signal?.aborted) {
        return this.aborted(requestId, attempts);
      }

      const name = adapter.name;
      const next = candidates[i + 1]?.name;

      // Availability check
      const record = await this.probe.check(adapter, { signal }).catch(() => null);
      if (record === null) {
        // check() only rejects when the caller aborted
        return this.aborted(requestId, attempts);
      }

      if (!record.available) {
        const error = record.lastError ?? 'Provider unavailable';
        this.log.info({ requestId, provider: name, error }, 'Provider unavailable, skipping');
        attempts.push({ provider: name, success: false, skipped: true, error, calls: 0, durationMs: 0 });
        safeReport(this.reporter, name, { available: false, error, latencyMs: record.latencyMs }, this.log);
        lastError = error;
        this.fireFallback(name, next, error);
        continue;
      }

      // Execution
      const request = resolveRequest(input, adapter.config, snap.config.defaults);
      const deadline = withDeadline(this.requestTimeoutMs, signal);
      const start = performance.now();
      let calls = 0;

      try {
        const text = await this.retry.execute(
          () => {
            calls += 1;
            return adapter.generateText(request, { signal: deadline.signal });
          },
          { signal: deadline.signal, label: name },
        );
        const durationMs = Math.round(performance.now() - start);

        this.log.info({ requestId, provider: name, durationMs, calls }, 'Provider succeeded');
        attempts.push({ provider: name, success: true, skipped: false, calls, durationMs });
        this.probe.recordSuccess(name, durationMs, epoch);
        safeReport(this.reporter, name, { available: true, error: null, latencyMs: durationMs }, this.log);

        return { requestId, text, provider: name, error: null, attempts };
      } catch (err: unknown) {
        const durationMs = Math.round(performance.now() - start);

        if (signal?.aborted) {
          attempts.push({ provider: name, success: false, skipped: false, error: ABORTED_MESSAGE, calls, durationMs });
          return this.aborted(requestId, attempts);
        }

        const error = deadline.timedOut()
          ? `Provider "${name}" timed out after ${this.requestTimeoutMs}ms`
          : errorMessage(err);

        this.log.warn({ requestId, provider: name, durationMs, calls, error }, 'Provider failed');
        attempts.push({ provider: name, success: false, skipped: false, error, calls, durationMs });

        if (deadline.timedOut() || reflectsProviderHealth(err)) {
          this.probe.recordFailure(name, error, durationMs, epoch);
        }
        safeReport(this.reporter, name, { available: false, error, latencyMs: durationMs }, this.log);

        lastError = error;
        this.fireFallback(name, next, error);
      } finally {
        deadline.dispose();
      }
    }

    // --- EXHAUSTED ------------------------------------------------------------
    const tried = attempts.map((a) => a.provider);
    const exhausted = new ExhaustionError(
      `All ${tried.length} providers failed. Last error: ${lastError ?? 'unknown'}`,
      tried,
    );
    this.log.error({ requestId, tried }, exhausted.message);
    return failure(requestId, exhausted.message, attempts);
  }

  /**
   * Names of configured providers that currently pass the availability
   * check, in priority order.
   */
  async availableProviders(signal?: AbortSignal): Promise<string[]> {
    const snap = this.registry.snapshot();
    const available: string[] = [];

    for (const adapter of this.candidates(undefined, snap.priority, snap.adapters)) {
      const record = await this.probe.check(adapter, { signal });
      if (record.available) available.push(adapter.name);
    }
    return available;
  }

  // -----------------------------------------------------------------------
  // Internal
  // -----------------------------------------------------------------------

  private candidates(
    explicit: string | undefined,
    priority: readonly string[],
    adapters: ReadonlyMap<string, A>,
  ): A[] {
    const names = explicit !== undefined ? [explicit, ...priority] : [...priority];
    const result: A[] = [];
    const seen = new Set<string>();

    for (const name of names) {
      if (seen.has(name)) continue;
      seen.add(name);
      const adapter = adapters.get(name);
      if (adapter) result.push(adapter);
    }
    return result;
  }

  private aborted(requestId: string, attempts: FallbackAttempt[]): FallbackResult {
    this.log.info({ requestId }, ABORTED_MESSAGE);
    return failure(requestId, ABORTED_MESSAGE, attempts);
  }

  private fireFallback(from: string, to: string | undefined, error: string): void {
    if (!this.onFallback || to === undefined) return;
    try {
      this.onFallback(from, to, error);
    } catch (err: unknown) {
      this.log.warn({ from, to, error: errorMessage(err) }, 'onFallback callback threw');
    }
  }
}

function failure(requestId: string, error: string, attempts: FallbackAttempt[]): FallbackResult {
  return { requestId, text: null, provider: null, error, attempts };
}
