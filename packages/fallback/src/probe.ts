/**
 * @textrelay/fallback - AvailabilityProbe
 *
 * Sends one cheap liveness request through an adapter, records the outcome,
 * and caches it for a short TTL. Tracks consecutive failures, marks
 * providers as degraded, and can poll every provider in the background.
 *
 * Cache discipline: each provider's record is replaced whole, concurrent
 * checks of one provider share a single in-flight probe, and invalidate()
 * (called on registry refresh) drops every cached verdict. Results that
 * belong to an older epoch, or to an adapter the registry has replaced,
 * are returned to their caller but never stored.
 */

import pino from 'pino';
import { abortable, errorMessage, withDeadline } from '@textrelay/core';
import type { ProviderRegistry, RegistrySnapshot } from './registry.js';
import type { TextAdapter } from './types.js';

// ---------------------------------------------------------------------------
// Types
// ---------------------------------------------------------------------------

/** Availability snapshot for a single provider. */
export interface AvailabilityRecord {
  provider: string;
  available: boolean;
  lastError: string | null;
  lastChecked: Date;
  latencyMs: number;
  consecutiveFailures: number;
  consecutiveSuccesses: number;
  /** True when consecutiveFailures >= degradedThreshold. */
  degraded: boolean;
}

/** Overall status level. */
export type OverallStatus = 'healthy' | 'degraded' | 'down';

export interface HealthReport {
  overallStatus: OverallStatus;
  providers: AvailabilityRecord[];
  lastFullCheck: Date | null;
}

export interface AvailabilityProbeOptions {
  /** How long a verdict is reused, in ms (default 60 000). 0 probes every time. */
  ttlMs?: number;
  /** Timeout for one probe request (default 30 000 ms). */
  timeoutMs?: number;
  /** Liveness prompt (default "Hello"). */
  prompt?: string;
  /** Token cap for the liveness request (default 5). */
  maxTokens?: number;
  /** Consecutive failures before a provider counts as degraded (default 3). */
  degradedThreshold?: number;
  onDegraded?: (provider: string, record: AvailabilityRecord) => void;
  /** When given, its refreshes invalidate the cache and checkAll() probes its providers. */
  registry?: ProviderRegistry;
  /** Clock, injected for tests. */
  now?: () => number;
  logger?: pino.Logger;
}

export interface CheckOptions {
  /** Caller's cancellation. The probe itself keeps running and still records its result. */
  signal?: AbortSignal;
  /** Ignore a cached verdict. */
  force?: boolean;
}

interface CacheEntry {
  at: number;
  epoch: number;
}

// ---------------------------------------------------------------------------
// AvailabilityProbe
// ---------------------------------------------------------------------------

/**
 * ```ts
 * const probe = new AvailabilityProbe({ registry, ttlMs: 30_000 });
 * const record = await probe.check(registry.get('openai'));
 * if (!record.available) console.warn(record.lastError);
 * ```
 */
export class AvailabilityProbe {
  readonly ttlMs: number;
  private readonly timeoutMs: number;
  private readonly prompt: string;
  private readonly maxTokens: number;
  private readonly degradedThreshold: number;
  private readonly onDegraded?: (provider: string, record: AvailabilityRecord) => void;
  private readonly registry?: ProviderRegistry;
  private readonly now: () => number;
  private readonly log: pino.Logger;

  private readonly records = new Map<string, AvailabilityRecord>();
  private readonly cache = new Map<string, CacheEntry>();
  private readonly inFlight = new Map<string, Promise<AvailabilityRecord>>();
  private epoch = 0;
  private probesSent = 0;
  private lastFullCheck: Date | null = null;
  private intervalHandle: ReturnType<typeof setInterval> | null = null;
  private readonly unsubscribe: (() => void) | null;

  constructor(options: AvailabilityProbeOptions = {}) {
    this.ttlMs = options.ttlMs ?? 60_000;
    this.timeoutMs = options.timeoutMs ?? 30_000;
    this.prompt = options.prompt ?? 'Hello';
    this.maxTokens = options.maxTokens ?? 5;
    this.degradedThreshold = options.degradedThreshold ?? 3;
    this.onDegraded = options.onDegraded;
    this.registry = options.registry;
    this.now = options.now ?? Date.now;
    this.log = options.logger ?? pino({ name: '@textrelay/probe' });

    this.unsubscribe = this.registry
      ? this.registry.onRefresh((next, previous) => this.handleRefresh(next, previous))
      : null;
  }

  // -----------------------------------------------------------------------
  // Checks
  // -----------------------------------------------------------------------

  /**
   * Availability of `adapter`, from cache when fresh, otherwise by probing.
   */
  async check(adapter: TextAdapter, options: CheckOptions = {}): Promise<AvailabilityRecord> {
    const name = adapter.name;

    if (!this.isCurrent(adapter)) {
      return abortable(this.probe(adapter), options.signal);
    }

    if (!options.force) {
      const cached = this.cachedRecord(name);
      if (cached) {
        this.log.debug({ provider: name, available: cached.available }, 'Using cached availability');
        return cached;
      }
    }

    let pending = this.inFlight.get(name);
    if (!pending) {
      pending = this.probe(adapter);
      this.inFlight.set(name, pending);
      const started = pending;
      const clear = (): void => {
        if (this.inFlight.get(name) === started) this.inFlight.delete(name);
      };
      void started.then(clear, clear);
    }

    return abortable(pending, options.signal);
  }

  /**
   * Probe every provider (in priority order when a registry is attached).
   */
  async checkAll(adapters?: readonly TextAdapter[]): Promise<AvailabilityRecord[]> {
    const targets = adapters ?? this.registryAdapters();
    const results: AvailabilityRecord[] = [];

    for (const adapter of targets) {
      results.push(await this.check(adapter, { force: true }));
    }

    this.lastFullCheck = new Date(this.now());
    return results;
  }

  // -----------------------------------------------------------------------
  // Recording
  // -----------------------------------------------------------------------

  /**
   * Record a successful call (probe or real request). Pass the `epoch` read
   * when the call started; a result from before an invalidation is dropped.
   */
  recordSuccess(provider: string, latencyMs: number, epoch = this.epoch): AvailabilityRecord {
    return this.write(provider, true, null, latencyMs, epoch);
  }

  /** Record a failed call (probe or real request). See recordSuccess(). */
  recordFailure(provider: string, error: string, latencyMs: number, epoch = this.epoch): AvailabilityRecord {
    return this.write(provider, false, error, latencyMs, epoch);
  }

  getRecord(provider: string): AvailabilityRecord | undefined {
    return this.records.get(provider);
  }

  getRecords(): AvailabilityRecord[] {
    return Array.from(this.records.values());
  }

  /** Bumped by every invalidate(). */
  get currentEpoch(): number {
    return this.epoch;
  }

  /** Number of liveness requests sent so far. */
  get probeCount(): number {
    return this.probesSent;
  }

  /**
   * Drop every cached verdict. Records stay for reporting; the next check
   * probes again. Probes already in flight finish but their results are discarded.
   */
  invalidate(): void {
    this.epoch += 1;
    this.cache.clear();
    this.inFlight.clear();
    this.log.debug({ epoch: this.epoch }, 'Availability cache invalidated');
  }

  /**
   * Forget everything. Useful in tests.
   */
  reset(): void {
    this.invalidate();
    this.records.clear();
    this.lastFullCheck = null;
  }

  // -----------------------------------------------------------------------
  // Report
  // -----------------------------------------------------------------------

  getReport(): HealthReport {
    const providers = this.getRecords();
    return {
      overallStatus: deriveStatus(providers),
      providers,
      lastFullCheck: this.lastFullCheck,
    };
  }

  // -----------------------------------------------------------------------
  // Lifecycle
  // -----------------------------------------------------------------------

  /**
   * Start background polling of the attached registry's providers.
   */
  start(intervalMs = 60_000): void {
    if (this.intervalHandle) {
      this.log.warn('Availability polling already running -- ignoring start()');
      return;
    }

    this.log.info({ intervalMs }, 'Starting availability polling');

    const tick = (): void => {
      this.checkAll().catch((err: unknown) => {
        this.log.error({ error: errorMessage(err) }, 'Availability polling failed');
      });
    };

    tick();
    this.intervalHandle = setInterval(tick, intervalMs);

    // Allow the Node process to exit even if the interval is still active
    this.intervalHandle.unref();
  }

  stop(): void {
    if (this.intervalHandle) {
      clearInterval(this.intervalHandle);
      this.intervalHandle = null;
      this.log.info('Availability polling stopped');
    }
  }

  get running(): boolean {
    return this.intervalHandle !== null;
  }

  /** Stop polling and detach from the registry. */
  dispose(): void {
    this.stop();
    this.unsubscribe?.();
  }

  // -----------------------------------------------------------------------
  // Internal
  // -----------------------------------------------------------------------

  private cachedRecord(provider: string): AvailabilityRecord | undefined {
    if (this.ttlMs <= 0) return undefined;

    const entry = this.cache.get(provider);
    if (!entry || entry.epoch !== this.epoch) return undefined;
    if (this.now() - entry.at >= this.ttlMs) return undefined;

    return this.records.get(provider);
  }

  /**
   * Registry refresh: every verdict goes stale, and records of providers
   * that were removed or rebuilt start over.
   */
  private handleRefresh(next: RegistrySnapshot, previous: RegistrySnapshot | null): void {
    this.invalidate();

    for (const name of [...this.records.keys()]) {
      if (next.adapters.get(name) !== previous?.adapters.get(name)) {
        this.records.delete(name);
      }
    }
  }

  /** False for an adapter the attached registry no longer serves. */
  private isCurrent(adapter: TextAdapter): boolean {
    if (!this.registry) return true;
    return this.registry.snapshot().adapters.get(adapter.name) === adapter;
  }

  private async probe(adapter: TextAdapter): Promise<AvailabilityRecord> {
    const epoch = this.isCurrent(adapter) ? this.epoch : -1;
    const deadline = withDeadline(this.timeoutMs);
    const start = this.now();
    this.probesSent += 1;

    this.log.debug({ provider: adapter.name }, 'Probing provider');

    try {
      await adapter.generateText(
        {
          messages: [{ role: 'user', content: this.prompt }],
          temperature: 0,
          maxTokens: this.maxTokens,
          options: {},
        },
        { signal: deadline.signal, timeoutMs: this.timeoutMs },
      );
      return this.write(adapter.name, true, null, this.now() - start, epoch);
    } catch (err: unknown) {
      const message = deadline.timedOut()
        ? `Probe timed out after ${this.timeoutMs}ms`
        : errorMessage(err);
      this.log.info({ provider: adapter.name, error: message }, 'Provider probe failed');
      return this.write(adapter.name, false, message, this.now() - start, epoch);
    } finally {
      deadline.dispose();
    }
  }

  private write(
    provider: string,
    available: boolean,
    error: string | null,
    latencyMs: number,
    epoch: number,
  ): AvailabilityRecord {
    const existing = this.records.get(provider);
    const consecutiveFailures = available ? 0 : (existing?.consecutiveFailures ?? 0) + 1;
    const consecutiveSuccesses = available ? (existing?.consecutiveSuccesses ?? 0) + 1 : 0;
    const degraded = consecutiveFailures >= this.degradedThreshold;

    const record: AvailabilityRecord = {
      provider,
      available,
      lastError: error,
      lastChecked: new Date(this.now()),
      latencyMs: Math.round(latencyMs),
      consecutiveFailures,
      consecutiveSuccesses,
      degraded,
    };

    if (epoch !== this.epoch) {
      this.log.debug({ provider, epoch, current: this.epoch }, 'Discarding stale availability result');
      return record;
    }

    this.records.set(provider, record);
    this.cache.set(provider, { at: this.now(), epoch });

    if (degraded && !existing?.degraded) {
      this.log.warn({ provider, consecutiveFailures }, 'Provider marked degraded');
      this.onDegraded?.(provider, record);
    }

    return record;
  }

  private registryAdapters(): TextAdapter[] {
    if (!this.registry) return [];
    const snap = this.registry.snapshot();
    return snap.priority.flatMap((name) => {
      const adapter = snap.adapters.get(name);
      return adapter ? [adapter] : [];
    });
  }
}

// ---------------------------------------------------------------------------
// Status derivation
// ---------------------------------------------------------------------------

/**
 * - healthy : at least one provider is available and none is degraded
 * - degraded: at least one provider is available but some are degraded
 * - down    : no provider is available (or none has been checked)
 */
function deriveStatus(providers: AvailabilityRecord[]): OverallStatus {
  const anyAvailable = providers.some((p) => p.available);
  const anyDegraded = providers.some((p) => p.degraded);

  if (!anyAvailable) return 'down';
  if (anyDegraded) return 'degraded';
  return 'healthy';
}
