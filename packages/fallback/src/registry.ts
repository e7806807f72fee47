/**
 * @textrelay/fallback - ProviderRegistry
 *
 * Owns one adapter per configured provider. The adapter map, the effective
 * priority list and the configuration they came from live in one immutable
 * snapshot; refresh() builds a new snapshot off to the side and swaps the
 * reference, so readers see the old state or the new one, never a mix.
 */

import pino from 'pino';
import { isPlaceholderCredential, errorMessage, type RelayConfig } from '@textrelay/core';
import { ConfigurationError, ProviderNotConfiguredError } from './errors.js';
import type { AdapterFactory, TextAdapter } from './types.js';

// ---------------------------------------------------------------------------
// Types
// ---------------------------------------------------------------------------

export interface RegistrySnapshot<A extends TextAdapter = TextAdapter> {
  /** Increments on every build. */
  readonly generation: number;
  readonly config: Readonly<RelayConfig>;
  readonly adapters: ReadonlyMap<string, A>;
  /** Configured providers in the order the orchestrator tries them. */
  readonly priority: readonly string[];
  /** Providers left out of this build and why. */
  readonly excluded: ReadonlyMap<string, string>;
}

export type RefreshListener<A extends TextAdapter = TextAdapter> = (
  next: RegistrySnapshot<A>,
  previous: RegistrySnapshot<A> | null,
) => void;

export interface ProviderRegistryOptions {
  logger?: pino.Logger;
}

// ---------------------------------------------------------------------------
// Priority resolution
// ---------------------------------------------------------------------------

/**
 * Effective try-order for a configuration.
 *
 * - `defaultProvider` first, when set
 * - then `priority` in order, or every provider in declaration order when
 *   `priority` is empty
 * - duplicates removed; names are not filtered against the built adapters here
 */
export function resolvePriority(config: Readonly<RelayConfig>): string[] {
  const declared = config.priority.length > 0
    ? config.priority
    : config.providers.map((p) => p.name);

  const ordered = config.defaultProvider ? [config.defaultProvider, ...declared] : [...declared];
  return [...new Set(ordered)];
}

// ---------------------------------------------------------------------------
// ProviderRegistry
// ---------------------------------------------------------------------------

/**
 * ```ts
 * const registry = new ProviderRegistry(config, createAdapter);
 * const adapter = registry.get('anthropic');
 * registry.refresh(nextConfig);
 * ```
 */
export class ProviderRegistry<A extends TextAdapter = TextAdapter> {
  private readonly factory: AdapterFactory<A>;
  private readonly log: pino.Logger;
  private readonly listeners = new Set<RefreshListener<A>>();

  private pendingConfig: Readonly<RelayConfig>;
  private current: RegistrySnapshot<A> | null = null;
  private generationCounter = 0;

  constructor(config: Readonly<RelayConfig>, factory: AdapterFactory<A>, options: ProviderRegistryOptions = {}) {
    this.pendingConfig = config;
    this.factory = factory;
    this.log = options.logger ?? pino({ name: '@textrelay/registry' });
  }

  // -----------------------------------------------------------------------
  // Reads
  // -----------------------------------------------------------------------

  /**
   * The current snapshot, built on first use. Hold on to it for the length
   * of one request to get a consistent view across a concurrent refresh.
   */
  snapshot(): RegistrySnapshot<A> {
    if (!this.current) {
      this.current = this.build(this.pendingConfig);
    }
    return this.current;
  }

  /**
   * The adapter for `name`.
   *
   * @throws ProviderNotConfiguredError when no adapter was built for it
   */
  get(name: string): A {
    const adapter = this.snapshot().adapters.get(name);
    if (!adapter) {
      throw new ProviderNotConfiguredError(name);
    }
    return adapter;
  }

  has(name: string): boolean {
    return this.snapshot().adapters.has(name);
  }

  /** Names of built providers in priority order. */
  names(): string[] {
    const snap = this.snapshot();
    return snap.priority.filter((name) => snap.adapters.has(name));
  }

  get generation(): number {
    return this.snapshot().generation;
  }

  // -----------------------------------------------------------------------
  // Refresh
  // -----------------------------------------------------------------------

  /**
   * Discard every adapter and rebuild from `config`. The new snapshot is
   * complete before it becomes visible.
   */
  refresh(config: Readonly<RelayConfig>): RegistrySnapshot<A> {
    const previous = this.current;
    const next = this.build(config);

    this.pendingConfig = config;
    this.current = next;

    this.log.info(
      { generation: next.generation, providers: [...next.adapters.keys()] },
      'Provider registry refreshed',
    );

    for (const listener of this.listeners) {
      try {
        listener(next, previous);
      } catch (err: unknown) {
        this.log.error({ error: errorMessage(err) }, 'Refresh listener threw');
      }
    }

    return next;
  }

  /** Subscribe to refreshes. Returns an unsubscribe function. */
  onRefresh(listener: RefreshListener<A>): () => void {
    this.listeners.add(listener);
    return () => {
      this.listeners.delete(listener);
    };
  }

  // -----------------------------------------------------------------------
  // Internal
  // -----------------------------------------------------------------------

  private build(config: Readonly<RelayConfig>): RegistrySnapshot<A> {
    const adapters = new Map<string, A>();
    const excluded = new Map<string, string>();

    for (const provider of config.providers) {
      if (adapters.has(provider.name) || excluded.has(provider.name)) {
        this.log.warn({ provider: provider.name }, 'Duplicate provider name, keeping the first');
        continue;
      }

      if (isPlaceholderCredential(provider.apiKey)) {
        const reason = new ConfigurationError(
          `No usable credential for provider "${provider.name}"`,
          provider.name,
        ).message;
        excluded.set(provider.name, reason);
        this.log.warn({ provider: provider.name }, reason);
        continue;
      }

      try {
        adapters.set(provider.name, this.factory(provider));
      } catch (err: unknown) {
        const reason = errorMessage(err);
        excluded.set(provider.name, reason);
        this.log.error({ provider: provider.name, error: reason }, 'Failed to create provider adapter');
      }
    }

    this.generationCounter += 1;

    const snapshot: RegistrySnapshot<A> = {
      generation: this.generationCounter,
      config,
      adapters,
      priority: Object.freeze(resolvePriority(config)),
      excluded,
    };

    this.log.info(
      { generation: snapshot.generation, providers: [...adapters.keys()], excluded: [...excluded.keys()] },
      'Provider adapters built',
    );

    return Object.freeze(snapshot);
  }
}
