/**
 * textrelay - TextRelay facade
 *
 * Loads configuration and wires the registry, availability probe, retry
 * policy and orchestrator into one object:
 *
 * ```ts
 * const relay = await TextRelay.create();
 * const { text, provider, error } = await relay.generate({ prompt: 'Summarise this' });
 * ```
 */

import pino from 'pino';
import { loadConfig, type LoadConfigOptions, type RelayConfig, type ValidationResult } from '@textrelay/core';
import {
  AvailabilityProbe,
  FallbackOrchestrator,
  ProviderRegistry,
  RetryPolicy,
  type AdapterFactory,
  type AvailabilityRecord,
  type FallbackResult,
  type GenerateOptions,
  type HealthReport,
  type RegistrySnapshot,
  type RequestSpec,
  type StatusReporter,
} from '@textrelay/fallback';
import { adapterFactory } from './models/provider.js';

export interface TextRelayOptions {
  /** Config file to read. Defaults to the resolved textrelay.json location. */
  configPath?: string;
  /** Environment for `$env:` references and overrides. Defaults to process.env. */
  env?: Record<string, string | undefined>;
  /** Use this configuration instead of reading a file. */
  config?: Readonly<RelayConfig>;
  reporter?: StatusReporter;
  logger?: pino.Logger;
  /** Replaces the built-in adapters, e.g. with fakes. */
  adapterFactory?: AdapterFactory;
  /** Backoff wait, injectable for tests. */
  sleep?: (ms: number, signal?: AbortSignal) => Promise<void>;
  onFallback?: (from: string, to: string, error: string) => void;
}

export class TextRelay {
  readonly registry: ProviderRegistry;
  readonly probe: AvailabilityProbe;
  readonly orchestrator: FallbackOrchestrator;

  private readonly loadOptions: LoadConfigOptions;
  private readonly log: pino.Logger;

  /**
   * Read configuration (unless `options.config` is given) and build a relay.
   */
  static async create(options: TextRelayOptions = {}): Promise<TextRelay> {
    const loadOptions: LoadConfigOptions = { path: options.configPath, env: options.env };

    if (options.config) {
      return new TextRelay(options.config, options, loadOptions);
    }

    const { config, validation, source } = await loadConfig(loadOptions);
    const relay = new TextRelay(config, options, loadOptions);
    relay.reportValidation(validation, source);
    return relay;
  }

  constructor(config: Readonly<RelayConfig>, options: TextRelayOptions = {}, loadOptions: LoadConfigOptions = {}) {
    this.loadOptions = loadOptions;
    this.log = options.logger ?? pino({ name: 'textrelay', level: config.logging.level });

    this.registry = new ProviderRegistry(
      config,
      options.adapterFactory ?? adapterFactory({ logger: this.log }),
      { logger: this.log },
    );

    this.probe = new AvailabilityProbe({
      ...config.probe,
      registry: this.registry,
      logger: this.log,
    });

    const retry = new RetryPolicy({
      ...config.retry,
      sleep: options.sleep,
      logger: this.log,
    });

    this.orchestrator = new FallbackOrchestrator({
      registry: this.registry,
      probe: this.probe,
      retry,
      reporter: options.reporter,
      requestTimeoutMs: config.requestTimeoutMs,
      onFallback: options.onFallback,
      logger: this.log,
    });
  }

  // -----------------------------------------------------------------------
  // Generation
  // -----------------------------------------------------------------------

  generate(input: RequestSpec, options?: GenerateOptions): Promise<FallbackResult> {
    return this.orchestrator.generate(input, options);
  }

  // -----------------------------------------------------------------------
  // Configuration
  // -----------------------------------------------------------------------

  /**
   * Rebuild every adapter from `config`, or from a fresh read of the
   * configuration file when none is given. Requests already running keep
   * the snapshot they started with. Retry and probe settings stay as they
   * were at creation.
   */
  async refresh(config?: Readonly<RelayConfig>): Promise<RegistrySnapshot> {
    if (config) {
      return this.registry.refresh(config);
    }

    const loaded = await loadConfig(this.loadOptions);
    this.reportValidation(loaded.validation, loaded.source);
    return this.registry.refresh(loaded.config);
  }

  // -----------------------------------------------------------------------
  // Availability
  // -----------------------------------------------------------------------

  /** Probe every configured provider now, in priority order. */
  checkAvailability(): Promise<AvailabilityRecord[]> {
    return this.probe.checkAll();
  }

  getAvailableProviders(signal?: AbortSignal): Promise<string[]> {
    return this.orchestrator.availableProviders(signal);
  }

  getHealthReport(): HealthReport {
    return this.probe.getReport();
  }

  /** Configured provider names in priority order. */
  getProviderNames(): string[] {
    return this.registry.names();
  }

  /** Poll availability in the background. */
  startMonitoring(intervalMs?: number): void {
    this.probe.start(intervalMs);
  }

  dispose(): void {
    this.probe.dispose();
  }

  // -----------------------------------------------------------------------
  // Internal
  // -----------------------------------------------------------------------

  private reportValidation(validation: ValidationResult, source: string | null): void {
    for (const warning of validation.warnings) {
      this.log.warn({ path: warning.path, source }, warning.message);
    }
    if (validation.usedDefaults) {
      this.log.error(
        { source, errors: validation.errors },
        'Configuration is invalid, falling back to defaults',
      );
    } else if (!validation.valid) {
      this.log.error(
        { source, errors: validation.errors },
        'Configuration has errors, using it as loaded',
      );
    }
  }
}
