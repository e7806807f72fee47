/**
 * Unit Tests for AvailabilityProbe
 *
 * Tests caching, in-flight sharing, invalidation, timeouts and degradation.
 */
import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';
import { DEFAULT_CONFIG, type ProviderConfig } from '@textrelay/core';
import {
  AvailabilityProbe,
  ProviderRegistry,
  type CallOptions,
  type GenerationRequest,
  type TextAdapter,
} from '@textrelay/fallback';

const log = vi.hoisted(() => ({
  info: vi.fn(),
  warn: vi.fn(),
  error: vi.fn(),
  debug: vi.fn(),
}));

vi.mock('pino', () => ({ default: () => log }));

type GenerateFn = (request: GenerationRequest, options?: CallOptions) => Promise<string>;

function makeAdapter(name: string, impl?: GenerateFn) {
  const config: ProviderConfig = { name, kind: 'openai', apiKey: 'test-secret', model: 'm' };
  const generateText = vi.fn<GenerateFn>(impl ?? (() => Promise.resolve('hi')));
  const adapter: TextAdapter = { name, model: 'm', config, generateText };
  return { adapter, generateText };
}

function deferred<T>() {
  let resolve: (value: T) => void = () => undefined;
  const promise = new Promise<T>((res) => {
    resolve = res;
  });
  return { promise, resolve };
}

describe('AvailabilityProbe', () => {
  let clock: number;
  const now = () => clock;

  beforeEach(() => {
    clock = 1_000_000;
    vi.clearAllMocks();
  });

  afterEach(() => {
    vi.restoreAllMocks();
  });

  // ---------------------------------------------------------------------------
  // Probing and caching
  // ---------------------------------------------------------------------------
  describe('check', () => {
    it('sends a minimal liveness request', async () => {
      const probe = new AvailabilityProbe({ now });
      const { adapter, generateText } = makeAdapter('a');

      const record = await probe.check(adapter);

      expect(record.available).toBe(true);
      expect(record.lastError).toBeNull();
      expect(generateText).toHaveBeenCalledWith(
        { messages: [{ role: 'user', content: 'Hello' }], temperature: 0, maxTokens: 5, options: {} },
        expect.objectContaining({ timeoutMs: 30000 }),
      );
    });

    it('reuses a verdict within the TTL', async () => {
      const probe = new AvailabilityProbe({ now, ttlMs: 60_000 });
      const { adapter, generateText } = makeAdapter('a');

      await probe.check(adapter);
      clock += 59_999;
      await probe.check(adapter);

      expect(generateText).toHaveBeenCalledTimes(1);
      expect(probe.probeCount).toBe(1);
    });

    it('probes again once the TTL has passed', async () => {
      const probe = new AvailabilityProbe({ now, ttlMs: 60_000 });
      const { adapter, generateText } = makeAdapter('a');

      await probe.check(adapter);
      clock += 60_000;
      await probe.check(adapter);

      expect(generateText).toHaveBeenCalledTimes(2);
    });

    it('probes every time when the TTL is zero', async () => {
      const probe = new AvailabilityProbe({ now, ttlMs: 0 });
      const { adapter, generateText } = makeAdapter('a');

      await probe.check(adapter);
      await probe.check(adapter);

      expect(generateText).toHaveBeenCalledTimes(2);
    });

    it('records the failure message when the probe fails', async () => {
      const probe = new AvailabilityProbe({ now });
      const { adapter } = makeAdapter('a', () => Promise.reject(new Error('a returned HTTP 401: bad key')));

      const record = await probe.check(adapter);

      expect(record.available).toBe(false);
      expect(record.lastError).toBe('a returned HTTP 401: bad key');
      expect(record.consecutiveFailures).toBe(1);
    });

    it('shares one in-flight probe between concurrent checks', async () => {
      const probe = new AvailabilityProbe({ now });
      const gate = deferred<string>();
      const { adapter, generateText } = makeAdapter('a', () => gate.promise);

      const first = probe.check(adapter);
      const second = probe.check(adapter);
      gate.resolve('hi');

      const [r1, r2] = await Promise.all([first, second]);
      expect(generateText).toHaveBeenCalledTimes(1);
      expect(r1).toBe(r2);
    });

    it('reports a probe that exceeds its timeout', async () => {
      const probe = new AvailabilityProbe({ now, timeoutMs: 10 });
      const { adapter } = makeAdapter('a', (_request, options) =>
        new Promise<string>((_resolve, reject) => {
          options?.signal?.addEventListener('abort', () => reject(new Error('aborted')));
        }),
      );

      const record = await probe.check(adapter);

      expect(record.available).toBe(false);
      expect(record.lastError).toBe('Probe timed out after 10ms');
    });

    it('rejects an aborted caller but still records the probe result', async () => {
      const probe = new AvailabilityProbe({ now });
      const gate = deferred<string>();
      const { adapter } = makeAdapter('a', () => gate.promise);
      const controller = new AbortController();

      const pending = probe.check(adapter, { signal: controller.signal });
      controller.abort(new Error('caller gave up'));
      await expect(pending).rejects.toThrow('caller gave up');

      gate.resolve('hi');
      const record = await probe.check(adapter);
      expect(record.available).toBe(true);
    });
  });

  // ---------------------------------------------------------------------------
  // Invalidation
  // ---------------------------------------------------------------------------
  describe('invalidate', () => {
    it('forces the next check to probe again', async () => {
      const probe = new AvailabilityProbe({ now });
      const { adapter, generateText } = makeAdapter('a');

      await probe.check(adapter);
      probe.invalidate();
      await probe.check(adapter);

      expect(generateText).toHaveBeenCalledTimes(2);
    });

    it('runs on every registry refresh', async () => {
      const config = {
        ...DEFAULT_CONFIG,
        providers: [{ name: 'a', kind: 'openai' as const, apiKey: 'test-secret', model: 'm' }],
        priority: [],
      };
      const { adapter, generateText } = makeAdapter('a');
      const registry = new ProviderRegistry(config, () => adapter);
      const probe = new AvailabilityProbe({ now, registry });

      await probe.check(adapter);
      registry.refresh(config);
      await probe.check(adapter);

      expect(generateText).toHaveBeenCalledTimes(2);
      probe.dispose();
    });

    it('does not cache a result that started before the invalidation', async () => {
      const probe = new AvailabilityProbe({ now });
      const gate = deferred<string>();
      const slow = makeAdapter('a', () => gate.promise);

      const stale = probe.check(slow.adapter);
      probe.invalidate();
      gate.resolve('hi');
      await stale;

      slow.generateText.mockResolvedValue('hi');
      await probe.check(slow.adapter);
      expect(slow.generateText).toHaveBeenCalledTimes(2);
    });

    it('drops records of providers a refresh removed', async () => {
      const a = makeAdapter('a');
      const b = makeAdapter('b', () => Promise.reject(new Error('down')));
      const both = { ...DEFAULT_CONFIG, providers: [a.adapter.config, b.adapter.config], priority: [] };
      const registry = new ProviderRegistry(both, (c) => (c.name === 'a' ? a.adapter : b.adapter));
      const probe = new AvailabilityProbe({ now, registry, degradedThreshold: 1 });

      await probe.checkAll();
      expect(probe.getReport().overallStatus).toBe('degraded');

      registry.refresh({ ...both, providers: [a.adapter.config] });
      await probe.checkAll();

      expect(probe.getRecords().map((r) => r.provider)).toEqual(['a']);
      expect(probe.getReport().overallStatus).toBe('healthy');
      probe.dispose();
    });

    it('starts a rebuilt adapter with fresh failure counts', async () => {
      const first = makeAdapter('a', () => Promise.reject(new Error('down')));
      const second = makeAdapter('a');
      let current = first.adapter;
      const config = { ...DEFAULT_CONFIG, providers: [first.adapter.config], priority: [] };
      const registry = new ProviderRegistry(config, () => current);
      const probe = new AvailabilityProbe({ now, registry });

      await probe.check(first.adapter, { force: true });
      await probe.check(first.adapter, { force: true });
      expect(probe.getRecord('a')?.consecutiveFailures).toBe(2);

      current = second.adapter;
      registry.refresh(config);
      second.generateText.mockRejectedValue(new Error('still down'));
      const record = await probe.check(second.adapter);

      expect(record.consecutiveFailures).toBe(1);
      expect(record.lastError).toBe('still down');
      probe.dispose();
    });

    it('does not store results for an adapter the registry replaced', async () => {
      const first = makeAdapter('a');
      const second = makeAdapter('a');
      let current = first.adapter;
      const config = { ...DEFAULT_CONFIG, providers: [first.adapter.config], priority: [] };
      const registry = new ProviderRegistry(config, () => current);
      const probe = new AvailabilityProbe({ now, registry });
      registry.snapshot();

      current = second.adapter;
      registry.refresh(config);
      const record = await probe.check(first.adapter);

      expect(record.available).toBe(true);
      expect(probe.getRecord('a')).toBeUndefined();

      await probe.check(second.adapter);
      expect(second.generateText).toHaveBeenCalledTimes(1);
      expect(probe.getRecord('a')?.available).toBe(true);
      probe.dispose();
    });
  });

  // ---------------------------------------------------------------------------
  // Degradation and reporting
  // ---------------------------------------------------------------------------
  describe('Degradation', () => {
    it('marks a provider degraded after consecutive failures', async () => {
      const onDegraded = vi.fn();
      const probe = new AvailabilityProbe({ now, degradedThreshold: 3, onDegraded });
      const { adapter } = makeAdapter('a', () => Promise.reject(new Error('down')));

      await probe.check(adapter, { force: true });
      await probe.check(adapter, { force: true });
      expect(probe.getRecord('a')?.degraded).toBe(false);

      const record = await probe.check(adapter, { force: true });
      await probe.check(adapter, { force: true });

      expect(record.degraded).toBe(true);
      expect(onDegraded).toHaveBeenCalledTimes(1);
      expect(log.warn).toHaveBeenCalledWith({ provider: 'a', consecutiveFailures: 3 }, 'Provider marked degraded');
    });

    it('clears failure counts on success', () => {
      const probe = new AvailabilityProbe({ now });

      probe.recordFailure('a', 'timeout', 100);
      probe.recordFailure('a', 'timeout', 100);
      const record = probe.recordSuccess('a', 42);

      expect(record).toMatchObject({
        available: true,
        lastError: null,
        latencyMs: 42,
        consecutiveFailures: 0,
        consecutiveSuccesses: 1,
        degraded: false,
      });
    });

    it('derives the overall status from the records', () => {
      const probe = new AvailabilityProbe({ now, degradedThreshold: 1 });
      expect(probe.getReport().overallStatus).toBe('down');

      probe.recordSuccess('a', 10);
      expect(probe.getReport().overallStatus).toBe('healthy');

      probe.recordFailure('b', 'down', 10);
      expect(probe.getReport().overallStatus).toBe('degraded');

      probe.recordFailure('a', 'down', 10);
      expect(probe.getReport().overallStatus).toBe('down');
    });

    it('checks every registry provider in priority order', async () => {
      const a = makeAdapter('a');
      const b = makeAdapter('b', () => Promise.reject(new Error('down')));
      const config = {
        ...DEFAULT_CONFIG,
        providers: [a.adapter.config, b.adapter.config],
        priority: ['b', 'a'],
      };
      const registry = new ProviderRegistry(config, (c) => (c.name === 'a' ? a.adapter : b.adapter));
      const probe = new AvailabilityProbe({ now, registry });

      const records = await probe.checkAll();

      expect(records.map((r) => [r.provider, r.available])).toEqual([
        ['b', false],
        ['a', true],
      ]);
      expect(probe.getReport().lastFullCheck).toEqual(new Date(clock));
      probe.dispose();
    });
  });

  // ---------------------------------------------------------------------------
  // Lifecycle
  // ---------------------------------------------------------------------------
  describe('Lifecycle', () => {
    it('starts and stops background polling', () => {
      const probe = new AvailabilityProbe({ now });

      probe.start(60_000);
      expect(probe.running).toBe(true);

      probe.stop();
      expect(probe.running).toBe(false);
    });
  });
});
