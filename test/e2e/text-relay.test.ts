/**
 * E2E Tests for the TextRelay facade
 *
 * Loads real configuration, builds real adapters and talks to a stubbed fetch.
 */
import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';
import { mkdtemp, rm, writeFile } from 'node:fs/promises';
import { join } from 'node:path';
import { tmpdir } from 'node:os';
import { buildConfig } from '@textrelay/core';
import { TextRelay } from '../../src/index.js';

const log = vi.hoisted(() => ({
  info: vi.fn(),
  warn: vi.fn(),
  error: vi.fn(),
  debug: vi.fn(),
}));

vi.mock('pino', () => ({ default: () => log }));

const fetchMock = vi.fn<typeof fetch>();
const noSleep = () => Promise.resolve();

function jsonResponse(body: unknown, status = 200): Response {
  return new Response(JSON.stringify(body), { status });
}

function completion(content: string): unknown {
  return { choices: [{ message: { role: 'assistant', content } }] };
}

/** OpenAI is failing; every other backend answers. */
function routeRequests(): void {
  fetchMock.mockImplementation(async (input) => {
    const url = String(input);
    if (url.startsWith('https://api.openai.com')) {
      return new Response('upstream error', { status: 500 });
    }
    return jsonResponse(completion('from zai'));
  });
}

describe('TextRelay', () => {
  let relay: TextRelay | undefined;

  beforeEach(() => {
    vi.clearAllMocks();
    fetchMock.mockReset();
    vi.stubGlobal('fetch', fetchMock);
  });

  afterEach(() => {
    relay?.dispose();
    relay = undefined;
    vi.unstubAllGlobals();
  });

  // ---------------------------------------------------------------------------
  // Generation
  // ---------------------------------------------------------------------------
  describe('generate', () => {
    it('falls back past a failing provider and filters options per provider', async () => {
      routeRequests();
      const { config } = buildConfig(undefined, {
        OPENAI_API_KEY: 'test-secret',
        ZAI_API_KEY: 'test-secret',
        LLM_PROVIDER_PRIORITY: 'openai,zai',
      });
      relay = await TextRelay.create({ config, sleep: noSleep });

      const result = await relay.generate({
        prompt: 'Hi',
        options: { top_p: 0.5, logit_bias: { '42': 1 }, presence_penalty: 1 },
      });

      expect(result).toMatchObject({ text: 'from zai', provider: 'zai', error: null });
      expect(fetchMock.mock.calls.map((call) => String(call[0]))).toEqual([
        'https://api.openai.com/v1/chat/completions',
        'https://api.z.ai/api/coding/paas/v4/chat/completions',
        'https://api.z.ai/api/coding/paas/v4/chat/completions',
      ]);
      expect(JSON.parse(String(fetchMock.mock.calls[2]?.[1]?.body))).toEqual({
        top_p: 0.5,
        model: 'glm-4.7',
        messages: [{ role: 'user', content: 'Hi' }],
        temperature: 0.7,
        max_tokens: 2048,
      });
    });

    it('sends the liveness probe with the configured prompt', async () => {
      routeRequests();
      const { config } = buildConfig(undefined, { ZAI_API_KEY: 'test-secret' });
      relay = await TextRelay.create({ config, sleep: noSleep });

      await relay.generate({ prompt: 'Hi' });

      expect(JSON.parse(String(fetchMock.mock.calls[0]?.[1]?.body))).toEqual({
        model: 'glm-4.7',
        messages: [{ role: 'user', content: 'Hello' }],
        temperature: 0,
        max_tokens: 5,
      });
    });

    it('returns an error result when no credentials are set', async () => {
      const { config } = buildConfig(undefined, {});
      relay = await TextRelay.create({ config });

      const result = await relay.generate({ prompt: 'Hi' });

      expect(result).toMatchObject({ text: null, provider: null, error: 'No LLM providers are configured' });
      expect(fetchMock).not.toHaveBeenCalled();
    });
  });

  // ---------------------------------------------------------------------------
  // Availability
  // ---------------------------------------------------------------------------
  describe('Availability', () => {
    it('probes every provider and summarises their health', async () => {
      routeRequests();
      const { config } = buildConfig(undefined, {
        OPENAI_API_KEY: 'test-secret',
        ZAI_API_KEY: 'test-secret',
      });
      relay = await TextRelay.create({ config });

      const records = await relay.checkAvailability();

      expect(records.map((r) => [r.provider, r.available])).toEqual([
        ['zai', true],
        ['openai', false],
      ]);
      expect(records[1]?.lastError).toBe('openai returned HTTP 500: upstream error');
      await expect(relay.getAvailableProviders()).resolves.toEqual(['zai']);
      expect(relay.getHealthReport().overallStatus).toBe('healthy');
      expect(fetchMock).toHaveBeenCalledTimes(2);
    });

    it('lists configured providers in priority order', async () => {
      const { config } = buildConfig(undefined, {
        OPENAI_API_KEY: 'test-secret',
        ANTHROPIC_API_KEY: 'test-secret',
      });
      relay = await TextRelay.create({ config });

      expect(relay.getProviderNames()).toEqual(['anthropic', 'openai']);
    });
  });

  // ---------------------------------------------------------------------------
  // Configuration files and refresh
  // ---------------------------------------------------------------------------
  describe('Configuration', () => {
    let tempDir: string;

    beforeEach(async () => {
      tempDir = await mkdtemp(join(tmpdir(), 'textrelay-relay-test-'));
    });

    afterEach(async () => {
      await rm(tempDir, { recursive: true, force: true });
    });

    function writeProviders(name: string): Promise<void> {
      return writeFile(
        join(tempDir, 'textrelay.json'),
        JSON.stringify({
          providers: [{ name, kind: 'openai', apiKey: '$env:PRIMARY_KEY', model: 'gpt-4o-mini' }],
          priority: [name],
        }),
      );
    }

    it('reads the configuration file and re-reads it on refresh', async () => {
      await writeProviders('primary');
      relay = await TextRelay.create({ env: { TEXTRELAY_HOME: tempDir, PRIMARY_KEY: 'test-secret' } });
      expect(relay.getProviderNames()).toEqual(['primary']);

      await writeProviders('secondary');
      const snapshot = await relay.refresh();

      expect(relay.getProviderNames()).toEqual(['secondary']);
      expect(snapshot.generation).toBe(2);
    });

    it('refreshes from a configuration object', async () => {
      const { config } = buildConfig(undefined, { OPENAI_API_KEY: 'test-secret' });
      relay = await TextRelay.create({ config });

      await relay.refresh(buildConfig(undefined, { ZAI_API_KEY: 'test-secret' }).config);

      expect(relay.getProviderNames()).toEqual(['zai']);
    });

    it('logs an invalid configuration and runs on defaults', async () => {
      await writeFile(join(tempDir, 'textrelay.json'), JSON.stringify({ retry: { maxAttempts: 0 } }));

      relay = await TextRelay.create({ env: { TEXTRELAY_HOME: tempDir, OPENAI_API_KEY: 'test-secret' } });

      expect(log.error).toHaveBeenCalledWith(
        expect.objectContaining({ source: join(tempDir, 'textrelay.json') }),
        'Configuration is invalid, falling back to defaults',
      );
      expect(relay.getProviderNames()).toEqual(['openai']);
    });

    it('keeps environment credentials when an override fails validation', async () => {
      routeRequests();
      relay = await TextRelay.create({
        env: { TEXTRELAY_HOME: tempDir, ZAI_API_KEY: 'test-secret', TEMPERATURE: 'warm' },
        sleep: noSleep,
      });

      const result = await relay.generate({ prompt: 'Hi' });

      expect(result).toMatchObject({ text: 'from zai', provider: 'zai', error: null });
    });

    it('logs business-rule errors without claiming to use defaults', async () => {
      await writeFile(
        join(tempDir, 'textrelay.json'),
        JSON.stringify({
          providers: [
            { name: 'main', kind: 'openai', apiKey: '$env:PRIMARY_KEY', model: 'gpt-4o-mini' },
            { name: 'main', kind: 'zai', apiKey: '$env:PRIMARY_KEY', model: 'glm-4.7' },
          ],
          priority: ['main'],
        }),
      );

      relay = await TextRelay.create({ env: { TEXTRELAY_HOME: tempDir, PRIMARY_KEY: 'test-secret' } });

      expect(log.error).toHaveBeenCalledWith(
        expect.objectContaining({ source: join(tempDir, 'textrelay.json') }),
        'Configuration has errors, using it as loaded',
      );
      expect(log.error).not.toHaveBeenCalledWith(
        expect.anything(),
        'Configuration is invalid, falling back to defaults',
      );
      expect(relay.getProviderNames()).toEqual(['main']);
    });
  });
});
