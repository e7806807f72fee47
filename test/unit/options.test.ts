/**
 * Unit Tests for extra-option allow-lists
 */
import { describe, it, expect } from 'vitest';
import type { ProviderConfig } from '@textrelay/core';
import { allowedOptionsFor, filterOptions } from '../../src/models/options.js';

function config(kind: ProviderConfig['kind'], allowedOptions?: string[]): ProviderConfig {
  return { name: kind, kind, apiKey: 'test-secret', model: 'm', allowedOptions };
}

describe('allowedOptionsFor', () => {
  it('returns the full list for the provider kind', () => {
    expect(allowedOptionsFor(config('anthropic'))).toEqual(['stop_sequences', 'top_p', 'top_k']);
    expect(allowedOptionsFor(config('zai'))).toEqual(['top_p', 'stop']);
  });

  it('narrows to the configured options', () => {
    expect(allowedOptionsFor(config('openrouter', ['top_p', 'stop']))).toEqual(['stop', 'top_p']);
  });

  it('cannot widen the list', () => {
    expect(allowedOptionsFor(config('zai', ['top_p', 'logit_bias']))).toEqual(['top_p']);
  });
});

describe('filterOptions', () => {
  it('keeps allowed keys with valid values', () => {
    const result = filterOptions({ top_p: 0.8, stop: ['\n\n'] }, ['top_p', 'stop']);

    expect(result.accepted).toEqual({ top_p: 0.8, stop: ['\n\n'] });
    expect(result.dropped).toEqual([]);
  });

  it('drops keys outside the allow-list', () => {
    const result = filterOptions({ top_p: 0.8, logit_bias: { '50256': -100 } }, ['top_p']);

    expect(result.accepted).toEqual({ top_p: 0.8 });
    expect(result.dropped).toEqual([{ key: 'logit_bias', reason: 'not-allowed' }]);
  });

  it('drops keys no provider knows, even when listed', () => {
    const result = filterOptions({ seed: 1 }, ['seed']);

    expect(result.dropped).toEqual([{ key: 'seed', reason: 'not-allowed' }]);
  });

  it('drops values that fail the option schema', () => {
    const result = filterOptions(
      { top_p: 1.5, top_k: 2.5, stop: ['a', 'b', 'c', 'd', 'e'], presence_penalty: 1 },
      ['top_p', 'top_k', 'stop', 'presence_penalty'],
    );

    expect(result.accepted).toEqual({ presence_penalty: 1 });
    expect(result.dropped).toEqual([
      { key: 'top_p', reason: 'invalid' },
      { key: 'top_k', reason: 'invalid' },
      { key: 'stop', reason: 'invalid' },
    ]);
  });

  it('ignores undefined values', () => {
    const result = filterOptions({ top_p: undefined }, []);

    expect(result).toEqual({ accepted: {}, dropped: [] });
  });
});
