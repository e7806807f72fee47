/**
 * textrelay models - Adapter factory
 *
 * Builds the TextAdapter for a provider configuration, switching on its kind.
 */

import type { ProviderConfig } from '@textrelay/core';
import { ConfigurationError, type AdapterFactory, type TextAdapter } from '@textrelay/fallback';
import { AnthropicAdapter } from './anthropic.js';
import { OpenAIAdapter, type AdapterOptions } from './openai.js';
import { OpenRouterAdapter } from './openrouter.js';
import { ZaiAdapter } from './zai.js';

/**
 * Create the adapter for `config`.
 *
 * @throws ConfigurationError for a kind no adapter implements
 */
export function createAdapter(config: Readonly<ProviderConfig>, options: AdapterOptions = {}): TextAdapter {
  const kind: string = config.kind;

  switch (kind) {
    case 'openai':
      return new OpenAIAdapter(config, options);
    case 'anthropic':
      return new AnthropicAdapter(config, options);
    case 'openrouter':
      return new OpenRouterAdapter(config, options);
    case 'zai':
      return new ZaiAdapter(config, options);
    default:
      throw new ConfigurationError(
        `Unknown provider kind "${kind}". Supported: openai, anthropic, openrouter, zai`,
        config.name,
      );
  }
}

/** An AdapterFactory whose adapters share `options`. */
export function adapterFactory(options: AdapterOptions = {}): AdapterFactory {
  return (config) => createAdapter(config, options);
}
