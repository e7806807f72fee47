/**
 * textrelay models - OpenRouter adapter
 *
 * OpenAI wire format plus attribution headers. Headers from the provider
 * configuration are merged over the defaults.
 */

import type { ProviderConfig } from '@textrelay/core';
import { OpenAIAdapter, type AdapterOptions } from './openai.js';

export const OPENROUTER_BASE_URL = 'https://openrouter.ai/api/v1';

export const OPENROUTER_DEFAULT_HEADERS: Readonly<Record<string, string>> = {
  'X-Title': 'textrelay',
};

export class OpenRouterAdapter extends OpenAIAdapter {
  constructor(config: Readonly<ProviderConfig>, options: AdapterOptions = {}) {
    super(config, options, OPENROUTER_BASE_URL);
  }

  protected override headers(): Record<string, string> {
    return {
      ...OPENROUTER_DEFAULT_HEADERS,
      ...super.headers(),
    };
  }
}
