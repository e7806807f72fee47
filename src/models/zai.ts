/**
 * textrelay models - Z AI adapter
 *
 * OpenAI wire format. GLM reasoning models can answer with an empty
 * `content` and the text in `reasoning_content`; we fall back to it.
 */

import type { ProviderConfig } from '@textrelay/core';
import { PermanentError } from '@textrelay/fallback';
import { OpenAIAdapter, type AdapterOptions, type ChatCompletion } from './openai.js';

export const ZAI_BASE_URL = 'https://api.z.ai/api/coding/paas/v4';

export class ZaiAdapter extends OpenAIAdapter {
  constructor(config: Readonly<ProviderConfig>, options: AdapterOptions = {}) {
    super(config, options, ZAI_BASE_URL);
  }

  protected override extractText(data: ChatCompletion): string {
    const message = data.choices[0]?.message;
    const content = message?.content;
    if (content) return content;

    const reasoning = message?.reasoning_content;
    if (typeof reasoning === 'string') {
      if (reasoning) this.log.debug({ provider: this.name }, 'Using reasoning_content as response text');
      return reasoning;
    }
    if (typeof content === 'string') return content;

    throw new PermanentError(`${this.name} returned no message content`, this.name);
  }
}
