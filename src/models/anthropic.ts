/**
 * textrelay models - Anthropic adapter
 *
 * Implements TextAdapter for Anthropic's Messages API.
 */

import pino from 'pino';
import { Type } from '@sinclair/typebox';
import { Value } from '@sinclair/typebox/value';
import type { ProviderConfig } from '@textrelay/core';
import {
  PermanentError,
  type CallOptions,
  type ChatMessage,
  type GenerationRequest,
  type TextAdapter,
} from '@textrelay/fallback';
import { postJson } from './http.js';
import { DEFAULT_TIMEOUT_MS, type AdapterOptions } from './openai.js';
import { allowedOptionsFor, filterOptions } from './options.js';

// ---------------------------------------------------------------------------
// Constants
// ---------------------------------------------------------------------------

export const ANTHROPIC_BASE_URL = 'https://api.anthropic.com';
export const ANTHROPIC_API_VERSION = '2023-06-01';

const MessagesResponseSchema = Type.Object({
  content: Type.Array(
    Type.Object({
      type: Type.String(),
      text: Type.Optional(Type.String()),
    }),
  ),
});

interface AnthropicMessage {
  role: 'user' | 'assistant';
  content: string;
}

// ---------------------------------------------------------------------------
// Message conversion
// ---------------------------------------------------------------------------

/**
 * Anthropic takes the system prompt as a separate field. `systemPrompt` and
 * the leading run of system messages are joined into it; a system message
 * after the first non-system one is sent as a user message in place.
 */
export function toAnthropicMessages(
  messages: readonly ChatMessage[],
  systemPrompt?: string,
): { system: string | undefined; messages: AnthropicMessage[] } {
  const systemParts: string[] = systemPrompt ? [systemPrompt] : [];
  const converted: AnthropicMessage[] = [];
  let leading = true;

  for (const m of messages) {
    if (m.role === 'system') {
      if (leading) {
        systemParts.push(m.content);
      } else {
        converted.push({ role: 'user', content: m.content });
      }
      continue;
    }
    leading = false;
    converted.push({ role: m.role, content: m.content });
  }

  return {
    system: systemParts.length > 0 ? systemParts.join('\n\n') : undefined,
    messages: converted,
  };
}

// ---------------------------------------------------------------------------
// AnthropicAdapter
// ---------------------------------------------------------------------------

export class AnthropicAdapter implements TextAdapter {
  readonly name: string;
  readonly model: string;
  readonly config: Readonly<ProviderConfig>;

  private readonly baseUrl: string;
  private readonly timeoutMs: number;
  private readonly allowedOptions: readonly string[];
  private readonly log: pino.Logger;

  constructor(config: Readonly<ProviderConfig>, options: AdapterOptions = {}) {
    this.name = config.name;
    this.model = config.model;
    this.config = config;
    this.baseUrl = (config.baseUrl ?? ANTHROPIC_BASE_URL).replace(/\/+$/, '');
    this.timeoutMs = config.timeoutMs ?? DEFAULT_TIMEOUT_MS;
    this.allowedOptions = allowedOptionsFor(config);
    this.log = options.logger ?? pino({ name: '@textrelay/models' });
  }

  async generateText(request: GenerationRequest, options: CallOptions = {}): Promise<string> {
    const { accepted, dropped } = filterOptions(request.options, this.allowedOptions);
    if (dropped.length > 0) {
      this.log.debug({ provider: this.name, dropped }, 'Dropped unsupported options');
    }

    const { system, messages } = toAnthropicMessages(request.messages, request.systemPrompt);

    const body: Record<string, unknown> = {
      ...accepted,
      model: this.model,
      messages,
      max_tokens: request.maxTokens,
      temperature: request.temperature,
    };
    if (system !== undefined) {
      body['system'] = system;
    }

    const data = await postJson({
      provider: this.name,
      url: `${this.baseUrl}/v1/messages`,
      headers: {
        ...this.config.headers,
        'x-api-key': this.config.apiKey,
        'anthropic-version': ANTHROPIC_API_VERSION,
      },
      body,
      timeoutMs: options.timeoutMs ?? this.timeoutMs,
      signal: options.signal,
    });

    if (!Value.Check(MessagesResponseSchema, data)) {
      throw new PermanentError(`${this.name} returned an unexpected response shape`, this.name);
    }

    const blocks = data.content.filter((block) => block.type === 'text');
    if (blocks.length === 0) {
      throw new PermanentError(`${this.name} returned no text content`, this.name);
    }
    return blocks.map((block) => block.text ?? '').join('');
  }
}
