/**
 * textrelay models - OpenAI adapter
 *
 * Implements TextAdapter for the OpenAI Chat Completions API. OpenRouter and
 * Z AI speak the same wire format and extend this class.
 */

import pino from 'pino';
import { Type, type Static } from '@sinclair/typebox';
import { Value } from '@sinclair/typebox/value';
import type { ProviderConfig } from '@textrelay/core';
import {
  PermanentError,
  type CallOptions,
  type GenerationRequest,
  type TextAdapter,
} from '@textrelay/fallback';
import { postJson } from './http.js';
import { allowedOptionsFor, filterOptions } from './options.js';

// ---------------------------------------------------------------------------
// Constants
// ---------------------------------------------------------------------------

export const OPENAI_BASE_URL = 'https://api.openai.com/v1';
export const DEFAULT_TIMEOUT_MS = 60_000;

const NullableString = Type.Optional(Type.Union([Type.String(), Type.Null()]));

export const ChatCompletionSchema = Type.Object({
  choices: Type.Array(
    Type.Object({
      message: Type.Object({
        content: NullableString,
        reasoning_content: NullableString,
      }),
    }),
    { minItems: 1 },
  ),
});

export type ChatCompletion = Static<typeof ChatCompletionSchema>;

export interface WireMessage {
  role: 'system' | 'user' | 'assistant';
  content: string;
}

export interface AdapterOptions {
  logger?: pino.Logger;
}

// ---------------------------------------------------------------------------
// OpenAIAdapter
// ---------------------------------------------------------------------------

export class OpenAIAdapter implements TextAdapter {
  readonly name: string;
  readonly model: string;
  readonly config: Readonly<ProviderConfig>;

  protected readonly baseUrl: string;
  protected readonly timeoutMs: number;
  protected readonly allowedOptions: readonly string[];
  protected readonly log: pino.Logger;

  constructor(config: Readonly<ProviderConfig>, options: AdapterOptions = {}, defaultBaseUrl = OPENAI_BASE_URL) {
    this.name = config.name;
    this.model = config.model;
    this.config = config;
    this.baseUrl = (config.baseUrl ?? defaultBaseUrl).replace(/\/+$/, '');
    this.timeoutMs = config.timeoutMs ?? DEFAULT_TIMEOUT_MS;
    this.allowedOptions = allowedOptionsFor(config);
    this.log = options.logger ?? pino({ name: '@textrelay/models' });
  }

  async generateText(request: GenerationRequest, options: CallOptions = {}): Promise<string> {
    const { accepted, dropped } = filterOptions(request.options, this.allowedOptions);
    if (dropped.length > 0) {
      this.log.debug({ provider: this.name, dropped }, 'Dropped unsupported options');
    }

    const body: Record<string, unknown> = {
      ...accepted,
      model: this.model,
      messages: this.buildMessages(request),
      temperature: request.temperature,
      max_tokens: request.maxTokens,
    };

    const data = await postJson({
      provider: this.name,
      url: `${this.baseUrl}/chat/completions`,
      headers: this.headers(),
      body,
      timeoutMs: options.timeoutMs ?? this.timeoutMs,
      signal: options.signal,
    });

    if (!Value.Check(ChatCompletionSchema, data)) {
      throw new PermanentError(`${this.name} returned an unexpected response shape`, this.name);
    }
    return this.extractText(data);
  }

  /**
   * `systemPrompt` goes first as a system message; the caller's messages
   * follow unchanged.
   */
  protected buildMessages(request: GenerationRequest): WireMessage[] {
    const messages: WireMessage[] = [];
    if (request.systemPrompt) {
      messages.push({ role: 'system', content: request.systemPrompt });
    }
    for (const m of request.messages) {
      messages.push({ role: m.role, content: m.content });
    }
    return messages;
  }

  protected headers(): Record<string, string> {
    return {
      ...this.config.headers,
      Authorization: `Bearer ${this.config.apiKey}`,
    };
  }

  protected extractText(data: ChatCompletion): string {
    const content = data.choices[0]?.message.content;
    if (typeof content !== 'string') {
      throw new PermanentError(`${this.name} returned no message content`, this.name);
    }
    return content;
  }
}
