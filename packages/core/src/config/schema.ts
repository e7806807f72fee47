/**
 * @textrelay/core - TypeBox schema for textrelay.json configuration
 *
 * Sections: providers, priority, defaults, retry, probe, logging
 */

import { Type, type Static } from '@sinclair/typebox';

// ---------------------------------------------------------------------------
// Sub-schemas
// ---------------------------------------------------------------------------

export const ProviderKindSchema = Type.Union([
  Type.Literal('openai'),
  Type.Literal('anthropic'),
  Type.Literal('openrouter'),
  Type.Literal('zai'),
]);
export type ProviderKind = Static<typeof ProviderKindSchema>;

const ProviderSchema = Type.Object({
  name: Type.String({ minLength: 1 }),
  kind: ProviderKindSchema,
  apiKey: Type.String({ default: '', description: 'Literal key or $env:NAME reference' }),
  model: Type.String({ minLength: 1 }),
  baseUrl: Type.Optional(Type.String()),
  allowedOptions: Type.Optional(Type.Array(Type.String())),
  temperature: Type.Optional(Type.Number({ minimum: 0, maximum: 2 })),
  maxTokens: Type.Optional(Type.Integer({ minimum: 1 })),
  headers: Type.Optional(Type.Record(Type.String(), Type.String())),
  timeoutMs: Type.Optional(Type.Integer({ minimum: 1 })),
});
export type ProviderConfig = Static<typeof ProviderSchema>;

const DefaultsSchema = Type.Object({
  temperature: Type.Number({ minimum: 0, maximum: 2, default: 0.7 }),
  maxTokens: Type.Integer({ minimum: 1, default: 2048 }),
});
export type GenerationDefaults = Static<typeof DefaultsSchema>;

const RetrySchema = Type.Object({
  maxAttempts: Type.Integer({ minimum: 1, default: 3 }),
  initialDelayMs: Type.Integer({ minimum: 0, default: 4000 }),
  maxDelayMs: Type.Integer({ minimum: 0, default: 10000 }),
  multiplier: Type.Number({ minimum: 1, default: 2 }),
  jitter: Type.Number({ minimum: 0, maximum: 1, default: 0 }),
});
export type RetryConfig = Static<typeof RetrySchema>;

const ProbeSchema = Type.Object({
  ttlMs: Type.Integer({ minimum: 0, default: 60000, description: '0 disables caching' }),
  timeoutMs: Type.Integer({ minimum: 1, default: 30000 }),
  prompt: Type.String({ default: 'Hello' }),
  maxTokens: Type.Integer({ minimum: 1, default: 5 }),
  degradedThreshold: Type.Integer({ minimum: 1, default: 3 }),
});
export type ProbeConfig = Static<typeof ProbeSchema>;

const LoggingSchema = Type.Object({
  level: Type.Union(
    [
      Type.Literal('fatal'),
      Type.Literal('error'),
      Type.Literal('warn'),
      Type.Literal('info'),
      Type.Literal('debug'),
      Type.Literal('trace'),
      Type.Literal('silent'),
    ],
    { default: 'info' },
  ),
});

// ---------------------------------------------------------------------------
// Root config schema
// ---------------------------------------------------------------------------

export const RelayConfigSchema = Type.Object({
  $schema: Type.Optional(Type.String()),
  version: Type.Number({ default: 1 }),
  providers: Type.Array(ProviderSchema, { default: [] }),
  priority: Type.Array(Type.String(), { default: [] }),
  defaultProvider: Type.Optional(Type.String()),
  defaults: DefaultsSchema,
  retry: RetrySchema,
  probe: ProbeSchema,
  requestTimeoutMs: Type.Integer({ minimum: 1, default: 120000 }),
  logging: LoggingSchema,
});

export type RelayConfig = Static<typeof RelayConfigSchema>;

// ---------------------------------------------------------------------------
// Defaults
// ---------------------------------------------------------------------------

export const DEFAULT_CONFIG: RelayConfig = {
  version: 1,
  providers: [
    {
      name: 'anthropic',
      kind: 'anthropic',
      apiKey: '$env:ANTHROPIC_API_KEY',
      model: 'claude-3-5-sonnet-20241022',
    },
    {
      name: 'openrouter',
      kind: 'openrouter',
      apiKey: '$env:OPENROUTER_API_KEY',
      model: 'anthropic/claude-3-haiku',
    },
    {
      name: 'zai',
      kind: 'zai',
      apiKey: '$env:ZAI_API_KEY',
      model: 'glm-4.7',
    },
    {
      name: 'openai',
      kind: 'openai',
      apiKey: '$env:OPENAI_API_KEY',
      model: 'gpt-4',
    },
  ],
  priority: ['anthropic', 'openrouter', 'zai', 'openai'],
  defaults: {
    temperature: 0.7,
    maxTokens: 2048,
  },
  retry: {
    maxAttempts: 3,
    initialDelayMs: 4000,
    maxDelayMs: 10000,
    multiplier: 2,
    jitter: 0,
  },
  probe: {
    ttlMs: 60000,
    timeoutMs: 30000,
    prompt: 'Hello',
    maxTokens: 5,
    degradedThreshold: 3,
  },
  requestTimeoutMs: 120000,
  logging: {
    level: 'info',
  },
};
