/**
 * textrelay models - Extra-option allow-lists
 *
 * Each provider kind forwards a fixed set of extra request options under
 * their wire names. Keys outside the provider's list, and values that fail
 * the option's schema, are dropped before the request is built.
 */

import { Type, type TSchema } from '@sinclair/typebox';
import { Value } from '@sinclair/typebox/value';
import { KNOWN_PROVIDER_OPTIONS, type ProviderConfig } from '@textrelay/core';
import type { ExtraOptions } from '@textrelay/fallback';

const Penalty = Type.Number({ minimum: -2, maximum: 2 });

/** Value schema for every option any kind can forward. */
export const OPTION_SCHEMAS: Readonly<Record<string, TSchema>> = {
  stop: Type.Union([Type.String(), Type.Array(Type.String(), { maxItems: 4 })]),
  stop_sequences: Type.Array(Type.String()),
  top_p: Type.Number({ minimum: 0, maximum: 1 }),
  top_k: Type.Integer({ minimum: 0 }),
  presence_penalty: Penalty,
  frequency_penalty: Penalty,
  logit_bias: Type.Record(Type.String(), Type.Number({ minimum: -100, maximum: 100 })),
  user: Type.String(),
};

export interface FilteredOptions {
  accepted: Record<string, unknown>;
  /** Keys left out, with the reason. */
  dropped: Array<{ key: string; reason: 'not-allowed' | 'invalid' }>;
}

/**
 * Option names `config` may forward: its kind's list, narrowed by
 * `allowedOptions` when that is set.
 */
export function allowedOptionsFor(config: Readonly<ProviderConfig>): string[] {
  const known = KNOWN_PROVIDER_OPTIONS[config.kind] ?? [];
  const narrowed = config.allowedOptions;
  return narrowed ? known.filter((name) => narrowed.includes(name)) : [...known];
}

/**
 * Split `options` into what may be sent and what must not.
 */
export function filterOptions(options: ExtraOptions, allowed: readonly string[]): FilteredOptions {
  const accepted: Record<string, unknown> = {};
  const dropped: FilteredOptions['dropped'] = [];

  for (const [key, value] of Object.entries(options)) {
    if (value === undefined) continue;

    const schema = OPTION_SCHEMAS[key];
    if (!allowed.includes(key) || !schema) {
      dropped.push({ key, reason: 'not-allowed' });
      continue;
    }
    if (!Value.Check(schema, value)) {
      dropped.push({ key, reason: 'invalid' });
      continue;
    }
    accepted[key] = value;
  }

  return { accepted, dropped };
}
