/**
 * @textrelay/fallback - RetryPolicy
 *
 * Bounded retry with exponential backoff for a single provider call.
 * Only TransientError is retried.
 */

import pino from 'pino';
import { sleep as defaultSleep, errorMessage } from '@textrelay/core';
import { TransientError } from './errors.js';

export interface RetryPolicyOptions {
  /** Total attempts including the first (default 3). */
  maxAttempts?: number;
  /** Delay before the first retry (default 4 000 ms). */
  initialDelayMs?: number;
  /** Ceiling for any single delay (default 10 000 ms). */
  maxDelayMs?: number;
  /** Growth factor between delays (default 2). */
  multiplier?: number;
  /** Random spread as a fraction of the delay, 0..1 (default 0). */
  jitter?: number;
  /** Injected for tests. */
  sleep?: (ms: number, signal?: AbortSignal) => Promise<void>;
  logger?: pino.Logger;
}

export interface RetryContext {
  /** 1-based attempt number. */
  attempt: number;
}

export interface RetryRunOptions {
  signal?: AbortSignal;
  /** Label used in logs. */
  label?: string;
  onRetry?: (error: TransientError, attempt: number, delayMs: number) => void;
}

/**
 * ```ts
 * const policy = new RetryPolicy({ maxAttempts: 3 });
 * const text = await policy.execute(() => adapter.generateText(req));
 * ```
 */
export class RetryPolicy {
  readonly maxAttempts: number;
  private readonly initialDelayMs: number;
  private readonly maxDelayMs: number;
  private readonly multiplier: number;
  private readonly jitter: number;
  private readonly sleep: (ms: number, signal?: AbortSignal) => Promise<void>;
  private readonly log: pino.Logger;

  constructor(options: RetryPolicyOptions = {}) {
    this.maxAttempts = Math.max(1, options.maxAttempts ?? 3);
    this.initialDelayMs = options.initialDelayMs ?? 4_000;
    this.maxDelayMs = options.maxDelayMs ?? 10_000;
    this.multiplier = options.multiplier ?? 2;
    this.jitter = options.jitter ?? 0;
    this.sleep = options.sleep ?? defaultSleep;
    this.log = options.logger ?? pino({ name: '@textrelay/retry' });
  }

  /**
   * Delay before retry number `retry` (1-based): initial * multiplier^(retry-1), capped.
   */
  delayFor(retry: number): number {
    const base = Math.min(
      this.initialDelayMs * Math.pow(this.multiplier, retry - 1),
      this.maxDelayMs,
    );
    if (this.jitter === 0) return base;

    const spread = base * this.jitter * (Math.random() * 2 - 1);
    return Math.max(0, Math.min(base + spread, this.maxDelayMs));
  }

  /**
   * Run `fn` until it succeeds, throws a non-transient error, or the attempt
   * ceiling is reached. Rethrows the most recent error.
   */
  async execute<T>(
    fn: (context: RetryContext) => Promise<T>,
    options: RetryRunOptions = {},
  ): Promise<T> {
    for (let attempt = 1; ; attempt++) {
      try {
        return await fn({ attempt });
      } catch (err: unknown) {
        if (!(err instanceof TransientError)) {
          throw err;
        }

        if (attempt >= this.maxAttempts || options.signal?.aborted) {
          this.log.warn(
            { label: options.label, attempts: attempt, error: errorMessage(err) },
            'Retry budget exhausted',
          );
          throw err;
        }

        const delayMs = this.delayFor(attempt);
        this.log.info(
          { label: options.label, attempt, delayMs, error: err.message },
          'Transient failure, retrying',
        );
        options.onRetry?.(err, attempt, delayMs);

        await this.sleep(delayMs, options.signal);
      }
    }
  }
}
