/**
 * @textrelay/core - Common utilities
 *
 * Shared helper functions used across textrelay.
 */

import { nanoid } from 'nanoid';

// ---------------------------------------------------------------------------
// Async helpers
// ---------------------------------------------------------------------------

/**
 * Build the rejection value for an aborted signal.
 */
export function abortReason(signal: AbortSignal): Error {
  const reason: unknown = signal.reason;
  if (reason instanceof Error) return reason;
  const err = new Error(typeof reason === 'string' ? reason : 'The operation was aborted');
  err.name = 'AbortError';
  return err;
}

/**
 * Sleep for a given number of milliseconds. Rejects early when `signal` aborts.
 */
export function sleep(ms: number, signal?: AbortSignal): Promise<void> {
  if (!signal) {
    return new Promise((resolve) => setTimeout(resolve, ms));
  }

  const abortSignal = signal;
  if (abortSignal.aborted) {
    return Promise.reject(abortReason(abortSignal));
  }

  return new Promise((resolve, reject) => {
    const onAbort = (): void => {
      clearTimeout(timer);
      reject(abortReason(abortSignal));
    };

    const timer = setTimeout(() => {
      abortSignal.removeEventListener('abort', onAbort);
      resolve();
    }, ms);

    abortSignal.addEventListener('abort', onAbort, { once: true });
  });
}

/**
 * Settle with `promise`, or reject as soon as `signal` aborts. The underlying
 * work is not cancelled; it keeps running and its result is dropped.
 */
export function abortable<T>(promise: Promise<T>, signal?: AbortSignal): Promise<T> {
  if (!signal) return promise;

  const abortSignal = signal;
  if (abortSignal.aborted) {
    return Promise.reject(abortReason(abortSignal));
  }

  return new Promise<T>((resolve, reject) => {
    const onAbort = (): void => {
      reject(abortReason(abortSignal));
    };
    abortSignal.addEventListener('abort', onAbort, { once: true });

    promise.then(
      (value) => {
        abortSignal.removeEventListener('abort', onAbort);
        resolve(value);
      },
      (err: unknown) => {
        abortSignal.removeEventListener('abort', onAbort);
        reject(err);
      },
    );
  });
}

/** An abort signal that fires on a deadline or when its parent aborts. */
export interface DeadlineSignal {
  signal: AbortSignal;
  /** True when the deadline (not the parent) caused the abort. */
  timedOut(): boolean;
  /** Clear the timer and detach from the parent. Always call when done. */
  dispose(): void;
}

/**
 * Create a signal that aborts after `timeoutMs` or when `parent` aborts,
 * whichever comes first.
 */
export function withDeadline(timeoutMs: number, parent?: AbortSignal): DeadlineSignal {
  const controller = new AbortController();
  let expired = false;

  const onParentAbort = (): void => {
    controller.abort(parent?.reason);
  };

  const timer = setTimeout(() => {
    expired = true;
    controller.abort(new Error(`Timed out after ${timeoutMs}ms`));
  }, timeoutMs);

  if (parent?.aborted) {
    clearTimeout(timer);
    controller.abort(parent.reason);
  } else {
    parent?.addEventListener('abort', onParentAbort, { once: true });
  }

  return {
    signal: controller.signal,
    timedOut: () => expired,
    dispose: () => {
      clearTimeout(timer);
      parent?.removeEventListener('abort', onParentAbort);
    },
  };
}

// ---------------------------------------------------------------------------
// String helpers
// ---------------------------------------------------------------------------

/**
 * Truncate a string to a maximum length, appending an ellipsis if truncated.
 */
export function truncate(str: string, maxLength: number, suffix = '...'): string {
  if (str.length <= maxLength) return str;
  if (maxLength <= suffix.length) return suffix.slice(0, maxLength);
  return str.slice(0, maxLength - suffix.length) + suffix;
}

/**
 * Message text of any thrown value.
 */
export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}

// ---------------------------------------------------------------------------
// ID generation
// ---------------------------------------------------------------------------

/**
 * Generate a request identifier: `{prefix}_{nanoid}`.
 */
export function generateId(prefix = 'req'): string {
  return `${prefix}_${nanoid(16)}`;
}

// ---------------------------------------------------------------------------
// Object helpers
// ---------------------------------------------------------------------------

/**
 * Check if a value is a non-null object (not an array).
 */
export function isPlainObject(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * Recursively freeze an object graph in place and return it.
 */
export function deepFreeze<T>(value: T): Readonly<T> {
  if (typeof value === 'object' && value !== null && !Object.isFrozen(value)) {
    Object.freeze(value);
    for (const child of Object.values(value)) {
      deepFreeze(child);
    }
  }
  return value;
}
