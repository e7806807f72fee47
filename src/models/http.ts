/**
 * textrelay models - JSON transport
 *
 * One POST with a deadline, mapped onto the error taxonomy:
 *   - network failure or our own timeout -> TransientError
 *   - caller's abort                     -> rethrown as the abort reason
 *   - non-2xx                            -> classified by status
 *   - unparseable body                   -> PermanentError
 */

import { abortReason, errorMessage, truncate, withDeadline } from '@textrelay/core';
import { PermanentError, TransientError, httpError } from '@textrelay/fallback';

const MAX_DETAIL_LENGTH = 500;

export interface PostJsonOptions {
  /** Provider name, used in error messages. */
  provider: string;
  url: string;
  headers: Readonly<Record<string, string>>;
  body: unknown;
  timeoutMs: number;
  signal?: AbortSignal;
}

export async function postJson(options: PostJsonOptions): Promise<unknown> {
  const { provider, timeoutMs, signal } = options;
  const deadline = withDeadline(timeoutMs, signal);

  const failed = (err: unknown): Error => {
    if (signal?.aborted) return abortReason(signal);
    if (deadline.timedOut()) {
      return new TransientError(`${provider} request timed out after ${timeoutMs}ms`, provider);
    }
    return new TransientError(`${provider} network error: ${errorMessage(err)}`, provider);
  };

  try {
    let response: Response;
    let text: string;

    try {
      response = await fetch(options.url, {
        method: 'POST',
        headers: { 'Content-Type': 'application/json', ...options.headers },
        body: JSON.stringify(options.body),
        signal: deadline.signal,
      });
      text = await response.text();
    } catch (err: unknown) {
      throw failed(err);
    }

    if (!response.ok) {
      const detail = text.trim() || response.statusText || 'no response body';
      throw httpError(provider, response.status, truncate(detail, MAX_DETAIL_LENGTH));
    }

    try {
      const parsed: unknown = JSON.parse(text);
      return parsed;
    } catch {
      throw new PermanentError(
        `${provider} returned a response that is not JSON: ${truncate(text, 100)}`,
        provider,
        response.status,
      );
    }
  } finally {
    deadline.dispose();
  }
}
