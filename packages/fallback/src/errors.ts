/**
 * @textrelay/fallback - Error taxonomy
 *
 * Adapters report the precise kind; RetryPolicy only distinguishes transient
 * from permanent; the orchestrator only distinguishes "this candidate failed"
 * from "every candidate failed".
 */

/** Base class for every error textrelay raises. */
export class RelayError extends Error {
  constructor(
    message: string,
    public readonly provider?: string,
  ) {
    super(message);
    this.name = 'RelayError';
  }
}

/** Missing or placeholder credential, unknown provider kind. Never retried. */
export class ConfigurationError extends RelayError {
  constructor(message: string, provider?: string) {
    super(message, provider);
    this.name = 'ConfigurationError';
  }
}

/** Requested a provider the registry never built. */
export class ProviderNotConfiguredError extends RelayError {
  constructor(provider: string) {
    super(`Provider "${provider}" is not configured`, provider);
    this.name = 'ProviderNotConfiguredError';
  }
}

/**
 * Retriable failure: rate limiting, 5xx, request timeout, network error.
 * `statusCode` is 0 when no HTTP response was received.
 */
export class TransientError extends RelayError {
  constructor(
    message: string,
    provider?: string,
    public readonly statusCode = 0,
  ) {
    super(message, provider);
    this.name = 'TransientError';
  }
}

/** Non-retriable failure: bad credentials, malformed request, unknown model. */
export class PermanentError extends RelayError {
  constructor(
    message: string,
    provider?: string,
    public readonly statusCode = 0,
  ) {
    super(message, provider);
    this.name = 'PermanentError';
  }
}

/**
 * Every candidate failed. Built by the orchestrator to format the aggregate
 * message; returned inside a FallbackResult, never thrown past it.
 */
export class ExhaustionError extends RelayError {
  constructor(
    message: string,
    public readonly tried: readonly string[],
  ) {
    super(message);
    this.name = 'ExhaustionError';
  }
}

export type ErrorClass = 'transient' | 'permanent';

/**
 * Classify an HTTP status code.
 *
 * Transient (retry, then fall back):
 *   - 0   (connection refused / network error)
 *   - 408 Request Timeout
 *   - 409 Conflict
 *   - 425 Too Early
 *   - 429 Too Many Requests
 *   - 5xx Server errors
 *
 * Permanent (fall back immediately):
 *   - 400 Bad Request, 422 Unprocessable Entity (malformed request)
 *   - 401 Unauthorized, 403 Forbidden (bad credentials)
 *   - 404 Not Found (unknown model or endpoint)
 *   - everything else
 */
export function classifyHttpStatus(statusCode: number): ErrorClass {
  if (statusCode === 0) return 'transient';
  if (statusCode === 408 || statusCode === 409 || statusCode === 425 || statusCode === 429) {
    return 'transient';
  }
  if (statusCode >= 500 && statusCode <= 599) return 'transient';
  return 'permanent';
}

/**
 * Build the typed error for an HTTP failure.
 */
export function httpError(
  provider: string,
  statusCode: number,
  detail: string,
): TransientError | PermanentError {
  const message = `${provider} returned HTTP ${statusCode}: ${detail}`;
  return classifyHttpStatus(statusCode) === 'transient'
    ? new TransientError(message, provider, statusCode)
    : new PermanentError(message, provider, statusCode);
}

export function isTransient(err: unknown): err is TransientError {
  return err instanceof TransientError;
}
