import { CancelledError, errorDetails, ProviderError } from '../../domain/errors.js';
import { ProviderErrorCode } from './types.js';

function extractStatus(cause: unknown): number | undefined {
  if (cause !== null && typeof cause === 'object' && 'status' in cause && typeof cause.status === 'number') {
    return cause.status;
  }
  return undefined;
}

function readHeader(headers: unknown, name: string): string | undefined {
  if (headers === null || typeof headers !== 'object') return undefined;
  if ('get' in headers && typeof headers.get === 'function') {
    const value: unknown = headers.get(name);
    return typeof value === 'string' ? value : undefined;
  }
  const value: unknown = Object.entries(headers).find(([key]) => key.toLowerCase() === name)?.[1];
  return typeof value === 'string' ? value : undefined;
}

/** Reads `retry-after-ms` or `retry-after` (seconds) from an SDK error's headers. */
export function extractRetryAfterMs(cause: unknown): number | undefined {
  if (cause === null || typeof cause !== 'object' || !('headers' in cause)) return undefined;

  const rawMs = readHeader(cause.headers, 'retry-after-ms');
  if (rawMs !== undefined && rawMs.trim() !== '') {
    const millis = Number(rawMs);
    if (Number.isFinite(millis) && millis >= 0) return millis;
  }

  const raw = readHeader(cause.headers, 'retry-after');
  if (raw === undefined || raw.trim() === '') return undefined;
  const seconds = Number(raw);
  if (Number.isFinite(seconds) && seconds >= 0) return seconds * 1000;
  return undefined;
}

function codeForStatus(status: number): ProviderErrorCode {
  switch (status) {
    case 429:
      return ProviderErrorCode.THROTTLED;
    case 503:
    case 529:
      return ProviderErrorCode.SERVICE_UNAVAILABLE;
    case 500:
    case 502:
      return ProviderErrorCode.INTERNAL_ERROR;
    case 504:
      return ProviderErrorCode.MODEL_TIMEOUT;
    case 400:
    case 413:
    case 422:
      return ProviderErrorCode.BAD_REQUEST;
    case 401:
    case 403:
      return ProviderErrorCode.AUTH_FAILED;
    case 404:
      return ProviderErrorCode.NOT_FOUND;
    default:
      return status >= 500 ? ProviderErrorCode.INTERNAL_ERROR : ProviderErrorCode.UNKNOWN;
  }
}

/**
 * Maps an SDK exception onto the provider-neutral error model. A call aborted
 * through the caller's signal becomes a `CancelledError` instead.
 */
export function toProviderError(cause: unknown, provider: string, signal?: AbortSignal): ProviderError | CancelledError {
  if (cause instanceof ProviderError || cause instanceof CancelledError) return cause;
  if (signal?.aborted) {
    return new CancelledError(`${provider} call aborted`, cause);
  }

  const status = extractStatus(cause);
  const details = errorDetails(cause);
  const retryAfterMs = extractRetryAfterMs(cause);

  if (status !== undefined) {
    return new ProviderError(codeForStatus(status), `${provider} API returned ${status}: ${details}`, {
      status,
      retryAfterMs,
      cause,
    });
  }

  const name = cause instanceof Error ? cause.name : '';
  if (name.includes('Timeout')) {
    return new ProviderError(ProviderErrorCode.MODEL_TIMEOUT, `${provider} request timed out`, { cause });
  }
  if (name.includes('Connection')) {
    return new ProviderError(ProviderErrorCode.CONNECTION_ERROR, `${provider} connection failed: ${details}`, { cause });
  }
  return new ProviderError(ProviderErrorCode.UNKNOWN, `${provider} call failed: ${details}`, { cause });
}
