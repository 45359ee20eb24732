import { describe, it, expect } from 'vitest';
import { extractRetryAfterMs, toProviderError } from '../../src/infrastructure/llm/errors.js';
import { CancelledError, ProviderError } from '../../src/domain/errors.js';

function apiError(status: number, headers?: unknown): Error {
  return Object.assign(new Error(`HTTP ${status}`), { status, headers });
}

describe('extractRetryAfterMs', () => {
  it('prefers retry-after-ms', () => {
    expect(extractRetryAfterMs(apiError(429, { 'retry-after-ms': '1500', 'retry-after': '9' }))).toBe(1500);
  });

  it('converts retry-after seconds to milliseconds', () => {
    expect(extractRetryAfterMs(apiError(429, { 'Retry-After': '3' }))).toBe(3000);
  });

  it('reads Headers-like objects', () => {
    const headers = new Headers({ 'retry-after': '1' });
    expect(extractRetryAfterMs(apiError(429, headers))).toBe(1000);
  });

  it('ignores missing or unparseable values', () => {
    expect(extractRetryAfterMs(apiError(429))).toBeUndefined();
    expect(extractRetryAfterMs(apiError(429, { 'retry-after': 'soon' }))).toBeUndefined();
    expect(extractRetryAfterMs('boom')).toBeUndefined();
  });
});

describe('toProviderError', () => {
  it.each([
    [429, 'THROTTLED'],
    [500, 'INTERNAL_ERROR'],
    [502, 'INTERNAL_ERROR'],
    [503, 'SERVICE_UNAVAILABLE'],
    [504, 'MODEL_TIMEOUT'],
    [401, 'AUTH_FAILED'],
    [404, 'NOT_FOUND'],
    [418, 'UNKNOWN'],
  ])('maps HTTP %i to %s', (status, code) => {
    const error = toProviderError(apiError(status), 'Groq');
    expect(error).toBeInstanceOf(ProviderError);
    expect(error).toMatchObject({ providerCode: code, status });
  });

  it('maps SDK timeout and connection errors by name', () => {
    const timeout = Object.assign(new Error('timed out'), { name: 'APIConnectionTimeoutError' });
    const connection = Object.assign(new Error('ECONNRESET'), { name: 'APIConnectionError' });

    expect(toProviderError(timeout, 'Groq')).toMatchObject({ providerCode: 'MODEL_TIMEOUT' });
    expect(toProviderError(connection, 'Groq')).toMatchObject({ providerCode: 'CONNECTION_ERROR' });
  });

  it('passes provider and cancellation errors through unchanged', () => {
    const original = new ProviderError('MODEL_ERROR', 'bad output');
    const cancelled = new CancelledError('stop');

    expect(toProviderError(original, 'Groq')).toBe(original);
    expect(toProviderError(cancelled, 'Groq')).toBe(cancelled);
  });
});
