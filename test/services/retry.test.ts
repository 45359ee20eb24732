import { describe, it, expect, vi } from 'vitest';
import { RetryStrategy, abortableSleep, type RetryConfig, type RetryEvent } from '../../src/services/retry/index.js';
import { CancelledError, ProviderError, RateLimitError } from '../../src/domain/errors.js';

const config: RetryConfig = { maxRetries: 3, baseDelayMs: 1000, maxDelayMs: 30_000, jitter: false };

function createSleep() {
  return vi.fn(async (_ms: number, _signal?: AbortSignal): Promise<void> => undefined);
}

const throttled = () => new ProviderError('THROTTLED', 'slow down', { status: 429 });

describe('RetryStrategy.getDelay', () => {
  const strategy = new RetryStrategy(config);

  it('doubles the base delay per attempt', () => {
    expect([0, 1, 2, 3].map((attempt) => strategy.getDelay(attempt))).toEqual([1000, 2000, 4000, 8000]);
  });

  it('caps the delay at maxDelay', () => {
    expect(strategy.getDelay(5)).toBe(30_000);
  });

  it('uses the provider retry-after hint, clamped to maxDelay', () => {
    expect(strategy.getDelay(0, 5000)).toBe(5000);
    expect(strategy.getDelay(0, 90_000)).toBe(30_000);
  });

  it('perturbs by at most 25% when jitter is on', () => {
    const low = new RetryStrategy({ ...config, jitter: true }, { random: () => 0 });
    const high = new RetryStrategy({ ...config, jitter: true }, { random: () => 1 });
    const mid = new RetryStrategy({ ...config, jitter: true }, { random: () => 0.5 });

    expect(low.getDelay(0)).toBe(750);
    expect(high.getDelay(0)).toBe(1250);
    expect(mid.getDelay(1)).toBe(2000);
  });

  it('rejects negative configuration', () => {
    expect(() => new RetryStrategy({ ...config, maxRetries: -1 })).toThrow('Retry configuration values must be non-negative');
  });
});

describe('RetryStrategy.shouldRetry', () => {
  const strategy = new RetryStrategy(config);

  it('retries transient provider codes', () => {
    expect(strategy.shouldRetry(throttled(), 0)).toBe(true);
    expect(strategy.shouldRetry(new ProviderError('MODEL_TIMEOUT', 'timeout'), 2)).toBe(true);
  });

  it('retries retryable HTTP statuses whatever the code', () => {
    expect(strategy.shouldRetry(new ProviderError('UNKNOWN', 'gateway', { status: 502 }), 0)).toBe(true);
  });

  it('retries rate limit errors', () => {
    expect(strategy.shouldRetry(new RateLimitError('limited', 'THROTTLED'), 0)).toBe(true);
  });

  it('does not retry client errors or unknown failures', () => {
    expect(strategy.shouldRetry(new ProviderError('BAD_REQUEST', 'bad', { status: 400 }), 0)).toBe(false);
    expect(strategy.shouldRetry(new Error('boom'), 0)).toBe(false);
  });

  it('stops once maxRetries is reached', () => {
    expect(strategy.shouldRetry(throttled(), 3)).toBe(false);
  });
});

describe('RetryStrategy.execute', () => {
  it('retries transient failures and reports each retry', async () => {
    const sleep = createSleep();
    const onRetry = vi.fn<(event: RetryEvent) => void>();
    const strategy = new RetryStrategy(config, { sleep });
    const fn = vi
      .fn<(attempt: number) => Promise<string>>()
      .mockRejectedValueOnce(throttled())
      .mockRejectedValueOnce(throttled())
      .mockResolvedValue('done');

    const result = await strategy.execute(fn, { onRetry });

    expect(result).toBe('done');
    expect(fn).toHaveBeenCalledTimes(3);
    expect(sleep.mock.calls.map(([ms]) => ms)).toEqual([1000, 2000]);
    expect(onRetry.mock.calls.map(([event]) => [event.attempt, event.delayMs])).toEqual([
      [1, 1000],
      [2, 2000],
    ]);
  });

  it('makes at most maxRetries + 1 attempts and rethrows the original error', async () => {
    const error = throttled();
    const strategy = new RetryStrategy(config, { sleep: createSleep() });
    const fn = vi.fn<(attempt: number) => Promise<string>>().mockRejectedValue(error);

    await expect(strategy.execute(fn)).rejects.toBe(error);
    expect(fn).toHaveBeenCalledTimes(4);
  });

  it('does not retry non-retryable errors', async () => {
    const error = new ProviderError('AUTH_FAILED', 'denied', { status: 401 });
    const sleep = createSleep();
    const strategy = new RetryStrategy(config, { sleep });
    const fn = vi.fn<(attempt: number) => Promise<string>>().mockRejectedValue(error);

    await expect(strategy.execute(fn)).rejects.toBe(error);
    expect(fn).toHaveBeenCalledTimes(1);
    expect(sleep).not.toHaveBeenCalled();
  });

  it('sleeps for the provider retry-after hint', async () => {
    const sleep = createSleep();
    const strategy = new RetryStrategy(config, { sleep });
    const fn = vi
      .fn<(attempt: number) => Promise<string>>()
      .mockRejectedValueOnce(new ProviderError('THROTTLED', 'slow down', { status: 429, retryAfterMs: 2500 }))
      .mockResolvedValue('ok');

    await strategy.execute(fn);

    expect(sleep).toHaveBeenCalledWith(2500, undefined);
  });

  it('cancels before the first attempt when the signal is aborted', async () => {
    const controller = new AbortController();
    controller.abort();
    const strategy = new RetryStrategy(config, { sleep: createSleep() });
    const fn = vi.fn<(attempt: number) => Promise<string>>();

    await expect(strategy.execute(fn, { signal: controller.signal })).rejects.toBeInstanceOf(CancelledError);
    expect(fn).not.toHaveBeenCalled();
  });

  it('cancels when the backoff would overrun the deadline', async () => {
    const sleep = createSleep();
    const strategy = new RetryStrategy(config, { sleep, now: () => 1000 });
    const fn = vi.fn<(attempt: number) => Promise<string>>().mockRejectedValue(throttled());

    await expect(strategy.execute(fn, { deadline: 1500 })).rejects.toBeInstanceOf(CancelledError);
    expect(fn).toHaveBeenCalledTimes(1);
    expect(sleep).not.toHaveBeenCalled();
  });

  it('cancels when the deadline has already passed', async () => {
    const strategy = new RetryStrategy(config, { sleep: createSleep(), now: () => 2000 });
    const fn = vi.fn<(attempt: number) => Promise<string>>();

    await expect(strategy.execute(fn, { deadline: 2000 })).rejects.toThrow('Invocation deadline exceeded before attempt');
    expect(fn).not.toHaveBeenCalled();
  });

  it('propagates a cancellation raised by the attempt without retrying', async () => {
    const strategy = new RetryStrategy(config, { sleep: createSleep() });
    const fn = vi.fn<(attempt: number) => Promise<string>>().mockRejectedValue(new CancelledError('aborted'));

    await expect(strategy.execute(fn)).rejects.toBeInstanceOf(CancelledError);
    expect(fn).toHaveBeenCalledTimes(1);
  });
});

describe('abortableSleep', () => {
  it('rejects with a cancellation when aborted mid-sleep', async () => {
    const controller = new AbortController();
    const pending = abortableSleep(10_000, controller.signal);
    controller.abort();

    await expect(pending).rejects.toBeInstanceOf(CancelledError);
  });

  it('resolves after the delay', async () => {
    await expect(abortableSleep(1)).resolves.toBeUndefined();
  });
});
