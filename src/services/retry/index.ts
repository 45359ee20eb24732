import { CancelledError, ProviderError, RateLimitError } from '../../domain/errors.js';
import { ProviderErrorCode } from '../../infrastructure/llm/types.js';
import { logger } from '../../infrastructure/logger.js';

const log = logger.child({ module: 'retry' });

export const TRANSIENT_PROVIDER_CODES: ReadonlySet<string> = new Set([
  ProviderErrorCode.THROTTLED,
  ProviderErrorCode.SERVICE_UNAVAILABLE,
  ProviderErrorCode.INTERNAL_ERROR,
  ProviderErrorCode.MODEL_TIMEOUT,
  ProviderErrorCode.MODEL_ERROR,
  ProviderErrorCode.STREAM_ERROR,
  ProviderErrorCode.CONNECTION_ERROR,
]);

export const RETRYABLE_STATUSES: ReadonlySet<number> = new Set([429, 500, 502, 503, 504]);

const JITTER_RATIO = 0.25;

export interface RetryConfig {
  maxRetries: number;
  baseDelayMs: number;
  maxDelayMs: number;
  jitter: boolean;
}

export interface RetryEvent {
  attempt: number;
  delayMs: number;
  error: unknown;
}

export interface ExecuteOptions {
  signal?: AbortSignal;
  /** Epoch milliseconds after which no further attempt or sleep is started. */
  deadline?: number;
  onRetry?: (event: RetryEvent) => void;
  requestId?: string;
}

export type SleepFn = (ms: number, signal?: AbortSignal) => Promise<void>;

export interface RetryDeps {
  sleep?: SleepFn;
  random?: () => number;
  now?: () => number;
}

export function abortableSleep(ms: number, signal?: AbortSignal): Promise<void> {
  return new Promise((resolve, reject) => {
    if (signal?.aborted) {
      reject(new CancelledError('Backoff sleep aborted', signal.reason));
      return;
    }
    const onAbort = () => {
      clearTimeout(timer);
      reject(new CancelledError('Backoff sleep aborted', signal?.reason));
    };
    const timer = setTimeout(() => {
      signal?.removeEventListener('abort', onAbort);
      resolve();
    }, ms);
    signal?.addEventListener('abort', onAbort, { once: true });
  });
}

/**
 * Exponential backoff with optional ±25% jitter. The configuration is fixed
 * at construction; every `execute` call keeps its own attempt counter.
 */
export class RetryStrategy {
  readonly config: Readonly<RetryConfig>;
  private readonly sleep: SleepFn;
  private readonly random: () => number;
  private readonly now: () => number;

  constructor(config: RetryConfig, deps: RetryDeps = {}) {
    if (config.maxRetries < 0 || config.baseDelayMs < 0 || config.maxDelayMs < 0) {
      throw new Error('Retry configuration values must be non-negative');
    }
    this.config = Object.freeze({ ...config });
    this.sleep = deps.sleep ?? abortableSleep;
    this.random = deps.random ?? Math.random;
    this.now = deps.now ?? Date.now;
  }

  shouldRetry(error: unknown, attempt: number): boolean {
    if (attempt >= this.config.maxRetries) return false;

    if (error instanceof RateLimitError) return true;
    if (error instanceof ProviderError) {
      if (TRANSIENT_PROVIDER_CODES.has(error.providerCode)) return true;
      return error.status !== undefined && RETRYABLE_STATUSES.has(error.status);
    }
    return false;
  }

  getDelay(attempt: number, retryAfterMs?: number): number {
    if (retryAfterMs !== undefined && retryAfterMs >= 0) {
      return Math.min(retryAfterMs, this.config.maxDelayMs);
    }

    const delay = Math.min(this.config.baseDelayMs * 2 ** attempt, this.config.maxDelayMs);
    if (!this.config.jitter) return delay;

    const spread = delay * JITTER_RATIO;
    return Math.max(0, delay + (this.random() * 2 - 1) * spread);
  }

  /**
   * Runs `fn` until it succeeds or a failure is not retryable. The last error
   * is rethrown unchanged once retries are exhausted.
   *
   * @throws {CancelledError} When the signal aborts or the deadline passes
   */
  async execute<T>(fn: (attempt: number) => Promise<T>, options: ExecuteOptions = {}): Promise<T> {
    const { signal, deadline, onRetry, requestId } = options;

    for (let attempt = 0; ; attempt++) {
      this.checkCancelled(signal, deadline, 'before attempt');

      try {
        return await fn(attempt);
      } catch (error) {
        if (error instanceof CancelledError || !this.shouldRetry(error, attempt)) {
          throw error;
        }

        const retryAfterMs = error instanceof ProviderError ? error.retryAfterMs : undefined;
        const delayMs = this.getDelay(attempt, retryAfterMs);

        this.checkCancelled(signal, deadline, 'before backoff');
        if (deadline !== undefined && this.now() + delayMs > deadline) {
          throw new CancelledError(`Backoff of ${Math.round(delayMs)}ms would exceed the deadline`, error);
        }

        log.warn(
          {
            requestId,
            attempt: attempt + 1,
            maxRetries: this.config.maxRetries,
            delayMs: Math.round(delayMs),
            providerCode: error instanceof ProviderError ? error.providerCode : undefined,
          },
          'Retrying model call after transient failure',
        );
        onRetry?.({ attempt: attempt + 1, delayMs, error });

        await this.sleep(delayMs, signal);
      }
    }
  }

  private checkCancelled(signal: AbortSignal | undefined, deadline: number | undefined, stage: string): void {
    if (signal?.aborted) {
      throw new CancelledError(`Invocation cancelled ${stage}`, signal.reason);
    }
    if (deadline !== undefined && this.now() >= deadline) {
      throw new CancelledError(`Invocation deadline exceeded ${stage}`);
    }
  }
}
