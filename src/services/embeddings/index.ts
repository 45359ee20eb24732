import { BoundedCache } from '../../infrastructure/cache.js';
import { errorDetails } from '../../domain/errors.js';
import { logger } from '../../infrastructure/logger.js';

const log = logger.child({ module: 'embeddings' });

export const DEFAULT_EMBEDDING_CACHE_SIZE = 1000;

export interface EmbeddingProvider {
  embed(text: string): Promise<number[]>;
}

/**
 * Memoizes embedding lookups in a bounded LRU cache. Concurrent requests for
 * the same text share one in-flight call; failed lookups are not cached.
 */
export class CachingEmbeddingProvider implements EmbeddingProvider {
  private readonly inner: EmbeddingProvider;
  private readonly cache: BoundedCache<string, number[]>;
  private readonly inFlight = new Map<string, Promise<number[]>>();

  constructor(inner: EmbeddingProvider, cache: BoundedCache<string, number[]> = new BoundedCache(DEFAULT_EMBEDDING_CACHE_SIZE)) {
    this.inner = inner;
    this.cache = cache;
  }

  get cachedCount(): number {
    return this.cache.size;
  }

  embed(text: string): Promise<number[]> {
    const key = text.trim().toLowerCase();

    const cached = this.cache.get(key);
    if (cached) return Promise.resolve(cached);

    const pending = this.inFlight.get(key);
    if (pending) return pending;

    const request = this.inner
      .embed(text)
      .then((vector) => {
        this.cache.set(key, vector);
        return vector;
      })
      .catch((error: unknown) => {
        log.warn({ textLength: text.length, details: errorDetails(error) }, 'Embedding lookup failed');
        throw error;
      })
      .finally(() => {
        this.inFlight.delete(key);
      });

    this.inFlight.set(key, request);
    return request;
  }
}
