import { describe, it, expect, vi } from 'vitest';
import { CachingEmbeddingProvider, type EmbeddingProvider } from '../../src/services/embeddings/index.js';
import { BoundedCache } from '../../src/infrastructure/cache.js';

function createInner() {
  const embed = vi.fn<EmbeddingProvider['embed']>();
  const inner: EmbeddingProvider = { embed };
  return { inner, embed };
}

describe('CachingEmbeddingProvider', () => {
  it('caches vectors under a normalized key', async () => {
    const { inner, embed } = createInner();
    embed.mockResolvedValue([0.1, 0.2]);
    const provider = new CachingEmbeddingProvider(inner);

    expect(await provider.embed('Whole Milk ')).toEqual([0.1, 0.2]);
    expect(await provider.embed('whole milk')).toEqual([0.1, 0.2]);
    expect(embed).toHaveBeenCalledTimes(1);
    expect(provider.cachedCount).toBe(1);
  });

  it('shares one in-flight lookup between concurrent callers', async () => {
    const { inner, embed } = createInner();
    let resolve: (vector: number[]) => void = () => undefined;
    embed.mockReturnValue(
      new Promise<number[]>((r) => {
        resolve = r;
      }),
    );
    const provider = new CachingEmbeddingProvider(inner);

    const first = provider.embed('eggs');
    const second = provider.embed('EGGS');
    resolve([0.5]);

    expect(await Promise.all([first, second])).toEqual([[0.5], [0.5]]);
    expect(embed).toHaveBeenCalledTimes(1);
  });

  it('does not cache failed lookups', async () => {
    const { inner, embed } = createInner();
    embed.mockRejectedValueOnce(new Error('embedding service unavailable')).mockResolvedValue([0.3]);
    const provider = new CachingEmbeddingProvider(inner);

    await expect(provider.embed('bread')).rejects.toThrow('embedding service unavailable');
    expect(await provider.embed('bread')).toEqual([0.3]);
    expect(embed).toHaveBeenCalledTimes(2);
  });

  it('evicts the least recently used vector at capacity', async () => {
    const { inner, embed } = createInner();
    embed.mockResolvedValue([1]);
    const provider = new CachingEmbeddingProvider(inner, new BoundedCache(1));

    await provider.embed('apples');
    await provider.embed('pears');
    await provider.embed('apples');

    expect(embed).toHaveBeenCalledTimes(3);
    expect(provider.cachedCount).toBe(1);
  });
});
