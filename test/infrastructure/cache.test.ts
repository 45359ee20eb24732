import { describe, it, expect } from 'vitest';
import { BoundedCache } from '../../src/infrastructure/cache.js';

describe('BoundedCache', () => {
  it('rejects a non-positive capacity', () => {
    expect(() => new BoundedCache(0)).toThrow('Cache capacity must be a positive integer, got 0');
    expect(() => new BoundedCache(1.5)).toThrow();
  });

  it('evicts the least recently used entry when full', () => {
    const cache = new BoundedCache<string, number>(2);
    cache.set('a', 1);
    cache.set('b', 2);
    cache.set('c', 3);

    expect(cache.has('a')).toBe(false);
    expect(cache.get('b')).toBe(2);
    expect(cache.get('c')).toBe(3);
    expect(cache.size).toBe(2);
  });

  it('treats a read as a use', () => {
    const cache = new BoundedCache<string, number>(2);
    cache.set('a', 1);
    cache.set('b', 2);
    cache.get('a');
    cache.set('c', 3);

    expect(cache.has('a')).toBe(true);
    expect(cache.has('b')).toBe(false);
  });

  it('overwrites an existing key without evicting', () => {
    const cache = new BoundedCache<string, number>(2);
    cache.set('a', 1);
    cache.set('b', 2);
    cache.set('a', 10);

    expect(cache.size).toBe(2);
    expect(cache.get('a')).toBe(10);
    expect(cache.get('b')).toBe(2);
  });

  it('stores falsy values', () => {
    const cache = new BoundedCache<string, number>(1);
    cache.set('zero', 0);
    expect(cache.get('zero')).toBe(0);
  });

  it('supports delete and clear', () => {
    const cache = new BoundedCache<string, number>(3);
    cache.set('a', 1);
    cache.set('b', 2);

    expect(cache.delete('a')).toBe(true);
    expect(cache.delete('a')).toBe(false);
    cache.clear();
    expect(cache.size).toBe(0);
  });
});
