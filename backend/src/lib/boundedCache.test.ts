import { describe, it, expect } from 'vitest';
import { BoundedCache } from './boundedCache';

describe('BoundedCache', () => {
  it('evicts the least recently used entry past the cap', () => {
    const cache = new BoundedCache<number>({ maxEntries: 2 });
    cache.set('a', 1);
    cache.set('b', 2);
    expect(cache.get('a')).toBe(1);
    cache.set('c', 3);

    expect(cache.size).toBe(2);
    expect(cache.has('b')).toBe(false);
    expect(cache.get('a')).toBe(1);
    expect(cache.get('c')).toBe(3);
  });

  it('drops entries once their time is up', () => {
    let clock = 1000;
    const cache = new BoundedCache<string | null>({ maxEntries: 10, ttlMs: 500, now: () => clock });
    cache.set('monza', null);
    clock = 1499;
    expect(cache.has('monza')).toBe(true);
    expect(cache.get('monza')).toBeNull();
    clock = 1500;
    expect(cache.has('monza')).toBe(false);
    expect(cache.size).toBe(0);
  });

  it('overwrites a key without growing', () => {
    const cache = new BoundedCache<number>({ maxEntries: 3 });
    cache.set('a', 1);
    cache.set('a', 2);
    expect(cache.size).toBe(1);
    expect(cache.get('a')).toBe(2);
  });

  it('rejects a non-positive cap', () => {
    expect(() => new BoundedCache<number>({ maxEntries: 0 })).toThrow(RangeError);
  });
});
