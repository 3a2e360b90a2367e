import { describe, it, expect } from 'vitest';
import { SeenCache } from './seen-cache.js';

describe('SeenCache', () => {
  it('remembers added keys', () => {
    const cache = new SeenCache(3);
    cache.add('a');
    expect(cache.has('a')).toBe(true);
    expect(cache.has('b')).toBe(false);
  });

  it('evicts the oldest key once full', () => {
    const cache = new SeenCache(2);
    cache.add('a');
    cache.add('b');
    cache.add('c');

    expect(cache.size).toBe(2);
    expect(cache.has('a')).toBe(false);
    expect(cache.has('b')).toBe(true);
    expect(cache.has('c')).toBe(true);
  });

  it('refreshes the age of a re-added key', () => {
    const cache = new SeenCache(2);
    cache.add('a');
    cache.add('b');
    cache.add('a');
    cache.add('c');

    expect(cache.has('a')).toBe(true);
    expect(cache.has('b')).toBe(false);
  });

  it('rejects a non-positive capacity', () => {
    expect(() => new SeenCache(0)).toThrow(RangeError);
  });
});
