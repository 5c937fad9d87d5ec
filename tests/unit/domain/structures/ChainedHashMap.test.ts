import { describe, it, expect } from 'vitest';
import { ChainedHashMap, rollingHash } from '../../../../src/domain/structures/ChainedHashMap.js';

describe('rollingHash', () => {
  it('should weight each character by successive powers of 31', () => {
    expect(rollingHash('a', 100)).toBe(1);
    expect(rollingHash('b', 100)).toBe(2);
    // 1 * 1 + 2 * 31 = 63
    expect(rollingHash('ab', 100)).toBe(63);
  });

  it('should stay within range for characters below "a"', () => {
    // 'A' is 65, so its term is 65 - 96 = -31
    expect(rollingHash('A', 100)).toBe(69);
    for (const key of ['Food', 'RENT', '123', 'Dining & Drinks', '']) {
      const bucket = rollingHash(key, 100);
      expect(bucket).toBeGreaterThanOrEqual(0);
      expect(bucket).toBeLessThan(100);
    }
  });
});

describe('ChainedHashMap', () => {
  it('should insert, search and overwrite values', () => {
    const map = new ChainedHashMap<number>();
    map.insert('Food', 10);
    map.insert('Rent', 900);
    map.insert('Food', 25);

    expect(map.search('Food')).toBe(25);
    expect(map.search('Rent')).toBe(900);
    expect(map.search('Travel')).toBeUndefined();
    expect(map.size).toBe(2);
  });

  it('should only update existing keys', () => {
    const map = new ChainedHashMap<number>();
    map.insert('Food', 1);

    expect(map.update('Food', 2)).toBe(true);
    expect(map.update('Rent', 3)).toBe(false);
    expect(map.search('Food')).toBe(2);
    expect(map.contains('Rent')).toBe(false);
  });

  it('should chain colliding keys and remove from any position', () => {
    const map = new ChainedHashMap<string>(1);
    map.insert('a', 'first');
    map.insert('b', 'second');
    map.insert('c', 'third');

    // New keys are prepended to their chain
    expect(map.entries()).toEqual([
      ['c', 'third'],
      ['b', 'second'],
      ['a', 'first'],
    ]);

    expect(map.remove('b')).toBe(true);
    expect(map.remove('b')).toBe(false);
    expect(map.entries().map(([key]) => key)).toEqual(['c', 'a']);
    expect(map.size).toBe(2);
  });

  it('should place keys in the bucket chosen by the rolling hash', () => {
    const map = new ChainedHashMap<number>(100);

    expect(map.bucketIndex('ab')).toBe(63);
  });

  it('should empty on clear', () => {
    const map = new ChainedHashMap<number>();
    map.insert('x', 1);
    map.clear();

    expect(map.size).toBe(0);
    expect(map.entries()).toEqual([]);
  });
});
