import { describe, it, expect } from 'vitest';
import { TopMagnitudeCache } from '../../../../src/domain/structures/TopMagnitudeCache.js';

type Expense = { id: string; amount: number };

const byAmount = (e: Expense) => e.amount;

function expenses(amounts: number[]): Expense[] {
  return amounts.map((amount, i) => ({ id: `e${i}`, amount }));
}

function isMaxHeap(items: Expense[]): boolean {
  return items.every((item, i) => i === 0 || items[Math.floor((i - 1) / 2)].amount >= item.amount);
}

describe('TopMagnitudeCache', () => {
  it('should build a valid max-heap bottom-up', () => {
    const cache = new TopMagnitudeCache<Expense>(byAmount);
    cache.buildHeap(expenses([3, 1, 4, 10, 5, 9, 2, 6]));

    expect(cache.size).toBe(8);
    expect(cache.peek()?.amount).toBe(10);
    expect(isMaxHeap(cache.toArray())).toBe(true);
  });

  it('should return the top k in descending order without consuming the heap', () => {
    const cache = new TopMagnitudeCache<Expense>(byAmount);
    cache.buildHeap(expenses([3, 1, 4, 10, 5, 9, 2, 6]));

    const first = cache.getTopK(3).map(byAmount);
    const second = cache.getTopK(3).map(byAmount);

    expect(first).toEqual([10, 9, 6]);
    expect(second).toEqual(first);
    expect(cache.size).toBe(8);
  });

  it('should cap k at the heap size', () => {
    const cache = new TopMagnitudeCache<Expense>(byAmount);
    cache.buildHeap(expenses([2, 8]));

    expect(cache.getTopK(5).map(byAmount)).toEqual([8, 2]);
    expect(cache.getTopK(0)).toEqual([]);
  });

  it('should sift inserted items up', () => {
    const cache = new TopMagnitudeCache<Expense>(byAmount);
    cache.insert({ id: 'a', amount: 5 });
    cache.insert({ id: 'b', amount: 50 });
    cache.insert({ id: 'c', amount: 20 });

    expect(cache.peek()?.id).toBe('b');
    expect(isMaxHeap(cache.toArray())).toBe(true);
  });

  it('should extract in descending order until empty', () => {
    const cache = new TopMagnitudeCache<Expense>(byAmount);
    cache.buildHeap(expenses([7, 3, 11]));

    expect(cache.extractMax()?.amount).toBe(11);
    expect(cache.extractMax()?.amount).toBe(7);
    expect(cache.extractMax()?.amount).toBe(3);
    expect(cache.extractMax()).toBeUndefined();
    expect(cache.size).toBe(0);
  });

  it('should not keep a reference to the source array', () => {
    const source = expenses([1, 2, 3]);
    const cache = new TopMagnitudeCache<Expense>(byAmount);
    cache.buildHeap(source);
    source.push({ id: 'late', amount: 100 });

    expect(cache.size).toBe(3);
    expect(cache.peek()?.amount).toBe(3);
  });

  it('should rank category totals', () => {
    const cache = new TopMagnitudeCache<{ category: string; totalAmount: number }>(
      (entry) => entry.totalAmount
    );
    cache.buildHeap([
      { category: 'Food', totalAmount: 150 },
      { category: 'Rent', totalAmount: 900 },
      { category: 'Travel', totalAmount: 320 },
    ]);

    expect(cache.getTopK(2).map((entry) => entry.category)).toEqual(['Rent', 'Travel']);
  });
});
