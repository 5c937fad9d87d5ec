export const DEFAULT_BUCKET_COUNT = 100;

const HASH_BASE = 31;
const CHAR_OFFSET = 'a'.charCodeAt(0) - 1;

type Entry<V> = {
  key: string;
  value: V;
};

/**
 * Polynomial rolling hash reduced modulo the bucket count.
 * Code units below 'a' produce negative terms, so the result is folded back into range.
 */
export function rollingHash(key: string, bucketCount: number): number {
  let hash = 0;
  let power = 1;
  for (let i = 0; i < key.length; i++) {
    const term = (key.charCodeAt(i) - CHAR_OFFSET) * power;
    hash = (((hash + term) % bucketCount) + bucketCount) % bucketCount;
    power = (power * HASH_BASE) % bucketCount;
  }
  return hash;
}

/**
 * ChainedHashMap - fixed-size separate-chaining hash table
 * Never resizes; collisions lengthen chains (O(n) worst case).
 */
export class ChainedHashMap<V> {
  private readonly buckets: Entry<V>[][];
  private count = 0;

  constructor(private readonly bucketCount: number = DEFAULT_BUCKET_COUNT) {
    this.buckets = Array.from({ length: bucketCount }, () => []);
  }

  /**
   * Inserts or overwrites
   */
  insert(key: string, value: V): void {
    const chain = this.chainFor(key);
    const entry = chain.find((candidate) => candidate.key === key);
    if (entry) {
      entry.value = value;
      return;
    }
    chain.unshift({ key, value });
    this.count++;
  }

  /**
   * Overwrites an existing key only
   */
  update(key: string, value: V): boolean {
    const entry = this.chainFor(key).find((candidate) => candidate.key === key);
    if (!entry) return false;
    entry.value = value;
    return true;
  }

  search(key: string): V | undefined {
    return this.chainFor(key).find((candidate) => candidate.key === key)?.value;
  }

  contains(key: string): boolean {
    return this.chainFor(key).some((candidate) => candidate.key === key);
  }

  remove(key: string): boolean {
    const chain = this.chainFor(key);
    const index = chain.findIndex((candidate) => candidate.key === key);
    if (index === -1) return false;
    chain.splice(index, 1);
    this.count--;
    return true;
  }

  /**
   * Bucket order, then chain order
   */
  entries(): Array<[string, V]> {
    const result: Array<[string, V]> = [];
    for (const chain of this.buckets) {
      for (const entry of chain) {
        result.push([entry.key, entry.value]);
      }
    }
    return result;
  }

  bucketIndex(key: string): number {
    return rollingHash(key, this.bucketCount);
  }

  get size(): number {
    return this.count;
  }

  clear(): void {
    for (const chain of this.buckets) {
      chain.length = 0;
    }
    this.count = 0;
  }

  private chainFor(key: string): Entry<V>[] {
    return this.buckets[this.bucketIndex(key)];
  }
}
