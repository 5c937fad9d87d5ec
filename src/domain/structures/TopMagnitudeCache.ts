/**
 * TopMagnitudeCache - binary max-heap over a snapshot array
 * A disposable view rebuilt from authoritative data before each top-K read.
 * Order among equal magnitudes is unspecified.
 */
export class TopMagnitudeCache<T> {
  private heap: T[] = [];

  constructor(private readonly magnitude: (item: T) => number) {}

  /**
   * Replaces the contents and restores heap order bottom-up, O(n)
   */
  buildHeap(items: readonly T[]): void {
    this.heap = [...items];
    for (let i = Math.floor(this.heap.length / 2) - 1; i >= 0; i--) {
      siftDown(this.heap, i, this.magnitude);
    }
  }

  // O(log n)
  insert(item: T): void {
    this.heap.push(item);
    siftUp(this.heap, this.heap.length - 1, this.magnitude);
  }

  // O(log n)
  extractMax(): T | undefined {
    return extractRoot(this.heap, this.magnitude);
  }

  peek(): T | undefined {
    return this.heap[0];
  }

  /**
   * Up to k largest items, descending. Extracts from a copy; the cache is unchanged.
   */
  getTopK(k: number): T[] {
    const scratch = [...this.heap];
    const result: T[] = [];
    while (result.length < k) {
      const item = extractRoot(scratch, this.magnitude);
      if (item === undefined) break;
      result.push(item);
    }
    return result;
  }

  /**
   * Raw heap array, for inspection
   */
  toArray(): T[] {
    return [...this.heap];
  }

  get size(): number {
    return this.heap.length;
  }

  clear(): void {
    this.heap = [];
  }
}

function extractRoot<T>(heap: T[], magnitude: (item: T) => number): T | undefined {
  if (heap.length === 0) return undefined;
  const root = heap[0];
  const last = heap.pop();
  if (heap.length > 0 && last !== undefined) {
    heap[0] = last;
    siftDown(heap, 0, magnitude);
  }
  return root;
}

function siftUp<T>(heap: T[], index: number, magnitude: (item: T) => number): void {
  let i = index;
  while (i > 0) {
    const parent = Math.floor((i - 1) / 2);
    if (magnitude(heap[parent]) >= magnitude(heap[i])) break;
    [heap[parent], heap[i]] = [heap[i], heap[parent]];
    i = parent;
  }
}

function siftDown<T>(heap: T[], index: number, magnitude: (item: T) => number): void {
  let i = index;
  for (;;) {
    const left = 2 * i + 1;
    const right = 2 * i + 2;
    let largest = i;

    if (left < heap.length && magnitude(heap[left]) > magnitude(heap[largest])) {
      largest = left;
    }
    if (right < heap.length && magnitude(heap[right]) > magnitude(heap[largest])) {
      largest = right;
    }
    if (largest === i) return;

    [heap[i], heap[largest]] = [heap[largest], heap[i]];
    i = largest;
  }
}
