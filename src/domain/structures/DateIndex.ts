import { Arena, type Handle } from './Arena.js';

type TreeNode<T> = {
  key: string;
  bucket: T[];
  left: Handle | null;
  right: Handle | null;
};

/**
 * DateIndex - binary search tree keyed by `YYYY-MM-DD`, one bucket per date
 * Not rebalanced: insertion in date order degrades it to a list (O(n) per insert).
 * Buckets keep insertion order; emptied buckets stay in the tree.
 */
export class DateIndex<T extends { readonly id: string; readonly date: string }> {
  private nodes = new Arena<TreeNode<T>>();
  private root: Handle | null = null;
  private count = 0;

  // O(log n) average, O(n) worst case
  insert(value: T): void {
    const key = value.date;
    if (!this.root) {
      this.root = this.allocate(key, value);
      this.count++;
      return;
    }

    let current = this.root;
    for (;;) {
      const node = this.nodes.require(current);
      if (key === node.key) {
        node.bucket.push(value);
        break;
      }
      const side = key < node.key ? 'left' : 'right';
      const child = node[side];
      if (!child) {
        node[side] = this.allocate(key, value);
        break;
      }
      current = child;
    }
    this.count++;
  }

  /**
   * Ascending by date
   */
  inorder(): T[] {
    const result: T[] = [];
    this.walk(this.root, result, false);
    return result;
  }

  /**
   * Descending by date
   */
  reverseInorder(): T[] {
    const result: T[] = [];
    this.walk(this.root, result, true);
    return result;
  }

  /**
   * All entries with start <= date <= end, ascending.
   * Subtrees that lie entirely outside the bounds are skipped.
   */
  rangeQuery(start: string, end: string): T[] {
    const result: T[] = [];
    this.collectRange(this.root, start, end, result);
    return result;
  }

  /**
   * `-31` is a valid upper bound for every month because keys compare as strings
   */
  getByMonth(yearMonth: string): T[] {
    return this.rangeQuery(`${yearMonth}-01`, `${yearMonth}-31`);
  }

  findById(id: string): T | undefined {
    const location = this.locate(this.root, id);
    return location ? location.bucket[location.index] : undefined;
  }

  // O(n): ids are not keys
  deleteById(id: string): boolean {
    const location = this.locate(this.root, id);
    if (!location) return false;
    location.bucket.splice(location.index, 1);
    this.count--;
    return true;
  }

  /**
   * Removes an entry whose date is known, descending only along its key path
   */
  delete(value: T): boolean {
    let current = this.root;
    while (current) {
      const node = this.nodes.require(current);
      if (value.date === node.key) {
        const index = node.bucket.findIndex((entry) => entry.id === value.id);
        if (index === -1) return false;
        node.bucket.splice(index, 1);
        this.count--;
        return true;
      }
      current = value.date < node.key ? node.left : node.right;
    }
    return false;
  }

  /**
   * Number of edges on the longest root-to-leaf path (0 for a single node, -1 when empty)
   */
  height(): number {
    const measure = (handle: Handle | null): number => {
      if (!handle) return -1;
      const node = this.nodes.require(handle);
      return 1 + Math.max(measure(node.left), measure(node.right));
    };
    return measure(this.root);
  }

  get size(): number {
    return this.count;
  }

  clear(): void {
    this.nodes.clear();
    this.root = null;
    this.count = 0;
  }

  private allocate(key: string, value: T): Handle {
    return this.nodes.allocate({ key, bucket: [value], left: null, right: null });
  }

  private walk(handle: Handle | null, result: T[], reverse: boolean): void {
    if (!handle) return;
    const node = this.nodes.require(handle);
    this.walk(reverse ? node.right : node.left, result, reverse);
    result.push(...node.bucket);
    this.walk(reverse ? node.left : node.right, result, reverse);
  }

  private collectRange(handle: Handle | null, start: string, end: string, result: T[]): void {
    if (!handle) return;
    const node = this.nodes.require(handle);

    if (node.key > start) {
      this.collectRange(node.left, start, end, result);
    }
    if (node.key >= start && node.key <= end) {
      result.push(...node.bucket);
    }
    if (node.key < end) {
      this.collectRange(node.right, start, end, result);
    }
  }

  private locate(
    handle: Handle | null,
    id: string
  ): { bucket: T[]; index: number } | null {
    if (!handle) return null;
    const node = this.nodes.require(handle);
    const index = node.bucket.findIndex((entry) => entry.id === id);
    if (index !== -1) {
      return { bucket: node.bucket, index };
    }
    return this.locate(node.left, id) ?? this.locate(node.right, id);
  }
}
