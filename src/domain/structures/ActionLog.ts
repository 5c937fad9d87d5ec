import { Arena, type Handle } from './Arena.js';

export const DEFAULT_ACTION_LOG_CAPACITY = 50;

type StackNode<T> = {
  value: T;
  next: Handle | null;
};

/**
 * ActionLog - bounded LIFO; when full, the oldest (bottom) entry is evicted
 */
export class ActionLog<T> {
  private nodes = new Arena<StackNode<T>>();
  private top: Handle | null = null;

  constructor(private readonly capacity: number = DEFAULT_ACTION_LOG_CAPACITY) {
    if (!Number.isInteger(capacity) || capacity < 1) {
      throw new RangeError(`ActionLog capacity must be a positive integer, got ${capacity}`);
    }
  }

  /**
   * O(1), plus an O(n) walk to trim the bottom on overflow
   */
  push(value: T): void {
    if (this.nodes.size >= this.capacity) {
      this.evictOldest();
    }
    this.top = this.nodes.allocate({ value, next: this.top });
  }

  pop(): T | undefined {
    if (!this.top) return undefined;
    const handle = this.top;
    const node = this.nodes.require(handle);
    this.top = node.next;
    this.nodes.release(handle);
    return node.value;
  }

  peek(): T | undefined {
    return this.top ? this.nodes.require(this.top).value : undefined;
  }

  /**
   * Most recent first
   */
  toArray(): T[] {
    const result: T[] = [];
    let current = this.top;
    while (current) {
      const node = this.nodes.require(current);
      result.push(node.value);
      current = node.next;
    }
    return result;
  }

  get size(): number {
    return this.nodes.size;
  }

  get maxSize(): number {
    return this.capacity;
  }

  isEmpty(): boolean {
    return this.top === null;
  }

  clear(): void {
    this.nodes.clear();
    this.top = null;
  }

  private evictOldest(): void {
    if (!this.top) return;

    const topNode = this.nodes.require(this.top);
    if (!topNode.next) {
      this.nodes.release(this.top);
      this.top = null;
      return;
    }

    // Walk to the second-to-last node
    let current = topNode;
    let nextHandle: Handle = topNode.next;
    let next = this.nodes.require(nextHandle);
    while (next.next) {
      current = next;
      nextHandle = next.next;
      next = this.nodes.require(nextHandle);
    }
    current.next = null;
    this.nodes.release(nextHandle);
  }
}
