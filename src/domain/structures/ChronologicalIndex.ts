import { Arena, type Handle } from './Arena.js';

type ListNode<T> = {
  value: T;
  prev: Handle | null;
  next: Handle | null;
};

/**
 * ChronologicalIndex - doubly linked sequence in insertion order
 * Front holds the most recently created entry; historical entries go to the back.
 */
export class ChronologicalIndex<T extends { readonly id: string }> {
  private nodes = new Arena<ListNode<T>>();
  private head: Handle | null = null;
  private tail: Handle | null = null;

  // O(1)
  addFront(value: T): void {
    const handle = this.nodes.allocate({ value, prev: null, next: this.head });
    if (this.head) {
      this.nodes.require(this.head).prev = handle;
    } else {
      this.tail = handle;
    }
    this.head = handle;
  }

  // O(1)
  addBack(value: T): void {
    const handle = this.nodes.allocate({ value, prev: this.tail, next: null });
    if (this.tail) {
      this.nodes.require(this.tail).next = handle;
    } else {
      this.head = handle;
    }
    this.tail = handle;
  }

  // O(n)
  deleteById(id: string): boolean {
    const handle = this.findHandle(id);
    if (!handle) return false;

    const node = this.nodes.require(handle);
    if (node.prev) {
      this.nodes.require(node.prev).next = node.next;
    } else {
      this.head = node.next;
    }
    if (node.next) {
      this.nodes.require(node.next).prev = node.prev;
    } else {
      this.tail = node.prev;
    }

    this.nodes.release(handle);
    return true;
  }

  findById(id: string): T | undefined {
    const handle = this.findHandle(id);
    return handle ? this.nodes.require(handle).value : undefined;
  }

  has(id: string): boolean {
    return this.findHandle(id) !== null;
  }

  /**
   * Snapshot from front (newest) to back
   */
  traverseForward(): T[] {
    const result: T[] = [];
    let current = this.head;
    while (current) {
      const node = this.nodes.require(current);
      result.push(node.value);
      current = node.next;
    }
    return result;
  }

  /**
   * Snapshot from back to front
   */
  traverseBackward(): T[] {
    const result: T[] = [];
    let current = this.tail;
    while (current) {
      const node = this.nodes.require(current);
      result.push(node.value);
      current = node.prev;
    }
    return result;
  }

  /**
   * First `count` entries from the front
   */
  takeFront(count: number): T[] {
    const result: T[] = [];
    let current = this.head;
    while (current && result.length < count) {
      const node = this.nodes.require(current);
      result.push(node.value);
      current = node.next;
    }
    return result;
  }

  filter(predicate: (value: T) => boolean): T[] {
    return this.traverseForward().filter(predicate);
  }

  get size(): number {
    return this.nodes.size;
  }

  clear(): void {
    this.nodes.clear();
    this.head = null;
    this.tail = null;
  }

  private findHandle(id: string): Handle | null {
    let current = this.head;
    while (current) {
      const node = this.nodes.require(current);
      if (node.value.id === id) {
        return current;
      }
      current = node.next;
    }
    return null;
  }
}
