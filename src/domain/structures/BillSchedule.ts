import { Arena, type Handle } from './Arena.js';
import { isOverdue, type Bill } from '../entities/Bill.js';

type QueueNode = {
  bill: Bill;
  next: Handle | null;
};

/**
 * BillSchedule - singly linked FIFO of bills
 * Lookup by id is a linear scan; bills are expected to be handled in arrival order.
 * Reads return copies so callers cannot flip flags behind the queue's back.
 */
export class BillSchedule {
  private nodes = new Arena<QueueNode>();
  private front: Handle | null = null;
  private rear: Handle | null = null;

  // O(1)
  enqueue(bill: Bill): void {
    const handle = this.nodes.allocate({ bill: { ...bill }, next: null });
    if (this.rear) {
      this.nodes.require(this.rear).next = handle;
    } else {
      this.front = handle;
    }
    this.rear = handle;
  }

  // O(1)
  dequeue(): Bill | undefined {
    if (!this.front) return undefined;
    const handle = this.front;
    const node = this.nodes.require(handle);
    this.front = node.next;
    if (!this.front) {
      this.rear = null;
    }
    this.nodes.release(handle);
    return { ...node.bill };
  }

  peek(): Bill | undefined {
    if (!this.front) return undefined;
    return { ...this.nodes.require(this.front).bill };
  }

  findById(id: string): Bill | undefined {
    const node = this.findNode(id);
    return node ? { ...node.bill } : undefined;
  }

  /**
   * Zero-based position from the front, or -1
   */
  positionOf(id: string): number {
    let position = 0;
    let current = this.front;
    while (current) {
      const node = this.nodes.require(current);
      if (node.bill.id === id) return position;
      position++;
      current = node.next;
    }
    return -1;
  }

  removeById(id: string): boolean {
    if (!this.front) return false;

    const head = this.nodes.require(this.front);
    if (head.bill.id === id) {
      this.dequeue();
      return true;
    }

    let previousHandle = this.front;
    let previous = head;
    while (previous.next) {
      const currentHandle = previous.next;
      const current = this.nodes.require(currentHandle);
      if (current.bill.id === id) {
        previous.next = current.next;
        if (this.rear && sameHandle(currentHandle, this.rear)) {
          this.rear = previousHandle;
        }
        this.nodes.release(currentHandle);
        return true;
      }
      previousHandle = currentHandle;
      previous = current;
    }
    return false;
  }

  setPaid(id: string, isPaid: boolean): boolean {
    const node = this.findNode(id);
    if (!node) return false;
    node.bill.isPaid = isPaid;
    return true;
  }

  markAsPaid(id: string): boolean {
    return this.setPaid(id, true);
  }

  getAll(): Bill[] {
    return this.collect(() => true);
  }

  getUnpaid(): Bill[] {
    return this.collect((bill) => !bill.isPaid);
  }

  getOverdue(referenceDate: string): Bill[] {
    return this.collect((bill) => isOverdue(bill, referenceDate));
  }

  get size(): number {
    return this.nodes.size;
  }

  clear(): void {
    this.nodes.clear();
    this.front = null;
    this.rear = null;
  }

  private findNode(id: string): QueueNode | undefined {
    let current = this.front;
    while (current) {
      const node = this.nodes.require(current);
      if (node.bill.id === id) return node;
      current = node.next;
    }
    return undefined;
  }

  private collect(predicate: (bill: Bill) => boolean): Bill[] {
    const result: Bill[] = [];
    let current = this.front;
    while (current) {
      const node = this.nodes.require(current);
      if (predicate(node.bill)) {
        result.push({ ...node.bill });
      }
      current = node.next;
    }
    return result;
  }
}

function sameHandle(a: Handle, b: Handle): boolean {
  return a.slot === b.slot && a.generation === b.generation;
}
