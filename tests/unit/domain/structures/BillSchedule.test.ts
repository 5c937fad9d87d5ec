import { describe, it, expect } from 'vitest';
import { BillSchedule } from '../../../../src/domain/structures/BillSchedule.js';
import type { Bill } from '../../../../src/domain/entities/Bill.js';

function bill(id: string, dueDate = '2025-07-15', isPaid = false): Bill {
  return { id, name: `Bill ${id}`, amount: 100, dueDate, category: 'Utilities', isPaid };
}

const ids = (bills: Bill[]) => bills.map((b) => b.id);

describe('BillSchedule', () => {
  it('should keep surviving bills in FIFO order after a dequeue', () => {
    const queue = new BillSchedule();
    queue.enqueue(bill('b1'));
    queue.enqueue(bill('b2'));
    queue.enqueue(bill('b3'));

    expect(queue.dequeue()?.id).toBe('b1');

    expect(queue.findById('b2')?.id).toBe('b2');
    expect(queue.positionOf('b2')).toBe(0);
    expect(queue.positionOf('b3')).toBe(1);
    expect(queue.positionOf('b1')).toBe(-1);
    expect(ids(queue.getAll())).toEqual(['b2', 'b3']);
  });

  it('should peek without removing', () => {
    const queue = new BillSchedule();
    expect(queue.peek()).toBeUndefined();

    queue.enqueue(bill('b1'));

    expect(queue.peek()?.id).toBe('b1');
    expect(queue.size).toBe(1);
  });

  it('should reset the tail when the last bill is dequeued', () => {
    const queue = new BillSchedule();
    queue.enqueue(bill('b1'));
    queue.dequeue();
    queue.enqueue(bill('b2'));

    expect(ids(queue.getAll())).toEqual(['b2']);
    expect(queue.dequeue()?.id).toBe('b2');
    expect(queue.dequeue()).toBeUndefined();
  });

  it('should remove head, middle and tail bills', () => {
    const queue = new BillSchedule();
    ['b1', 'b2', 'b3', 'b4'].forEach((id) => queue.enqueue(bill(id)));

    expect(queue.removeById('b1')).toBe(true);
    expect(queue.removeById('b3')).toBe(true);
    expect(queue.removeById('b4')).toBe(true);
    expect(queue.removeById('missing')).toBe(false);

    // Tail moved back to b2, so new arrivals follow it
    queue.enqueue(bill('b5'));
    expect(ids(queue.getAll())).toEqual(['b2', 'b5']);
    expect(queue.size).toBe(2);
  });

  it('should mark bills paid in place', () => {
    const queue = new BillSchedule();
    queue.enqueue(bill('b1'));
    queue.enqueue(bill('b2'));

    expect(queue.markAsPaid('b1')).toBe(true);
    expect(queue.markAsPaid('missing')).toBe(false);

    expect(queue.findById('b1')?.isPaid).toBe(true);
    expect(ids(queue.getUnpaid())).toEqual(['b2']);
    expect(queue.positionOf('b1')).toBe(0);

    expect(queue.setPaid('b1', false)).toBe(true);
    expect(ids(queue.getUnpaid())).toEqual(['b1', 'b2']);
  });

  it('should report unpaid bills due before the reference date as overdue', () => {
    const queue = new BillSchedule();
    queue.enqueue(bill('late', '2025-07-01'));
    queue.enqueue(bill('paid-late', '2025-07-01', true));
    queue.enqueue(bill('today', '2025-07-10'));
    queue.enqueue(bill('future', '2025-08-01'));

    expect(ids(queue.getOverdue('2025-07-10'))).toEqual(['late']);
  });

  it('should not expose its stored bills to mutation', () => {
    const queue = new BillSchedule();
    const original = bill('b1');
    queue.enqueue(original);

    original.isPaid = true;
    const read = queue.findById('b1');
    if (read) read.isPaid = true;

    expect(queue.findById('b1')?.isPaid).toBe(false);
  });
});
