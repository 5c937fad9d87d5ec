import { describe, it, expect } from 'vitest';
import { createBill, isOverdue } from '../../../src/domain/entities/Bill.js';

describe('Bill', () => {
  it('should create an unpaid bill', () => {
    const bill = createBill('bill_1', {
      name: 'Electricity',
      amount: 80,
      dueDate: '2025-07-20',
      category: 'Utilities',
    });

    expect(bill).toEqual({
      id: 'bill_1',
      name: 'Electricity',
      amount: 80,
      dueDate: '2025-07-20',
      category: 'Utilities',
      isPaid: false,
    });
  });

  it('should validate name, amount and due date', () => {
    const base = { name: 'Water', amount: 30, dueDate: '2025-07-20', category: '' };

    expect(() => createBill('b', { ...base, name: '' })).toThrow('name must be a non-empty string');
    expect(() => createBill('b', { ...base, amount: 0 })).toThrow('amount must be a positive number');
    expect(() => createBill('b', { ...base, dueDate: 'soon' })).toThrow(
      'dueDate must use the YYYY-MM-DD format'
    );
  });

  it('should only be overdue when unpaid and past due', () => {
    const bill = createBill('b', { name: 'Water', amount: 30, dueDate: '2025-07-20', category: '' });

    expect(isOverdue(bill, '2025-07-21')).toBe(true);
    expect(isOverdue(bill, '2025-07-20')).toBe(false);
    expect(isOverdue({ ...bill, isPaid: true }, '2025-07-21')).toBe(false);
  });
});
