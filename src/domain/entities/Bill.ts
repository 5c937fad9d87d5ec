import { ValidationError } from '../errors.js';
import { assertDateKey, assertPositiveAmount } from './Transaction.js';

/**
 * Bill entity - a pending payment held in arrival order
 */
export interface Bill {
  id: string;
  name: string;
  amount: number;
  dueDate: string; // YYYY-MM-DD
  category: string;
  isPaid: boolean;
}

export type NewBill = Omit<Bill, 'id' | 'isPaid'>;

export type BillStatusFilter = 'all' | 'unpaid' | 'overdue';

export function validateBill(params: NewBill): void {
  if (typeof params.name !== 'string' || params.name.trim() === '') {
    throw new ValidationError('name must be a non-empty string');
  }
  assertPositiveAmount(params.amount);
  assertDateKey(params.dueDate, 'dueDate');
}

export function createBill(id: string, params: NewBill, isPaid = false): Bill {
  validateBill(params);
  return {
    id,
    name: params.name,
    amount: params.amount,
    dueDate: params.dueDate,
    category: params.category ?? '',
    isPaid,
  };
}

/**
 * Overdue is computed against a caller-supplied reference date, never stored
 */
export function isOverdue(bill: Bill, referenceDate: string): boolean {
  return !bill.isPaid && bill.dueDate < referenceDate;
}
