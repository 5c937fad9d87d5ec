import { ValidationError } from '../errors.js';

/**
 * Transaction entity - one income or expense entry in the ledger
 * Immutable after creation; indexes hold references, never copies they mutate
 */
export type TransactionType = 'income' | 'expense';

export const TRANSACTION_TYPES: readonly TransactionType[] = ['income', 'expense'];

export interface Transaction {
  readonly id: string;
  readonly type: TransactionType;
  readonly amount: number;
  readonly category: string;
  readonly description: string;
  readonly date: string; // YYYY-MM-DD, compared as a string
}

export type NewTransaction = Omit<Transaction, 'id'>;

const DATE_PATTERN = /^\d{4}-\d{2}-\d{2}$/;
const MONTH_PATTERN = /^\d{4}-\d{2}$/;

export function isTransactionType(value: unknown): value is TransactionType {
  return value === 'income' || value === 'expense';
}

export function isDateKey(value: string): boolean {
  return DATE_PATTERN.test(value);
}

export function isMonthKey(value: string): boolean {
  return MONTH_PATTERN.test(value);
}

export function assertPositiveAmount(amount: number, field = 'amount'): void {
  if (typeof amount !== 'number' || !Number.isFinite(amount) || amount <= 0) {
    throw new ValidationError(`${field} must be a positive number`, { [field]: amount });
  }
}

export function assertDateKey(date: string, field = 'date'): void {
  if (typeof date !== 'string' || !isDateKey(date)) {
    throw new ValidationError(`${field} must use the YYYY-MM-DD format`, { [field]: date });
  }
}

/**
 * Validates transaction fields before anything touches an index
 */
export function validateTransaction<
  T extends { type: unknown; amount: number; category: string; date: string },
>(params: T): asserts params is T & { type: TransactionType } {
  if (!isTransactionType(params.type)) {
    throw new ValidationError(`type must be one of: ${TRANSACTION_TYPES.join(', ')}`, {
      type: params.type,
    });
  }
  assertPositiveAmount(params.amount);
  if (typeof params.category !== 'string' || params.category.trim() === '') {
    throw new ValidationError('category must be a non-empty string');
  }
  assertDateKey(params.date);
}

/**
 * Create a new Transaction with validation
 */
export function createTransaction(id: string, params: NewTransaction): Transaction {
  validateTransaction(params);
  return Object.freeze({
    id,
    type: params.type,
    amount: params.amount,
    category: params.category,
    description: params.description ?? '',
    date: params.date,
  });
}
