import { describe, it, expect, vi, beforeEach } from 'vitest';
import { CommandService, COMMAND_NAMES } from '../../../src/services/CommandService.js';
import { LedgerService } from '../../../src/services/LedgerService.js';

const loggerMock = vi.hoisted(() => ({
  logger: {
    info: vi.fn(),
    error: vi.fn(),
    warn: vi.fn(),
    debug: vi.fn(),
  },
}));

vi.mock('../../../src/infra/logger.js', () => loggerMock);

describe('CommandService', () => {
  let ledger: LedgerService;
  let onMutation: ReturnType<typeof vi.fn>;
  let service: CommandService;

  beforeEach(() => {
    vi.clearAllMocks();
    ledger = new LedgerService({ clock: () => new Date('2025-07-01T00:00:00Z') });
    onMutation = vi.fn();
    service = new CommandService(ledger, onMutation);
  });

  it('should expose every command name', () => {
    expect(COMMAND_NAMES).toHaveLength(21);
    expect(COMMAND_NAMES).toContain('add_transaction');
    expect(COMMAND_NAMES).toContain('get_dashboard');
  });

  it('should add a transaction and notify the mutation hook', () => {
    const outcome = service.execute('add_transaction', {
      type: 'expense',
      amount: '42.5',
      category: 'Food',
      date: '2025-07-01',
    });

    expect(outcome).toEqual({
      success: true,
      data: {
        id: 'txn_1751328000_1',
        type: 'expense',
        amount: 42.5,
        category: 'Food',
        description: '',
        date: '2025-07-01',
      },
    });
    expect(onMutation).toHaveBeenCalledTimes(1);
    expect(onMutation).toHaveBeenCalledWith(ledger, 'add_transaction');
  });

  it('should not notify the hook for queries', () => {
    service.execute('get_transactions');
    service.execute('get_budgets');

    expect(onMutation).not.toHaveBeenCalled();
  });

  it('should reject unknown commands', () => {
    expect(service.execute('drop_everything')).toEqual({
      success: false,
      error: {
        kind: 'InvalidInput',
        message: 'Unknown command: drop_everything',
        details: { command: 'drop_everything' },
      },
    });
  });

  it('should reject parameters that fail the schema', () => {
    const outcome = service.execute('delete_transaction', {});

    expect(outcome.success).toBe(false);
    if (!outcome.success) {
      expect(outcome.error.kind).toBe('InvalidInput');
      expect(outcome.error.message).toBe('Invalid parameters for delete_transaction');
    }
  });

  it('should surface ledger validation failures as invalid input', () => {
    const outcome = service.execute('add_transaction', {
      type: 'expense',
      amount: 0,
      category: 'Food',
      date: '2025-07-01',
    });

    expect(outcome).toEqual({
      success: false,
      error: {
        kind: 'InvalidInput',
        message: 'amount must be a positive number',
        details: { amount: 0 },
      },
    });
    expect(onMutation).not.toHaveBeenCalled();
  });

  it('should report missing records as not found', () => {
    expect(service.execute('delete_transaction', { id: 'txn_missing' })).toEqual({
      success: false,
      error: {
        kind: 'NotFound',
        message: 'Transaction with id txn_missing not found',
        details: { resource: 'Transaction', id: 'txn_missing' },
      },
    });
    expect(service.execute('pay_bill', { id: 'bill_missing' })).toEqual({
      success: false,
      error: {
        kind: 'NotFound',
        message: 'Bill with id bill_missing not found',
        details: { resource: 'Bill', id: 'bill_missing' },
      },
    });
  });

  it('should report an empty undo log', () => {
    expect(service.execute('undo')).toEqual({
      success: false,
      error: { kind: 'LogEmpty', message: 'Nothing to undo' },
    });
    expect(onMutation).not.toHaveBeenCalled();
  });

  it('should undo the last mutation', () => {
    service.execute('set_budget', { category: 'Food', limit: 100 });

    expect(service.execute('undo')).toEqual({ success: true, data: { undone: true } });
    expect(ledger.getAllBudgets()).toEqual([]);
    expect(onMutation).toHaveBeenCalledTimes(2);
  });

  it('should pay a bill and return it', () => {
    const added = service.execute('add_bill', { name: 'Rent', amount: 900, dueDate: '2025-07-05' });
    expect(added.success).toBe(true);

    const outcome = service.execute('pay_bill', { id: 'bill_1751328000_1' });

    expect(outcome).toEqual({
      success: true,
      data: {
        id: 'bill_1751328000_1',
        name: 'Rent',
        amount: 900,
        dueDate: '2025-07-05',
        category: '',
        isPaid: true,
      },
    });
  });

  it('should apply parameter defaults', () => {
    for (let i = 1; i <= 12; i++) {
      service.execute('add_transaction', {
        type: 'expense',
        amount: i,
        category: 'Food',
        date: '2025-07-01',
      });
    }

    const recent = service.execute('get_recent_transactions');
    const top = service.execute('get_top_expenses');

    expect(recent.success && Array.isArray(recent.data) && recent.data.length).toBe(10);
    expect(top.success && Array.isArray(top.data) && top.data.length).toBe(5);
  });

  it('should use the given date for overdue bills', () => {
    service.execute('add_bill', { name: 'Phone', amount: 40, dueDate: '2025-06-28' });

    const outcome = service.execute('get_bills', { status: 'overdue', asOf: '2025-07-01' });

    expect(outcome.success && Array.isArray(outcome.data) && outcome.data.length).toBe(1);
  });

  it('should reject a malformed month', () => {
    expect(service.execute('get_monthly_summary', { month: 'July' })).toEqual({
      success: false,
      error: {
        kind: 'InvalidInput',
        message: 'month must use the YYYY-MM format',
        details: { month: 'July' },
      },
    });
  });

  it('should reject amounts and limits that are not numbers or numeric strings', () => {
    for (const amount of [null, '', '  ', true, false, [7], 'twelve']) {
      const outcome = service.execute('add_transaction', {
        type: 'expense',
        amount,
        category: 'Food',
        date: '2025-07-01',
      });
      expect(outcome.success).toBe(false);
      if (!outcome.success) {
        expect(outcome.error.kind).toBe('InvalidInput');
        expect(outcome.error.message).toBe('Invalid parameters for add_transaction');
      }
    }

    for (const limit of [null, '', true, [100]]) {
      const outcome = service.execute('set_budget', { category: 'Food', limit });
      expect(outcome.success).toBe(false);
      if (!outcome.success) {
        expect(outcome.error.message).toBe('Invalid parameters for set_budget');
      }
    }

    expect(ledger.getStats().transactionCount).toBe(0);
    expect(ledger.getAllBudgets()).toEqual([]);
    expect(onMutation).not.toHaveBeenCalled();
  });

  it('should accept numeric strings for counts but reject other values', () => {
    expect(service.execute('get_recent_transactions', { count: '3' }).success).toBe(true);
    expect(service.execute('get_recent_transactions', { count: false }).success).toBe(false);
    expect(service.execute('get_top_expenses', { k: '2.5' }).success).toBe(false);
  });

  it('should keep a mutation and flag it when the hook fails', () => {
    const failing = new CommandService(ledger, () => {
      throw new Error('disk full');
    });

    const outcome = failing.execute('add_transaction', {
      type: 'expense',
      amount: 12,
      category: 'Food',
      date: '2025-07-01',
    });

    expect(outcome).toEqual({
      success: true,
      data: {
        id: 'txn_1751328000_1',
        type: 'expense',
        amount: 12,
        category: 'Food',
        description: '',
        date: '2025-07-01',
      },
      persisted: false,
    });
    expect(ledger.getStats().transactionCount).toBe(1);
    expect(loggerMock.logger.error).toHaveBeenCalledWith('Post-mutation hook failed', {
      command: 'add_transaction',
      error: 'disk full',
    });
  });
});
