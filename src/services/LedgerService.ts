import {
  assertDateKey,
  createTransaction,
  isMonthKey,
  validateTransaction,
  type Transaction,
  type TransactionType,
} from '../domain/entities/Transaction.js';
import { deriveBudgetAlert, type Budget, type BudgetAlert } from '../domain/entities/Budget.js';
import { createBill, validateBill, type Bill, type BillStatusFilter } from '../domain/entities/Bill.js';
import { describeAction, type Action } from '../domain/entities/Action.js';
import { ValidationError } from '../domain/errors.js';
import { IdGenerator, type Clock } from '../domain/IdGenerator.js';
import { ChronologicalIndex } from '../domain/structures/ChronologicalIndex.js';
import { DateIndex } from '../domain/structures/DateIndex.js';
import { TopMagnitudeCache } from '../domain/structures/TopMagnitudeCache.js';
import { CategoryAggregator } from '../domain/structures/CategoryAggregator.js';
import { BillSchedule } from '../domain/structures/BillSchedule.js';
import {
  AutocompleteIndex,
  DEFAULT_SUGGESTION_LIMIT,
} from '../domain/structures/AutocompleteIndex.js';
import { ActionLog, DEFAULT_ACTION_LOG_CAPACITY } from '../domain/structures/ActionLog.js';
import { logger } from '../infra/logger.js';

export const DEFAULT_CATEGORIES = [
  'Food',
  'Transport',
  'Shopping',
  'Entertainment',
  'Bills',
  'Healthcare',
  'Education',
  'Salary',
  'Freelance',
  'Investment',
  'Rent',
  'Utilities',
  'Groceries',
  'Dining',
  'Travel',
] as const;

const DEFAULT_TOP_K = 5;
const DEFAULT_RECENT_COUNT = 10;
const DASHBOARD_RECENT_COUNT = 5;
const MIN_DATE_KEY = '0000-00-00';
const MAX_DATE_KEY = '9999-99-99';

export interface AddTransactionInput {
  type: string;
  amount: number;
  category: string;
  description?: string;
  date: string;
}

export interface AddBillInput {
  name: string;
  amount: number;
  dueDate: string;
  category?: string;
}

export interface CategoryAmount {
  category: string;
  totalAmount: number;
}

export interface MonthlySummary {
  month: string;
  totalIncome: number;
  totalExpenses: number;
  netSavings: number;
  transactionCount: number;
  categoryBreakdown: CategoryAmount[];
}

export interface LedgerStats {
  transactionCount: number;
  budgetCount: number;
  billCount: number;
  totalBalance: number;
  totalIncome: number;
  totalExpenses: number;
}

export interface Dashboard extends LedgerStats {
  asOf: string;
  recentTransactions: Transaction[];
  alerts: BudgetAlert[];
  upcomingBills: Bill[];
  overdueBills: Bill[];
  topCategories: CategoryAmount[];
}

export interface LedgerState {
  transactions: Transaction[];
  budgets: Array<{ category: string; limit: number }>;
  bills: Bill[];
}

export interface ActionHistoryEntry {
  type: Action['type'];
  description: string;
}

export interface LedgerOptions {
  clock?: Clock;
  undoCapacity?: number;
  suggestionLimit?: number;
  defaultCategories?: readonly string[];
}

/**
 * LedgerService - owns every transaction index and keeps them in step
 * Each mutation validates first, then touches all affected structures and
 * records one reversible action. Undo applies the exact inverse without
 * recording anything.
 */
export class LedgerService {
  // Authoritative id → record map; the indexes below reference the same objects
  private records = new Map<string, Transaction>();
  private chronological = new ChronologicalIndex<Transaction>();
  private byDate = new DateIndex<Transaction>();
  private aggregator = new CategoryAggregator();
  private bills = new BillSchedule();
  private categories = new AutocompleteIndex();
  private descriptions = new AutocompleteIndex();
  private expenseCache = new TopMagnitudeCache<Transaction>((txn) => txn.amount);
  private categoryCache = new TopMagnitudeCache<CategoryAmount>((entry) => entry.totalAmount);
  private actions: ActionLog<Action>;
  private transactionIds: IdGenerator;
  private billIds: IdGenerator;
  private suggestionLimit: number;

  constructor(options: LedgerOptions = {}) {
    const clock = options.clock ?? (() => new Date());
    this.actions = new ActionLog<Action>(options.undoCapacity ?? DEFAULT_ACTION_LOG_CAPACITY);
    this.transactionIds = new IdGenerator('txn', clock);
    this.billIds = new IdGenerator('bill', clock);
    this.suggestionLimit = options.suggestionLimit ?? DEFAULT_SUGGESTION_LIMIT;

    for (const category of options.defaultCategories ?? DEFAULT_CATEGORIES) {
      this.categories.insert(category);
    }
  }

  // ===== Transactions =====

  addTransaction(input: AddTransactionInput): Transaction {
    validateTransaction(input);

    const id = this.transactionIds.nextUnique((candidate) => this.records.has(candidate));
    const txn = createTransaction(id, {
      type: input.type,
      amount: input.amount,
      category: input.category,
      description: input.description ?? '',
      date: input.date,
    });

    this.attach(txn, 'front');
    this.actions.push({ type: 'add_transaction', transactionId: txn.id });

    logger.debug('Transaction added', { id: txn.id, type: txn.type, category: txn.category });
    return txn;
  }

  deleteTransaction(id: string): boolean {
    const txn = this.records.get(id);
    if (!txn) {
      return false;
    }

    this.actions.push({ type: 'delete_transaction', transaction: txn });
    this.detach(txn);

    logger.debug('Transaction deleted', { id });
    return true;
  }

  getTransaction(id: string): Transaction | undefined {
    return this.records.get(id);
  }

  /**
   * Most recent first, optionally filtered by category and/or type
   */
  getAllTransactions(filter: { category?: string; type?: TransactionType } = {}): Transaction[] {
    const { category, type } = filter;
    if (category === undefined && type === undefined) {
      return this.chronological.traverseForward();
    }
    return this.chronological.filter(
      (txn) =>
        (category === undefined || txn.category === category) &&
        (type === undefined || txn.type === type)
    );
  }

  /**
   * Oldest chronological entry first
   */
  getTransactionsOldestFirst(): Transaction[] {
    return this.chronological.traverseBackward();
  }

  getRecentTransactions(count: number = DEFAULT_RECENT_COUNT): Transaction[] {
    return this.chronological.takeFront(count);
  }

  getTransactionsByDate(
    query: { order?: 'asc' | 'desc'; startDate?: string; endDate?: string } = {}
  ): Transaction[] {
    const { order = 'asc', startDate, endDate } = query;

    if (startDate === undefined && endDate === undefined) {
      return order === 'asc' ? this.byDate.inorder() : this.byDate.reverseInorder();
    }

    if (startDate !== undefined) assertDateKey(startDate, 'startDate');
    if (endDate !== undefined) assertDateKey(endDate, 'endDate');

    const range = this.byDate.rangeQuery(startDate ?? MIN_DATE_KEY, endDate ?? MAX_DATE_KEY);
    return order === 'asc' ? range : range.reverse();
  }

  // ===== Budgets =====

  setBudget(category: string, limit: number): Budget {
    assertCategory(category);
    assertLimit(limit);

    const existing = this.aggregator.getBudget(category);
    if (existing) {
      this.actions.push({ type: 'update_budget', category, previousLimit: existing.limit });
    } else {
      this.actions.push({ type: 'add_budget', category });
    }
    const budget = this.writeBudget(category, limit);

    logger.debug('Budget set', { category, limit, created: !existing });
    return budget;
  }

  getBudget(category: string): Budget | undefined {
    return this.aggregator.getBudget(category);
  }

  getAllBudgets(): Budget[] {
    return this.aggregator.getAllBudgets();
  }

  getBudgetAlerts(): BudgetAlert[] {
    const alerts: BudgetAlert[] = [];
    for (const budget of this.aggregator.getAllBudgets()) {
      const alert = deriveBudgetAlert(budget);
      if (alert) {
        alerts.push(alert);
      }
    }
    return alerts;
  }

  // ===== Bills =====

  addBill(input: AddBillInput): Bill {
    const params = {
      name: input.name,
      amount: input.amount,
      dueDate: input.dueDate,
      category: input.category ?? '',
    };
    validateBill(params);

    const id = this.billIds.nextUnique((candidate) => this.bills.findById(candidate) !== undefined);
    const bill = createBill(id, params);
    this.bills.enqueue(bill);
    this.actions.push({ type: 'add_bill', billId: bill.id });

    logger.debug('Bill added', { id: bill.id, dueDate: bill.dueDate });
    return bill;
  }

  getBills(query: { status?: BillStatusFilter; asOf?: string } = {}): Bill[] {
    const { status = 'all' } = query;
    switch (status) {
      case 'all':
        return this.bills.getAll();
      case 'unpaid':
        return this.bills.getUnpaid();
      case 'overdue': {
        if (query.asOf === undefined) {
          throw new ValidationError('asOf is required for overdue bills');
        }
        assertDateKey(query.asOf, 'asOf');
        return this.bills.getOverdue(query.asOf);
      }
    }
  }

  getBill(id: string): Bill | undefined {
    return this.bills.findById(id);
  }

  getNextBill(): Bill | undefined {
    return this.bills.peek();
  }

  payBill(id: string): boolean {
    const bill = this.bills.findById(id);
    if (!bill) {
      return false;
    }

    this.actions.push({ type: 'pay_bill', billId: id, previousPaid: bill.isPaid });
    this.bills.markAsPaid(id);

    logger.debug('Bill paid', { id });
    return true;
  }

  deleteBill(id: string): boolean {
    const bill = this.bills.findById(id);
    if (!bill) {
      return false;
    }

    this.actions.push({ type: 'delete_bill', bill });
    this.bills.removeById(id);

    logger.debug('Bill deleted', { id });
    return true;
  }

  // ===== Analytics =====

  /**
   * Rebuilds the expense heap from the chronological index, then extracts k
   */
  getTopExpenses(k: number = DEFAULT_TOP_K): Transaction[] {
    this.expenseCache.buildHeap(this.chronological.filter((txn) => txn.type === 'expense'));
    return this.expenseCache.getTopK(k);
  }

  getTopCategories(k: number = DEFAULT_TOP_K): CategoryAmount[] {
    this.categoryCache.buildHeap(
      this.aggregator.getExpenseTotals().filter((entry) => entry.totalAmount > 0)
    );
    return this.categoryCache.getTopK(k);
  }

  getMonthlySummary(yearMonth: string): MonthlySummary {
    if (typeof yearMonth !== 'string' || !isMonthKey(yearMonth)) {
      throw new ValidationError('month must use the YYYY-MM format', { month: yearMonth });
    }

    const summary: MonthlySummary = {
      month: yearMonth,
      totalIncome: 0,
      totalExpenses: 0,
      netSavings: 0,
      transactionCount: 0,
      categoryBreakdown: [],
    };
    const categoryTotals = new Map<string, number>();

    for (const txn of this.byDate.getByMonth(yearMonth)) {
      summary.transactionCount++;
      if (txn.type === 'income') {
        summary.totalIncome += txn.amount;
      } else {
        summary.totalExpenses += txn.amount;
        categoryTotals.set(txn.category, (categoryTotals.get(txn.category) ?? 0) + txn.amount);
      }
    }

    summary.netSavings = summary.totalIncome - summary.totalExpenses;
    summary.categoryBreakdown = [...categoryTotals].map(([category, totalAmount]) => ({
      category,
      totalAmount,
    }));
    return summary;
  }

  getStats(): LedgerStats {
    let totalIncome = 0;
    let totalExpenses = 0;
    for (const txn of this.chronological.traverseForward()) {
      if (txn.type === 'income') {
        totalIncome += txn.amount;
      } else {
        totalExpenses += txn.amount;
      }
    }

    return {
      transactionCount: this.chronological.size,
      budgetCount: this.aggregator.budgetCount,
      billCount: this.bills.size,
      totalBalance: totalIncome - totalExpenses,
      totalIncome,
      totalExpenses,
    };
  }

  getDashboard(asOf: string): Dashboard {
    assertDateKey(asOf, 'asOf');
    return {
      asOf,
      ...this.getStats(),
      recentTransactions: this.getRecentTransactions(DASHBOARD_RECENT_COUNT),
      alerts: this.getBudgetAlerts(),
      upcomingBills: this.bills.getUnpaid(),
      overdueBills: this.bills.getOverdue(asOf),
      topCategories: this.getTopCategories(DEFAULT_TOP_K),
    };
  }

  // ===== Autocomplete =====

  getCategorySuggestions(prefix: string, limit: number = this.suggestionLimit): string[] {
    return this.categories.getWordsWithPrefix(prefix, limit);
  }

  getAllCategories(): string[] {
    return this.categories.getAllWords();
  }

  getDescriptionSuggestions(prefix: string, limit: number = this.suggestionLimit): string[] {
    return this.descriptions.getWordsWithPrefix(prefix, limit);
  }

  // ===== Undo =====

  undo(): boolean {
    const action = this.actions.pop();
    if (!action) {
      return false;
    }

    switch (action.type) {
      case 'add_transaction': {
        const txn = this.records.get(action.transactionId);
        if (txn) {
          this.detach(txn);
        }
        break;
      }
      case 'delete_transaction':
        if (!this.records.has(action.transaction.id)) {
          this.attach(action.transaction, 'back');
        }
        break;
      case 'add_budget':
        this.aggregator.removeBudget(action.category);
        break;
      case 'update_budget':
        this.aggregator.setLimit(action.category, action.previousLimit);
        break;
      case 'add_bill':
        this.bills.removeById(action.billId);
        break;
      case 'delete_bill':
        // Re-enqueued at the tail; the bill's former queue position is not restored
        if (!this.bills.findById(action.bill.id)) {
          this.bills.enqueue(action.bill);
        }
        break;
      case 'pay_bill':
        this.bills.setPaid(action.billId, action.previousPaid);
        break;
    }

    logger.debug('Action undone', { action: describeAction(action) });
    return true;
  }

  canUndo(): boolean {
    return !this.actions.isEmpty();
  }

  getActionHistory(): ActionHistoryEntry[] {
    return this.actions.toArray().map((action) => ({
      type: action.type,
      description: describeAction(action),
    }));
  }

  // ===== Bulk load (not undoable) =====

  /**
   * Appends a stored transaction at the chronological back
   */
  loadTransaction(record: Transaction): Transaction {
    if (this.records.has(record.id)) {
      throw new ValidationError(`Duplicate transaction id ${record.id}`, { id: record.id });
    }
    const txn = createTransaction(record.id, record);
    this.attach(txn, 'back');
    return txn;
  }

  loadBudget(category: string, limit: number): Budget {
    assertCategory(category);
    assertLimit(limit);
    return this.writeBudget(category, limit);
  }

  loadBill(record: Bill): Bill {
    if (this.bills.findById(record.id)) {
      throw new ValidationError(`Duplicate bill id ${record.id}`, { id: record.id });
    }
    const bill = createBill(record.id, record, record.isPaid);
    this.bills.enqueue(bill);
    return bill;
  }

  /**
   * Queryable state for snapshotting: transactions newest first, bills in FIFO order
   */
  exportState(): LedgerState {
    return {
      transactions: this.chronological.traverseForward(),
      budgets: this.aggregator
        .getAllBudgets()
        .map((budget) => ({ category: budget.category, limit: budget.limit })),
      bills: this.bills.getAll(),
    };
  }

  // ===== Index maintenance =====

  private attach(txn: Transaction, position: 'front' | 'back'): void {
    this.records.set(txn.id, txn);
    if (position === 'front') {
      this.chronological.addFront(txn);
    } else {
      this.chronological.addBack(txn);
    }
    this.byDate.insert(txn);

    if (txn.type === 'expense') {
      this.aggregator.recordExpense(txn.category, txn.amount);
    }

    this.categories.insert(txn.category);
    if (txn.description !== '') {
      this.descriptions.insert(txn.description);
    }
  }

  private detach(txn: Transaction): void {
    this.records.delete(txn.id);
    this.chronological.deleteById(txn.id);
    this.byDate.delete(txn);

    if (txn.type === 'expense') {
      this.aggregator.reverseExpense(txn.category, txn.amount);
    }
  }

  /**
   * Changes the limit of an existing budget, or creates one seeded with the current spend
   */
  private writeBudget(category: string, limit: number): Budget {
    this.categories.insert(category);
    const existing = this.aggregator.getBudget(category);
    if (existing) {
      this.aggregator.setLimit(category, limit);
      return { ...existing, limit };
    }
    return this.aggregator.createBudget(category, limit);
  }
}

function assertCategory(category: string): void {
  if (typeof category !== 'string' || category.trim() === '') {
    throw new ValidationError('category must be a non-empty string');
  }
}

function assertLimit(limit: number): void {
  if (typeof limit !== 'number' || !Number.isFinite(limit) || limit < 0) {
    throw new ValidationError('limit must be a non-negative number', { limit });
  }
}
