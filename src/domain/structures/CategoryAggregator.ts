import { ChainedHashMap, DEFAULT_BUCKET_COUNT } from './ChainedHashMap.js';
import { createBudget, type Budget } from '../entities/Budget.js';

/**
 * CategoryAggregator - per-category budgets and raw expense totals
 * For every category with a budget, budget.spent equals the expense total.
 * Expense totals exist for unbudgeted categories too, so a later budget
 * starts from the right spent value.
 */
export class CategoryAggregator {
  private budgets: ChainedHashMap<Budget>;
  private expenseTotals: ChainedHashMap<number>;

  constructor(bucketCount: number = DEFAULT_BUCKET_COUNT) {
    this.budgets = new ChainedHashMap<Budget>(bucketCount);
    this.expenseTotals = new ChainedHashMap<number>(bucketCount);
  }

  recordExpense(category: string, amount: number): void {
    this.writeSpent(category, this.getExpenseTotal(category) + amount);
  }

  /**
   * Floors at zero even if the totals have drifted
   */
  reverseExpense(category: string, amount: number): void {
    this.writeSpent(category, Math.max(0, this.getExpenseTotal(category) - amount));
  }

  getExpenseTotal(category: string): number {
    return this.expenseTotals.search(category) ?? 0;
  }

  getExpenseTotals(): Array<{ category: string; totalAmount: number }> {
    return this.expenseTotals
      .entries()
      .map(([category, totalAmount]) => ({ category, totalAmount }));
  }

  hasBudget(category: string): boolean {
    return this.budgets.contains(category);
  }

  getBudget(category: string): Budget | undefined {
    const budget = this.budgets.search(category);
    return budget ? { ...budget } : undefined;
  }

  getAllBudgets(): Budget[] {
    return this.budgets.entries().map(([, budget]) => ({ ...budget }));
  }

  /**
   * Creates the budget, seeding spent from the running expense total
   */
  createBudget(category: string, limit: number): Budget {
    const budget = createBudget(category, limit, this.getExpenseTotal(category));
    this.budgets.insert(category, budget);
    return { ...budget };
  }

  setLimit(category: string, limit: number): boolean {
    const budget = this.budgets.search(category);
    if (!budget) return false;
    return this.budgets.update(category, { ...budget, limit });
  }

  removeBudget(category: string): boolean {
    return this.budgets.remove(category);
  }

  get budgetCount(): number {
    return this.budgets.size;
  }

  clear(): void {
    this.budgets.clear();
    this.expenseTotals.clear();
  }

  private writeSpent(category: string, spent: number): void {
    this.expenseTotals.insert(category, spent);
    const budget = this.budgets.search(category);
    if (budget) {
      this.budgets.update(category, { ...budget, spent });
    }
  }
}
