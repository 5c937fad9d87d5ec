import type { DatabaseAdapter } from '../DatabaseAdapter.js';

type BudgetRow = {
  category: string;
  amount_limit: number;
};

export type StoredBudget = {
  category: string;
  limit: number;
};

export class BudgetRepository {
  constructor(private db: DatabaseAdapter) {}

  listAll(): StoredBudget[] {
    const rows = this.db.query<BudgetRow>(
      'SELECT category, amount_limit FROM budgets ORDER BY category ASC'
    );
    return rows.map((row) => ({ category: row.category, limit: row.amount_limit }));
  }

  /**
   * Spent is not stored: it is rebuilt from transactions on load
   */
  replaceAll(budgets: readonly StoredBudget[]): void {
    this.db.execute('DELETE FROM budgets');
    for (const budget of budgets) {
      this.db.execute('INSERT INTO budgets (category, amount_limit) VALUES (?, ?)', [
        budget.category,
        budget.limit,
      ]);
    }
  }
}
