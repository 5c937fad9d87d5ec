/**
 * Budget entity - spending limit for one category
 * `spent` is derived from the category's live expense transactions
 */
export interface Budget {
  category: string;
  limit: number;
  spent: number;
}

export type AlertLevel = 'normal' | 'caution' | 'warning' | 'exceeded';

export interface BudgetAlert {
  category: string;
  level: Exclude<AlertLevel, 'normal'>;
  percentUsed: number;
  spent: number;
  limit: number;
  message: string;
}

export function createBudget(category: string, limit: number, spent = 0): Budget {
  return { category, limit, spent };
}

export function getPercentUsed(budget: Budget): number {
  if (budget.limit === 0) return 0;
  return (budget.spent / budget.limit) * 100;
}

export function getAlertLevel(budget: Budget): AlertLevel {
  const percent = getPercentUsed(budget);
  if (percent >= 100) return 'exceeded';
  if (percent >= 80) return 'warning';
  if (percent >= 50) return 'caution';
  return 'normal';
}

/**
 * Derives the alert for a budget, or null when spending is below every threshold.
 * Recomputed on each read so it always reflects the latest spent value.
 */
export function deriveBudgetAlert(budget: Budget): BudgetAlert | null {
  const level = getAlertLevel(budget);
  if (level === 'normal') {
    return null;
  }

  const message =
    level === 'exceeded'
      ? `Budget exceeded! You've spent $${Math.trunc(budget.spent)} of $${Math.trunc(budget.limit)}`
      : level === 'warning'
        ? 'Warning: 80%+ of budget used'
        : 'Caution: 50%+ of budget used';

  return {
    category: budget.category,
    level,
    percentUsed: getPercentUsed(budget),
    spent: budget.spent,
    limit: budget.limit,
    message,
  };
}
