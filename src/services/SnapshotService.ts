import type { DatabaseAdapter } from '../infra/DatabaseAdapter.js';
import type { TransactionRepository } from '../infra/repositories/TransactionRepository.js';
import type { BudgetRepository } from '../infra/repositories/BudgetRepository.js';
import type { BillRepository } from '../infra/repositories/BillRepository.js';
import type { LedgerService } from './LedgerService.js';
import { logger } from '../infra/logger.js';

export type SnapshotCounts = {
  transactions: number;
  budgets: number;
  bills: number;
};

/**
 * SnapshotService - persistence boundary for the in-memory ledger
 * Loading goes through the ledger's bulk-load calls, so nothing loaded is undoable.
 */
export class SnapshotService {
  constructor(
    private db: DatabaseAdapter,
    private transactionRepo: TransactionRepository,
    private budgetRepo: BudgetRepository,
    private billRepo: BillRepository
  ) {}

  /**
   * Transactions load before budgets so each budget starts with its spent total
   */
  load(ledger: LedgerService): SnapshotCounts {
    const transactions = this.transactionRepo.listAll();
    const budgets = this.budgetRepo.listAll();
    const bills = this.billRepo.listAll();

    transactions.forEach((txn) => ledger.loadTransaction(txn));
    budgets.forEach((budget) => ledger.loadBudget(budget.category, budget.limit));
    bills.forEach((bill) => ledger.loadBill(bill));

    const counts = {
      transactions: transactions.length,
      budgets: budgets.length,
      bills: bills.length,
    };
    logger.info('Ledger snapshot loaded', counts);
    return counts;
  }

  persist(ledger: LedgerService): SnapshotCounts {
    const state = ledger.exportState();

    this.db.transaction(() => {
      this.transactionRepo.replaceAll(state.transactions);
      this.budgetRepo.replaceAll(state.budgets);
      this.billRepo.replaceAll(state.bills);
    });

    const counts = {
      transactions: state.transactions.length,
      budgets: state.budgets.length,
      bills: state.bills.length,
    };
    logger.debug('Ledger snapshot persisted', counts);
    return counts;
  }
}
