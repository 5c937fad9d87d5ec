import type { DatabaseAdapter } from '../DatabaseAdapter.js';
import { isTransactionType, type Transaction } from '../../domain/entities/Transaction.js';
import { DatabaseError } from '../../domain/errors.js';

type TransactionRow = {
  id: string;
  position: number;
  type: string;
  amount: number;
  category: string;
  description: string;
  date: string;
};

export class TransactionRepository {
  constructor(private db: DatabaseAdapter) {}

  /**
   * Rows in stored chronological order (newest first)
   */
  listAll(): Transaction[] {
    const rows = this.db.query<TransactionRow>(
      'SELECT id, position, type, amount, category, description, date FROM transactions ORDER BY position ASC'
    );
    return rows.map(mapRow);
  }

  /**
   * Rewrites the table; callers wrap this in a database transaction
   */
  replaceAll(transactions: readonly Transaction[]): void {
    this.db.execute('DELETE FROM transactions');
    transactions.forEach((txn, position) => {
      this.db.execute(
        `
        INSERT INTO transactions (id, position, type, amount, category, description, date)
        VALUES (?, ?, ?, ?, ?, ?, ?)
        `,
        [txn.id, position, txn.type, txn.amount, txn.category, txn.description, txn.date]
      );
    });
  }
}

function mapRow(row: TransactionRow): Transaction {
  if (!isTransactionType(row.type)) {
    throw new DatabaseError('Stored transaction has an unknown type', { id: row.id, type: row.type });
  }
  return {
    id: row.id,
    type: row.type,
    amount: row.amount,
    category: row.category,
    description: row.description,
    date: row.date,
  };
}
