import type { DatabaseAdapter } from '../DatabaseAdapter.js';
import type { Bill } from '../../domain/entities/Bill.js';

type BillRow = {
  id: string;
  position: number;
  name: string;
  amount: number;
  due_date: string;
  category: string;
  is_paid: number;
};

export class BillRepository {
  constructor(private db: DatabaseAdapter) {}

  /**
   * Rows in queue order
   */
  listAll(): Bill[] {
    const rows = this.db.query<BillRow>(
      'SELECT id, position, name, amount, due_date, category, is_paid FROM bills ORDER BY position ASC'
    );
    return rows.map((row) => ({
      id: row.id,
      name: row.name,
      amount: row.amount,
      dueDate: row.due_date,
      category: row.category,
      isPaid: row.is_paid === 1,
    }));
  }

  replaceAll(bills: readonly Bill[]): void {
    this.db.execute('DELETE FROM bills');
    bills.forEach((bill, position) => {
      this.db.execute(
        `
        INSERT INTO bills (id, position, name, amount, due_date, category, is_paid)
        VALUES (?, ?, ?, ?, ?, ?, ?)
        `,
        [bill.id, position, bill.name, bill.amount, bill.dueDate, bill.category, bill.isPaid ? 1 : 0]
      );
    });
  }
}
