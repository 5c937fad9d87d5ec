import type { Transaction } from './Transaction.js';
import type { Bill } from './Bill.js';

/**
 * Action entity - reversible descriptor of one past ledger mutation
 * Each variant carries exactly what its inverse needs.
 */
export type Action =
  | { type: 'add_transaction'; transactionId: string }
  | { type: 'delete_transaction'; transaction: Transaction }
  | { type: 'add_budget'; category: string }
  | { type: 'update_budget'; category: string; previousLimit: number }
  | { type: 'add_bill'; billId: string }
  | { type: 'delete_bill'; bill: Bill }
  | { type: 'pay_bill'; billId: string; previousPaid: boolean };

/**
 * Short human-readable label for history views and logs
 */
export function describeAction(action: Action): string {
  switch (action.type) {
    case 'add_transaction':
      return `Add transaction ${action.transactionId}`;
    case 'delete_transaction':
      return `Delete transaction ${action.transaction.id}`;
    case 'add_budget':
      return `Add budget for ${action.category}`;
    case 'update_budget':
      return `Update budget for ${action.category}`;
    case 'add_bill':
      return `Add bill ${action.billId}`;
    case 'delete_bill':
      return `Delete bill ${action.bill.id}`;
    case 'pay_bill':
      return `Pay bill ${action.billId}`;
  }
}
