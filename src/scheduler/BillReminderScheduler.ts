import cron, { type ScheduledTask } from 'node-cron';
import { logger } from '../infra/logger.js';
import type { LedgerService } from '../services/LedgerService.js';
import type { Env } from '../infra/env.js';
import type { Bill } from '../domain/entities/Bill.js';

const DAY_MS = 24 * 60 * 60 * 1000;

export type BillReminder = {
  overdue: Bill[];
  dueSoon: Bill[];
};

function toDateKey(date: Date): string {
  return date.toISOString().slice(0, 10);
}

/**
 * BillReminderScheduler - periodic overdue / due-soon bill reports using node-cron
 */
export class BillReminderScheduler {
  private task: ScheduledTask | null = null;

  constructor(
    private env: Pick<Env, 'BILL_REMINDER_CRON' | 'BILL_REMINDER_DAYS_AHEAD'>,
    private ledger: LedgerService,
    private clock: () => Date = () => new Date()
  ) {}

  start(): void {
    const expression = this.env.BILL_REMINDER_CRON;
    if (!cron.validate(expression)) {
      logger.warn('BILL_REMINDER_CRON is not a valid cron expression, skipping scheduler', {
        expression,
      });
      return;
    }

    this.task = cron.schedule(expression, () => {
      this.runCheck();
    });

    logger.info('BillReminderScheduler started', {
      cronExpression: expression,
      daysAhead: this.env.BILL_REMINDER_DAYS_AHEAD,
    });
  }

  stop(): void {
    if (this.task) {
      this.task.stop();
      this.task = null;
      logger.info('BillReminderScheduler stopped');
    }
  }

  /**
   * Unpaid bills already past due, and those due within the look-ahead window
   */
  collectReminders(): BillReminder {
    const now = this.clock();
    const today = toDateKey(now);
    const horizon = toDateKey(new Date(now.getTime() + this.env.BILL_REMINDER_DAYS_AHEAD * DAY_MS));

    const overdue = this.ledger.getBills({ status: 'overdue', asOf: today });
    const dueSoon = this.ledger
      .getBills({ status: 'unpaid' })
      .filter((bill) => bill.dueDate >= today && bill.dueDate <= horizon);

    return { overdue, dueSoon };
  }

  runCheck(): void {
    try {
      const { overdue, dueSoon } = this.collectReminders();

      if (overdue.length > 0) {
        logger.warn('Overdue bills', {
          count: overdue.length,
          bills: overdue.map((bill) => ({ id: bill.id, name: bill.name, dueDate: bill.dueDate })),
        });
      }
      if (dueSoon.length > 0) {
        logger.info('Bills due soon', {
          count: dueSoon.length,
          bills: dueSoon.map((bill) => ({ id: bill.id, name: bill.name, dueDate: bill.dueDate })),
        });
      }
    } catch (error) {
      logger.error('Bill reminder check failed', {
        error: error instanceof Error ? error.message : String(error),
      });
    }
  }
}

/**
 * Factory function to create and start scheduler
 */
export function startBillReminders(
  env: Pick<Env, 'BILL_REMINDER_CRON' | 'BILL_REMINDER_DAYS_AHEAD'>,
  ledger: LedgerService
): BillReminderScheduler {
  const scheduler = new BillReminderScheduler(env, ledger);
  scheduler.start();
  return scheduler;
}
