import { z, type ZodTypeAny } from 'zod';
import type { LedgerService } from './LedgerService.js';
import { NotFoundError, ValidationError } from '../domain/errors.js';
import { logger } from '../infra/logger.js';

export type FailureKind = 'InvalidInput' | 'NotFound' | 'LogEmpty';

export type CommandOutcome =
  | { success: true; data: unknown; persisted?: boolean }
  | { success: false; error: { kind: FailureKind; message: string; details?: unknown } };

type CommandDefinition<S extends ZodTypeAny> = {
  schema: S;
  mutates: boolean;
  run: (ledger: LedgerService, params: z.infer<S>) => CommandOutcome;
};

const dateKey = z.string().regex(/^\d{4}-\d{2}-\d{2}$/, 'must use the YYYY-MM-DD format');
// Numbers or numeric strings only; null, booleans, arrays and blank strings are rejected
const numeric = z.union([z.number(), z.string().trim().min(1)]).pipe(z.coerce.number());
const positiveCount = numeric.pipe(z.number().int().min(1));
const noParams = z.object({}).passthrough();

function ok(data: unknown): CommandOutcome {
  return { success: true, data };
}

function failure(kind: FailureKind, message: string, details?: unknown): CommandOutcome {
  return { success: false, error: { kind, message, ...(details ? { details } : {}) } };
}

function notFound(resource: string, id: string): CommandOutcome {
  const error = new NotFoundError(resource, id);
  return failure('NotFound', error.message, error.details);
}

function today(): string {
  return new Date().toISOString().slice(0, 10);
}

function define<S extends ZodTypeAny>(definition: CommandDefinition<S>): CommandDefinition<S> {
  return definition;
}

const commands = {
  add_transaction: define({
    schema: z.object({
      type: z.string(),
      amount: numeric,
      category: z.string(),
      description: z.string().optional(),
      date: z.string(),
    }),
    mutates: true,
    run: (ledger, params) => ok(ledger.addTransaction(params)),
  }),

  delete_transaction: define({
    schema: z.object({ id: z.string().min(1) }),
    mutates: true,
    run: (ledger, { id }) =>
      ledger.deleteTransaction(id)
        ? ok({ deleted: true, id })
        : notFound('Transaction', id),
  }),

  get_transactions: define({
    schema: z.object({
      category: z.string().optional(),
      type: z.enum(['income', 'expense']).optional(),
    }),
    mutates: false,
    run: (ledger, params) => ok(ledger.getAllTransactions(params)),
  }),

  get_recent_transactions: define({
    schema: z.object({ count: positiveCount.default(10) }),
    mutates: false,
    run: (ledger, { count }) => ok(ledger.getRecentTransactions(count)),
  }),

  get_transactions_by_date: define({
    schema: z.object({
      order: z.enum(['asc', 'desc']).default('asc'),
      startDate: dateKey.optional(),
      endDate: dateKey.optional(),
    }),
    mutates: false,
    run: (ledger, params) => ok(ledger.getTransactionsByDate(params)),
  }),

  set_budget: define({
    schema: z.object({ category: z.string(), limit: numeric }),
    mutates: true,
    run: (ledger, { category, limit }) => ok(ledger.setBudget(category, limit)),
  }),

  get_budgets: define({
    schema: noParams,
    mutates: false,
    run: (ledger) => ok(ledger.getAllBudgets()),
  }),

  get_alerts: define({
    schema: noParams,
    mutates: false,
    run: (ledger) => ok(ledger.getBudgetAlerts()),
  }),

  add_bill: define({
    schema: z.object({
      name: z.string(),
      amount: numeric,
      dueDate: z.string(),
      category: z.string().optional(),
    }),
    mutates: true,
    run: (ledger, params) => ok(ledger.addBill(params)),
  }),

  get_bills: define({
    schema: z.object({
      status: z.enum(['all', 'unpaid', 'overdue']).default('all'),
      asOf: dateKey.optional(),
    }),
    mutates: false,
    run: (ledger, { status, asOf }) =>
      ok(ledger.getBills({ status, asOf: status === 'overdue' ? (asOf ?? today()) : asOf })),
  }),

  pay_bill: define({
    schema: z.object({ id: z.string().min(1) }),
    mutates: true,
    run: (ledger, { id }) =>
      ledger.payBill(id)
        ? ok(ledger.getBill(id))
        : notFound('Bill', id),
  }),

  delete_bill: define({
    schema: z.object({ id: z.string().min(1) }),
    mutates: true,
    run: (ledger, { id }) =>
      ledger.deleteBill(id)
        ? ok({ deleted: true, id })
        : notFound('Bill', id),
  }),

  get_top_expenses: define({
    schema: z.object({ k: positiveCount.default(5) }),
    mutates: false,
    run: (ledger, { k }) => ok(ledger.getTopExpenses(k)),
  }),

  get_top_categories: define({
    schema: z.object({ k: positiveCount.default(5) }),
    mutates: false,
    run: (ledger, { k }) => ok(ledger.getTopCategories(k)),
  }),

  get_monthly_summary: define({
    schema: z.object({ month: z.string() }),
    mutates: false,
    run: (ledger, { month }) => ok(ledger.getMonthlySummary(month)),
  }),

  get_category_suggestions: define({
    schema: z.object({ prefix: z.string().default(''), limit: positiveCount.optional() }),
    mutates: false,
    run: (ledger, { prefix, limit }) => ok(ledger.getCategorySuggestions(prefix, limit)),
  }),

  get_description_suggestions: define({
    schema: z.object({ prefix: z.string().default(''), limit: positiveCount.optional() }),
    mutates: false,
    run: (ledger, { prefix, limit }) => ok(ledger.getDescriptionSuggestions(prefix, limit)),
  }),

  get_all_categories: define({
    schema: noParams,
    mutates: false,
    run: (ledger) => ok(ledger.getAllCategories()),
  }),

  undo: define({
    schema: noParams,
    mutates: true,
    run: (ledger) =>
      ledger.undo() ? ok({ undone: true }) : failure('LogEmpty', 'Nothing to undo'),
  }),

  get_action_history: define({
    schema: noParams,
    mutates: false,
    run: (ledger) => ok(ledger.getActionHistory()),
  }),

  get_dashboard: define({
    schema: z.object({ asOf: dateKey.optional() }),
    mutates: false,
    run: (ledger, { asOf }) => ok(ledger.getDashboard(asOf ?? today())),
  }),
};

export type CommandName = keyof typeof commands;

export function isCommandName(name: string): name is CommandName {
  return Object.prototype.hasOwnProperty.call(commands, name);
}

export const COMMAND_NAMES: CommandName[] = Object.keys(commands).filter(isCommandName);

/**
 * CommandService - turns named commands with parameter bundles into ledger calls
 * Only InvalidInput is a rejection; NotFound and LogEmpty are ordinary outcomes.
 */
export class CommandService {
  constructor(
    private ledger: LedgerService,
    private onMutation?: (ledger: LedgerService, command: CommandName) => void
  ) {}

  execute(name: string, params: unknown = {}): CommandOutcome {
    if (!isCommandName(name)) {
      return failure('InvalidInput', `Unknown command: ${name}`, { command: name });
    }

    const outcome = this.dispatch(name, params ?? {});

    if (outcome.success && commands[name].mutates && this.onMutation) {
      try {
        this.onMutation(this.ledger, name);
      } catch (error) {
        // The mutation stands; the next successful snapshot rewrites every row
        logger.error('Post-mutation hook failed', {
          command: name,
          error: error instanceof Error ? error.message : String(error),
        });
        return { ...outcome, persisted: false };
      }
    }

    if (!outcome.success) {
      logger.info('Command did not succeed', { command: name, kind: outcome.error.kind });
    }
    return outcome;
  }

  private dispatch(name: CommandName, params: unknown): CommandOutcome {
    const command: CommandDefinition<ZodTypeAny> = commands[name];
    const parsed = command.schema.safeParse(params);
    if (!parsed.success) {
      return failure('InvalidInput', `Invalid parameters for ${name}`, {
        issues: parsed.error.issues.map((issue) => ({
          path: issue.path.join('.'),
          message: issue.message,
        })),
      });
    }

    try {
      return command.run(this.ledger, parsed.data);
    } catch (error) {
      if (error instanceof ValidationError) {
        return failure('InvalidInput', error.message, error.details);
      }
      throw error;
    }
  }
}
