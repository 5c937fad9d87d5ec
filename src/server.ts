import express from 'express';
import cors from 'cors';
import dotenv from 'dotenv';
import { validateEnv } from './infra/env.js';
import { createLogger, setLogger } from './infra/logger.js';
import { createRateLimiter } from './infra/rateLimiter.js';
import { DatabaseAdapter } from './infra/DatabaseAdapter.js';
import { TransactionRepository } from './infra/repositories/TransactionRepository.js';
import { BudgetRepository } from './infra/repositories/BudgetRepository.js';
import { BillRepository } from './infra/repositories/BillRepository.js';
import { LedgerService } from './services/LedgerService.js';
import { SnapshotService } from './services/SnapshotService.js';
import { CommandService } from './services/CommandService.js';
import { createApiRouter } from './api/index.js';
import { createErrorHandler, notFoundHandler } from './api/errorHandler.js';
import { startBillReminders } from './scheduler/BillReminderScheduler.js';
import type { Request, Response, NextFunction } from 'express';

// Load environment variables
dotenv.config();

// Validate environment (fail-fast)
const env = validateEnv();

// Initialize logger
const loggerInstance = createLogger(env);
setLogger(loggerInstance);

// Initialize persistence
const db = new DatabaseAdapter(env);
const snapshotService = new SnapshotService(
  db,
  new TransactionRepository(db),
  new BudgetRepository(db),
  new BillRepository(db)
);

// Build the in-memory ledger from the last snapshot
const ledger = new LedgerService({
  undoCapacity: env.UNDO_LOG_CAPACITY,
  suggestionLimit: env.AUTOCOMPLETE_LIMIT,
});
snapshotService.load(ledger);

// Snapshot after every successful mutating command
const commandService = new CommandService(ledger, (current, command) => {
  const counts = snapshotService.persist(current);
  loggerInstance.debug('Snapshot written', { command, ...counts });
});

const app = express();

// Middleware
app.use(cors());
app.use(express.json());
app.use(
  createRateLimiter({
    windowMs: env.RATE_LIMIT_WINDOW_MS,
    max: env.RATE_LIMIT_MAX_REQUESTS,
  })
);

// Request logging middleware
app.use((req: Request, _res: Response, next: NextFunction) => {
  loggerInstance.info('Incoming request', {
    method: req.method,
    path: req.path,
    ip: req.ip,
  });
  next();
});

// Health check endpoint
app.get('/health', (_req: Request, res: Response) => {
  res.json({ status: 'ok', timestamp: new Date().toISOString() });
});

// Mount API routes
app.use('/api', createApiRouter({ commandService }));

// 404 handler
app.use(notFoundHandler);

// Global error handler
app.use(createErrorHandler(env));

const reminders = startBillReminders(env, ledger);

// Start server
const server = app.listen(env.PORT, () => {
  loggerInstance.info('Server started', {
    port: env.PORT,
    nodeEnv: env.NODE_ENV,
    transactions: ledger.getStats().transactionCount,
  });
});

// Graceful shutdown
process.on('SIGTERM', () => {
  loggerInstance.info('SIGTERM received, shutting down gracefully');
  reminders.stop();
  server.close(() => {
    db.close();
    loggerInstance.info('Server closed');
    process.exit(0);
  });
});

export { app };
