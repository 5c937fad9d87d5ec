import { z, ZodError } from 'zod';
import cron from 'node-cron';

/**
 * Environment variable schema with strict validation
 */
const envSchema = z.object({
  NODE_ENV: z.enum(['development', 'production', 'test']).default('development'),
  PORT: z.coerce.number().int().default(3000),

  // Data storage
  SQLITE_DB_PATH: z.string().default('./data/ledger.db'),

  // Logging
  LOG_LEVEL: z.enum(['error', 'warn', 'info', 'debug']).default('info'),
  LOG_FILE: z.string().optional(),

  // Ledger core
  UNDO_LOG_CAPACITY: z.coerce
    .number()
    .int()
    .min(1, { message: 'UNDO_LOG_CAPACITY must be at least 1' })
    .default(50),
  AUTOCOMPLETE_LIMIT: z.coerce
    .number()
    .int()
    .min(1, { message: 'AUTOCOMPLETE_LIMIT must be at least 1' })
    .default(10),

  // Bill reminders
  BILL_REMINDER_CRON: z
    .string()
    .default('0 8 * * *')
    .refine((expression) => cron.validate(expression), {
      message: 'BILL_REMINDER_CRON must be a valid cron expression',
    }),
  BILL_REMINDER_DAYS_AHEAD: z.coerce.number().int().min(0).default(7),

  // Rate limiting (API)
  RATE_LIMIT_WINDOW_MS: z.coerce.number().int().default(60000),
  RATE_LIMIT_MAX_REQUESTS: z.coerce.number().int().default(120),
});

export type Env = z.infer<typeof envSchema>;

/**
 * Parses environment variables without side effects
 */
export function parseEnv(source: NodeJS.ProcessEnv = process.env): Env {
  return envSchema.parse(source);
}

/**
 * Validates and parses environment variables
 * Exits process with code 1 if validation fails (fail-fast principle)
 */
export function validateEnv(source: NodeJS.ProcessEnv = process.env): Env {
  try {
    return parseEnv(source);
  } catch (error) {
    if (error instanceof ZodError) {
      console.error('❌ Environment validation failed:');
      error.issues.forEach((err) => {
        console.error(`  - ${err.path.join('.')}: ${err.message}`);
      });
      console.error('\nCheck .env.example for required variables');
      process.exit(1);
    }
    throw error;
  }
}
