import { z } from 'zod';

const LOG_LEVELS = ['fatal', 'error', 'warn', 'info', 'debug', 'trace', 'silent'] as const;

export const gameConfigSchema = z
  .object({
    OPERATOR_ID: z
      .string({ error: 'OPERATOR_ID is required' })
      .min(3, 'OPERATOR_ID must be at least 3 characters')
      .max(64, 'OPERATOR_ID must be at most 64 characters')
      .regex(
        /^[a-z][a-z0-9]+(-[a-z0-9]+)*$/,
        'OPERATOR_ID must be a lowercase slug (e.g. "operator-a")',
      ),

    // Published with every round. No default.
    HOUSE_EDGE_PERCENT: z.coerce
      .number({ error: 'HOUSE_EDGE_PERCENT is required' })
      .min(0, 'HOUSE_EDGE_PERCENT must be >= 0')
      .lt(100, 'HOUSE_EDGE_PERCENT must be < 100'),

    MAX_MULTIPLIER: z.coerce
      .number()
      .gt(1, 'MAX_MULTIPLIER must be > 1')
      .max(1_000_000, 'MAX_MULTIPLIER must be <= 1000000')
      .default(1000),

    MIN_BET_CENTS: z.coerce.number().int().positive('MIN_BET_CENTS must be > 0'),

    MAX_BET_CENTS: z.coerce.number().int().positive('MAX_BET_CENTS must be > 0'),

    BETTING_WINDOW_MS: z.coerce
      .number()
      .int()
      .positive('BETTING_WINDOW_MS must be > 0')
      .default(5000),

    TICK_INTERVAL_MS: z.coerce
      .number()
      .int()
      .min(10, 'TICK_INTERVAL_MS must be >= 10')
      .max(100, 'TICK_INTERVAL_MS must be <= 100')
      .default(50),

    GROWTH_RATE: z.coerce.number().positive('GROWTH_RATE must be > 0').default(0.00006),

    LEDGER_TIMEOUT_MS: z.coerce.number().int().positive().default(2000),

    CREDIT_RETRY_BASE_MS: z.coerce.number().int().positive().default(250),

    CREDIT_RETRY_MAX_MS: z.coerce.number().int().positive().default(30_000),

    CREDIT_ALERT_AFTER_ATTEMPTS: z.coerce.number().int().positive().default(5),

    HISTORY_CAPACITY: z.coerce.number().int().positive().default(1000),

    ACCOUNT_LEDGER_URL: z
      .string()
      .regex(/^https?:\/\/[^\s]+$/, 'ACCOUNT_LEDGER_URL must use http:// or https://')
      .optional(),

    CLIENT_SEED: z.string().min(1).optional(),

    NATS_URL: z
      .string({ error: 'NATS_URL is required' })
      .regex(/^(nats|tls):\/\/[^\s]+$/, 'NATS_URL must use nats:// or tls:// scheme'),

    LOG_LEVEL: z.enum(LOG_LEVELS).default('info'),

    NODE_ENV: z.string().default('development'),
  })
  .refine((data) => data.MIN_BET_CENTS < data.MAX_BET_CENTS, {
    message: 'MIN_BET_CENTS must be less than MAX_BET_CENTS',
    path: ['MIN_BET_CENTS'],
  })
  .refine((data) => data.CREDIT_RETRY_BASE_MS <= data.CREDIT_RETRY_MAX_MS, {
    message: 'CREDIT_RETRY_BASE_MS must not exceed CREDIT_RETRY_MAX_MS',
    path: ['CREDIT_RETRY_BASE_MS'],
  });

export type RawGameConfig = z.infer<typeof gameConfigSchema>;
