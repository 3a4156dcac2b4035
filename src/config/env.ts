import dotenv from 'dotenv';
import { z } from 'zod';
import { DEFAULT_CURRENCY } from './constants';
import { isSupportedCurrency } from './currencies';

const envSchema = z.object({
  NODE_ENV: z.enum(['development', 'production', 'test']).default('development'),
  TELEGRAM_BOT_TOKEN: z.string().min(1),
  DB_PATH: z.string().default('./data/expenses.db'),
  DEFAULT_CURRENCY: z
    .string()
    .default(DEFAULT_CURRENCY)
    .transform((val) => val.trim().toUpperCase())
    .refine(isSupportedCurrency, 'Unsupported DEFAULT_CURRENCY'),
  HEALTH_PORT: z.string().default('5000').transform(Number),
});

export type Env = z.infer<typeof envSchema>;

function loadEnv(): Env {
  dotenv.config();

  return envSchema.parse(process.env);
}

export const env = loadEnv();
