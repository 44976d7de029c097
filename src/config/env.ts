import dotenv from 'dotenv';
import { z } from 'zod';

dotenv.config();

export const envSchema = z.object({
  NODE_ENV: z.enum(['development', 'test', 'production']).default('development'),
  PORT: z.string().default('5000'),
  FRONTEND_URL: z.string().url().optional(),
  LOG_DIR: z.string().min(1).default('./logs'),
  LOG_LEVEL: z.enum(['error', 'warn', 'info', 'http', 'verbose', 'debug', 'silly']).default('info'),
  RECENT_RUNS_LIMIT: z.coerce.number().int().min(1).max(500).default(50),
  MAX_TRAINING_ROWS: z.coerce.number().int().positive().optional()
});

export const env = envSchema.parse(process.env);
