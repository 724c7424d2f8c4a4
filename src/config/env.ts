// ============================================
// CAPITOL - Environment Configuration
// ============================================

import { z } from 'zod';

// Custom coerce helpers
const coerceNumber = z.coerce.number();
const coerceInt = z.coerce.number().int();

const envSchema = z.object({
  // Server
  PORT: coerceNumber.default(3000),
  HOST: z.string().default('0.0.0.0'),
  NODE_ENV: z.enum(['development', 'production', 'test']).default('development'),
  LOG_LEVEL: z.enum(['fatal', 'error', 'warn', 'info', 'debug', 'trace', 'silent']).optional(),

  // Database
  DB_PATH: z.string().default('./capitol.db'),

  // Catalog data (states, parties, events, policies)
  DATA_DIR: z.string().default('./data'),

  // Simulation
  SIM_SEED: coerceInt.default(42),
  SIM_START_YEAR: coerceInt.min(1789).default(2025),
  SIM_START_MONTH: coerceInt.min(1).max(12).default(1),
});

export type Env = z.infer<typeof envSchema>;

function loadEnv(): Env {
  const result = envSchema.safeParse(process.env);

  if (!result.success) {
    console.error('❌ Invalid environment variables:');
    console.error(result.error.format());
    throw new Error('Invalid environment configuration');
  }

  return result.data;
}

export const env = loadEnv();

export function isDevelopment(): boolean {
  return env.NODE_ENV === 'development';
}

export function isTest(): boolean {
  return env.NODE_ENV === 'test';
}
