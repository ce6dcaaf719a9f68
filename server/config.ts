/**
 * Runtime configuration
 *
 * Validates the process environment once at startup. dotenv must already
 * have run (entry points call `config()` before importing this module).
 */

import { z } from 'zod';
import { isDatabaseConfigured } from './storage';

export const DEFAULT_CSV_PATH = 'data/galamsay_data.csv';

const EnvSchema = z.object({
  NODE_ENV: z.enum(['development', 'production', 'test']).optional().default('development'),
  PORT: z.coerce.number().int().min(1).max(65535).optional().default(3000),
  HOST: z.string().min(1).optional().default('0.0.0.0'),
  GALAMSAY_CSV_PATH: z.string().min(1).optional().default(DEFAULT_CSV_PATH),
});

export interface AppConfig {
  nodeEnv: 'development' | 'production' | 'test';
  port: number;
  host: string;
  csvPath: string;
  /** True when DATABASE_URL or POSTGRES_PASSWORD is set. */
  databaseConfigured: boolean;
}

export function loadConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
  const result = EnvSchema.safeParse(env);
  if (!result.success) {
    const detail = result.error.errors
      .map((e) => `${e.path.join('.')}: ${e.message}`)
      .join('; ');
    throw new Error(`Invalid environment configuration: ${detail}`);
  }

  return {
    nodeEnv: result.data.NODE_ENV,
    port: result.data.PORT,
    host: result.data.HOST,
    csvPath: result.data.GALAMSAY_CSV_PATH,
    databaseConfigured: isDatabaseConfigured(env),
  };
}
