// Load environment variables FIRST before any other imports
import { config } from 'dotenv';
config();

import { drizzle, type NodePgDatabase } from 'drizzle-orm/node-postgres';
import pkg from 'pg';
import * as schema from '@shared/analysis-schema';
const { Pool } = pkg;

export type AnalysisDb = NodePgDatabase<typeof schema>;

// Analysis Database Connection
// Requires DATABASE_URL or the individual POSTGRES_* environment variables.
// The pool is created lazily so that importing this module never throws.
export function getConnectionString(env: NodeJS.ProcessEnv = process.env): string {
  // Prefer DATABASE_URL if set
  if (env.DATABASE_URL) {
    return env.DATABASE_URL;
  }

  // Otherwise, require POSTGRES_PASSWORD to be explicitly set (no hardcoded fallback)
  const password = env.POSTGRES_PASSWORD;
  if (!password) {
    throw new Error(
      'Database connection requires either DATABASE_URL or POSTGRES_PASSWORD environment variable to be set. ' +
        'See .env.example for required configuration.'
    );
  }

  const user = env.POSTGRES_USER || 'postgres';
  const host = env.POSTGRES_HOST || 'localhost';
  const port = env.POSTGRES_PORT || '5432';
  const database = env.POSTGRES_DATABASE || 'galamsay';

  return `postgresql://${user}:${encodeURIComponent(password)}@${host}:${port}/${database}`;
}

let pool: InstanceType<typeof Pool> | null = null;
let analysisDb: AnalysisDb | null = null;

/**
 * Get the analysis database, creating the pool on first use.
 * Throws when the connection is not configured.
 */
export function getAnalysisDb(): AnalysisDb {
  if (analysisDb) return analysisDb;

  const connectionString = getConnectionString();
  pool = new Pool({ connectionString });
  pool.on('error', (err) => {
    console.error('[storage] Idle PostgreSQL client error:', err.message);
  });
  analysisDb = drizzle(pool, { schema });
  return analysisDb;
}

export function isDatabaseConfigured(env: NodeJS.ProcessEnv = process.env): boolean {
  return Boolean(env.DATABASE_URL || env.POSTGRES_PASSWORD);
}

/** Close the pool (graceful shutdown, end of CLI run). */
export async function closeAnalysisDb(): Promise<void> {
  const current = pool;
  pool = null;
  analysisDb = null;
  if (current) {
    await current.end();
  }
}
