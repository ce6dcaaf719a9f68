/* eslint-disable no-console */
/**
 * Run analysis database migrations.
 *
 * Executes SQL migration files from migrations/ in filename order, each in
 * its own transaction, and records applied files in schema_migrations so
 * reruns skip them.
 *
 * Usage:
 *   npm run db:migrate
 *   # or directly:
 *   tsx scripts/run-migrations.ts
 *
 * Environment:
 *   DATABASE_URL or POSTGRES_* vars
 */

import { config } from 'dotenv';
config();

import fs from 'node:fs';
import path from 'node:path';
import { fileURLToPath } from 'node:url';
import pkg from 'pg';
import { getConnectionString } from '../server/storage';
const { Pool } = pkg;

async function main(): Promise<void> {
  const connectionString = getConnectionString();

  // Mask password in log output
  const safeUrl = connectionString.replace(/:([^@/]+)@/, ':****@');
  console.log(`[migrate] Connecting to: ${safeUrl}`);

  const pool = new Pool({ connectionString });

  try {
    // Test connection
    const client = await pool.connect();
    console.log('[migrate] Connected successfully');
    client.release();

    const scriptDir = path.dirname(fileURLToPath(import.meta.url));
    const migrationsDir = path.resolve(scriptDir, '..', 'migrations');
    const files = fs
      .readdirSync(migrationsDir)
      .filter((f: string) => f.endsWith('.sql'))
      .sort();

    console.log(`[migrate] Found ${files.length} migration files`);

    // Bootstrap migration tracking table outside any file transaction.
    await pool.query(`
      CREATE TABLE IF NOT EXISTS schema_migrations (
        filename TEXT PRIMARY KEY,
        applied_at TIMESTAMPTZ NOT NULL DEFAULT NOW()
      )
    `);

    for (const file of files) {
      const { rowCount } = await pool.query('SELECT 1 FROM schema_migrations WHERE filename = $1', [
        file,
      ]);
      if (rowCount && rowCount > 0) {
        console.log(`[migrate] Skipping (already applied): ${file}`);
        continue;
      }

      const sqlContent = fs.readFileSync(path.join(migrationsDir, file), 'utf-8');

      console.log(`[migrate] Running: ${file}`);
      // BEGIN/COMMIT must share one client; pool.query may hand out a new one per call
      const tx = await pool.connect();
      try {
        await tx.query('BEGIN');
        await tx.query(sqlContent);
        await tx.query('INSERT INTO schema_migrations (filename) VALUES ($1)', [file]);
        await tx.query('COMMIT');
        console.log(`[migrate] OK: ${file}`);
      } catch (err) {
        await tx.query('ROLLBACK').catch((rollbackErr: unknown) => {
          console.error('[migrate] ROLLBACK failed:', rollbackErr);
        });
        console.error(`[migrate] FAILED: ${file}`, err instanceof Error ? err.message : err);
        throw err;
      } finally {
        tx.release();
      }
    }

    console.log('[migrate] All migrations completed successfully');
  } finally {
    await pool.end();
  }
}

main().catch((err) => {
  console.error('[migrate] Fatal error:', err);
  process.exit(1);
});
