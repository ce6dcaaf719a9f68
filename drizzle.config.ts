import { defineConfig } from 'drizzle-kit';

// DATABASE_URL is the canonical connection string for the analysis database.
const dbUrl = process.env.DATABASE_URL;

if (!dbUrl) {
  throw new Error(
    'DATABASE_URL is not set. Point it at the galamsay analysis database before running drizzle-kit.'
  );
}

export default defineConfig({
  out: './migrations',
  schema: './shared/analysis-schema.ts',
  dialect: 'postgresql',
  dbCredentials: {
    url: dbUrl,
  },
});
