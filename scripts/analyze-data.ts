#!/usr/bin/env tsx
/* eslint-disable no-console */

/**
 * Galamsay data analysis
 *
 * Reads the CSV, cleans it, prints the metrics and data-quality report, then
 * stores the run (with its cleaned snapshot) in the analysis database.
 * Run this BEFORE querying the API.
 *
 * Usage:
 *   npm run analyze                    # uses GALAMSAY_CSV_PATH or data/galamsay_data.csv
 *   npx tsx scripts/analyze-data.ts path/to/file.csv
 *
 * Environment:
 *   DATABASE_URL or POSTGRES_* vars
 */

import { config } from 'dotenv';
config();

import { loadConfig } from '../server/config';
import { prepareAnalysis, persistAnalysis } from '../server/analysis-pipeline';
import { formatAnalysisReport } from '../server/analysis-report';
import { PostgresAnalysisStore } from '../server/postgres-analysis-store';
import { closeAnalysisDb } from '../server/storage';

const RULE = '='.repeat(60);

async function main(): Promise<void> {
  const appConfig = loadConfig();
  const csvPath = process.argv[2] ?? appConfig.csvPath;

  console.log(RULE);
  console.log('GALAMSAY DATA ANALYSIS');
  console.log(RULE);

  // Structural CSV problems are fatal before anything is written
  const prepared = await prepareAnalysis(csvPath);
  console.log(`✓ Loaded ${prepared.rawCount} records from ${csvPath}`);
  console.log(
    `✓ Cleaned data: ${prepared.cleaning.cleaned.length} valid records ` +
      `(removed ${prepared.cleaning.rejectedCount} invalid records)`
  );
  console.log('');

  for (const line of formatAnalysisReport(prepared)) {
    console.log(line);
  }

  console.log('');
  console.log(RULE);

  const store = new PostgresAnalysisStore();
  try {
    const run = await persistAnalysis(prepared, store);
    console.log(`✓ Analysis saved to database with ID: ${run.id}`);
    console.log(`  Timestamp: ${run.createdAt.toISOString()}`);
  } finally {
    await closeAnalysisDb();
  }
}

main().catch((err) => {
  console.error('✗ Analysis failed:', err instanceof Error ? err.message : err);
  process.exit(1);
});
