import {
  pgTable,
  serial,
  text,
  integer,
  bigint,
  boolean,
  doublePrecision,
  timestamp,
  index,
} from 'drizzle-orm/pg-core';
import { createInsertSchema } from 'drizzle-zod';

/**
 * Analysis Runs Table
 * One immutable row per pipeline execution. Child tables below hold the
 * cleaned snapshot and the over-threshold list for the run.
 */
export const analysisRuns = pgTable(
  'analysis_runs',
  {
    id: serial('id').primaryKey(),
    createdAt: timestamp('created_at', { withTimezone: true }).notNull().defaultNow(),
    totalSites: bigint('total_sites', { mode: 'number' }).notNull(),
    // null when the cleaned dataset was empty
    topRegion: text('top_region'),
    topRegionSites: bigint('top_region_sites', { mode: 'number' }).notNull().default(0),
    averagePerRegion: doublePrecision('average_per_region').notNull(),
    validCount: integer('valid_count').notNull(),
    rejectedCount: integer('rejected_count').notNull(),
  },
  (table) => [index('idx_analysis_runs_created_at').on(table.createdAt)]
);

/**
 * City Data Table
 * Cleaned city rows exactly as analyzed by the owning run.
 */
export const cityData = pgTable(
  'city_data',
  {
    id: serial('id').primaryKey(),
    analysisRunId: integer('analysis_run_id')
      .notNull()
      .references(() => analysisRuns.id, { onDelete: 'cascade' }),
    position: integer('position').notNull(),
    city: text('city').notNull(),
    region: text('region').notNull(),
    siteCount: bigint('site_count', { mode: 'number' }).notNull(),
    flagged: boolean('flagged').notNull().default(false),
  },
  (table) => [index('idx_city_data_run').on(table.analysisRunId)]
);

/**
 * Cities Exceeding Threshold Table
 * Pre-computed over-threshold list for each run, with the threshold used.
 */
export const citiesExceedingThreshold = pgTable(
  'cities_exceeding_threshold',
  {
    id: serial('id').primaryKey(),
    analysisRunId: integer('analysis_run_id')
      .notNull()
      .references(() => analysisRuns.id, { onDelete: 'cascade' }),
    position: integer('position').notNull(),
    city: text('city').notNull(),
    region: text('region').notNull(),
    siteCount: bigint('site_count', { mode: 'number' }).notNull(),
    threshold: integer('threshold').notNull(),
  },
  (table) => [index('idx_cities_exceeding_threshold_run').on(table.analysisRunId)]
);

// Export Zod schemas for validation
export const insertAnalysisRunSchema = createInsertSchema(analysisRuns);
export const insertCityDataSchema = createInsertSchema(cityData);
export const insertCityExceedingThresholdSchema = createInsertSchema(citiesExceedingThreshold);

// Export TypeScript types
export type AnalysisRunRow = typeof analysisRuns.$inferSelect;
export type InsertAnalysisRunRow = typeof analysisRuns.$inferInsert;
export type CityDataRow = typeof cityData.$inferSelect;
export type InsertCityDataRow = typeof cityData.$inferInsert;
export type CityExceedingThresholdRow = typeof citiesExceedingThreshold.$inferSelect;
export type InsertCityExceedingThresholdRow = typeof citiesExceedingThreshold.$inferInsert;
