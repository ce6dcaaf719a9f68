// Load environment variables from .env file FIRST before any other imports
import { config } from 'dotenv';
config();

import { loadConfig } from './config';
import { createApp } from './app';
import { log } from './log';
import { MemAnalysisStore, type IAnalysisStore } from './analysis-store';
import { PostgresAnalysisStore } from './postgres-analysis-store';
import { closeAnalysisDb } from './storage';
import type { StorageBackend } from './service-health';

(async () => {
  const appConfig = loadConfig();

  let store: IAnalysisStore;
  let backend: StorageBackend;
  if (appConfig.databaseConfigured) {
    store = new PostgresAnalysisStore();
    backend = 'postgres';
  } else {
    store = new MemAnalysisStore();
    backend = 'memory';
    log('⚠️  No DATABASE_URL or POSTGRES_PASSWORD set - serving an empty in-memory store');
    log('   Configure the database and run `npm run analyze` to populate results');
  }

  const { server } = await createApp({ store, backend });

  server.listen(appConfig.port, appConfig.host, () => {
    log(`serving on ${appConfig.host}:${appConfig.port} (storage: ${backend})`);
  });

  const shutdown = (signal: string) => {
    log(`${signal} received, shutting down gracefully`);
    server.close(() => {
      closeAnalysisDb()
        .catch((err: unknown) => {
          console.error('[storage] Error closing database pool:', err);
        })
        .finally(() => {
          log('Server closed');
          process.exit(0);
        });
    });
  };

  process.on('SIGTERM', () => shutdown('SIGTERM'));
  process.on('SIGINT', () => shutdown('SIGINT'));
})().catch((err: unknown) => {
  console.error('❌ Failed to start server:', err);
  process.exit(1);
});
