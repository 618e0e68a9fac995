/**
 * Express server configuration.
 *
 * Read-only surface over a store: timelines and metrics for recorded test
 * cases. Observation itself never goes through HTTP.
 */

import express from 'express';
import { Store } from './storage/store';
import { createMemoryStore } from './storage/memory-store';
import { MetricsCollector } from './metrics/collector';
import { errorHandler } from './api/middleware';
import { createTestCaseRoutes } from './api/test-cases';
import { createTestRunRoutes } from './api/test-runs';

const startTime = Date.now();

/** Application context containing all services. */
export interface AppContext {
  store: Store;
  collector: MetricsCollector;
}

/** Create the application context; defaults to an in-memory store. */
export function createAppContext(store?: Store): AppContext {
  const appStore = store ?? createMemoryStore();
  return {
    store: appStore,
    collector: new MetricsCollector(appStore),
  };
}

/** Create and configure the Express application. */
export function createApp(context?: Partial<AppContext>): express.Application {
  const base = createAppContext(context?.store);
  const ctx: AppContext = { ...base, collector: context?.collector ?? base.collector };
  const app = express();

  app.get('/health', (_req, res) => {
    res.json({
      status: 'ok',
      uptimeMs: Date.now() - startTime,
      storage: ctx.store.kind,
    });
  });

  app.use('/api', createTestCaseRoutes(ctx.store, ctx.collector));
  app.use('/api', createTestRunRoutes(ctx.collector));

  app.use(errorHandler);

  return app;
}
