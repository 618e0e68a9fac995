/**
 * Test case API routes.
 *
 * GET /test-cases/:testCaseId/timeline: Entities and events, ordered by timestamp
 * GET /test-cases/:testCaseId/metrics: Stage durations and event counts
 */

import { Router } from 'express';
import { apiError, notFoundError } from '../domain/errors';
import { MetricsCollector } from '../metrics/collector';
import { Store } from '../storage/store';

export function createTestCaseRoutes(store: Store, collector: MetricsCollector): Router {
  const router = Router();

  router.get('/test-cases/:testCaseId/timeline', async (req, res, next) => {
    try {
      const { testCaseId } = req.params;
      const testCase = await store.testCases.getById(testCaseId);
      if (!testCase) {
        res.status(404).json(apiError(notFoundError('TestCase', testCaseId)));
        return;
      }
      const [entities, events] = await Promise.all([
        store.entities.listByTestCase(testCaseId),
        store.events.listByTestCase(testCaseId),
      ]);
      res.json({ testCase, entities, events });
    } catch (err) {
      next(err);
    }
  });

  router.get('/test-cases/:testCaseId/metrics', async (req, res, next) => {
    try {
      res.json(await collector.collect(req.params.testCaseId));
    } catch (err) {
      next(err);
    }
  });

  return router;
}
