/**
 * Test run API routes.
 *
 * GET /test-runs/:runName/metrics: Metrics for every recorded test case of a run
 */

import { Router } from 'express';
import { MetricsCollector } from '../metrics/collector';

export function createTestRunRoutes(collector: MetricsCollector): Router {
  const router = Router();

  router.get('/test-runs/:runName/metrics', async (req, res, next) => {
    try {
      res.json(await collector.collectRun(req.params.runName));
    } catch (err) {
      next(err);
    }
  });

  return router;
}
