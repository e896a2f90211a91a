import express, { NextFunction, Request, Response } from 'express';
import { PipelineScheduler } from '../../services/scheduler';
import { logger } from '../../utils/logger';

export function createPipelineRouter(deps: { scheduler: PipelineScheduler; cronSecret?: string }) {
  const router = express.Router();

  /**
   * POST /pipeline/run
   * Runs one batch now. Guarded by CRON_SECRET when it is set.
   */
  router.post('/pipeline/run', async (req: Request, res: Response, next: NextFunction) => {
    const authHeader = req.headers.authorization;
    if (deps.cronSecret && authHeader !== `Bearer ${deps.cronSecret}`) {
      logger.warn('Unauthorized pipeline run request', { authHeader: authHeader ? 'present' : 'missing' });
      res.status(401).json({ error: 'Unauthorized' });
      return;
    }

    try {
      const report = await deps.scheduler.trigger();
      if (!report) {
        res.status(409).json({ error: 'A pipeline run is already in progress' });
        return;
      }
      res.status(200).json(report);
    } catch (error) {
      next(error);
    }
  });

  return router;
}
