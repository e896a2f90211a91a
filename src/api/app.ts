import express, { NextFunction, Request, Response } from 'express';
import { MatchStore } from '../db/store';
import { AppError, CvExtractionError, StoreConstraintViolation } from '../errors';
import { CvService } from '../services/cv-service';
import { PipelineScheduler } from '../services/scheduler';
import { logger } from '../utils/logger';
import { createPipelineRouter } from './routes/pipeline.routes';
import { createUsersRouter } from './routes/users.routes';

export interface AppDeps {
  cvService: CvService;
  matches: MatchStore;
  scheduler: PipelineScheduler;
  cronSecret?: string;
  cvMaxUploadBytes: number;
}

export function createApp(deps: AppDeps) {
  const app = express();

  app.use(express.json());

  app.get('/health', (_req, res) => {
    res.json({ status: 'ok', pipelineRunning: deps.scheduler.isRunning });
  });

  app.use(createUsersRouter(deps));
  app.use(createPipelineRouter(deps));

  app.use((error: unknown, req: Request, res: Response, _next: NextFunction) => {
    if (error instanceof SyntaxError && 'body' in error) {
      res.status(400).json({ error: 'Malformed JSON body' });
      return;
    }
    if (error instanceof StoreConstraintViolation) {
      res.status(409).json({ error: 'A user with this email already exists' });
      return;
    }
    if (error instanceof CvExtractionError) {
      res.status(400).json({ error: error.message });
      return;
    }

    logger.error(`Request failed`, error, {
      method: req.method,
      path: req.path,
      code: error instanceof AppError ? error.code : undefined,
    });
    res.status(500).json({ error: 'Internal server error' });
  });

  return app;
}
