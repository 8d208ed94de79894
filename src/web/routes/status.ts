import { Router } from 'express';
import { asyncHandler } from '../middleware/error-handler.js';

export interface StatusReporter {
  getSystemStatus(): Promise<string>;
}

export function createStatusRouter(status: StatusReporter): Router {
  const router = Router();

  router.get(
    '/',
    asyncHandler(async (_req, res) => {
      res.json({ report: await status.getSystemStatus() });
    }),
  );

  return router;
}

export function createHealthRouter(): Router {
  const router = Router();

  router.get('/', (_req, res) => {
    res.json({
      status: 'healthy',
      timestamp: new Date().toISOString(),
    });
  });

  return router;
}
