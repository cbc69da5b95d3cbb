import { Router } from 'express';
import { errorMessage } from '../../shared/logger.js';
import { AppError } from '../errors/app-error.js';
import type { ServerContext } from './types.js';

/** Read-only host snapshots, reachable while the WebSocket channel is down. */
export function makeSystemRoute(ctx: ServerContext): Router {
  const router = Router();

  router.get('/system/info', async (_req, res, next) => {
    try {
      res.json(await ctx.telemetry.systemInfo());
    } catch (error) {
      next(new AppError('collaborator_failed', `Failed to fetch system info: ${errorMessage(error)}`, 500));
    }
  });

  router.get('/system/metrics', async (_req, res, next) => {
    try {
      res.json(await ctx.telemetry.metrics());
    } catch (error) {
      next(new AppError('collaborator_failed', `Failed to fetch metrics: ${errorMessage(error)}`, 500));
    }
  });

  return router;
}
