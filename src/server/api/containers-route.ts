import { Router } from 'express';
import { z } from 'zod';
import { containerIdSchema } from '../../shared/protocol-schema.js';
import { errorMessage } from '../../shared/logger.js';
import { AppError } from '../errors/app-error.js';
import type { ServerContext } from './types.js';

const statsParamsSchema = z.object({ id: containerIdSchema });

export function makeContainersRoute(ctx: ServerContext): Router {
  const router = Router();

  router.get('/containers', async (_req, res, next) => {
    try {
      res.json({ containers: await ctx.telemetry.containers() });
    } catch (error) {
      ctx.counters.markCollaboratorFailure('get_containers');
      next(new AppError('collaborator_failed', `Failed to fetch containers: ${errorMessage(error)}`, 500));
    }
  });

  router.get('/containers/:id/stats', async (req, res, next) => {
    const params = statsParamsSchema.safeParse(req.params);
    if (!params.success) {
      ctx.counters.validationFailureTotal += 1;
      next(new AppError('invalid_params', 'container id must not be empty'));
      return;
    }
    try {
      res.json(await ctx.telemetry.containerStats(params.data.id));
    } catch (error) {
      ctx.counters.markCollaboratorFailure('container_stats');
      next(new AppError('collaborator_failed', `Failed to fetch container stats: ${errorMessage(error)}`, 500));
    }
  });

  return router;
}
