import { Router } from 'express';
import { z } from 'zod';
import { MAX_PROCESS_LIMIT } from '../../shared/protocol-schema.js';
import { createLogger, errorMessage } from '../../shared/logger.js';
import { AppError } from '../errors/app-error.js';
import type { ServerContext } from './types.js';

const log = createLogger('processes');

const listQuerySchema = z.object({ limit: z.coerce.number().int().min(1).max(MAX_PROCESS_LIMIT).default(20) });
const killParamsSchema = z.object({ pid: z.coerce.number().int().positive() });

/** Process listing and kill over HTTP, for when the channel is down. */
export function makeProcessesRoute(ctx: ServerContext): Router {
  const router = Router();

  router.get('/processes', async (req, res, next) => {
    const query = listQuerySchema.safeParse(req.query);
    if (!query.success) {
      ctx.counters.validationFailureTotal += 1;
      next(new AppError('invalid_params', `limit must be an integer between 1 and ${MAX_PROCESS_LIMIT}`));
      return;
    }
    try {
      res.json({ processes: await ctx.telemetry.processes(query.data.limit) });
    } catch (error) {
      ctx.counters.markCollaboratorFailure('get_processes');
      next(new AppError('collaborator_failed', `Failed to fetch processes: ${errorMessage(error)}`, 500));
    }
  });

  router.post('/processes/:pid/kill', async (req, res, next) => {
    const params = killParamsSchema.safeParse(req.params);
    if (!params.success) {
      ctx.counters.validationFailureTotal += 1;
      next(new AppError('invalid_params', 'pid must be a positive integer'));
      return;
    }
    const { pid } = params.data;
    log.info('kill requested', { pid });
    try {
      res.json({ status: 'ok', message: await ctx.actions.killProcess(pid) });
    } catch (error) {
      ctx.counters.markCollaboratorFailure('kill_process');
      next(new AppError('collaborator_failed', errorMessage(error), 500));
    }
  });

  return router;
}
