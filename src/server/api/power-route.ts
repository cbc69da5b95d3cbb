import { Router } from 'express';
import { z } from 'zod';
import { powerActionSchema } from '../../shared/protocol-schema.js';
import { createLogger, errorMessage } from '../../shared/logger.js';
import { AppError } from '../errors/app-error.js';
import type { ServerContext } from './types.js';

const log = createLogger('power');

const powerBodySchema = z.object({ action: powerActionSchema });

/**
 * Out-of-band power control. It lives outside the WebSocket channel so that a
 * reboot can be requested even while the channel is down.
 */
export function makePowerRoute(ctx: ServerContext): Router {
  const router = Router();

  router.post('/power', async (req, res, next) => {
    const body = powerBodySchema.safeParse(req.body ?? {});
    if (!body.success) {
      ctx.counters.validationFailureTotal += 1;
      next(new AppError('invalid_params', 'action must be one of: reboot, shutdown'));
      return;
    }

    const { action } = body.data;
    log.info('power action requested', { action });
    try {
      const message = await ctx.actions.powerAction(action);
      res.json({ status: 'ok', message });
    } catch (error) {
      ctx.counters.markCollaboratorFailure('power_action');
      next(new AppError('collaborator_failed', errorMessage(error), 500));
    }
  });

  return router;
}
