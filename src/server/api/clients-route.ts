import { Router } from 'express';
import { z } from 'zod';
import { AppError } from '../errors/app-error.js';
import type { ClientState } from '../types.js';
import type { ServerContext } from './types.js';

const querySchema = z.object({ status: z.enum(['online', 'offline']).optional() });

// connection ids stay internal
function publicView(c: ClientState) {
  return {
    clientId: c.clientId,
    status: c.status,
    lastSeen: c.lastSeen,
    reconnects: c.reconnects,
    ...(c.connectedAt !== undefined ? { connectedAt: c.connectedAt } : {}),
    ...(c.offlineSince !== undefined ? { offlineSince: c.offlineSince } : {})
  };
}

export function makeClientsRoute(ctx: ServerContext): Router {
  const router = Router();
  router.get('/clients', (req, res, next) => {
    const query = querySchema.safeParse(req.query);
    if (!query.success) {
      next(new AppError('invalid_params', 'status must be one of: online, offline'));
      return;
    }
    const { status } = query.data;
    const clients = ctx.clientRegistry.list().filter((c) => !status || c.status === status);
    res.json({ clients: clients.map(publicView) });
  });
  return router;
}
