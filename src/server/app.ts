import express, { type Express } from 'express';
import type { ServerContext } from './api/types.js';
import { makeClientsRoute } from './api/clients-route.js';
import { makeContainersRoute } from './api/containers-route.js';
import { makePowerRoute } from './api/power-route.js';
import { makeProcessesRoute } from './api/processes-route.js';
import { makeStatusRoute } from './api/status-route.js';
import { makeSystemRoute } from './api/system-route.js';
import { errorHandler } from './middleware/error-handler.js';
import { requestLogger } from './middleware/request-logger.js';

export function createApp(ctx: ServerContext): Express {
  const app = express();
  app.use(express.json({ limit: '64kb' }));
  app.use(requestLogger);

  app.use('/api', makeStatusRoute(ctx));
  app.use('/api', makeClientsRoute(ctx));
  app.use('/api', makeSystemRoute(ctx));
  app.use('/api', makeProcessesRoute(ctx));
  app.use('/api', makeContainersRoute(ctx));
  app.use('/api', makePowerRoute(ctx));

  app.use('/api', (_req, res) => {
    res.status(404).json({ status: 'error', code: 'not_found', message: 'Route not found.' });
  });
  app.use(errorHandler);
  return app;
}
