import { Router } from 'express';
import { PROTOCOL_VERSION } from '../../shared/protocol.js';
import { buildHealthSummary } from '../metrics/health.js';
import type { ServerContext } from './types.js';

export function makeStatusRoute(ctx: ServerContext): Router {
  const router = Router();
  router.get('/status', (_req, res) => {
    res.json(buildHealthSummary(ctx.getMetrics(), ctx.counters));
  });
  // liveness only; never touches the host
  router.get('/healthz', (_req, res) => {
    res.json({ ok: true, port: ctx.port, protocolVersion: PROTOCOL_VERSION });
  });
  return router;
}
