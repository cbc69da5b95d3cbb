import { WebSocketServer } from 'ws';
import type { Server } from 'node:http';
import { randomUUID } from 'node:crypto';
import { parseClientMessage } from '../../shared/protocol-schema.js';
import { createLogger } from '../../shared/logger.js';
import type { ServerContext } from '../api/types.js';
import { ChannelWorker } from '../session/channel-worker.js';
import { handleWsClose } from '../session/lifecycle.js';
import { POLICY_VIOLATION, validateHello } from './ws-protocol.js';

const log = createLogger('ws');

export function mountWsServer(server: Server, ctx: ServerContext): WebSocketServer {
  const wss = new WebSocketServer({ noServer: true });

  wss.on('connection', (ws) => {
    const connId = randomUUID();
    let worker: ChannelWorker | undefined;
    let clientId = '';

    ws.on('message', (raw) => {
      const now = Date.now();
      const parsed = parseClientMessage(raw.toString());

      if (!worker) {
        const valid = validateHello(parsed);
        if (!valid.ok) {
          ws.close(POLICY_VIOLATION, valid.reason);
          return;
        }
        clientId = valid.hello.clientId;
        if (ctx.clientRegistry.detectClientIdConflict(clientId, connId)) {
          ctx.counters.clientIdConflictTotal += 1;
          log.warn('client id taken over by a new connection', { clientId });
        }
        const conn = ctx.connectionManager.register(connId, clientId, ws, now);
        const resumed = ctx.clientRegistry.markClientOnline(clientId, connId, now);
        if (resumed) ctx.counters.reconnectTotal += 1;
        worker = new ChannelWorker(ctx, conn);
        conn.sendJson({ type: 'welcome', clientId, resumed, ts: now });
        log.info('client connected', { clientId, connId, resumed });
        return;
      }

      if (!parsed.ok) {
        worker.handleInvalid(parsed.envelope, parsed.reason);
        return;
      }
      const msg = parsed.message;
      if (msg.type === 'heartbeat') {
        ctx.clientRegistry.touch(clientId, now);
      } else if (msg.type === 'hello') {
        worker.handleInvalid({ type: 'hello', pid: 0, containerId: '', action: '' }, 'already greeted');
      } else {
        void worker.handle(msg);
      }
    });

    ws.on('error', (error) => {
      log.warn('socket error', { connId, error: error.message });
    });

    ws.on('close', (code) => {
      handleWsClose(ctx.connectionManager, ctx.clientRegistry, ctx.counters, worker, connId, code, Date.now());
      if (worker) log.info('client disconnected', { clientId, connId, code });
    });
  });

  server.on('upgrade', (req, socket, head) => {
    const url = req.url || '';
    if (!url.startsWith('/ws')) {
      socket.destroy();
      return;
    }
    wss.handleUpgrade(req, socket, head, (ws) => {
      wss.emit('connection', ws, req);
    });
  });

  return wss;
}
