import http from 'node:http';
import { config } from './config.js';
import { createApp } from './app.js';
import { createServerContext } from './context.js';
import { onGcTick } from './session/lifecycle.js';
import { HostTelemetrySource } from './telemetry/host-telemetry-source.js';
import { mountWsServer } from './transport/ws-server.js';
import { createLogger, setLogLevel } from '../shared/logger.js';

setLogLevel(config.logLevel);
const log = createLogger('hostpulse');

const host = new HostTelemetrySource(config.host);
const ctx = createServerContext({ port: config.port, telemetry: host, actions: host });

const app = createApp(ctx);
const server = http.createServer(app);
const wss = mountWsServer(server, ctx);

const gcTimer = setInterval(() => {
  const removed = onGcTick(ctx.clientRegistry, Date.now(), config.session.offlineClientTtlMs);
  if (removed > 0) log.debug('forgot offline clients', { removed });
}, config.session.gcIntervalMs);

server.listen(config.port, () => {
  log.info(`listening on ${config.port}`);
});

const shutdown = (signal: string) => {
  log.info(`caught ${signal}, closing`);
  clearInterval(gcTimer);
  for (const ws of wss.clients) ws.close(1001, 'server shutting down');
  server.close(() => process.exit(0));
  setTimeout(() => process.exit(1), 5_000).unref();
};
for (const sig of ['SIGINT', 'SIGTERM'] as const) process.on(sig, () => shutdown(sig));
