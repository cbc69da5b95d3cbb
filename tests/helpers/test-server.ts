import http from 'node:http';
import { createApp } from '../../src/server/app.js';
import { createServerContext } from '../../src/server/context.js';
import { mountWsServer } from '../../src/server/transport/ws-server.js';
import { FakeHost } from './fake-host.js';

/** Full server on an ephemeral port, backed by a fake host. */
export async function startTestServer(host = new FakeHost()) {
  const ctx = createServerContext({ port: 0, telemetry: host, actions: host });
  const server = http.createServer(createApp(ctx));
  const wss = mountWsServer(server, ctx);
  await new Promise<void>((resolve) => server.listen(0, '127.0.0.1', () => resolve()));
  const address = server.address();
  if (!address || typeof address === 'string') throw new Error('test server has no tcp address');
  const { port } = address;

  return {
    host,
    ctx,
    wss,
    wsUrl: `ws://127.0.0.1:${port}/ws`,
    apiUrl: `http://127.0.0.1:${port}/api`,
    async close() {
      for (const ws of wss.clients) ws.terminate();
      wss.close();
      await new Promise<void>((resolve) => server.close(() => resolve()));
    }
  };
}
