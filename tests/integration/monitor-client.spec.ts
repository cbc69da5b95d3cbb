import { afterEach, beforeEach, describe, expect, it } from 'vitest';
import { MonitorClient } from '../../src/client/monitor-client.js';
import type { ServerMessage } from '../../src/shared/protocol.js';
import { sampleContainers, sampleInfo } from '../helpers/fake-host.js';
import { startTestServer } from '../helpers/test-server.js';
import { until } from '../helpers/wait.js';

type TestServer = Awaited<ReturnType<typeof startTestServer>>;

describe('monitor client over a live channel', () => {
  let srv: TestServer;
  let client: MonitorClient;

  beforeEach(async () => {
    srv = await startTestServer();
    client = new MonitorClient({ url: srv.wsUrl, clientId: 'client-a', reconnectDelayMs: 50 });
  });

  afterEach(async () => {
    client.stop();
    await srv.close();
  });

  it('loads the initial snapshot for the active view', async () => {
    client.start();
    await until(() => client.getState().processes.length > 0 && client.getState().metrics !== undefined);
    const state = client.getState();
    expect(state.connection).toBe('open');
    expect(state.systemInfo).toEqual(sampleInfo);
    expect(state.systemInfoFor).toBe('client-a');
    expect(state.processes).toHaveLength(3);
  });

  it('resumes the same identity after the server drops the channel', async () => {
    const welcomes: ServerMessage[] = [];
    client.session.subscribe((m) => {
      if (m.type === 'welcome') welcomes.push(m);
    });
    client.start();
    await until(() => welcomes.length === 1);
    for (const ws of srv.wss.clients) ws.terminate();

    await until(() => welcomes.length === 2);
    expect(welcomes[1]).toMatchObject({ clientId: 'client-a', resumed: true });
    expect(srv.ctx.clientRegistry.get('client-a')?.reconnects).toBe(1);
    expect(srv.ctx.counters.reconnectTotal).toBe(1);
    await until(() => client.getState().connection === 'open' && client.getState().systemInfoFor === 'client-a');
  });

  it('switches to containers and fetches them at once', async () => {
    client.start();
    await until(() => client.getState().connection === 'open');
    client.setActiveView('containers');
    await until(() => client.getState().containers.length > 0);
    expect(client.getState().containers).toEqual(sampleContainers);
    expect(srv.host.calls).toContain('containers');
  });

  it('kills a process and refreshes the process list', async () => {
    client.start();
    await until(() => client.getState().processes.length > 0);
    const before = srv.host.calls.filter((c) => c.startsWith('processes')).length;
    expect(client.killProcess(202)).toEqual({ ok: true, requestId: expect.any(Number) });
    await until(() => client.getState().notifications.some((n) => n.level === 'success'));
    expect(client.getState().notifications).toContainEqual({ level: 'success', title: 'Success', message: 'Process 202 terminated' });
    await until(() => srv.host.calls.filter((c) => c.startsWith('processes')).length > before);
  });

  it('follows container logs', async () => {
    srv.host.logs.set('web', 'boot');
    client.start();
    await until(() => client.getState().connection === 'open');
    client.openLogs('web', { follow: true });
    await until(() => client.getLogStream('web')?.state === 'active');
    await until(() => srv.host.followers.length === 1);
    srv.host.followers[0].sink.line('ready');
    await until(() => client.getLogStream('web')?.buffer === 'boot\nready');
    client.stopLogs('web');
    await until(() => srv.host.followers[0].stopped);
  });
});
