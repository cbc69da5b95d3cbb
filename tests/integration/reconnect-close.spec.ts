import { describe, expect, it } from 'vitest';
import { WebSocket } from 'ws';
import { CommandDispatcher } from '../../src/server/commands/command-dispatcher.js';
import { LogFollowers } from '../../src/server/logs/log-followers.js';
import { Counters } from '../../src/server/metrics/counters.js';
import { ChannelWorker } from '../../src/server/session/channel-worker.js';
import { ClientRegistry } from '../../src/server/session/client-registry.js';
import { ConnectionManager } from '../../src/server/session/connection-manager.js';
import { handleWsClose, onGcTick } from '../../src/server/session/lifecycle.js';
import { FakeHost } from '../helpers/fake-host.js';

function openSocket() {
  return { readyState: WebSocket.OPEN, send: () => undefined };
}

describe('reconnect and close', () => {
  it('a late close of the old connection does not knock the new one offline', () => {
    const c = new ClientRegistry();
    const m = new ConnectionManager();
    const counters = new Counters();
    m.register('conn1', 'client1', openSocket(), 0);
    c.markClientOnline('client1', 'conn1', 0);
    m.register('conn2', 'client1', openSocket(), 10);
    c.markClientOnline('client1', 'conn2', 10);

    handleWsClose(m, c, counters, undefined, 'conn1', 1006, 20);
    expect(c.get('client1')).toMatchObject({ status: 'online', connId: 'conn2', reconnects: 1 });
    expect(m.size()).toBe(1);
    expect(counters.wsCloseTotal).toEqual({ '1006': 1 });
  });

  it('closing a channel stops its log followers', async () => {
    const host = new FakeHost();
    const counters = new Counters();
    const logFollowers = new LogFollowers();
    const c = new ClientRegistry();
    const m = new ConnectionManager();
    const conn = m.register('conn1', 'client1', openSocket(), 0);
    c.markClientOnline('client1', 'conn1', 0);
    const worker = new ChannelWorker({ telemetry: host, dispatcher: new CommandDispatcher(host, counters), logFollowers, counters }, conn);
    await worker.handle({ type: 'get_container_logs', requestId: 1, containerId: 'web', tail: 10, follow: true });
    expect(logFollowers.size()).toBe(1);

    handleWsClose(m, c, counters, worker, 'conn1', 1001, 50);
    expect(logFollowers.size()).toBe(0);
    expect(host.followers[0].stopped).toBe(true);
    expect(c.get('client1')).toMatchObject({ status: 'offline', offlineSince: 50 });
  });

  it('serializes frames while the socket is open and drops them after', () => {
    const sent: string[] = [];
    const socket: { readyState: number; send(data: string): void } = { readyState: WebSocket.OPEN, send: (data) => { sent.push(data); } };
    const conn = new ConnectionManager().register('conn1', 'client1', socket, 0);
    expect(conn.sendJson({ type: 'welcome', clientId: 'client1', resumed: false, ts: 0 })).toBe(true);
    socket.readyState = WebSocket.CLOSING;
    expect(conn.sendJson({ type: 'welcome', clientId: 'client1', resumed: false, ts: 1 })).toBe(false);
    expect(sent).toEqual(['{"type":"welcome","clientId":"client1","resumed":false,"ts":0}']);
  });

  it('gc forgets identities that stayed offline', () => {
    const c = new ClientRegistry();
    c.markClientOnline('client1', 'conn1', 0);
    c.markClientOffline('client1', 'conn1', 0);
    expect(onGcTick(c, 30 * 60_000, 30 * 60_000)).toBe(0);
    expect(onGcTick(c, 30 * 60_000 + 1, 30 * 60_000)).toBe(1);
  });
});
