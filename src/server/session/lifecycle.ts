import type { ClientRegistry } from './client-registry.js';
import type { ConnectionManager } from './connection-manager.js';
import type { Counters } from '../metrics/counters.js';
import type { ChannelWorker } from './channel-worker.js';

export function handleWsClose(connectionManager: ConnectionManager, clientRegistry: ClientRegistry, counters: Counters, worker: ChannelWorker | undefined, connId: string, code: number, now: number): void {
  counters.markWsClose(code);
  // follow-mode subscriptions end with the channel
  worker?.close();
  const conn = connectionManager.unregister(connId);
  if (!conn) return;
  clientRegistry.markClientOffline(conn.clientId, connId, now);
}

export function onGcTick(clientRegistry: ClientRegistry, now: number, offlineTtlMs: number): number {
  return clientRegistry.gcOfflineClients(now, offlineTtlMs);
}
