import type { ClientState } from '../types.js';

/** Connection identities as seen across reconnects. */
export class ClientRegistry {
  private readonly clients = new Map<string, ClientState>();

  /** Returns true when the identity was already known (a reconnect). */
  markClientOnline(clientId: string, connId: string, now: number): boolean {
    const prev = this.clients.get(clientId);
    this.clients.set(clientId, {
      clientId,
      status: 'online',
      lastSeen: now,
      connId,
      connectedAt: now,
      offlineSince: undefined,
      reconnects: prev ? prev.reconnects + 1 : 0
    });
    return prev !== undefined;
  }

  touch(clientId: string, now: number): void {
    const c = this.clients.get(clientId);
    if (c) c.lastSeen = now;
  }

  /** Ignored when the identity has already been taken over by a newer connection. */
  markClientOffline(clientId: string, connId: string, now: number): ClientState | undefined {
    const c = this.clients.get(clientId);
    if (!c || c.connId !== connId) return undefined;
    c.status = 'offline';
    c.offlineSince = now;
    c.lastSeen = now;
    c.connId = undefined;
    return c;
  }

  detectClientIdConflict(clientId: string, connId: string): boolean {
    const c = this.clients.get(clientId);
    return !!c?.connId && c.connId !== connId;
  }

  gcOfflineClients(now: number, ttlMs: number): number {
    let deleted = 0;
    for (const [id, c] of this.clients) {
      if (c.status === 'offline' && c.offlineSince !== undefined && now - c.offlineSince > ttlMs) {
        this.clients.delete(id);
        deleted += 1;
      }
    }
    return deleted;
  }

  get(clientId: string): ClientState | undefined { return this.clients.get(clientId); }
  list(): ClientState[] { return [...this.clients.values()]; }
}
