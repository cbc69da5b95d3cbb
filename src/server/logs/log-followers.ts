import type { LogFollowHandle } from '../telemetry/telemetry-source.js';

interface Follower {
  connId: string;
  containerId: string;
  requestId: number;
  handle: LogFollowHandle;
}

/** Open follow-mode subscriptions, at most one per (connection, container). */
export class LogFollowers {
  private readonly followers = new Map<string, Follower>();
  key(connId: string, containerId: string): string { return `${connId}:${containerId}`; }

  /** Registers a follower, stopping whichever one it supersedes. */
  start(connId: string, containerId: string, requestId: number, handle: LogFollowHandle): void {
    this.stop(connId, containerId);
    this.followers.set(this.key(connId, containerId), { connId, containerId, requestId, handle });
  }

  stop(connId: string, containerId: string): boolean {
    const k = this.key(connId, containerId);
    const f = this.followers.get(k);
    if (!f) return false;
    this.followers.delete(k);
    f.handle.stop();
    return true;
  }

  /** Drops the entry without stopping it, for followers that ended on their own. */
  forget(connId: string, containerId: string, requestId: number): void {
    if (this.isCurrent(connId, containerId, requestId)) this.followers.delete(this.key(connId, containerId));
  }

  stopAllForConnection(connId: string): number {
    let stopped = 0;
    for (const f of [...this.followers.values()]) {
      if (f.connId === connId && this.stop(connId, f.containerId)) stopped += 1;
    }
    return stopped;
  }

  isCurrent(connId: string, containerId: string, requestId: number): boolean {
    return this.followers.get(this.key(connId, containerId))?.requestId === requestId;
  }

  size(): number { return this.followers.size; }
}
