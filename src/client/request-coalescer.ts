interface InFlight { requestId: number; sentAt: number; }

/**
 * Single-flight bookkeeping: at most one outstanding request per key. A second
 * request for a busy key is refused, never queued.
 */
export class RequestCoalescer<K extends string> {
  private readonly inFlight = new Map<K, InFlight>();

  tryAcquire(key: K, requestId: number, now: number): boolean {
    if (this.inFlight.has(key)) return false;
    this.inFlight.set(key, { requestId, sentAt: now });
    return true;
  }

  settle(key: K, requestId: number): boolean {
    if (this.inFlight.get(key)?.requestId !== requestId) return false;
    this.inFlight.delete(key);
    return true;
  }

  isOutstanding(key: K): boolean { return this.inFlight.has(key); }
  requestIdOf(key: K): number | undefined { return this.inFlight.get(key)?.requestId; }
  outstanding(): K[] { return [...this.inFlight.keys()]; }

  clear(): void { this.inFlight.clear(); }
}
