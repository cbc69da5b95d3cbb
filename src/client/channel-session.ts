import { parseServerMessage } from '../shared/protocol-schema.js';
import { PROTOCOL_VERSION, type ClientMessage, type ServerMessage } from '../shared/protocol.js';
import { createLogger } from '../shared/logger.js';
import { wsTransport, type ChannelTransport, type TransportFactory } from './transport.js';

const log = createLogger('session');

export type SessionState = 'connecting' | 'open' | 'closed' | 'backoff';
export type SessionEvent = 'connect' | 'opened' | 'dropped' | 'retry' | 'shutdown';

const TRANSITIONS: Record<SessionState, Partial<Record<SessionEvent, SessionState>>> = {
  closed: { connect: 'connecting', retry: 'backoff' },
  connecting: { opened: 'open', dropped: 'closed', shutdown: 'closed' },
  open: { dropped: 'closed', shutdown: 'closed' },
  backoff: { connect: 'connecting', shutdown: 'closed' }
};

export function nextSessionState(state: SessionState, event: SessionEvent): SessionState | undefined {
  return TRANSITIONS[state][event];
}

export interface SessionOptions {
  url: string;
  clientId: string;
  transport?: TransportFactory;
  reconnectDelayMs?: number;
  backoff?: 'constant' | 'exponential';
  maxReconnectDelayMs?: number;
  heartbeatMs?: number;
}

export type StateListener = (state: SessionState) => void;
export type MessageListener = (msg: ServerMessage) => void;

/**
 * One persistent duplex channel per client. Reconnects forever after a drop,
 * always with the same client id, until `close()` is called. Nothing is queued
 * while the channel is down: `send` drops the message and returns false.
 */
export class ChannelSession {
  readonly clientId: string;
  private readonly url: string;
  private readonly transportFactory: TransportFactory;
  private readonly reconnectDelayMs: number;
  private readonly backoff: 'constant' | 'exponential';
  private readonly maxReconnectDelayMs: number;
  private readonly heartbeatMs: number;

  private current: SessionState = 'closed';
  private transport?: ChannelTransport;
  private generation = 0;
  private attempt = 0;
  private requestSeq = 0;
  private stopped = true;
  private retryTimer?: NodeJS.Timeout;
  private heartbeatTimer?: NodeJS.Timeout;
  private readonly stateListeners = new Set<StateListener>();
  private readonly messageListeners = new Set<MessageListener>();

  constructor(opts: SessionOptions) {
    this.url = opts.url;
    this.clientId = opts.clientId;
    this.transportFactory = opts.transport ?? wsTransport;
    this.reconnectDelayMs = opts.reconnectDelayMs ?? 3_000;
    this.backoff = opts.backoff ?? 'constant';
    this.maxReconnectDelayMs = opts.maxReconnectDelayMs ?? 30_000;
    this.heartbeatMs = opts.heartbeatMs ?? 15_000;
  }

  get state(): SessionState { return this.current; }
  get isOpen(): boolean { return this.current === 'open'; }

  onStateChange(listener: StateListener): () => void {
    this.stateListeners.add(listener);
    return () => this.stateListeners.delete(listener);
  }

  subscribe(listener: MessageListener): () => void {
    this.messageListeners.add(listener);
    return () => this.messageListeners.delete(listener);
  }

  /** Monotonic for the lifetime of the session; reconnects do not reset it. */
  nextRequestId(): number {
    this.requestSeq += 1;
    return this.requestSeq;
  }

  open(): void {
    this.stopped = false;
    this.transition('connect');
  }

  close(): void {
    this.stopped = true;
    this.transition('shutdown');
  }

  send(message: ClientMessage): boolean {
    if (this.current !== 'open' || !this.transport) return false;
    this.transport.send(JSON.stringify(message));
    return true;
  }

  onMessage(raw: string): void {
    const msg = parseServerMessage(raw);
    if (!msg) {
      log.warn('dropping malformed server message', { raw: raw.slice(0, 200) });
      return;
    }
    for (const l of this.messageListeners) l(msg);
  }

  reconnectDelay(attempt: number): number {
    if (this.backoff === 'constant') return this.reconnectDelayMs;
    return Math.min(this.reconnectDelayMs * 2 ** Math.max(0, attempt - 1), this.maxReconnectDelayMs);
  }

  private transition(event: SessionEvent): boolean {
    const next = nextSessionState(this.current, event);
    if (!next) return false;
    const prev = this.current;
    this.current = next;
    this.enter(next, prev, event);
    for (const l of this.stateListeners) l(next);
    // a drop is surfaced as `closed` before backing off
    if (next === 'closed' && event === 'dropped' && !this.stopped) this.transition('retry');
    return true;
  }

  private enter(state: SessionState, prev: SessionState, event: SessionEvent): void {
    switch (state) {
      case 'connecting':
        this.clearRetry();
        this.connect();
        return;
      case 'open':
        this.attempt = 0;
        this.startHeartbeat();
        return;
      case 'closed':
        this.stopHeartbeat();
        this.clearRetry();
        if (event === 'shutdown' && (prev === 'open' || prev === 'connecting')) this.dropTransport(1000, 'client closed');
        else this.dropTransport();
        return;
      case 'backoff': {
        this.attempt += 1;
        const delay = this.reconnectDelay(this.attempt);
        log.info('disconnected, reconnecting', { clientId: this.clientId, attempt: this.attempt, delayMs: delay });
        this.retryTimer = setTimeout(() => {
          this.retryTimer = undefined;
          this.transition('connect');
        }, delay);
      }
    }
  }

  private connect(): void {
    const gen = ++this.generation;
    const live = () => gen === this.generation;
    this.transport = this.transportFactory(this.url, {
      onOpen: () => {
        if (!live() || !this.transport) return;
        this.transport.send(JSON.stringify({ type: 'hello', clientId: this.clientId, version: PROTOCOL_VERSION, ts: Date.now() } satisfies ClientMessage));
        this.transition('opened');
      },
      onMessage: (data) => {
        if (live()) this.onMessage(data);
      },
      onError: (error) => {
        if (live()) log.warn('transport error', { clientId: this.clientId, error: error.message });
      },
      onClose: (code) => {
        if (!live()) return;
        this.transport = undefined;
        log.debug('transport closed', { clientId: this.clientId, code });
        this.transition('dropped');
      }
    });
  }

  private dropTransport(code?: number, reason?: string): void {
    const t = this.transport;
    this.transport = undefined;
    this.generation += 1;
    if (t && code !== undefined) t.close(code, reason);
  }

  private startHeartbeat(): void {
    this.stopHeartbeat();
    this.heartbeatTimer = setInterval(() => {
      this.send({ type: 'heartbeat', clientId: this.clientId, ts: Date.now() });
    }, this.heartbeatMs);
  }

  private stopHeartbeat(): void {
    if (this.heartbeatTimer) clearInterval(this.heartbeatTimer);
    this.heartbeatTimer = undefined;
  }

  private clearRetry(): void {
    if (this.retryTimer) clearTimeout(this.retryTimer);
    this.retryTimer = undefined;
  }
}
