import type { ClientMessage, Topic, TopicRequest, ViewName } from '../shared/protocol.js';
import { RequestCoalescer } from './request-coalescer.js';

export interface ScheduleOptions {
  processTickMs: number;
  defaultTickMs: number;
  /** Minimum time between two requests of a topic; requests inside the window are dropped. */
  minSpacingMs: Record<Topic, number>;
  /** Minimum time between two applied responses of a topic. Forced refreshes are exempt. */
  deliverySpacingMs: Record<Topic, number>;
  processLimit: number;
}

export const DEFAULT_SCHEDULE: ScheduleOptions = {
  processTickMs: 1_000,
  defaultTickMs: 5_000,
  minSpacingMs: { system_info: 0, metrics: 0, processes: 900, containers: 0, network: 1_000 },
  deliverySpacingMs: { system_info: 0, metrics: 0, processes: 900, containers: 0, network: 0 },
  processLimit: 20
};

export const VIEW_TOPIC: Record<ViewName, Topic | undefined> = {
  processes: 'processes',
  containers: 'containers',
  network: 'network',
  overview: undefined
};

/** Topics that back an always-visible part of the client. */
const ALWAYS_VISIBLE: ReadonlySet<Topic> = new Set<Topic>(['system_info', 'metrics']);

export interface SchedulerChannel {
  readonly isOpen: boolean;
  send(message: ClientMessage): boolean;
  nextRequestId(): number;
}

export type RequestOutcome = 'sent' | 'hidden' | 'in_flight' | 'spacing' | 'disconnected';
export type ResponseVerdict = 'apply' | 'discard' | 'unmatched';

/**
 * Decides when each topic is collected. The active view steers collection: only
 * its topic (plus metrics) is requested on a tick, and switching views requests
 * the new topic at once. Combined with single-flight and per-topic spacing this
 * keeps the request rate bounded however fast the operator clicks.
 *
 * The active view and the per-topic timestamps are owned here and written by
 * nothing else.
 */
export class TopicScheduler {
  private readonly opts: ScheduleOptions;
  private readonly coalescer = new RequestCoalescer<Topic>();
  private readonly lastRequestAt = new Map<Topic, number>();
  private readonly lastDeliveredAt = new Map<Topic, number>();
  private readonly forcedIds = new Set<number>();
  private readonly pendingForced = new Set<Topic>();
  private view: ViewName;
  private limit: number;
  private timer?: NodeJS.Timeout;

  constructor(private readonly channel: SchedulerChannel, opts: Partial<ScheduleOptions> = {}, initialView: ViewName = 'processes', private readonly now: () => number = Date.now) {
    this.opts = { ...DEFAULT_SCHEDULE, ...opts };
    this.view = initialView;
    this.limit = this.opts.processLimit;
  }

  get activeView(): ViewName { return this.view; }
  get processLimit(): number { return this.limit; }
  get ticking(): boolean { return this.timer !== undefined; }

  tickIntervalMs(view: ViewName = this.view): number {
    return view === 'processes' ? this.opts.processTickMs : this.opts.defaultTickMs;
  }

  isOutstanding(topic: Topic): boolean { return this.coalescer.isOutstanding(topic); }
  outstanding(): Topic[] { return this.coalescer.outstanding(); }
  lastRequestOf(topic: Topic): number | undefined { return this.lastRequestAt.get(topic); }
  lastDeliveryOf(topic: Topic): number | undefined { return this.lastDeliveredAt.get(topic); }

  setActiveView(view: ViewName): void {
    if (view === this.view) return;
    this.view = view;
    if (!this.channel.isOpen) return;
    this.restartTicks();
    const topic = VIEW_TOPIC[view];
    if (topic) this.request(topic);
  }

  setProcessLimit(limit: number): void {
    if (!Number.isInteger(limit) || limit < 1 || limit === this.limit) return;
    this.limit = limit;
    if (this.view === 'processes') this.request('processes');
  }

  isVisible(topic: Topic): boolean {
    return ALWAYS_VISIBLE.has(topic) || VIEW_TOPIC[this.view] === topic;
  }

  /**
   * Requests `topic` now. `force` skips the spacing window (used after a command
   * changed the host) but never the single-flight rule: a forced refresh of a
   * topic already in flight is issued as soon as that response lands.
   */
  request(topic: Topic, opts: { force?: boolean } = {}): RequestOutcome {
    const force = opts.force ?? false;
    if (!this.channel.isOpen) return 'disconnected';
    if (!this.isVisible(topic)) return 'hidden';
    if (this.coalescer.isOutstanding(topic)) {
      if (force) this.pendingForced.add(topic);
      return 'in_flight';
    }
    const now = this.now();
    const last = this.lastRequestAt.get(topic);
    if (!force && last !== undefined && now - last < this.opts.minSpacingMs[topic]) return 'spacing';

    const requestId = this.channel.nextRequestId();
    this.coalescer.tryAcquire(topic, requestId, now);
    this.lastRequestAt.set(topic, now);
    if (force) this.forcedIds.add(requestId);
    if (!this.channel.send(this.buildRequest(topic, requestId))) {
      this.coalescer.settle(topic, requestId);
      this.forcedIds.delete(requestId);
      return 'disconnected';
    }
    return 'sent';
  }

  /**
   * Settles the request a response answers and says whether the payload should
   * reach client-visible state. Responses for a view the operator has left still
   * clear the in-flight flag but are discarded.
   */
  handleResponse(topic: Topic, requestId: number): ResponseVerdict {
    if (!this.coalescer.settle(topic, requestId)) return 'unmatched';
    const forced = this.forcedIds.delete(requestId);
    const verdict = this.verdictFor(topic, forced);
    if (verdict === 'apply') this.lastDeliveredAt.set(topic, this.now());
    this.flushPendingForced(topic);
    return verdict;
  }

  /** A topic-scoped error ends the request just like a response would. */
  handleError(topic: Topic, requestId: number): boolean {
    if (!this.coalescer.settle(topic, requestId)) return false;
    this.forcedIds.delete(requestId);
    this.flushPendingForced(topic);
    return true;
  }

  onChannelOpen(): void {
    this.request('system_info');
    this.request('metrics');
    const topic = VIEW_TOPIC[this.view];
    if (topic) this.request(topic);
    this.restartTicks();
  }

  /** In-flight requests die with the channel; they are re-requested on reopen. */
  onChannelClosed(): void {
    this.stopTicks();
    this.coalescer.clear();
    this.forcedIds.clear();
    this.pendingForced.clear();
  }

  dispose(): void {
    this.onChannelClosed();
  }

  private tick(): void {
    const topic = VIEW_TOPIC[this.view];
    if (topic) this.request(topic);
    this.request('metrics');
  }

  private verdictFor(topic: Topic, forced: boolean): ResponseVerdict {
    if (!this.isVisible(topic)) return 'discard';
    const last = this.lastDeliveredAt.get(topic);
    if (!forced && last !== undefined && this.now() - last < this.opts.deliverySpacingMs[topic]) return 'discard';
    return 'apply';
  }

  private flushPendingForced(topic: Topic): void {
    if (!this.pendingForced.delete(topic)) return;
    this.request(topic, { force: true });
  }

  private restartTicks(): void {
    this.stopTicks();
    this.timer = setInterval(() => this.tick(), this.tickIntervalMs());
  }

  private stopTicks(): void {
    if (this.timer) clearInterval(this.timer);
    this.timer = undefined;
  }

  private buildRequest(topic: Topic, requestId: number): TopicRequest {
    switch (topic) {
      case 'system_info': return { type: 'get_system_info', requestId };
      case 'metrics': return { type: 'get_metrics', requestId };
      case 'processes': return { type: 'get_processes', requestId, limit: this.limit };
      case 'containers': return { type: 'get_containers', requestId };
      case 'network': return { type: 'get_network_stats', requestId };
    }
  }
}
