import { isCommandKind } from '../shared/protocol-schema.js';
import {
  topicOfRequestKind,
  topicOfResponse,
  type ContainerEntry,
  type NetworkSnapshot,
  type ProcessEntry,
  type ServerMessage,
  type SystemInfo,
  type SystemMetrics,
  type TopicResponse,
  type ViewName
} from '../shared/protocol.js';
import { ChannelSession, type SessionOptions, type SessionState } from './channel-session.js';
import { CommandTracker, type CommandOutcome, type Notification } from './command-tracker.js';
import { LogStreamController, type LogOptions, type LogStream } from './log-stream-controller.js';
import { TopicScheduler, type ScheduleOptions } from './topic-scheduler.js';

const MAX_NOTIFICATIONS = 20;

export interface DashboardState {
  clientId: string;
  connection: SessionState;
  /** Identity the server attached to the latest system_info. */
  systemInfoFor?: string;
  systemInfo?: SystemInfo;
  metrics?: SystemMetrics;
  processes: ProcessEntry[];
  containers: ContainerEntry[];
  network?: NetworkSnapshot;
  activeView: ViewName;
  processLimit: number;
  notifications: Notification[];
}

export interface MonitorClientOptions extends SessionOptions {
  schedule?: Partial<ScheduleOptions>;
  initialView?: ViewName;
}

export type DashboardListener = (state: DashboardState) => void;

/**
 * Client-side composition: one channel session feeding the scheduler, command
 * tracker and log controller, and the dashboard state they keep current.
 */
export class MonitorClient {
  readonly session: ChannelSession;
  readonly scheduler: TopicScheduler;
  readonly commands: CommandTracker;
  readonly logs: LogStreamController;
  private state: DashboardState;
  private readonly listeners = new Set<DashboardListener>();
  private readonly disposers: Array<() => void> = [];

  constructor(opts: MonitorClientOptions) {
    this.session = new ChannelSession(opts);
    this.scheduler = new TopicScheduler(this.session, opts.schedule, opts.initialView);
    this.commands = new CommandTracker(this.session, {
      refresh: (topic) => this.scheduler.request(topic, { force: true }),
      notify: (n) => this.notify(n)
    });
    this.logs = new LogStreamController(this.session, () => this.emit());
    this.state = {
      clientId: this.session.clientId,
      connection: this.session.state,
      processes: [],
      containers: [],
      activeView: this.scheduler.activeView,
      processLimit: this.scheduler.processLimit,
      notifications: []
    };

    this.disposers.push(
      this.session.onStateChange((s) => this.onSessionState(s)),
      this.session.subscribe((msg) => this.route(msg))
    );
  }

  start(): void { this.session.open(); }

  stop(): void {
    this.session.close();
    for (const d of this.disposers.splice(0)) d();
  }

  getState(): DashboardState { return this.state; }
  getLogStream(containerId: string): LogStream | undefined { return this.logs.get(containerId); }

  subscribe(listener: DashboardListener): () => void {
    this.listeners.add(listener);
    return () => this.listeners.delete(listener);
  }

  setActiveView(view: ViewName): void {
    this.scheduler.setActiveView(view);
    this.patch({ activeView: this.scheduler.activeView });
  }

  setProcessLimit(limit: number): void {
    this.scheduler.setProcessLimit(limit);
    this.patch({ processLimit: this.scheduler.processLimit });
  }

  killProcess(pid: number): CommandOutcome { return this.commands.killProcess(pid); }
  containerAction(containerId: string, action: string): CommandOutcome { return this.commands.containerAction(containerId, action); }
  powerAction(action: string): CommandOutcome { return this.commands.powerAction(action); }

  openLogs(containerId: string, opts?: Partial<LogOptions>): boolean {
    const before = this.logs.get(containerId);
    if (this.logs.open(containerId, opts)) return true;
    const rejected = this.logs.get(containerId);
    if (rejected && rejected !== before && rejected.state === 'error' && rejected.error) this.notify({ level: 'error', title: 'Invalid log request', message: rejected.error });
    return false;
  }
  stopLogs(containerId: string): void { this.logs.stop(containerId); }
  closeLogs(containerId: string): void { this.logs.close(containerId); }

  dismissNotifications(): void { this.patch({ notifications: [] }); }

  private onSessionState(s: SessionState): void {
    if (s === 'open') {
      this.patch({ connection: s });
      this.scheduler.onChannelOpen();
      return;
    }
    if (s === 'closed') {
      this.scheduler.onChannelClosed();
      this.commands.onChannelClosed();
      this.logs.onChannelClosed();
    }
    this.patch({ connection: s });
  }

  private route(msg: ServerMessage): void {
    switch (msg.type) {
      case 'welcome':
        return;
      case 'process_kill_result':
      case 'container_action_result':
      case 'power_action_result':
        this.commands.handleResult(msg);
        return;
      case 'container_logs':
      case 'container_logs_update':
      case 'container_logs_error':
      case 'container_logs_end':
        if (msg.type === 'container_logs_error' && this.logs.get(msg.containerId)?.requestId === msg.requestId) {
          this.notify({ level: 'error', title: 'Error', message: msg.error });
        }
        this.logs.handle(msg);
        return;
      case 'error':
        this.onError(msg.message, msg.requestKind, msg.requestId);
        return;
      default:
        this.onTopicResponse(msg);
    }
  }

  private onTopicResponse(msg: TopicResponse): void {
    const topic = topicOfResponse(msg.type);
    if (!topic || this.scheduler.handleResponse(topic, msg.requestId) !== 'apply') return;
    switch (msg.type) {
      case 'system_info':
        this.patch({ systemInfo: msg.data, systemInfoFor: msg.clientId });
        return;
      case 'metrics':
        this.patch({ metrics: msg.data });
        return;
      case 'processes_data':
        this.patch({ processes: msg.data });
        return;
      case 'containers_data':
        this.patch({ containers: msg.data });
        return;
      case 'network_stats':
        this.patch({ network: msg.data });
    }
  }

  private onError(message: string, requestKind?: string, requestId?: number): void {
    if (requestKind !== undefined && requestId !== undefined) {
      const topic = topicOfRequestKind(requestKind);
      if (topic) this.scheduler.handleError(topic, requestId);
      else if (isCommandKind(requestKind)) this.commands.handleError(requestKind, requestId);
      else if (requestKind === 'get_container_logs') this.logs.fail(requestId, message);
    }
    this.notify({ level: 'error', title: 'Error', message });
  }

  private notify(n: Notification): void {
    this.patch({ notifications: [...this.state.notifications, n].slice(-MAX_NOTIFICATIONS) });
  }

  private patch(p: Partial<DashboardState>): void {
    this.state = { ...this.state, ...p };
    this.emit();
  }

  private emit(): void {
    for (const l of this.listeners) l(this.state);
  }
}
