import type {
  ContainerAction,
  ContainerEntry,
  ContainerStats,
  NetworkSnapshot,
  PowerAction,
  ProcessEntry,
  SystemInfo,
  SystemMetrics,
  TopicRequest,
  TopicResponse
} from '../../shared/protocol.js';

/** Handle for a running log follower. `stop` is idempotent. */
export interface LogFollowHandle { stop(): void; }

export interface LogFollowSink {
  line(text: string): void;
  error(error: Error): void;
  /** Clean exit without a stop request. */
  end(): void;
}

/** Read side of the host: one point-in-time snapshot per topic, plus container logs. */
export interface TelemetrySource {
  systemInfo(): Promise<SystemInfo>;
  metrics(): Promise<SystemMetrics>;
  processes(limit: number): Promise<ProcessEntry[]>;
  containers(): Promise<ContainerEntry[]>;
  containerStats(containerId: string): Promise<ContainerStats>;
  network(): Promise<NetworkSnapshot>;
  containerLogs(containerId: string, tail: number): Promise<string>;
  followContainerLogs(containerId: string, sink: LogFollowSink): LogFollowHandle;
}

/**
 * Mutating side of the host. Each call resolves to a human-readable outcome or
 * rejects with an error whose message is shown to the operator as is.
 */
export interface HostActions {
  killProcess(pid: number): Promise<string>;
  containerAction(containerId: string, action: ContainerAction): Promise<string>;
  powerAction(action: PowerAction): Promise<string>;
}

export async function collectTopic(source: TelemetrySource, request: TopicRequest, clientId: string): Promise<TopicResponse> {
  const reply = { requestId: request.requestId, clientId };
  switch (request.type) {
    case 'get_system_info':
      return { type: 'system_info', ...reply, data: await source.systemInfo() };
    case 'get_metrics':
      return { type: 'metrics', ...reply, data: await source.metrics() };
    case 'get_processes':
      return { type: 'processes_data', ...reply, data: await source.processes(request.limit) };
    case 'get_containers':
      return { type: 'containers_data', ...reply, data: await source.containers() };
    case 'get_network_stats':
      return { type: 'network_stats', ...reply, data: await source.network() };
  }
}
