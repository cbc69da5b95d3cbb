export const PROTOCOL_VERSION = '1.0.0';

export type Topic = 'system_info' | 'metrics' | 'processes' | 'containers' | 'network';
export type ViewName = 'processes' | 'containers' | 'network' | 'overview';

export type CommandKind = 'kill_process' | 'container_action' | 'power_action';
export type ContainerAction = 'start' | 'stop' | 'restart';
export type PowerAction = 'reboot' | 'shutdown';
export type ContainerStatus = 'running' | 'stopped' | 'paused' | 'other';

export const TOPICS: readonly Topic[] = ['system_info', 'metrics', 'processes', 'containers', 'network'];
export const CONTAINER_ACTIONS: readonly ContainerAction[] = ['start', 'stop', 'restart'];
export const POWER_ACTIONS: readonly PowerAction[] = ['reboot', 'shutdown'];

export interface SystemInfo {
  hostname: string;
  os: string;
  uptimeSeconds: number;
  cpuCount: number;
  totalMemoryBytes: number;
  kernel: string;
}

export interface SystemMetrics {
  cpuPercent: number;
  memory: { total: number; used: number };
  disk: { total: number; used: number };
}

export interface ProcessEntry { pid: number; user: string; cmd: string; cpuPercent: number; memBytes: number; }

export interface ContainerEntry {
  id: string;
  name: string;
  image: string;
  status: ContainerStatus;
  ports: string;
  createdAt: string;
  fullStatus: string;
}

export interface ContainerStats {
  containerId: string;
  cpuPercent: number;
  memoryBytes: number;
  memoryPercent: number;
  healthStatus: string;
  /** Variable names only, at most five. */
  envVars: string[];
}

export interface ProcessNetworkUsage { connections: number; bytesSent: number; bytesRecv: number; }

export interface NetworkSnapshot {
  totalBytesSent: number;
  totalBytesRecv: number;
  /** Keyed by pid. Partial when the host cannot attribute traffic to a process. */
  processNetwork: Record<string, ProcessNetworkUsage>;
}

// client -> server

export interface HelloMessage { type: 'hello'; clientId: string; version: string; ts: number; }
export interface HeartbeatMessage { type: 'heartbeat'; clientId: string; ts: number; }

export interface GetSystemInfoRequest { type: 'get_system_info'; requestId: number; }
export interface GetMetricsRequest { type: 'get_metrics'; requestId: number; }
export interface GetProcessesRequest { type: 'get_processes'; requestId: number; limit: number; }
export interface GetContainersRequest { type: 'get_containers'; requestId: number; }
export interface GetNetworkStatsRequest { type: 'get_network_stats'; requestId: number; }

export type TopicRequest = GetSystemInfoRequest | GetMetricsRequest | GetProcessesRequest | GetContainersRequest | GetNetworkStatsRequest;

export interface KillProcessRequest { type: 'kill_process'; requestId: number; pid: number; }
export interface ContainerActionRequest { type: 'container_action'; requestId: number; containerId: string; action: ContainerAction; }
export interface PowerActionRequest { type: 'power_action'; requestId: number; action: PowerAction; }

export type CommandRequest = KillProcessRequest | ContainerActionRequest | PowerActionRequest;

export interface GetContainerLogsRequest { type: 'get_container_logs'; requestId: number; containerId: string; tail: number; follow: boolean; }
export interface StopContainerLogsRequest { type: 'stop_container_logs'; requestId: number; containerId: string; }

export type LogRequest = GetContainerLogsRequest | StopContainerLogsRequest;

export type ClientRequest = TopicRequest | CommandRequest | LogRequest;
export type ClientMessage = HelloMessage | HeartbeatMessage | ClientRequest;
export type ClientRequestKind = ClientRequest['type'];

// server -> client

interface Reply { requestId: number; clientId: string; }

export interface WelcomeMessage { type: 'welcome'; clientId: string; resumed: boolean; ts: number; }
export interface SystemInfoMessage extends Reply { type: 'system_info'; data: SystemInfo; }
export interface MetricsMessage extends Reply { type: 'metrics'; data: SystemMetrics; }
export interface ProcessesDataMessage extends Reply { type: 'processes_data'; data: ProcessEntry[]; }
export interface ContainersDataMessage extends Reply { type: 'containers_data'; data: ContainerEntry[]; }
export interface NetworkStatsMessage extends Reply { type: 'network_stats'; data: NetworkSnapshot; }

export type TopicResponse = SystemInfoMessage | MetricsMessage | ProcessesDataMessage | ContainersDataMessage | NetworkStatsMessage;

export interface ProcessKillResultMessage extends Reply { type: 'process_kill_result'; pid: number; success: boolean; message: string; }
export interface ContainerActionResultMessage extends Reply {
  type: 'container_action_result';
  containerId: string;
  action: string;
  status: 'in_progress' | 'success' | 'error';
  message: string;
}
export interface PowerActionResultMessage extends Reply { type: 'power_action_result'; action: string; success: boolean; message: string; }

export type CommandResultMessage = ProcessKillResultMessage | ContainerActionResultMessage | PowerActionResultMessage;

export interface ContainerLogsMessage extends Reply { type: 'container_logs'; containerId: string; logs: string; tail: number; follow: boolean; }
export interface ContainerLogsUpdateMessage extends Reply { type: 'container_logs_update'; containerId: string; logLine: string; }
export interface ContainerLogsErrorMessage extends Reply { type: 'container_logs_error'; containerId: string; error: string; }
/** The follower ended on its own, usually because the container stopped. */
export interface ContainerLogsEndMessage extends Reply { type: 'container_logs_end'; containerId: string; }

export type LogMessage = ContainerLogsMessage | ContainerLogsUpdateMessage | ContainerLogsErrorMessage | ContainerLogsEndMessage;

export interface ErrorMessage {
  type: 'error';
  message: string;
  requestId?: number;
  requestKind?: string;
  clientId?: string;
}

export type ServerMessage = WelcomeMessage | TopicResponse | CommandResultMessage | LogMessage | ErrorMessage;

export const TOPIC_REQUEST_KIND: Record<Topic, TopicRequest['type']> = {
  system_info: 'get_system_info',
  metrics: 'get_metrics',
  processes: 'get_processes',
  containers: 'get_containers',
  network: 'get_network_stats'
};

export const TOPIC_RESPONSE_KIND: Record<Topic, TopicResponse['type']> = {
  system_info: 'system_info',
  metrics: 'metrics',
  processes: 'processes_data',
  containers: 'containers_data',
  network: 'network_stats'
};

export function topicOfResponse(type: string): Topic | undefined {
  return TOPICS.find((t) => TOPIC_RESPONSE_KIND[t] === type);
}

export function topicOfRequestKind(kind: string): Topic | undefined {
  return TOPICS.find((t) => TOPIC_REQUEST_KIND[t] === kind);
}
