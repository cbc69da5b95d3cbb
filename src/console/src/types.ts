import type { ClientStatus, ServerMetrics } from '../../server/types.js';

export type ProcessSortField = 'cpuPercent' | 'memBytes' | 'pid';
export type SortDirection = 'asc' | 'desc';

export interface ProcessSort {
  field: ProcessSortField;
  direction: SortDirection;
}

export interface ServerClientView {
  clientId: string;
  status: ClientStatus;
  lastSeen: number;
  reconnects: number;
}

export interface ServerStatusView {
  metrics: ServerMetrics;
  clients: ServerClientView[];
}
