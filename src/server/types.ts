import type { ServerMessage } from '../shared/protocol.js';

export type ClientStatus = 'online' | 'offline';

export type SendJson = (payload: ServerMessage) => boolean;

export interface ConnectionState {
  connId: string;
  clientId: string;
  connectedAt: number;
  sendJson: SendJson;
}

export interface ClientState {
  clientId: string;
  status: ClientStatus;
  lastSeen: number;
  connId?: string;
  connectedAt?: number;
  offlineSince?: number;
  /** Number of hellos seen for this identity after the first one. */
  reconnects: number;
}

export interface ServerMetrics {
  clientsOnline: number;
  wsConnections: number;
  activeLogFollowers: number;
}
