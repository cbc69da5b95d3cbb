import { WebSocket } from 'ws';
import type { ServerMessage } from '../../shared/protocol.js';
import type { ConnectionState } from '../types.js';

/** The part of a `ws` socket a connection writes through. */
export interface JsonSocket {
  readonly readyState: number;
  send(data: string): void;
}

/** Live channels by connection id. Frames for a socket that is no longer open are dropped. */
export class ConnectionManager {
  private readonly connections = new Map<string, ConnectionState>();

  register(connId: string, clientId: string, socket: JsonSocket, now: number): ConnectionState {
    const conn: ConnectionState = {
      connId,
      clientId,
      connectedAt: now,
      sendJson: (payload: ServerMessage) => {
        if (socket.readyState !== WebSocket.OPEN) return false;
        socket.send(JSON.stringify(payload));
        return true;
      }
    };
    this.connections.set(connId, conn);
    return conn;
  }

  unregister(connId: string): ConnectionState | undefined {
    const conn = this.connections.get(connId);
    this.connections.delete(connId);
    return conn;
  }

  size(): number { return this.connections.size; }
}
