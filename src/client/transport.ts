import WebSocket from 'ws';

export interface TransportHandlers {
  onOpen(): void;
  onMessage(data: string): void;
  onClose(code: number): void;
  onError(error: Error): void;
}

export interface ChannelTransport {
  send(data: string): void;
  close(code?: number, reason?: string): void;
}

export type TransportFactory = (url: string, handlers: TransportHandlers) => ChannelTransport;

export const wsTransport: TransportFactory = (url, handlers) => {
  const ws = new WebSocket(url);
  ws.on('open', () => handlers.onOpen());
  ws.on('message', (raw) => handlers.onMessage(raw.toString()));
  // ws always follows 'error' with 'close'
  ws.on('error', (error) => handlers.onError(error));
  ws.on('close', (code) => handlers.onClose(code));
  return {
    send: (data) => ws.send(data),
    close: (code, reason) => ws.close(code, reason)
  };
};
