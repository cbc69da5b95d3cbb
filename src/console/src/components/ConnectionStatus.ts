import type { SessionState } from '../../../client/channel-session.js';

const LABEL: Record<SessionState, string> = {
  open: 'connected',
  connecting: 'connecting',
  backoff: 'reconnecting',
  closed: 'disconnected'
};

export function renderConnectionStatus(state: SessionState, clientId: string): string {
  return `status=${LABEL[state]} client=${clientId}`;
}
