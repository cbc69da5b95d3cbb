import type { ServerClientView } from '../types.js';

export function renderClientList(clients: ServerClientView[]): string {
  return clients.map((c) => `- [${c.status}] ${c.clientId} reconnects=${c.reconnects} lastSeen=${new Date(c.lastSeen).toISOString()}`).join('\n');
}
