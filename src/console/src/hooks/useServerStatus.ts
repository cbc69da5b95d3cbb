import { z } from 'zod';
import type { ServerStatusView } from '../types.js';

const statusSchema = z.object({
  metrics: z.object({ clientsOnline: z.number(), wsConnections: z.number(), activeLogFollowers: z.number() })
});

const clientsSchema = z.object({
  clients: z.array(
    z.object({ clientId: z.string(), status: z.enum(['online', 'offline']), lastSeen: z.number(), reconnects: z.number() })
  )
});

export async function useServerStatus(baseUrl = 'http://localhost:8787/api'): Promise<ServerStatusView> {
  const [statusRes, clientsRes] = await Promise.all([
    fetch(`${baseUrl}/status`).then((r) => r.json()),
    fetch(`${baseUrl}/clients`).then((r) => r.json())
  ]);
  return {
    metrics: statusSchema.parse(statusRes).metrics,
    clients: clientsSchema.parse(clientsRes).clients
  };
}
