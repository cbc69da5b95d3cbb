import { containerStatsSchema, systemInfoSchema, systemMetricsSchema } from '../shared/protocol-schema.js';
import type { ContainerStats, PowerAction, SystemInfo, SystemMetrics } from '../shared/protocol.js';

export interface ActionResponse { status: 'ok' | 'error'; message: string; }

async function readActionResponse(res: Response): Promise<ActionResponse> {
  const body: unknown = await res.json().catch(() => ({}));
  const message = typeof body === 'object' && body !== null && 'message' in body && typeof body.message === 'string' ? body.message : `HTTP ${res.status}`;
  return { status: res.ok ? 'ok' : 'error', message };
}

async function getJson(url: string): Promise<unknown> {
  const res = await fetch(url);
  const body: unknown = await res.json();
  if (!res.ok) {
    const message = typeof body === 'object' && body !== null && 'message' in body && typeof body.message === 'string' ? body.message : `HTTP ${res.status}`;
    throw new Error(message);
  }
  return body;
}

/**
 * Power control over plain HTTP, so a reboot can still be requested while the
 * WebSocket channel is down.
 */
export async function requestPowerAction(baseUrl: string, action: PowerAction): Promise<ActionResponse> {
  return readActionResponse(await fetch(`${baseUrl}/power`, {
    method: 'POST',
    headers: { 'Content-Type': 'application/json' },
    body: JSON.stringify({ action })
  }));
}

export async function requestProcessKill(baseUrl: string, pid: number): Promise<ActionResponse> {
  return readActionResponse(await fetch(`${baseUrl}/processes/${pid}/kill`, { method: 'POST' }));
}

export async function fetchSystemSnapshot(baseUrl: string): Promise<{ info: SystemInfo; metrics: SystemMetrics }> {
  const [info, metrics] = await Promise.all([getJson(`${baseUrl}/system/info`), getJson(`${baseUrl}/system/metrics`)]);
  return { info: systemInfoSchema.parse(info), metrics: systemMetricsSchema.parse(metrics) };
}

export async function fetchContainerStats(baseUrl: string, containerId: string): Promise<ContainerStats> {
  return containerStatsSchema.parse(await getJson(`${baseUrl}/containers/${encodeURIComponent(containerId)}/stats`));
}
