import type { ContainerEntry, ContainerStats } from '../../../shared/protocol.js';
import { formatBytes, formatPercent } from '../format.js';

export function renderContainerList(containers: ContainerEntry[]): string {
  if (containers.length === 0) return 'no containers';
  return containers.map((c) => `- [${c.status}] ${c.name} ${c.image} (${c.id})${c.ports ? ` ports=${c.ports}` : ''}`).join('\n');
}

export function renderContainerStats(s: ContainerStats): string {
  const env = s.envVars.length ? ` env=${s.envVars.join(',')}` : '';
  return `stats ${s.containerId} cpu=${formatPercent(s.cpuPercent)} mem=${formatBytes(s.memoryBytes)} (${formatPercent(s.memoryPercent)}) health=${s.healthStatus}${env}`;
}
