import type { NetworkSnapshot, SystemInfo, SystemMetrics } from '../../../shared/protocol.js';
import { formatBytes, formatPercent, formatUptime } from '../format.js';

export function renderMetricsCards(info: SystemInfo | undefined, metrics: SystemMetrics | undefined, network?: NetworkSnapshot): string {
  const lines: string[] = [];
  if (info) lines.push(`host=${info.hostname} os=${info.os} kernel=${info.kernel} cpus=${info.cpuCount} uptime=${formatUptime(info.uptimeSeconds)}`);
  if (!metrics) {
    lines.push('metrics=pending');
    return lines.join('\n');
  }
  lines.push(`cpu=${formatPercent(metrics.cpuPercent)}`);
  lines.push(`memory=${formatBytes(metrics.memory.used)} / ${formatBytes(metrics.memory.total)}`);
  lines.push(`disk=${formatBytes(metrics.disk.used)} / ${formatBytes(metrics.disk.total)}`);
  if (network) lines.push(`net sent=${formatBytes(network.totalBytesSent)} recv=${formatBytes(network.totalBytesRecv)}`);
  return lines.join('\n');
}
