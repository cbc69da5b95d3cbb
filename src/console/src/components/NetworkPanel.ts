import type { NetworkSnapshot } from '../../../shared/protocol.js';
import { formatBytes } from '../format.js';

export function renderNetworkPanel(network: NetworkSnapshot | undefined): string {
  if (!network) return 'network=pending';
  const lines = [`sent=${formatBytes(network.totalBytesSent)} recv=${formatBytes(network.totalBytesRecv)}`];
  const byConnections = Object.entries(network.processNetwork).sort(([, a], [, b]) => b.connections - a.connections);
  for (const [pid, usage] of byConnections) lines.push(`- pid=${pid} connections=${usage.connections}`);
  return lines.join('\n');
}
