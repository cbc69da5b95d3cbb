import { renderClientList } from '../components/ClientList.js';
import { useServerStatus } from '../hooks/useServerStatus.js';

export async function renderServerDashboard(baseUrl?: string): Promise<string> {
  const { metrics, clients } = await useServerStatus(baseUrl);
  return [
    `clients_online=${metrics.clientsOnline}\nws_connections=${metrics.wsConnections}\nlog_followers=${metrics.activeLogFollowers}`,
    renderClientList(clients)
  ].join('\n\n');
}
