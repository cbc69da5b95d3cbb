import type { DashboardState } from '../../../client/monitor-client.js';
import type { LogStream } from '../../../client/log-stream-controller.js';
import { renderConnectionStatus } from '../components/ConnectionStatus.js';
import { renderContainerList } from '../components/ContainerList.js';
import { renderLogView } from '../components/LogView.js';
import { renderMetricsCards } from '../components/MetricsCards.js';
import { renderNetworkPanel } from '../components/NetworkPanel.js';
import { renderNotifications } from '../components/NotificationList.js';
import { renderProcessTable } from '../components/ProcessTable.js';
import type { ProcessSort } from '../types.js';

export interface DashboardViewOptions {
  sort?: ProcessSort;
  logs?: LogStream[];
  fullLogs?: boolean;
}

export function renderMonitorDashboard(state: DashboardState, opts: DashboardViewOptions = {}): string {
  const parts = [renderConnectionStatus(state.connection, state.clientId), renderMetricsCards(state.systemInfo, state.metrics, state.network)];
  switch (state.activeView) {
    case 'processes':
      parts.push(renderProcessTable(state.processes, opts.sort));
      break;
    case 'containers':
      parts.push(renderContainerList(state.containers));
      break;
    case 'network':
      parts.push(renderNetworkPanel(state.network));
      break;
    case 'overview':
      break;
  }
  for (const stream of opts.logs ?? []) parts.push(renderLogView(stream, opts.fullLogs));
  const notes = renderNotifications(state.notifications);
  if (notes) parts.push(notes);
  return parts.join('\n\n');
}
