import { describe, expect, it } from 'vitest';
import type { DashboardState } from '../../src/client/monitor-client.js';
import { renderConnectionStatus } from '../../src/console/src/components/ConnectionStatus.js';
import { renderContainerList } from '../../src/console/src/components/ContainerList.js';
import { renderLogView, visibleLogText } from '../../src/console/src/components/LogView.js';
import { renderMetricsCards } from '../../src/console/src/components/MetricsCards.js';
import { renderNetworkPanel } from '../../src/console/src/components/NetworkPanel.js';
import { renderProcessTable, sortProcesses, toggleSort } from '../../src/console/src/components/ProcessTable.js';
import { formatBytes, formatUptime } from '../../src/console/src/format.js';
import { renderMonitorDashboard } from '../../src/console/src/pages/MonitorDashboard.js';
import { sampleContainers, sampleInfo, sampleMetrics, sampleNetwork, sampleProcesses } from '../helpers/fake-host.js';

describe('dashboard metrics', () => {
  it('formats sizes and uptime', () => {
    expect(formatBytes(0)).toBe('0 B');
    expect(formatBytes(512)).toBe('512 B');
    expect(formatBytes(1536)).toBe('1.5 KB');
    expect(formatBytes(2 * 1024 ** 3)).toBe('2 GB');
    expect(formatUptime(90_061)).toBe('1d 1h 1m');
  });

  it('renders host cards', () => {
    expect(renderMetricsCards(sampleInfo, sampleMetrics, sampleNetwork).split('\n')).toEqual([
      'host=test-host os=Linux kernel=6.1.0-test cpus=4 uptime=1d 1h 1m',
      'cpu=12.5%',
      'memory=2 GB / 8 GB',
      'disk=40 GB / 100 GB',
      'net sent=1 KB recv=2 KB'
    ]);
    expect(renderMetricsCards(undefined, undefined)).toBe('metrics=pending');
  });

  it('sorts processes by the chosen column', () => {
    expect(sortProcesses(sampleProcesses, { field: 'cpuPercent', direction: 'desc' }).map((p) => p.pid)).toEqual([202, 101, 303]);
    expect(sortProcesses(sampleProcesses, { field: 'memBytes', direction: 'asc' }).map((p) => p.pid)).toEqual([202, 101, 303]);
    expect(sortProcesses(sampleProcesses, { field: 'pid', direction: 'desc' }).map((p) => p.pid)).toEqual([303, 202, 101]);
    expect(toggleSort({ field: 'cpuPercent', direction: 'desc' }, 'cpuPercent')).toEqual({ field: 'cpuPercent', direction: 'asc' });
    expect(toggleSort({ field: 'cpuPercent', direction: 'asc' }, 'pid')).toEqual({ field: 'pid', direction: 'desc' });
  });

  it('renders the process table with the sort marker', () => {
    const lines = renderProcessTable(sampleProcesses).split('\n');
    expect(lines[0]).toBe('PID\tUSER\tCPUv\tMEM\tCOMMAND');
    expect(lines[1]).toBe('202\tapp\t30.0%\t1 KB\tbeta --serve');
    expect(lines).toHaveLength(4);
  });

  it('renders containers and network usage', () => {
    expect(renderContainerList(sampleContainers)).toBe(
      '- [running] web nginx:latest (c0ffee) ports=0.0.0.0:80->80/tcp\n- [stopped] db postgres:16 (decaf0)'
    );
    expect(renderNetworkPanel(sampleNetwork)).toBe('sent=1 KB recv=2 KB\n- pid=101 connections=2');
  });

  it('caps the log view unless the full log is asked for', () => {
    expect(visibleLogText('a\nb\nc\nd', 2)).toBe('c\nd');
    expect(visibleLogText('a\nb\nc\nd', 2, true)).toBe('a\nb\nc\nd');
    expect(renderLogView({ containerId: 'web', tail: 100, follow: false, state: 'error', buffer: '', error: 'boom' })).toBe(
      'logs web [error] tail=100\nerror: boom'
    );
  });

  it('renders the dashboard for the active view', () => {
    const state: DashboardState = {
      clientId: 'client-a',
      connection: 'backoff',
      processes: sampleProcesses,
      containers: sampleContainers,
      activeView: 'containers',
      processLimit: 20,
      notifications: [{ level: 'error', title: 'Error', message: 'Not connected' }]
    };
    expect(renderConnectionStatus('backoff', 'client-a')).toBe('status=reconnecting client=client-a');
    expect(renderMonitorDashboard(state).split('\n\n')).toEqual([
      'status=reconnecting client=client-a',
      'metrics=pending',
      renderContainerList(sampleContainers),
      '[error] Error: Not connected'
    ]);
  });
});
