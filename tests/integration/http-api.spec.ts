import { afterEach, beforeEach, describe, expect, it } from 'vitest';
import { fetchContainerStats, fetchSystemSnapshot, requestPowerAction, requestProcessKill } from '../../src/client/http-api.js';
import { renderContainerStats } from '../../src/console/src/components/ContainerList.js';
import { renderServerDashboard } from '../../src/console/src/pages/ServerDashboard.js';
import { sampleInfo, sampleMetrics, sampleStats } from '../helpers/fake-host.js';
import { startTestServer } from '../helpers/test-server.js';

type TestServer = Awaited<ReturnType<typeof startTestServer>>;

describe('http api', () => {
  let srv: TestServer;

  beforeEach(async () => {
    srv = await startTestServer();
  });

  afterEach(async () => {
    await srv.close();
  });

  it('requests a power action over http', async () => {
    expect(await requestPowerAction(srv.apiUrl, 'reboot')).toEqual({ status: 'ok', message: 'System reboot initiated' });
    srv.host.failures.set('powerAction', new Error('shutdown: permission denied'));
    expect(await requestPowerAction(srv.apiUrl, 'shutdown')).toEqual({ status: 'error', message: 'shutdown: permission denied' });
  });

  it('fetches a host snapshot', async () => {
    expect(await fetchSystemSnapshot(srv.apiUrl)).toEqual({ info: sampleInfo, metrics: sampleMetrics });
  });

  it('kills a process over http', async () => {
    expect(await requestProcessKill(srv.apiUrl, 202)).toEqual({ status: 'ok', message: 'Process 202 terminated' });
    srv.host.failures.set('killProcess', new Error('Permission denied to kill process'));
    expect(await requestProcessKill(srv.apiUrl, 1)).toEqual({ status: 'error', message: 'Permission denied to kill process' });
  });

  it('fetches and renders container stats', async () => {
    const stats = await fetchContainerStats(srv.apiUrl, 'c0ffee');
    expect(stats).toEqual({ containerId: 'c0ffee', ...sampleStats });
    expect(renderContainerStats(stats)).toBe('stats c0ffee cpu=1.5% mem=64 MB (3.2%) health=healthy env=PATH,NGINX_VERSION');

    srv.host.failures.set('containerStats', new Error('No such container: gone'));
    await expect(fetchContainerStats(srv.apiUrl, 'gone')).rejects.toThrow('Failed to fetch container stats: No such container: gone');
  });

  it('renders the server dashboard', async () => {
    srv.ctx.clientRegistry.markClientOnline('client-a', 'conn1', 0);
    expect(await renderServerDashboard(srv.apiUrl)).toBe(
      'clients_online=1\nws_connections=0\nlog_followers=0\n\n- [online] client-a reconnects=0 lastSeen=1970-01-01T00:00:00.000Z'
    );
  });
});
