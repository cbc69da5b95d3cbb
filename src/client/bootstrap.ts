import { getOrCreateClientId } from './client-id.js';
import { clientConfig } from './config.js';
import { MonitorClient, type MonitorClientOptions } from './monitor-client.js';

export type BootstrapOptions = Partial<Omit<MonitorClientOptions, 'url'>> & { serverUrl?: string };

export async function bootstrap(opts: BootstrapOptions = {}): Promise<MonitorClient> {
  const { serverUrl = clientConfig.serverUrl, ...rest } = opts;
  const clientId = rest.clientId ?? (await getOrCreateClientId(clientConfig.clientIdPath));
  const client = new MonitorClient({ ...rest, url: serverUrl, clientId });
  client.start();
  return client;
}
