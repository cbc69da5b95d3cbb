#!/usr/bin/env node
import { parseArgs } from 'node:util';
import { z } from 'zod';
import { renderContainerStats } from '../console/src/components/ContainerList.js';
import { renderMonitorDashboard } from '../console/src/pages/MonitorDashboard.js';
import { renderServerDashboard } from '../console/src/pages/ServerDashboard.js';
import { createLogger, errorMessage, setLogLevel } from '../shared/logger.js';
import { bootstrap } from './bootstrap.js';
import { clientConfig } from './config.js';
import { fetchContainerStats, requestPowerAction, requestProcessKill } from './http-api.js';

const argsSchema = z.object({
  url: z.string().optional(),
  view: z.enum(['processes', 'containers', 'network', 'overview']).default('processes'),
  limit: z.coerce.number().int().positive().optional(),
  logs: z.string().optional(),
  follow: z.boolean().default(false),
  'full-logs': z.boolean().default(false),
  power: z.enum(['reboot', 'shutdown']).optional(),
  kill: z.coerce.number().int().positive().optional(),
  stats: z.string().optional(),
  'server-status': z.boolean().default(false)
});

async function main(): Promise<void> {
  setLogLevel(clientConfig.logLevel);
  const { values } = parseArgs({
    options: {
      url: { type: 'string' },
      view: { type: 'string' },
      limit: { type: 'string' },
      logs: { type: 'string' },
      follow: { type: 'boolean' },
      'full-logs': { type: 'boolean' },
      power: { type: 'string' },
      kill: { type: 'string' },
      stats: { type: 'string' },
      'server-status': { type: 'boolean' }
    }
  });
  const args = argsSchema.parse(values);

  // one-shot HTTP commands work without a channel
  if (args.power) {
    const res = await requestPowerAction(clientConfig.apiUrl, args.power);
    process.stdout.write(`${res.message}\n`);
    process.exitCode = res.status === 'ok' ? 0 : 1;
    return;
  }
  if (args.kill !== undefined) {
    const res = await requestProcessKill(clientConfig.apiUrl, args.kill);
    process.stdout.write(`${res.message}\n`);
    process.exitCode = res.status === 'ok' ? 0 : 1;
    return;
  }
  if (args.stats) {
    process.stdout.write(`${renderContainerStats(await fetchContainerStats(clientConfig.apiUrl, args.stats))}\n`);
    return;
  }
  if (args['server-status']) {
    process.stdout.write(`${await renderServerDashboard(clientConfig.apiUrl)}\n`);
    return;
  }
  const client = await bootstrap({ serverUrl: args.url, initialView: args.view });
  if (args.limit !== undefined) client.setProcessLimit(args.limit);

  const logsFor = args.logs;
  if (logsFor) {
    client.session.onStateChange((s) => {
      if (s === 'open') client.openLogs(logsFor, { follow: args.follow });
    });
  }

  const draw = () => {
    const stream = logsFor ? client.getLogStream(logsFor) : undefined;
    const text = renderMonitorDashboard(client.getState(), { logs: stream ? [stream] : [], fullLogs: args['full-logs'] });
    process.stdout.write(process.stdout.isTTY ? `\x1Bc${text}\n` : `${text}\n`);
  };
  client.subscribe(draw);

  for (const sig of ['SIGINT', 'SIGTERM'] as const) {
    process.on(sig, () => {
      client.stop();
      process.exit(0);
    });
  }
}

main().catch((error: unknown) => {
  createLogger('hostpulse-watch').error('failed to start', { error: errorMessage(error) });
  process.exit(1);
});
