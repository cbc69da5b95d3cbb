import { spawn } from 'node:child_process';
import fs from 'node:fs/promises';
import os from 'node:os';
import readline from 'node:readline';
import { setTimeout as sleep } from 'node:timers/promises';
import type {
  ContainerAction,
  ContainerEntry,
  ContainerStats,
  NetworkSnapshot,
  PowerAction,
  ProcessEntry,
  SystemInfo,
  SystemMetrics
} from '../../shared/protocol.js';
import { createLogger, errorMessage } from '../../shared/logger.js';
import type { HostConfig } from '../config.js';
import {
  DOCKER_INSPECT_FORMAT,
  DOCKER_PS_FORMAT,
  DOCKER_STATS_FORMAT,
  parseDockerInspect,
  parseDockerPs,
  parseDockerStats,
  parseProcNetDev,
  parsePsOutput,
  parseSsProcesses,
  selectTopProcesses,
  type DockerInspectDetails
} from './parsers.js';
import { runCommand } from './run-command.js';
import type { HostActions, LogFollowHandle, LogFollowSink, TelemetrySource } from './telemetry-source.js';

const log = createLogger('host');

const KILL_GRACE_MS = 5_000;
const MAX_SCANNED_PROCESSES = 2000;

interface CpuSample { idle: number; total: number; }

function sampleCpu(): CpuSample {
  let idle = 0;
  let total = 0;
  for (const cpu of os.cpus()) {
    const t = cpu.times;
    idle += t.idle;
    total += t.user + t.nice + t.sys + t.irq + t.idle;
  }
  return { idle, total };
}

function isErrno(error: unknown): error is NodeJS.ErrnoException {
  return error instanceof Error && 'code' in error;
}

const PAST_TENSE: Record<ContainerAction, string> = { start: 'started', stop: 'stopped', restart: 'restarted' };

/** Reads the local host through `ps`, `docker`, `ss`, `/proc` and `node:os`. */
export class HostTelemetrySource implements TelemetrySource, HostActions {
  private lastCpu?: CpuSample;

  constructor(private readonly cfg: HostConfig) {}

  async systemInfo(): Promise<SystemInfo> {
    return {
      hostname: os.hostname(),
      os: `${os.type()} ${os.arch()}`,
      uptimeSeconds: Math.floor(os.uptime()),
      cpuCount: os.cpus().length,
      totalMemoryBytes: os.totalmem(),
      kernel: os.release()
    };
  }

  async metrics(): Promise<SystemMetrics> {
    let prev = this.lastCpu;
    if (!prev) {
      prev = sampleCpu();
      await sleep(100);
    }
    const cur = sampleCpu();
    this.lastCpu = cur;
    const totalDelta = cur.total - prev.total;
    const cpuPercent = totalDelta > 0 ? Math.round((1 - (cur.idle - prev.idle) / totalDelta) * 1000) / 10 : 0;

    const stat = await fs.statfs('/');
    const diskTotal = stat.blocks * stat.bsize;
    return {
      cpuPercent,
      memory: { total: os.totalmem(), used: os.totalmem() - os.freemem() },
      disk: { total: diskTotal, used: diskTotal - stat.bfree * stat.bsize }
    };
  }

  async processes(limit: number): Promise<ProcessEntry[]> {
    const stdout = await runCommand('ps', ['-eo', 'pid=,user=,pcpu=,rss=,args='], { timeoutMs: this.cfg.commandTimeoutMs });
    return selectTopProcesses(parsePsOutput(stdout).slice(0, MAX_SCANNED_PROCESSES), limit);
  }

  async containers(): Promise<ContainerEntry[]> {
    const stdout = await runCommand('docker', ['ps', '-a', '--format', DOCKER_PS_FORMAT], { timeoutMs: this.cfg.commandTimeoutMs, label: 'Docker ps' });
    return parseDockerPs(stdout);
  }

  async containerStats(containerId: string): Promise<ContainerStats> {
    const opts = { timeoutMs: this.cfg.commandTimeoutMs };
    const sample = parseDockerStats(await runCommand('docker', ['stats', '--no-stream', '--format', DOCKER_STATS_FORMAT, containerId], { ...opts, label: 'Docker stats' }));
    let details: DockerInspectDetails = { healthStatus: 'unknown', envVars: [] };
    try {
      details = parseDockerInspect(await runCommand('docker', ['inspect', '--format', DOCKER_INSPECT_FORMAT, containerId], { ...opts, label: 'Docker inspect' }));
    } catch (error) {
      log.debug('container inspect unavailable', { containerId, error: errorMessage(error) });
    }
    return { containerId, ...sample, ...details };
  }

  async network(): Promise<NetworkSnapshot> {
    const totals = parseProcNetDev(await fs.readFile('/proc/net/dev', 'utf8'));
    let processNetwork: NetworkSnapshot['processNetwork'] = {};
    try {
      processNetwork = parseSsProcesses(await runCommand('ss', ['-tunpH'], { timeoutMs: this.cfg.commandTimeoutMs }));
    } catch (error) {
      // per-process attribution is optional
      log.debug('per-process network attribution unavailable', { error: errorMessage(error) });
    }
    return { totalBytesSent: totals.bytesSent, totalBytesRecv: totals.bytesRecv, processNetwork };
  }

  containerLogs(containerId: string, tail: number): Promise<string> {
    return runCommand('docker', ['logs', '--tail', String(tail), containerId], { timeoutMs: this.cfg.commandTimeoutMs, label: 'Docker logs' });
  }

  followContainerLogs(containerId: string, sink: LogFollowSink): LogFollowHandle {
    const child = spawn('docker', ['logs', '--follow', '--tail', '0', containerId], { stdio: ['ignore', 'pipe', 'pipe'] });
    let stopped = false;
    for (const stream of [child.stdout, child.stderr]) {
      readline.createInterface({ input: stream }).on('line', (line) => {
        if (!stopped) sink.line(line);
      });
    }
    child.on('error', (error) => {
      if (stopped) return;
      stopped = true;
      sink.error(isErrno(error) && error.code === 'ENOENT' ? new Error('docker command not found') : error);
    });
    // 'close' waits for both pipes to drain
    child.on('close', (code) => {
      if (stopped) return;
      stopped = true;
      if (code === 0) sink.end();
      else sink.error(new Error(`Docker logs follow exited with code ${code ?? 'null'}`));
    });
    return {
      stop: () => {
        if (stopped) return;
        stopped = true;
        child.kill('SIGTERM');
      }
    };
  }

  async killProcess(pid: number): Promise<string> {
    try {
      process.kill(pid, 'SIGTERM');
    } catch (error) {
      if (isErrno(error) && error.code === 'ESRCH') throw new Error('Process not found');
      if (isErrno(error) && error.code === 'EPERM') throw new Error('Permission denied to kill process');
      throw new Error(`Failed to kill process: ${errorMessage(error)}`);
    }
    const deadline = Date.now() + KILL_GRACE_MS;
    while (Date.now() < deadline) {
      if (!isAlive(pid)) return `Process ${pid} terminated`;
      await sleep(100);
    }
    try {
      process.kill(pid, 'SIGKILL');
    } catch (error) {
      if (!isErrno(error) || error.code !== 'ESRCH') throw new Error(`Failed to kill process: ${errorMessage(error)}`);
    }
    return `Process ${pid} killed`;
  }

  async containerAction(containerId: string, action: ContainerAction): Promise<string> {
    await runCommand('docker', [action, containerId], { timeoutMs: this.cfg.containerActionTimeoutMs, label: `Docker ${action}` });
    return `Container ${PAST_TENSE[action]} successfully`;
  }

  async powerAction(action: PowerAction): Promise<string> {
    if (this.cfg.managedStopCommand) {
      try {
        await runCommand('sh', ['-c', this.cfg.managedStopCommand], { timeoutMs: this.cfg.containerActionTimeoutMs, label: 'Managed stop' });
        log.info('managed containers stopped');
      } catch (error) {
        log.warn('managed container stop failed, continuing', { error: errorMessage(error) });
      }
      await sleep(this.cfg.managedStopSettleMs);
    }
    const flag = action === 'reboot' ? '-r' : '-h';
    await runCommand('shutdown', [flag, '+0'], { timeoutMs: this.cfg.commandTimeoutMs, label: 'Shutdown' });
    return action === 'reboot' ? 'Managed containers stopped. System rebooting' : 'Managed containers stopped. System shutting down';
  }
}

function isAlive(pid: number): boolean {
  try {
    process.kill(pid, 0);
    return true;
  } catch {
    return false;
  }
}
