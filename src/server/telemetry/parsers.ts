import type { ContainerEntry, ContainerStats, ContainerStatus, ProcessEntry, ProcessNetworkUsage } from '../../shared/protocol.js';

const MAX_CMD_LENGTH = 100;
const TOP_SLICE = 10;

/** Parses `ps -eo pid=,user=,pcpu=,rss=,args=` output. RSS is reported in KiB. */
export function parsePsOutput(stdout: string): ProcessEntry[] {
  const out: ProcessEntry[] = [];
  for (const line of stdout.split('\n')) {
    const m = /^\s*(\d+)\s+(\S+)\s+([\d.]+)\s+(\d+)\s+(.*)$/.exec(line);
    if (!m) continue;
    const cmd = m[5].trim();
    out.push({
      pid: Number(m[1]),
      user: m[2] || 'unknown',
      cpuPercent: Number(m[3]),
      memBytes: Number(m[4]) * 1024,
      cmd: cmd ? cmd.slice(0, MAX_CMD_LENGTH) : 'unknown'
    });
  }
  return out;
}

/**
 * Small limits get a mix of the heaviest CPU and memory consumers, so an idle
 * process holding a lot of memory still shows up. Larger limits are CPU-ordered.
 */
export function selectTopProcesses(all: ProcessEntry[], limit: number): ProcessEntry[] {
  const byCpu = [...all].sort((a, b) => b.cpuPercent - a.cpuPercent);
  if (limit > 20) return byCpu.slice(0, limit);

  const byMem = [...all].sort((a, b) => b.memBytes - a.memBytes);
  const seen = new Set<number>();
  const combined: ProcessEntry[] = [];
  for (const p of [...byCpu.slice(0, TOP_SLICE), ...byMem.slice(0, TOP_SLICE)]) {
    if (seen.has(p.pid)) continue;
    seen.add(p.pid);
    combined.push(p);
    if (combined.length >= limit) break;
  }
  return combined;
}

export const DOCKER_PS_FORMAT = '{{.ID}}\t{{.Names}}\t{{.Image}}\t{{.Status}}\t{{.Ports}}\t{{.CreatedAt}}';

export function containerStatusOf(fullStatus: string): ContainerStatus {
  if (/^Up\b/.test(fullStatus)) return /\(Paused\)/.test(fullStatus) ? 'paused' : 'running';
  if (/^Exited\b/.test(fullStatus)) return 'stopped';
  return 'other';
}

export function parseDockerPs(stdout: string): ContainerEntry[] {
  const out: ContainerEntry[] = [];
  for (const line of stdout.split('\n')) {
    if (!line.trim()) continue;
    const parts = line.split('\t');
    if (parts.length < 4) continue;
    const [id, name, image, fullStatus, ports = '', createdAt = ''] = parts;
    out.push({ id, name, image, status: containerStatusOf(fullStatus), ports, createdAt, fullStatus });
  }
  return out;
}

/** Sums receive/transmit byte counters of `/proc/net/dev`, loopback excluded. */
export function parseProcNetDev(text: string): { bytesRecv: number; bytesSent: number } {
  let bytesRecv = 0;
  let bytesSent = 0;
  for (const line of text.split('\n')) {
    const idx = line.indexOf(':');
    if (idx < 0) continue;
    const iface = line.slice(0, idx).trim();
    if (!iface || iface === 'lo') continue;
    const fields = line.slice(idx + 1).trim().split(/\s+/).map(Number);
    if (fields.length < 9 || fields.some(Number.isNaN)) continue;
    bytesRecv += fields[0];
    bytesSent += fields[8];
  }
  return { bytesRecv, bytesSent };
}

/**
 * Counts sockets per owning pid from `ss -tunpH`. `ss` cannot attribute byte
 * counters to processes, so those stay at zero.
 */
export function parseSsProcesses(stdout: string): Record<string, ProcessNetworkUsage> {
  const out: Record<string, ProcessNetworkUsage> = {};
  for (const line of stdout.split('\n')) {
    const pids = new Set<string>();
    for (const m of line.matchAll(/pid=(\d+)/g)) pids.add(m[1]);
    for (const pid of pids) {
      const usage = out[pid] ?? { connections: 0, bytesSent: 0, bytesRecv: 0 };
      usage.connections += 1;
      out[pid] = usage;
    }
  }
  return out;
}

export const DOCKER_STATS_FORMAT = '{{.CPUPerc}}\t{{.MemUsage}}\t{{.MemPerc}}';
export const DOCKER_INSPECT_FORMAT = '{{if .State.Health}}{{.State.Health.Status}}{{end}}{{println}}{{range .Config.Env}}{{println .}}{{end}}';

const MAX_ENV_VARS = 5;

const SIZE_UNITS: Record<string, number> = {
  B: 1,
  kB: 1e3,
  KB: 1e3,
  MB: 1e6,
  GB: 1e9,
  TB: 1e12,
  KiB: 1024,
  MiB: 1024 ** 2,
  GiB: 1024 ** 3,
  TiB: 1024 ** 4
};

/** Reads docker's human sizes ("12.5MiB", "1.2GB", "512B"). Unknown input is 0. */
export function parseByteSize(text: string): number {
  const m = /^([\d.]+)\s*([A-Za-z]*)$/.exec(text.trim());
  if (!m) return 0;
  const unit = SIZE_UNITS[m[2] || 'B'];
  const value = Number(m[1]);
  if (unit === undefined || Number.isNaN(value)) return 0;
  return Math.round(value * unit);
}

function parsePercent(text: string): number {
  const n = Number(text.trim().replace(/%$/, ''));
  return Number.isFinite(n) ? n : 0;
}

export type DockerStatsSample = Pick<ContainerStats, 'cpuPercent' | 'memoryBytes' | 'memoryPercent'>;

/** Parses one `docker stats --no-stream` row. "--" columns read as 0. */
export function parseDockerStats(stdout: string): DockerStatsSample {
  const line = stdout.split('\n').find((l) => l.trim());
  const parts = line?.split('\t') ?? [];
  if (parts.length < 3) throw new Error('No stats available for container');
  const [cpu, memUsage, memPercent] = parts;
  return {
    cpuPercent: parsePercent(cpu),
    memoryBytes: parseByteSize(memUsage.split(' / ')[0]),
    memoryPercent: parsePercent(memPercent)
  };
}

export type DockerInspectDetails = Pick<ContainerStats, 'healthStatus' | 'envVars'>;

/** First line is the health status (empty without a healthcheck), then one env entry per line. */
export function parseDockerInspect(stdout: string): DockerInspectDetails {
  const [health = '', ...env] = stdout.split('\n');
  const envVars = env
    .filter((l) => l.indexOf('=') > 0)
    .map((l) => l.slice(0, l.indexOf('=')))
    .slice(0, MAX_ENV_VARS);
  return { healthStatus: health.trim() || 'unknown', envVars };
}
