import 'dotenv/config';

const minute = 60 * 1000;

function envInt(key: string, fallback: number, min = 0): number {
  const raw = process.env[key];
  if (raw === undefined || raw === '') return fallback;
  const parsed = Number.parseInt(raw, 10);
  if (Number.isNaN(parsed) || parsed < min) {
    throw new Error(`Invalid value for ${key}: "${raw}" (expected integer >= ${min})`);
  }
  return parsed;
}

export const config = {
  port: envInt('PORT', 8787, 1),
  logLevel: process.env.LOG_LEVEL ?? 'info',
  session: {
    // offline client identities are forgotten after this long
    offlineClientTtlMs: envInt('HOSTPULSE_OFFLINE_CLIENT_TTL_MS', 30 * minute),
    gcIntervalMs: envInt('HOSTPULSE_GC_INTERVAL_MS', 10_000, 100)
  },
  host: {
    commandTimeoutMs: envInt('HOSTPULSE_COMMAND_TIMEOUT_MS', 15_000, 100),
    containerActionTimeoutMs: envInt('HOSTPULSE_CONTAINER_ACTION_TIMEOUT_MS', 30_000, 100),
    /** Shell command that stops managed application containers before a power action. */
    managedStopCommand: process.env.HOSTPULSE_MANAGED_STOP_CMD ?? '',
    managedStopSettleMs: envInt('HOSTPULSE_MANAGED_STOP_SETTLE_MS', 3_000)
  }
};

export type HostConfig = typeof config.host;
