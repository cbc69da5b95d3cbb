import { z } from 'zod';
import type { ClientMessage, CommandKind, ServerMessage } from './protocol.js';

export const MAX_PROCESS_LIMIT = 2000;
export const MAX_LOG_TAIL = 10_000;

const requestId = z.number().int().nonnegative();

export const containerActionSchema = z.enum(['start', 'stop', 'restart']);
export const powerActionSchema = z.enum(['reboot', 'shutdown']);

export const pidSchema = z.number({ invalid_type_error: 'pid must be a number' }).int('pid must be an integer').positive('pid must be a positive integer');
export const containerIdSchema = z.string({ invalid_type_error: 'container id must be a string' }).trim().min(1, 'container id must not be empty');
export const logTailSchema = z.number().int().min(0).max(MAX_LOG_TAIL);
export const logTargetSchema = z.object({ containerId: containerIdSchema, tail: logTailSchema });

export const helloSchema = z.object({ type: z.literal('hello'), clientId: z.string().min(1), version: z.string(), ts: z.number() });
const heartbeatSchema = z.object({ type: z.literal('heartbeat'), clientId: z.string(), ts: z.number() });

export const clientMessageSchema = z.discriminatedUnion('type', [
  helloSchema,
  heartbeatSchema,
  z.object({ type: z.literal('get_system_info'), requestId }),
  z.object({ type: z.literal('get_metrics'), requestId }),
  z.object({ type: z.literal('get_processes'), requestId, limit: z.number().int().min(1).max(MAX_PROCESS_LIMIT).default(20) }),
  z.object({ type: z.literal('get_containers'), requestId }),
  z.object({ type: z.literal('get_network_stats'), requestId }),
  z.object({ type: z.literal('kill_process'), requestId, pid: pidSchema }),
  z.object({ type: z.literal('container_action'), requestId, containerId: containerIdSchema, action: containerActionSchema }),
  z.object({ type: z.literal('power_action'), requestId, action: powerActionSchema }),
  z.object({
    type: z.literal('get_container_logs'),
    requestId,
    containerId: containerIdSchema,
    tail: logTailSchema.default(100),
    follow: z.boolean().default(false)
  }),
  z.object({ type: z.literal('stop_container_logs'), requestId, containerId: containerIdSchema })
]);

const envelopeSchema = z.object({
  type: z.string().catch(''),
  requestId: requestId.optional().catch(undefined),
  pid: z.number().catch(0),
  containerId: z.string().catch(''),
  action: z.string().catch('')
});

export type ClientEnvelope = z.infer<typeof envelopeSchema>;

export type ParsedClientMessage =
  | { ok: true; message: ClientMessage }
  | { ok: false; reason: string; envelope: ClientEnvelope };

const COMMAND_KINDS: readonly string[] = ['kill_process', 'container_action', 'power_action'] satisfies CommandKind[];

export function isCommandKind(kind: string): kind is CommandKind {
  return COMMAND_KINDS.includes(kind);
}

export function describeIssues(error: z.ZodError): string {
  return error.issues.map((i) => (i.path.length ? `${i.path.join('.')}: ${i.message}` : i.message)).join('; ');
}

export function parseClientMessage(raw: string): ParsedClientMessage {
  let json: unknown;
  try {
    json = JSON.parse(raw);
  } catch {
    return { ok: false, reason: 'message is not valid JSON', envelope: envelopeSchema.parse({}) };
  }
  // arrays and primitives carry no envelope
  const candidate = envelopeSchema.safeParse(json);
  const envelope = candidate.success ? candidate.data : envelopeSchema.parse({});
  const parsed = clientMessageSchema.safeParse(json);
  if (!parsed.success) {
    const reason = envelope.type ? describeIssues(parsed.error) : 'message type is missing';
    return { ok: false, reason, envelope };
  }
  return { ok: true, message: parsed.data };
}

// server -> client

const reply = { requestId, clientId: z.string() };

export const systemInfoSchema = z.object({
  hostname: z.string(),
  os: z.string(),
  uptimeSeconds: z.number(),
  cpuCount: z.number(),
  totalMemoryBytes: z.number(),
  kernel: z.string()
});

export const systemMetricsSchema = z.object({
  cpuPercent: z.number(),
  memory: z.object({ total: z.number(), used: z.number() }),
  disk: z.object({ total: z.number(), used: z.number() })
});

export const processEntrySchema = z.object({ pid: z.number(), user: z.string(), cmd: z.string(), cpuPercent: z.number(), memBytes: z.number() });

export const containerEntrySchema = z.object({
  id: z.string(),
  name: z.string(),
  image: z.string(),
  status: z.enum(['running', 'stopped', 'paused', 'other']),
  ports: z.string(),
  createdAt: z.string(),
  fullStatus: z.string()
});

export const containerStatsSchema = z.object({
  containerId: z.string(),
  cpuPercent: z.number(),
  memoryBytes: z.number(),
  memoryPercent: z.number(),
  healthStatus: z.string(),
  envVars: z.array(z.string())
});

export const networkSnapshotSchema = z.object({
  totalBytesSent: z.number(),
  totalBytesRecv: z.number(),
  processNetwork: z.record(z.object({ connections: z.number(), bytesSent: z.number(), bytesRecv: z.number() }))
});

export const serverMessageSchema = z.discriminatedUnion('type', [
  z.object({ type: z.literal('welcome'), clientId: z.string(), resumed: z.boolean(), ts: z.number() }),
  z.object({ type: z.literal('system_info'), ...reply, data: systemInfoSchema }),
  z.object({ type: z.literal('metrics'), ...reply, data: systemMetricsSchema }),
  z.object({ type: z.literal('processes_data'), ...reply, data: z.array(processEntrySchema) }),
  z.object({ type: z.literal('containers_data'), ...reply, data: z.array(containerEntrySchema) }),
  z.object({ type: z.literal('network_stats'), ...reply, data: networkSnapshotSchema }),
  z.object({ type: z.literal('process_kill_result'), ...reply, pid: z.number(), success: z.boolean(), message: z.string() }),
  z.object({
    type: z.literal('container_action_result'),
    ...reply,
    containerId: z.string(),
    action: z.string(),
    status: z.enum(['in_progress', 'success', 'error']),
    message: z.string()
  }),
  z.object({ type: z.literal('power_action_result'), ...reply, action: z.string(), success: z.boolean(), message: z.string() }),
  z.object({ type: z.literal('container_logs'), ...reply, containerId: z.string(), logs: z.string(), tail: z.number(), follow: z.boolean() }),
  z.object({ type: z.literal('container_logs_update'), ...reply, containerId: z.string(), logLine: z.string() }),
  z.object({ type: z.literal('container_logs_error'), ...reply, containerId: z.string(), error: z.string() }),
  z.object({ type: z.literal('container_logs_end'), ...reply, containerId: z.string() }),
  z.object({
    type: z.literal('error'),
    message: z.string(),
    requestId: requestId.optional(),
    requestKind: z.string().optional(),
    clientId: z.string().optional()
  })
]);

export function parseServerMessage(raw: string): ServerMessage | null {
  try {
    const parsed = serverMessageSchema.safeParse(JSON.parse(raw));
    return parsed.success ? parsed.data : null;
  } catch {
    return null;
  }
}
