import { isCommandKind, type ClientEnvelope } from '../../shared/protocol-schema.js';
import type { ClientRequest, GetContainerLogsRequest, ServerMessage } from '../../shared/protocol.js';
import { createLogger, errorMessage } from '../../shared/logger.js';
import type { CommandDispatcher } from '../commands/command-dispatcher.js';
import type { LogFollowers } from '../logs/log-followers.js';
import type { Counters } from '../metrics/counters.js';
import { collectTopic, type TelemetrySource } from '../telemetry/telemetry-source.js';
import type { ConnectionState } from '../types.js';
import { TaskLanes } from './task-lanes.js';

const log = createLogger('worker');

export interface WorkerDeps {
  telemetry: TelemetrySource;
  dispatcher: CommandDispatcher;
  logFollowers: LogFollowers;
  counters: Counters;
}

function laneOf(req: ClientRequest): string {
  switch (req.type) {
    case 'get_container_logs':
    case 'stop_container_logs':
      return `logs:${req.containerId}`;
    case 'kill_process':
    case 'container_action':
    case 'power_action':
      return `command:${req.type}`;
    default:
      return `topic:${req.type}`;
  }
}

/**
 * Serves the requests of one connection. Each request kind has its own lane, so
 * a slow container listing never holds back process or metrics responses, while
 * requests of the same kind are answered in arrival order.
 */
export class ChannelWorker {
  private readonly lanes = new TaskLanes((lane, error) => {
    log.error('lane task failed', { connId: this.conn.connId, lane, error: errorMessage(error) });
  });
  private closed = false;

  constructor(private readonly deps: WorkerDeps, private readonly conn: ConnectionState) {}

  private send(msg: ServerMessage): void {
    if (this.closed) return;
    this.conn.sendJson(msg);
  }

  handle(req: ClientRequest): Promise<void> {
    this.deps.counters.markRequest(req.type);
    return this.lanes.push(laneOf(req), () => this.run(req));
  }

  /** Answers a frame that failed validation, without touching the host. */
  handleInvalid(envelope: ClientEnvelope, reason: string): void {
    if (isCommandKind(envelope.type)) {
      this.send(this.deps.dispatcher.rejectInvalid(envelope.type, envelope, reason, this.conn.clientId));
      return;
    }
    this.deps.counters.malformedMessageTotal += 1;
    this.send({
      type: 'error',
      message: envelope.type ? `Invalid ${envelope.type} request: ${reason}` : `Unsupported message: ${reason}`,
      clientId: this.conn.clientId,
      ...(envelope.type ? { requestKind: envelope.type } : {}),
      ...(envelope.requestId !== undefined ? { requestId: envelope.requestId } : {})
    });
  }

  close(): void {
    this.closed = true;
    this.deps.logFollowers.stopAllForConnection(this.conn.connId);
  }

  idle(): Promise<void> { return this.lanes.idle(); }

  private async run(req: ClientRequest): Promise<void> {
    if (this.closed) return;
    switch (req.type) {
      case 'kill_process':
      case 'container_action':
      case 'power_action':
        await this.deps.dispatcher.dispatch(req, this.conn.clientId, (msg) => this.send(msg));
        return;
      case 'get_container_logs':
        await this.serveLogs(req);
        return;
      case 'stop_container_logs':
        this.deps.logFollowers.stop(this.conn.connId, req.containerId);
        return;
      default:
        try {
          this.send(await collectTopic(this.deps.telemetry, req, this.conn.clientId));
        } catch (error) {
          this.deps.counters.markCollaboratorFailure(req.type);
          this.send({
            type: 'error',
            message: `Failed to fetch ${req.type.replace(/^get_/, '').replace(/_/g, ' ')}: ${errorMessage(error)}`,
            requestId: req.requestId,
            requestKind: req.type,
            clientId: this.conn.clientId
          });
        }
    }
  }

  private async serveLogs(req: GetContainerLogsRequest): Promise<void> {
    const { connId, clientId } = this.conn;
    const { containerId, requestId } = req;
    const reply = { requestId, clientId, containerId };
    // a fresh request supersedes whatever was following this container
    this.deps.logFollowers.stop(connId, containerId);

    let logs: string;
    try {
      logs = await this.deps.telemetry.containerLogs(containerId, req.tail);
    } catch (error) {
      this.deps.counters.markCollaboratorFailure(req.type);
      this.send({ type: 'container_logs_error', ...reply, error: errorMessage(error) });
      return;
    }
    this.send({ type: 'container_logs', ...reply, logs, tail: req.tail, follow: req.follow });
    if (!req.follow || this.closed) return;

    const handle = this.deps.telemetry.followContainerLogs(containerId, {
      line: (logLine) => {
        if (this.deps.logFollowers.isCurrent(connId, containerId, requestId)) {
          this.send({ type: 'container_logs_update', ...reply, logLine });
        }
      },
      error: (error) => {
        if (!this.deps.logFollowers.isCurrent(connId, containerId, requestId)) return;
        this.deps.logFollowers.forget(connId, containerId, requestId);
        this.send({ type: 'container_logs_error', ...reply, error: error.message });
      },
      end: () => {
        if (!this.deps.logFollowers.isCurrent(connId, containerId, requestId)) return;
        this.deps.logFollowers.forget(connId, containerId, requestId);
        this.send({ type: 'container_logs_end', ...reply });
      }
    });
    this.deps.logFollowers.start(connId, containerId, requestId, handle);
  }
}
