import type { ClientEnvelope } from '../../shared/protocol-schema.js';
import type { CommandKind, CommandRequest, CommandResultMessage } from '../../shared/protocol.js';
import { createLogger, errorMessage } from '../../shared/logger.js';
import type { Counters } from '../metrics/counters.js';
import type { HostActions } from '../telemetry/telemetry-source.js';

const log = createLogger('commands');

export type EmitResult = (msg: CommandResultMessage) => void;

function capitalize(s: string): string {
  return s.charAt(0).toUpperCase() + s.slice(1);
}

/**
 * Runs one-shot mutating actions against the host. Failures are relayed with the
 * collaborator's message untouched and are never retried: a repeated `shutdown`
 * is not harmless.
 */
export class CommandDispatcher {
  constructor(private readonly actions: HostActions, private readonly counters: Counters) {}

  async dispatch(req: CommandRequest, clientId: string, emit: EmitResult): Promise<void> {
    const reply = { requestId: req.requestId, clientId };
    log.info('command received', { kind: req.type, clientId, requestId: req.requestId });

    switch (req.type) {
      case 'kill_process': {
        try {
          const message = await this.actions.killProcess(req.pid);
          emit({ type: 'process_kill_result', ...reply, pid: req.pid, success: true, message });
        } catch (error) {
          this.counters.markCollaboratorFailure(req.type);
          emit({ type: 'process_kill_result', ...reply, pid: req.pid, success: false, message: errorMessage(error) });
        }
        return;
      }
      case 'container_action': {
        const base = { type: 'container_action_result', ...reply, containerId: req.containerId, action: req.action } as const;
        emit({ ...base, status: 'in_progress', message: `${capitalize(req.action)} requested...` });
        try {
          const message = await this.actions.containerAction(req.containerId, req.action);
          emit({ ...base, status: 'success', message });
        } catch (error) {
          this.counters.markCollaboratorFailure(req.type);
          emit({ ...base, status: 'error', message: errorMessage(error) });
        }
        return;
      }
      case 'power_action': {
        try {
          const message = await this.actions.powerAction(req.action);
          emit({ type: 'power_action_result', ...reply, action: req.action, success: true, message });
        } catch (error) {
          this.counters.markCollaboratorFailure(req.type);
          emit({ type: 'power_action_result', ...reply, action: req.action, success: false, message: errorMessage(error) });
        }
      }
    }
  }

  /** Result for a command whose target failed validation. The host is not contacted. */
  rejectInvalid(kind: CommandKind, envelope: ClientEnvelope, reason: string, clientId: string): CommandResultMessage {
    this.counters.validationFailureTotal += 1;
    const reply = { requestId: envelope.requestId ?? 0, clientId };
    switch (kind) {
      case 'kill_process':
        return { type: 'process_kill_result', ...reply, pid: envelope.pid, success: false, message: `Invalid kill request: ${reason}` };
      case 'container_action':
        return {
          type: 'container_action_result',
          ...reply,
          containerId: envelope.containerId,
          action: envelope.action,
          status: 'error',
          message: `Invalid container action: ${reason}`
        };
      case 'power_action':
        return { type: 'power_action_result', ...reply, action: envelope.action, success: false, message: `Invalid power action: ${reason}` };
    }
  }
}
