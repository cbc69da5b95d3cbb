import type { z } from 'zod';
import { containerActionSchema, containerIdSchema, pidSchema, powerActionSchema } from '../shared/protocol-schema.js';
import type { ClientMessage, CommandKind, CommandRequest, CommandResultMessage, Topic } from '../shared/protocol.js';
import { RequestCoalescer } from './request-coalescer.js';

export interface Notification {
  level: 'success' | 'error' | 'info';
  title: string;
  message: string;
}

export type CommandOutcome =
  | { ok: true; requestId: number }
  | { ok: false; reason: 'validation' | 'busy' | 'disconnected'; message: string };

export interface CommandChannel {
  readonly isOpen: boolean;
  send(message: ClientMessage): boolean;
  nextRequestId(): number;
}

export interface CommandHooks {
  /** Forced refresh of the topic a successful command changed. */
  refresh(topic: Topic): void;
  notify(notification: Notification): void;
  now?: () => number;
}

const RESULT_KIND: Record<CommandResultMessage['type'], CommandKind> = {
  process_kill_result: 'kill_process',
  container_action_result: 'container_action',
  power_action_result: 'power_action'
};

const AFFECTED_TOPIC: Record<CommandKind, Topic | undefined> = {
  kill_process: 'processes',
  container_action: 'containers',
  power_action: undefined
};

function firstIssue(error: z.ZodError): string {
  return error.issues[0]?.message ?? 'invalid value';
}

/**
 * Client half of command dispatch. Targets are validated before anything is
 * sent, and at most one command of each kind may be outstanding, so a result
 * can always be matched to the request it answers.
 */
export class CommandTracker {
  private readonly coalescer = new RequestCoalescer<CommandKind>();
  private readonly now: () => number;

  constructor(private readonly channel: CommandChannel, private readonly hooks: CommandHooks) {
    this.now = hooks.now ?? Date.now;
  }

  isBusy(kind: CommandKind): boolean { return this.coalescer.isOutstanding(kind); }

  killProcess(pid: number): CommandOutcome {
    const parsed = pidSchema.safeParse(pid);
    if (!parsed.success) return this.invalid('Kill process', firstIssue(parsed.error));
    return this.issue('kill_process', (requestId) => ({ type: 'kill_process', requestId, pid: parsed.data }));
  }

  containerAction(containerId: string, action: string): CommandOutcome {
    const id = containerIdSchema.safeParse(containerId);
    if (!id.success) return this.invalid('Container action', firstIssue(id.error));
    const act = containerActionSchema.safeParse(action);
    if (!act.success) return this.invalid('Container action', `unknown action "${action}"`);
    return this.issue('container_action', (requestId) => ({ type: 'container_action', requestId, containerId: id.data, action: act.data }));
  }

  powerAction(action: string): CommandOutcome {
    const act = powerActionSchema.safeParse(action);
    if (!act.success) return this.invalid('Power action', `unknown action "${action}"`);
    return this.issue('power_action', (requestId) => ({ type: 'power_action', requestId, action: act.data }));
  }

  handleResult(msg: CommandResultMessage): boolean {
    const kind = RESULT_KIND[msg.type];
    if (this.coalescer.requestIdOf(kind) !== msg.requestId) return false;

    if (msg.type === 'container_action_result' && msg.status === 'in_progress') {
      this.hooks.notify({ level: 'info', title: 'In progress', message: msg.message });
      return true;
    }
    this.coalescer.settle(kind, msg.requestId);

    const success = msg.type === 'container_action_result' ? msg.status === 'success' : msg.success;
    this.hooks.notify({ level: success ? 'success' : 'error', title: success ? 'Success' : 'Error', message: msg.message });
    const topic = AFFECTED_TOPIC[kind];
    if (success && topic) this.hooks.refresh(topic);
    return true;
  }

  /** A generic error frame answering a command releases its kind. */
  handleError(kind: CommandKind, requestId: number): boolean {
    return this.coalescer.settle(kind, requestId);
  }

  onChannelClosed(): void {
    this.coalescer.clear();
  }

  private issue(kind: CommandKind, build: (requestId: number) => CommandRequest): CommandOutcome {
    if (!this.channel.isOpen) return { ok: false, reason: 'disconnected', message: 'Not connected' };
    if (this.coalescer.isOutstanding(kind)) {
      return { ok: false, reason: 'busy', message: `A ${kind.replace('_', ' ')} command is still running` };
    }
    const requestId = this.channel.nextRequestId();
    this.coalescer.tryAcquire(kind, requestId, this.now());
    if (!this.channel.send(build(requestId))) {
      this.coalescer.settle(kind, requestId);
      return { ok: false, reason: 'disconnected', message: 'Not connected' };
    }
    return { ok: true, requestId };
  }

  private invalid(title: string, message: string): CommandOutcome {
    this.hooks.notify({ level: 'error', title, message });
    return { ok: false, reason: 'validation', message };
  }
}
