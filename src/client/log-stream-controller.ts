import { describeIssues, logTargetSchema } from '../shared/protocol-schema.js';
import type { ClientMessage, LogMessage } from '../shared/protocol.js';

export type LogStreamState = 'inactive' | 'requested' | 'active' | 'error';

export interface LogStream {
  containerId: string;
  tail: number;
  follow: boolean;
  state: LogStreamState;
  /** Full text received so far. Never trimmed here; views cap what they show. */
  buffer: string;
  requestId?: number;
  error?: string;
}

export interface LogChannel {
  readonly isOpen: boolean;
  send(message: ClientMessage): boolean;
  nextRequestId(): number;
}

export interface LogOptions { tail: number; follow: boolean; }

export const DEFAULT_LOG_OPTIONS: LogOptions = { tail: 100, follow: false };

export function appendLine(buffer: string, line: string): string {
  if (buffer === '' || buffer.endsWith('\n')) return buffer + line;
  return `${buffer}\n${line}`;
}

/**
 * Per-container log viewing on the shared channel.
 *
 *   inactive -> requested -> active -> inactive   (follow, until stopped or ended)
 *   inactive -> requested -> inactive             (one-shot tail)
 *   requested -> error                            (host failure)
 *
 * Every request opens a new generation. Frames carrying an older request id are
 * dropped, so lines from a superseded follow never leak into the new buffer.
 */
export class LogStreamController {
  private readonly streams = new Map<string, LogStream>();

  constructor(private readonly channel: LogChannel, private readonly onChange: (stream: LogStream) => void = () => undefined) {}

  get(containerId: string): LogStream | undefined { return this.streams.get(containerId); }
  list(): LogStream[] { return [...this.streams.values()]; }

  open(containerId: string, opts: Partial<LogOptions> = {}): boolean {
    const prev = this.streams.get(containerId);
    const tail = opts.tail ?? prev?.tail ?? DEFAULT_LOG_OPTIONS.tail;
    const follow = opts.follow ?? prev?.follow ?? DEFAULT_LOG_OPTIONS.follow;
    const target = logTargetSchema.safeParse({ containerId, tail });
    if (!target.success) {
      if (prev?.state === 'active' || prev?.state === 'requested') this.stop(containerId);
      const rejected: LogStream = {
        containerId,
        tail: prev?.tail ?? DEFAULT_LOG_OPTIONS.tail,
        follow,
        state: 'error',
        buffer: prev?.buffer ?? '',
        error: describeIssues(target.error)
      };
      this.streams.set(containerId, rejected);
      this.onChange(rejected);
      return false;
    }
    if (!this.channel.isOpen) return false;

    const requestId = this.channel.nextRequestId();
    const stream: LogStream = { containerId, tail, follow, state: 'requested', buffer: prev?.buffer ?? '', requestId };
    this.streams.set(containerId, stream);
    if (!this.channel.send({ type: 'get_container_logs', requestId, containerId, tail, follow })) {
      stream.state = 'inactive';
      stream.requestId = undefined;
      this.onChange(stream);
      return false;
    }
    this.onChange(stream);
    return true;
  }

  /** Tail and follow changes re-request while the stream is live, and are only recorded otherwise. */
  setTail(containerId: string, tail: number): boolean {
    return this.reopenWith(containerId, { tail });
  }

  setFollow(containerId: string, follow: boolean): boolean {
    return this.reopenWith(containerId, { follow });
  }

  /** Ends following. The buffer is kept. */
  stop(containerId: string): void {
    const s = this.streams.get(containerId);
    if (!s) return;
    const wasLive = s.state === 'active' || s.state === 'requested';
    s.state = 'inactive';
    s.requestId = undefined;
    if (wasLive && this.channel.isOpen) {
      this.channel.send({ type: 'stop_container_logs', requestId: this.channel.nextRequestId(), containerId });
    }
    this.onChange(s);
  }

  close(containerId: string): void {
    this.stop(containerId);
    this.streams.delete(containerId);
  }

  reset(containerId: string): void {
    const s = this.streams.get(containerId);
    if (!s) return;
    s.buffer = '';
    this.onChange(s);
  }

  /** Moves the stream opened by `requestId` to error when the server refused the request. */
  fail(requestId: number, message: string): boolean {
    for (const s of this.streams.values()) {
      if (s.requestId !== requestId) continue;
      s.state = 'error';
      s.error = message;
      s.requestId = undefined;
      this.onChange(s);
      return true;
    }
    return false;
  }

  handle(msg: LogMessage): boolean {
    const s = this.streams.get(msg.containerId);
    if (!s || s.requestId !== msg.requestId) return false;

    switch (msg.type) {
      case 'container_logs':
        if (s.state !== 'requested') return false;
        s.buffer = msg.logs;
        s.error = undefined;
        if (s.follow) {
          s.state = 'active';
        } else {
          s.state = 'inactive';
          s.requestId = undefined;
        }
        break;
      case 'container_logs_update':
        if (s.state !== 'active' || !s.follow) return false;
        s.buffer = appendLine(s.buffer, msg.logLine);
        break;
      case 'container_logs_error':
        s.state = 'error';
        s.error = msg.error;
        s.requestId = undefined;
        break;
      case 'container_logs_end':
        if (s.state !== 'active') return false;
        s.state = 'inactive';
        s.requestId = undefined;
        break;
    }
    this.onChange(s);
    return true;
  }

  /** Follow subscriptions do not survive the channel. */
  onChannelClosed(): void {
    for (const s of this.streams.values()) {
      if (s.state === 'inactive') continue;
      if (s.state !== 'error') s.state = 'inactive';
      s.requestId = undefined;
      this.onChange(s);
    }
  }

  private reopenWith(containerId: string, patch: Partial<LogOptions>): boolean {
    const s = this.streams.get(containerId);
    if (!s) return false;
    if (s.state === 'active' || s.state === 'requested') return this.open(containerId, { tail: s.tail, follow: s.follow, ...patch });
    if (patch.tail !== undefined) s.tail = patch.tail;
    if (patch.follow !== undefined) s.follow = patch.follow;
    this.onChange(s);
    return true;
  }
}
