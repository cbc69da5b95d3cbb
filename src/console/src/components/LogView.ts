import type { LogStream } from '../../../client/log-stream-controller.js';

/** Shows the last `maxLines` lines of the buffer unless `full` is set. */
export function visibleLogText(buffer: string, maxLines: number, full = false): string {
  if (full) return buffer;
  return buffer.split('\n').slice(-maxLines).join('\n');
}

export function renderLogView(stream: LogStream, full = false): string {
  const head = `logs ${stream.containerId} [${stream.state}] tail=${stream.tail}${stream.follow ? ' follow' : ''}`;
  if (stream.state === 'error') return `${head}\nerror: ${stream.error ?? 'unknown error'}`;
  return `${head}\n${visibleLogText(stream.buffer, stream.tail, full)}`;
}
