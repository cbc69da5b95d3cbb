import { describe, expect, it } from 'vitest';
import { LogStreamController, appendLine } from '../../src/client/log-stream-controller.js';
import { FakeChannel } from '../helpers/fake-channel.js';

const reply = { clientId: 'c', containerId: 'web' };

describe('log-stream-controller', () => {
  it('appends lines with a single separator', () => {
    expect(appendLine('', 'a')).toBe('a');
    expect(appendLine('a', 'b')).toBe('a\nb');
    expect(appendLine('a\n', 'b')).toBe('a\nb');
  });

  it('ends a one-shot tail after the snapshot', () => {
    const ch = new FakeChannel();
    const logs = new LogStreamController(ch);
    logs.open('web', { tail: 50 });
    expect(ch.sent).toEqual([{ type: 'get_container_logs', requestId: 1, containerId: 'web', tail: 50, follow: false }]);
    logs.handle({ type: 'container_logs', requestId: 1, ...reply, logs: 'one\ntwo', tail: 50, follow: false });
    expect(logs.get('web')).toMatchObject({ state: 'inactive', buffer: 'one\ntwo', requestId: undefined });
    expect(logs.handle({ type: 'container_logs_update', requestId: 1, ...reply, logLine: 'late' })).toBe(false);
  });

  it('drops lines from a superseded follow', () => {
    const ch = new FakeChannel();
    const logs = new LogStreamController(ch);
    logs.open('web', { follow: true });
    logs.handle({ type: 'container_logs', requestId: 1, ...reply, logs: 'a', tail: 100, follow: true });
    logs.handle({ type: 'container_logs_update', requestId: 1, ...reply, logLine: 'b' });
    expect(logs.get('web')?.buffer).toBe('a\nb');

    logs.setTail('web', 10);
    expect(ch.last()).toEqual({ type: 'get_container_logs', requestId: 2, containerId: 'web', tail: 10, follow: true });
    expect(logs.handle({ type: 'container_logs_update', requestId: 1, ...reply, logLine: 'stale' })).toBe(false);
    logs.handle({ type: 'container_logs', requestId: 2, ...reply, logs: 'fresh', tail: 10, follow: true });
    logs.handle({ type: 'container_logs_update', requestId: 2, ...reply, logLine: 'next' });
    expect(logs.get('web')).toMatchObject({ state: 'active', buffer: 'fresh\nnext' });
  });

  it('replaces the buffer with the fresh fetch after a tail switch', () => {
    const ch = new FakeChannel();
    const logs = new LogStreamController(ch);
    logs.open('c1', { follow: true });
    const c1 = { clientId: 'c', containerId: 'c1' };
    logs.handle({ type: 'container_logs', requestId: 1, ...c1, logs: '', tail: 100, follow: true });
    logs.handle({ type: 'container_logs_update', requestId: 1, ...c1, logLine: 'first' });
    logs.handle({ type: 'container_logs_update', requestId: 1, ...c1, logLine: 'second' });
    logs.setTail('c1', 5);
    logs.handle({ type: 'container_logs_update', requestId: 1, ...c1, logLine: 'third' });
    logs.handle({ type: 'container_logs_update', requestId: 1, ...c1, logLine: 'fourth' });
    logs.handle({ type: 'container_logs', requestId: 2, ...c1, logs: 'tail of five', tail: 5, follow: true });
    expect(logs.get('c1')?.buffer).toBe('tail of five');
  });

  it('stops following and keeps the buffer', () => {
    const ch = new FakeChannel();
    const logs = new LogStreamController(ch);
    logs.open('web', { follow: true });
    logs.handle({ type: 'container_logs', requestId: 1, ...reply, logs: 'a', tail: 100, follow: true });
    logs.stop('web');
    expect(ch.last()).toEqual({ type: 'stop_container_logs', requestId: 2, containerId: 'web' });
    expect(logs.get('web')).toMatchObject({ state: 'inactive', buffer: 'a' });
    expect(logs.handle({ type: 'container_logs_update', requestId: 1, ...reply, logLine: 'b' })).toBe(false);
  });

  it('records option changes on an idle stream without sending', () => {
    const ch = new FakeChannel();
    const logs = new LogStreamController(ch);
    logs.open('web');
    logs.handle({ type: 'container_logs', requestId: 1, ...reply, logs: '', tail: 100, follow: false });
    logs.setFollow('web', true);
    expect(ch.sent).toHaveLength(1);
    expect(logs.get('web')?.follow).toBe(true);
  });

  it('moves to error on a host failure', () => {
    const logs = new LogStreamController(new FakeChannel());
    logs.open('web');
    logs.handle({ type: 'container_logs_error', requestId: 1, ...reply, error: 'No such container: web' });
    expect(logs.get('web')).toMatchObject({ state: 'error', error: 'No such container: web' });
  });

  it('ends a follow the server reports as finished', () => {
    const logs = new LogStreamController(new FakeChannel());
    logs.open('web', { follow: true });
    expect(logs.handle({ type: 'container_logs_end', requestId: 1, ...reply })).toBe(false);
    logs.handle({ type: 'container_logs', requestId: 1, ...reply, logs: 'a', tail: 100, follow: true });
    expect(logs.handle({ type: 'container_logs_end', requestId: 1, ...reply })).toBe(true);
    expect(logs.get('web')).toMatchObject({ state: 'inactive', requestId: undefined, buffer: 'a' });
    expect(logs.handle({ type: 'container_logs_update', requestId: 1, ...reply, logLine: 'late' })).toBe(false);
  });

  it('clears the buffer of a following stream and keeps appending', () => {
    const logs = new LogStreamController(new FakeChannel());
    logs.open('web', { follow: true });
    logs.handle({ type: 'container_logs', requestId: 1, ...reply, logs: 'a', tail: 100, follow: true });
    logs.handle({ type: 'container_logs_update', requestId: 1, ...reply, logLine: 'b' });
    logs.reset('web');
    expect(logs.get('web')).toMatchObject({ state: 'active', buffer: '', requestId: 1 });
    logs.handle({ type: 'container_logs_update', requestId: 1, ...reply, logLine: 'c' });
    logs.handle({ type: 'container_logs_update', requestId: 1, ...reply, logLine: 'd' });
    expect(logs.get('web')?.buffer).toBe('c\nd');
  });

  it('refuses an out-of-range tail without sending', () => {
    const ch = new FakeChannel();
    const logs = new LogStreamController(ch);
    expect(logs.open('web', { tail: 50_000 })).toBe(false);
    expect(ch.sent).toEqual([]);
    expect(logs.get('web')).toMatchObject({ state: 'error', tail: 100, error: 'tail: Number must be less than or equal to 10000' });
  });

  it('refuses a blank container id without sending', () => {
    const ch = new FakeChannel();
    const logs = new LogStreamController(ch);
    expect(logs.open('  ')).toBe(false);
    expect(ch.sent).toEqual([]);
    expect(logs.get('  ')).toMatchObject({ state: 'error', error: 'containerId: container id must not be empty' });
  });

  it('stops a live follow before recording a refused change', () => {
    const ch = new FakeChannel();
    const logs = new LogStreamController(ch);
    logs.open('web', { follow: true });
    logs.handle({ type: 'container_logs', requestId: 1, ...reply, logs: 'a', tail: 100, follow: true });
    expect(logs.setTail('web', -1)).toBe(false);
    expect(ch.last()).toEqual({ type: 'stop_container_logs', requestId: 2, containerId: 'web' });
    expect(logs.get('web')).toMatchObject({ state: 'error', tail: 100, buffer: 'a' });
  });

  it('moves to error when the server refuses the request', () => {
    const logs = new LogStreamController(new FakeChannel());
    logs.open('web');
    expect(logs.fail(1, 'Invalid get_container_logs request: tail: Expected number, received string')).toBe(true);
    expect(logs.get('web')).toMatchObject({
      state: 'error',
      requestId: undefined,
      error: 'Invalid get_container_logs request: tail: Expected number, received string'
    });
    expect(logs.fail(1, 'again')).toBe(false);
    expect(logs.fail(99, 'unknown')).toBe(false);
  });

  it('goes inactive when the channel drops', () => {
    const logs = new LogStreamController(new FakeChannel());
    logs.open('web', { follow: true });
    logs.handle({ type: 'container_logs', requestId: 1, ...reply, logs: 'a', tail: 100, follow: true });
    logs.onChannelClosed();
    expect(logs.get('web')).toMatchObject({ state: 'inactive', requestId: undefined, buffer: 'a' });
  });

  it('does not open while disconnected', () => {
    const ch = new FakeChannel();
    ch.isOpen = false;
    const logs = new LogStreamController(ch);
    expect(logs.open('web')).toBe(false);
    expect(logs.get('web')).toBeUndefined();
  });
});
