import { describe, expect, it } from 'vitest';
import { CommandDispatcher } from '../../src/server/commands/command-dispatcher.js';
import { Counters } from '../../src/server/metrics/counters.js';
import type { CommandResultMessage } from '../../src/shared/protocol.js';
import { FakeHost } from '../helpers/fake-host.js';

function setup() {
  const host = new FakeHost();
  const counters = new Counters();
  const dispatcher = new CommandDispatcher(host, counters);
  const out: CommandResultMessage[] = [];
  return { host, counters, dispatcher, out, emit: (m: CommandResultMessage) => { out.push(m); } };
}

describe('command-dispatcher', () => {
  it('reports a kill result', async () => {
    const { dispatcher, out, emit } = setup();
    await dispatcher.dispatch({ type: 'kill_process', requestId: 3, pid: 42 }, 'client-a', emit);
    expect(out).toEqual([{ type: 'process_kill_result', requestId: 3, clientId: 'client-a', pid: 42, success: true, message: 'Process 42 terminated' }]);
  });

  it('announces a container action before its outcome', async () => {
    const { dispatcher, out, emit } = setup();
    await dispatcher.dispatch({ type: 'container_action', requestId: 4, containerId: 'web', action: 'restart' }, 'client-a', emit);
    expect(out.map((m) => (m.type === 'container_action_result' ? [m.status, m.message] : []))).toEqual([
      ['in_progress', 'Restart requested...'],
      ['success', 'Container restarted successfully']
    ]);
  });

  it('relays the collaborator message once, without retrying', async () => {
    const { host, counters, dispatcher, out, emit } = setup();
    host.failures.set('powerAction', new Error('shutdown: permission denied'));
    await dispatcher.dispatch({ type: 'power_action', requestId: 5, action: 'shutdown' }, 'client-a', emit);
    expect(out).toEqual([
      { type: 'power_action_result', requestId: 5, clientId: 'client-a', action: 'shutdown', success: false, message: 'shutdown: permission denied' }
    ]);
    expect(host.calls).toEqual(['powerAction:shutdown']);
    expect(counters.collaboratorFailureTotal).toEqual({ power_action: 1 });
  });

  it('builds a failed result for an invalid target', () => {
    const { counters, dispatcher } = setup();
    const msg = dispatcher.rejectInvalid('kill_process', { type: 'kill_process', requestId: 9, pid: 0, containerId: '', action: '' }, 'pid: pid must be a positive integer', 'client-a');
    expect(msg).toEqual({
      type: 'process_kill_result',
      requestId: 9,
      clientId: 'client-a',
      pid: 0,
      success: false,
      message: 'Invalid kill request: pid: pid must be a positive integer'
    });
    expect(counters.validationFailureTotal).toBe(1);
  });
});
