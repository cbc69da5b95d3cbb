import { describe, expect, it } from 'vitest';
import { TaskLanes } from '../../src/server/session/task-lanes.js';

function gate() {
  let open: () => void = () => undefined;
  const promise = new Promise<void>((r) => { open = () => r(); });
  return { promise, open };
}

describe('task-lanes', () => {
  it('runs one key in order and other keys alongside', async () => {
    const order: string[] = [];
    const lanes = new TaskLanes(() => undefined);
    const slow = gate();
    void lanes.push('a', async () => {
      await slow.promise;
      order.push('a1');
    });
    void lanes.push('a', async () => {
      order.push('a2');
    });
    await lanes.push('b', async () => {
      order.push('b1');
    });
    expect(order).toEqual(['b1']);
    slow.open();
    await lanes.idle();
    expect(order).toEqual(['b1', 'a1', 'a2']);
    expect(lanes.size()).toBe(0);
  });

  it('reports a failed task and keeps the lane going', async () => {
    const errors: string[] = [];
    const lanes = new TaskLanes((key, error) => errors.push(`${key}:${error instanceof Error ? error.message : String(error)}`));
    let ran = false;
    await expect(lanes.push('a', async () => { throw new Error('boom'); })).resolves.toBeUndefined();
    await lanes.push('a', async () => { ran = true; });
    expect(errors).toEqual(['a:boom']);
    expect(ran).toBe(true);
  });
});
