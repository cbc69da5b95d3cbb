import { describe, expect, it } from 'vitest';
import { RequestCoalescer } from '../../src/client/request-coalescer.js';

describe('request-coalescer', () => {
  it('refuses a second request while one is outstanding', () => {
    const c = new RequestCoalescer<'a' | 'b'>();
    expect(c.tryAcquire('a', 1, 0)).toBe(true);
    expect(c.tryAcquire('a', 2, 10)).toBe(false);
    expect(c.tryAcquire('b', 3, 10)).toBe(true);
    expect(c.requestIdOf('a')).toBe(1);
    expect(c.outstanding()).toEqual(['a', 'b']);
  });

  it('ignores settles carrying a stale id', () => {
    const c = new RequestCoalescer<'a'>();
    c.tryAcquire('a', 5, 0);
    expect(c.settle('a', 4)).toBe(false);
    expect(c.isOutstanding('a')).toBe(true);
    expect(c.settle('a', 5)).toBe(true);
    expect(c.isOutstanding('a')).toBe(false);
    expect(c.tryAcquire('a', 6, 0)).toBe(true);
  });

  it('clear abandons everything', () => {
    const c = new RequestCoalescer<'a' | 'b'>();
    c.tryAcquire('a', 1, 0);
    c.tryAcquire('b', 2, 0);
    c.clear();
    expect(c.outstanding()).toEqual([]);
  });
});
