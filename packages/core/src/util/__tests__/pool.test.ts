import { describe, it, expect } from 'vitest';
import { setTimeout as sleep } from 'node:timers/promises';

import { runWithConcurrency } from '../pool.js';

describe('runWithConcurrency', () => {
  it('never runs more than the limit at once', async () => {
    let active = 0;
    let peak = 0;
    const seen: number[] = [];
    await runWithConcurrency([1, 2, 3, 4, 5, 6, 7], 3, async (item) => {
      active++;
      peak = Math.max(peak, active);
      await sleep(5);
      seen.push(item);
      active--;
    });
    expect(peak).toBe(3);
    expect([...seen].sort()).toEqual([1, 2, 3, 4, 5, 6, 7]);
  });

  it('pulls lazily and hands out indices in order', async () => {
    const pulled: number[] = [];
    function* source(): Generator<string> {
      for (const value of ['a', 'b', 'c']) {
        pulled.push(pulled.length);
        yield value;
      }
    }
    const indices: Array<[string, number]> = [];
    await runWithConcurrency(source(), 1, async (item, index) => {
      indices.push([item, index]);
    });
    expect(indices).toEqual([
      ['a', 0],
      ['b', 1],
      ['c', 2],
    ]);
    expect(pulled).toEqual([0, 1, 2]);
  });

  it('stops pulling after a failure and rethrows it once running calls settle', async () => {
    const started: number[] = [];
    let settled = 0;
    const run = runWithConcurrency([1, 2, 3, 4, 5], 2, async (item) => {
      started.push(item);
      if (item === 1) throw new Error('first failed');
      await sleep(10);
      settled++;
    });
    await expect(run).rejects.toThrow('first failed');
    expect(started).toEqual([1, 2]);
    expect(settled).toBe(1);
  });

  it('treats a limit below one as one', async () => {
    const order: number[] = [];
    await runWithConcurrency([1, 2], 0, async (item) => {
      order.push(item);
    });
    expect(order).toEqual([1, 2]);
  });
});
