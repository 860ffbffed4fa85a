import { describe, it, expect } from 'vitest';
import { withConcurrency } from '../pool.js';

describe('withConcurrency', () => {
  it('processes every item with at most N in flight', async () => {
    let active = 0;
    let peak = 0;
    const done: number[] = [];

    await withConcurrency([1, 2, 3, 4, 5, 6], 2, async (n) => {
      active++;
      peak = Math.max(peak, active);
      await new Promise((r) => setTimeout(r, 5));
      done.push(n);
      active--;
    });

    expect(done.sort()).toEqual([1, 2, 3, 4, 5, 6]);
    expect(peak).toBe(2);
  });

  it('stops taking items once the signal aborts', async () => {
    const controller = new AbortController();
    const seen: number[] = [];

    await withConcurrency(
      [1, 2, 3, 4],
      1,
      async (n) => {
        seen.push(n);
        if (n === 2) controller.abort();
      },
      controller.signal,
    );

    expect(seen).toEqual([1, 2]);
  });

  it('handles an empty list', async () => {
    await expect(withConcurrency([], 3, async () => {})).resolves.toBeUndefined();
  });
});
