import { describe, it, expect } from 'vitest';
import { mapWithConcurrency } from './concurrency';

const tick = () => new Promise<void>((resolve) => setImmediate(resolve));

describe('mapWithConcurrency', () => {
  it('preserves input order in the results', async () => {
    const delays = [3, 0, 2, 1];
    const results = await mapWithConcurrency(delays, 2, async (d, i) => {
      for (let k = 0; k < d; k++) await tick();
      return `item-${i}`;
    });
    expect(results).toEqual(['item-0', 'item-1', 'item-2', 'item-3']);
  });

  it('never exceeds the limit', async () => {
    let active = 0;
    let peak = 0;
    await mapWithConcurrency(Array.from({ length: 10 }, (_, i) => i), 3, async () => {
      active++;
      peak = Math.max(peak, active);
      await tick();
      active--;
    });
    expect(peak).toBe(3);
  });

  it('returns an empty array for no items', async () => {
    await expect(mapWithConcurrency([], 4, async () => 1)).resolves.toEqual([]);
  });

  it('rejects with the first error and starts no new work', async () => {
    const started: number[] = [];
    const run = mapWithConcurrency([0, 1, 2, 3, 4], 1, async (n) => {
      started.push(n);
      if (n === 1) throw new Error('stop');
      return n;
    });
    await expect(run).rejects.toThrow('stop');
    expect(started).toEqual([0, 1]);
  });

  it('rejects an invalid limit', async () => {
    await expect(mapWithConcurrency([1], 0, async (n) => n)).rejects.toThrow(RangeError);
  });
});
