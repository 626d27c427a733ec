/**
 * Concurrency Utility Tests
 */

import { describe, it, expect } from 'vitest';
import { processWithConcurrency } from '../../src/utils/concurrency.js';

function delay(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}

describe('processWithConcurrency', () => {
  it('returns results in input order', async () => {
    const results = await processWithConcurrency(
      [30, 5, 15, 1],
      async (ms, index) => {
        await delay(ms);
        return `${index}:${ms}`;
      },
      2
    );

    expect(results).toEqual(['0:30', '1:5', '2:15', '3:1']);
  });

  it('never exceeds the concurrency limit', async () => {
    let inFlight = 0;
    let maxInFlight = 0;

    await processWithConcurrency(
      Array.from({ length: 12 }, (_, i) => i),
      async () => {
        inFlight++;
        maxInFlight = Math.max(maxInFlight, inFlight);
        await delay(2);
        inFlight--;
      },
      3
    );

    expect(maxInFlight).toBe(3);
  });

  it('reports progress once per item', async () => {
    const progress: Array<[number, number]> = [];

    await processWithConcurrency(
      ['a', 'b', 'c'],
      async (item) => item,
      2,
      (completed, total) => progress.push([completed, total])
    );

    expect(progress).toEqual([
      [1, 3],
      [2, 3],
      [3, 3],
    ]);
  });

  it('treats a concurrency below one as one', async () => {
    const results = await processWithConcurrency([1, 2], async (n) => n * 2, 0);
    expect(results).toEqual([2, 4]);
  });

  it('returns an empty array for no items', async () => {
    expect(await processWithConcurrency([], async () => 1)).toEqual([]);
  });
});
