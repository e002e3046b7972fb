import { describe, expect, it } from 'vitest';
import { InternalError } from '../../../src/runner/errors.js';
import { WorkerPool } from '../../../src/runner/worker-pool.js';
import { delay } from '../../support/fake-transport.js';

async function collect<T, R>(iterable: AsyncIterable<{ item: T; value: R }>): Promise<Array<{ item: T; value: R }>> {
  const results: Array<{ item: T; value: R }> = [];
  for await (const result of iterable) {
    results.push(result);
  }
  return results;
}

describe('WorkerPool', () => {
  it('never runs more than maxConcurrency workers at once', async () => {
    const pool = new WorkerPool(2);
    const events: string[] = [];
    let active = 0;
    let peak = 0;

    const results = await collect(pool.run([1, 2, 3, 4, 5], async n => {
      active++;
      peak = Math.max(peak, active);
      events.push(`start:${n}`);
      await delay(15);
      events.push(`stop:${n}`);
      active--;
      return n * 10;
    }));

    expect(peak).toBe(2);
    expect(results.map(r => r.value).sort((a, b) => a - b)).toEqual([10, 20, 30, 40, 50]);
    // The third item starts only after one of the first two stopped.
    const thirdStart = events.indexOf('start:3');
    const firstStop = events.findIndex(e => e.startsWith('stop:'));
    expect(firstStop).toBeGreaterThanOrEqual(0);
    expect(firstStop).toBeLessThan(thirdStart);
    expect(events.slice(0, 2)).toEqual(['start:1', 'start:2']);
  });

  it('starts everything at once when there are fewer items than slots', async () => {
    const pool = new WorkerPool(8);
    const started: number[] = [];
    const gate = delay(10);

    const results = collect(pool.run([1, 2, 3], async n => {
      started.push(n);
      await gate;
      return n;
    }));

    expect(started).toEqual([1, 2, 3]);
    expect(await results).toHaveLength(3);
  });

  it('yields results in completion order', async () => {
    const pool = new WorkerPool(3);
    const results = await collect(pool.run([30, 10, 20], async ms => {
      await delay(ms);
      return ms;
    }));
    expect(results.map(r => r.item)).toEqual([10, 20, 30]);
  });

  it('completes immediately with no items', async () => {
    expect(await collect(new WorkerPool().run([], async () => 1))).toEqual([]);
  });

  it('stops scheduling after a worker rejects and rethrows once in-flight work settles', async () => {
    const pool = new WorkerPool(1);
    const started: number[] = [];

    await expect(collect(pool.run([1, 2, 3], async n => {
      started.push(n);
      if (n === 1) {
        throw new InternalError('boom');
      }
      return n;
    }))).rejects.toThrow('boom');
    expect(started).toEqual([1]);
  });

  it('rejects invalid concurrency', () => {
    expect(() => new WorkerPool(0)).toThrow(InternalError);
    expect(() => new WorkerPool(2.5)).toThrow(InternalError);
  });

  it('defaults to eight slots', () => {
    expect(new WorkerPool().maxConcurrency).toBe(8);
  });
});
