import { describe, it, expect } from 'vitest';
import { InfrastructureError } from '@envforge/shared';
import { runPool } from './pool';

function deferred<T>() {
  let resolve: (value: T) => void = () => undefined;
  const promise = new Promise<T>((r) => {
    resolve = r;
  });
  return { promise, resolve };
}

const tick = () => new Promise((r) => setTimeout(r, 0));

describe('runPool', () => {
  it('returns results in input order', async () => {
    const delays = [30, 5, 15, 0];
    const results = await runPool(delays, 2, async (ms, i) => {
      await new Promise((r) => setTimeout(r, ms));
      return `item-${i}`;
    });
    expect(results).toEqual(['item-0', 'item-1', 'item-2', 'item-3']);
  });

  it('never exceeds the concurrency limit', async () => {
    let active = 0;
    let peak = 0;
    await runPool(Array.from({ length: 10 }, (_, i) => i), 3, async () => {
      active += 1;
      peak = Math.max(peak, active);
      await tick();
      active -= 1;
    });
    expect(peak).toBe(3);
  });

  it('starts the next item as soon as one finishes', async () => {
    const gates = [deferred<void>(), deferred<void>(), deferred<void>()];
    const started: number[] = [];
    const run = runPool([0, 1, 2], 2, async (i) => {
      started.push(i);
      await gates[i].promise;
    });

    await tick();
    expect(started).toEqual([0, 1]);
    gates[1].resolve();
    await tick();
    await tick();
    expect(started).toEqual([0, 1, 2]);
    gates[0].resolve();
    gates[2].resolve();
    await run;
  });

  it('stops scheduling after an infrastructure error and drains in-flight work', async () => {
    const started: number[] = [];
    const finished: number[] = [];
    const gate = deferred<void>();

    const run = runPool([0, 1, 2, 3], 2, async (i) => {
      started.push(i);
      if (i === 0) throw new InfrastructureError('docker daemon unreachable');
      await gate.promise;
      finished.push(i);
    });

    await tick();
    gate.resolve();
    await expect(run).rejects.toBeInstanceOf(InfrastructureError);
    expect(started).toEqual([0, 1]);
    expect(finished).toEqual([1]);
  });

  it('handles an empty input', async () => {
    expect(await runPool([], 4, async () => 1)).toEqual([]);
  });
});
