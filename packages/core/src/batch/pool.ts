import { InfrastructureError } from '@envforge/shared';

/**
 * Runs `work` over `items` with at most `concurrency` in flight, starting the
 * next item as soon as any finishes. Results keep input order.
 *
 * An InfrastructureError stops new items from starting; items already in
 * flight are awaited, then the error is rethrown. Any other error is treated
 * the same way, since `work` is expected to turn per-item failures into values.
 */
export async function runPool<T, R>(
  items: readonly T[],
  concurrency: number,
  work: (item: T, index: number) => Promise<R>,
): Promise<R[]> {
  const limit = Math.max(1, Math.floor(concurrency));
  const results = new Array<R>(items.length);
  const inFlight = new Map<number, Promise<void>>();
  let next = 0;
  let failure: { error: unknown } | undefined;

  const launch = (index: number) => {
    const task = work(items[index], index).then(
      (value) => {
        results[index] = value;
      },
      (error: unknown) => {
        // First error wins; an infrastructure error outranks any earlier one.
        const outranks =
          error instanceof InfrastructureError && !(failure?.error instanceof InfrastructureError);
        if (!failure || outranks) {
          failure = { error };
        }
      },
    );
    inFlight.set(
      index,
      task.finally(() => {
        inFlight.delete(index);
      }),
    );
  };

  while (next < items.length || inFlight.size > 0) {
    while (!failure && next < items.length && inFlight.size < limit) {
      launch(next);
      next += 1;
    }
    if (inFlight.size === 0) break;
    await Promise.race(inFlight.values());
  }

  if (failure) throw failure.error;
  return results;
}
