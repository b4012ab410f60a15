export type PoolWorker<T, R> = (item: T, index: number, signal: AbortSignal) => Promise<R>;

/**
 * Maps items through an async worker with at most `limit` calls in flight.
 *
 * Results keep the order of `items`. The first failure stops scheduling,
 * aborts the signal handed to in-flight workers and is rethrown once they settle.
 */
export const mapWithConcurrency = async <T, R>(
  items: readonly T[],
  limit: number,
  worker: PoolWorker<T, R>,
  signal?: AbortSignal
): Promise<R[]> => {
  signal?.throwIfAborted();

  const controller = new AbortController();
  const forwardAbort = () => controller.abort(signal?.reason);
  signal?.addEventListener("abort", forwardAbort, { once: true });

  const results: R[] = new Array<R>(items.length);
  const state: { nextIndex: number; failure?: { error: unknown } } = { nextIndex: 0 };

  const runWorker = async (): Promise<void> => {
    while (!controller.signal.aborted) {
      const index = state.nextIndex;
      if (index >= items.length) {
        return;
      }
      state.nextIndex += 1;
      try {
        results[index] = await worker(items[index], index, controller.signal);
      } catch (error) {
        if (!state.failure && !controller.signal.aborted) {
          state.failure = { error };
          controller.abort(error);
        }
      }
    }
  };

  try {
    const workerCount = Math.max(1, Math.min(limit, items.length));
    await Promise.all(Array.from({ length: workerCount }, () => runWorker()));
  } finally {
    signal?.removeEventListener("abort", forwardAbort);
  }

  if (state.failure) {
    throw state.failure.error;
  }
  signal?.throwIfAborted();
  return results;
};
