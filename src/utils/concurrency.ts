/**
 * Bounded parallel execution.
 */

/**
 * Run `task(index)` for every index in `0..count-1`, at most `limit` at a time.
 *
 * The first failure aborts the signal handed to the remaining tasks, stops
 * new tasks from starting and is rethrown once the running ones settle.
 */
export async function runWithConcurrency(
  count: number,
  limit: number,
  task: (index: number, signal: AbortSignal) => Promise<void>,
  signal?: AbortSignal
): Promise<void> {
  const controller = new AbortController();
  const onAbort = (): void => controller.abort(signal?.reason);
  if (signal?.aborted) {
    controller.abort(signal.reason);
  } else {
    signal?.addEventListener('abort', onAbort, { once: true });
  }

  let next = 0;
  const state: { failure?: { error: unknown } } = {};

  const worker = async (): Promise<void> => {
    while (state.failure === undefined && next < count) {
      const index = next++;
      try {
        await task(index, controller.signal);
      } catch (error) {
        if (state.failure === undefined) {
          state.failure = { error };
          controller.abort(error);
        }
      }
    }
  };

  try {
    const workers = Array.from({ length: Math.max(1, Math.min(limit, count)) }, () => worker());
    await Promise.all(workers);
  } finally {
    signal?.removeEventListener('abort', onAbort);
  }

  if (state.failure !== undefined) {
    throw state.failure.error;
  }
}

/** Split `[offset, offset + length)` into ranges of at most `chunkSize` bytes */
export function splitRange(offset: number, length: number, chunkSize: number): { offset: number; length: number }[] {
  const ranges: { offset: number; length: number }[] = [];
  let start = offset;
  const end = offset + length;
  while (start < end) {
    const size = Math.min(chunkSize, end - start);
    ranges.push({ offset: start, length: size });
    start += size;
  }
  return ranges;
}
