/**
 * Bounded fan-out helpers.
 */

/**
 * Map over items in chunks of `limit`, awaiting each chunk before the
 * next. Results keep the input order.
 */
export async function mapInChunks<T, R>(
  items: readonly T[],
  limit: number,
  worker: (item: T, index: number) => Promise<R>
): Promise<R[]> {
  const size = Math.max(1, Math.floor(limit));
  const results: R[] = [];

  // Process in batches based on the limit
  for (let start = 0; start < items.length; start += size) {
    const batch = items.slice(start, start + size);
    const batchResults = await Promise.all(batch.map((item, i) => worker(item, start + i)));
    results.push(...batchResults);
  }

  return results;
}

/**
 * Run `task` with a signal that aborts after `timeoutMs` (or when the
 * parent signal aborts). The timer is always cleared.
 */
export async function withDeadline<T>(
  timeoutMs: number,
  task: (signal: AbortSignal) => Promise<T>,
  parent?: AbortSignal
): Promise<T> {
  const controller = new AbortController();
  const onParentAbort = (): void => controller.abort(parent?.reason);
  if (parent?.aborted) {
    controller.abort(parent.reason);
  } else {
    parent?.addEventListener('abort', onParentAbort, { once: true });
  }

  let timeoutId: NodeJS.Timeout | undefined;
  const timeoutPromise = new Promise<never>((_, reject) => {
    timeoutId = setTimeout(() => {
      const error = new Error(`timed out after ${timeoutMs}ms`);
      controller.abort(error);
      reject(error);
    }, timeoutMs);
  });

  try {
    return await Promise.race([task(controller.signal), timeoutPromise]);
  } finally {
    clearTimeout(timeoutId);
    parent?.removeEventListener('abort', onParentAbort);
  }
}
