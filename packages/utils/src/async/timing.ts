/**
 * Wait for `ms` milliseconds
 *
 * Resolves early (without throwing) when the signal aborts, so loops can
 * check their own stop flag afterwards.
 */
export function sleep(ms: number, signal?: AbortSignal): Promise<void> {
  return new Promise((resolve) => {
    if (signal?.aborted) {
      resolve();
      return;
    }

    const onAbort = () => {
      clearTimeout(timer);
      resolve();
    };
    const timer = setTimeout(() => {
      signal?.removeEventListener('abort', onAbort);
      resolve();
    }, ms);

    signal?.addEventListener('abort', onAbort, { once: true });
  });
}

/**
 * Let other pending callbacks run before continuing
 */
export function yieldToEventLoop(): Promise<void> {
  return new Promise((resolve) => setImmediate(resolve));
}

/**
 * Wait for the first of several tasks to settle, without throwing
 *
 * Resolves with the winner's index and settled result. The remaining tasks
 * keep running; callers cancel and await them as needed.
 */
export function firstSettled<T>(
  tasks: ReadonlyArray<Promise<T>>
): Promise<{ index: number; result: PromiseSettledResult<T> }> {
  return Promise.race(
    tasks.map((task, index) =>
      task.then(
        (value) => ({ index, result: { status: 'fulfilled', value } as const }),
        (reason: unknown) => ({ index, result: { status: 'rejected', reason } as const })
      )
    )
  );
}
