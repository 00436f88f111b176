/**
 * Bounded concurrency helpers.
 */

export interface Limiter {
  readonly limit: number;
  /** Tasks currently running */
  readonly active: number;
  run<T>(task: () => Promise<T>): Promise<T>;
}

/**
 * FIFO limiter. Callers that share one instance share its slots, so work
 * spread over several callers still never exceeds `concurrency`.
 */
export function createLimiter(concurrency: number): Limiter {
  const limit = Math.max(1, Math.floor(concurrency) || 1);
  const queue: Array<() => void> = [];
  let active = 0;

  const next = () => {
    if (active >= limit) return;
    const start = queue.shift();
    if (start) start();
  };

  return {
    limit,
    get active() {
      return active;
    },
    run<T>(task: () => Promise<T>): Promise<T> {
      return new Promise<T>((resolve, reject) => {
        queue.push(() => {
          active += 1;
          Promise.resolve()
            .then(task)
            .then(resolve, reject)
            .finally(() => {
              active -= 1;
              next();
            });
        });
        next();
      });
    },
  };
}

/**
 * Runs the worker over every item. A number bounds this call alone; a
 * limiter bounds it together with everything else that limiter runs.
 */
export async function runWithConcurrency<T>(
  items: readonly T[],
  worker: (item: T, index: number) => Promise<void>,
  concurrency: number | Limiter
): Promise<void> {
  const limiter = typeof concurrency === 'number' ? createLimiter(concurrency) : concurrency;
  await Promise.all(items.map((item, index) => limiter.run(() => worker(item, index))));
}
