export type ConcurrencyLimiter = <T>(fn: () => Promise<T>) => Promise<T>;

/**
 * Cap the number of in-flight async tasks.
 *
 * Tasks beyond the limit wait in FIFO order and start as soon as a running task settles,
 * whether it resolved or rejected.
 *
 * @param concurrency - Maximum number of tasks running at once.
 * @returns Function that schedules a task under the limit and resolves with its result.
 */
export function limitConcurrency(concurrency: number): ConcurrencyLimiter {
  if (!Number.isInteger(concurrency) || concurrency < 1) {
    throw new RangeError('concurrency must be a positive integer');
  }

  let active = 0;
  const queue: Array<() => void> = [];

  const next = () => {
    if (active >= concurrency) return;
    const start = queue.shift();
    if (start) start();
  };

  return <T>(fn: () => Promise<T>): Promise<T> =>
    new Promise<T>((resolve, reject) => {
      queue.push(() => {
        active += 1;
        let running: Promise<T>;
        try {
          running = fn();
        } catch (error) {
          running = Promise.reject(error);
        }
        void running
          .then(resolve, reject)
          .finally(() => {
            active -= 1;
            next();
          });
      });
      next();
    });
}
