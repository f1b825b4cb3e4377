export type Limiter = {
  <T>(task: () => Promise<T>): Promise<T>;
  activeCount: () => number;
  pendingCount: () => number;
};

/**
 * In-process FIFO limiter bounding how many tasks run at once.
 *
 *   const limit = createLimiter(8);
 *   await Promise.allSettled(urls.map((url) => limit(() => fetchOne(url))));
 */
export const createLimiter = (concurrency: number): Limiter => {
  if (!Number.isInteger(concurrency) || concurrency < 1) {
    throw new Error("concurrency must be an integer >= 1");
  }

  let active = 0;
  const pending: Array<() => void> = [];

  const drain = () => {
    while (active < concurrency && pending.length > 0) {
      const start = pending.shift();
      if (!start) return;
      active += 1;
      start();
    }
  };

  const run = <T>(task: () => Promise<T>): Promise<T> =>
    new Promise<T>((resolve, reject) => {
      pending.push(() => {
        Promise.resolve()
          .then(task)
          .then(resolve, reject)
          .finally(() => {
            active -= 1;
            drain();
          });
      });
      drain();
    });

  return Object.assign(run, {
    activeCount: () => active,
    pendingCount: () => pending.length
  });
};
