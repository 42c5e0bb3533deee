export type Limiter = {
  <T>(task: () => Promise<T>): Promise<T>;
  readonly active: () => number;
  readonly pending: () => number;
};

/**
 * Runs at most `concurrency` tasks at a time; the rest wait in FIFO order.
 *   const limit = createLimiter(10);
 *   await Promise.allSettled(ids.map((id) => limit(() => fetchDetail(id))));
 */
export const createLimiter = (concurrency: number): Limiter => {
  if (!Number.isInteger(concurrency) || concurrency < 1) {
    throw new Error("concurrency must be an integer >= 1");
  }

  let active = 0;
  const queue: Array<() => void> = [];

  const next = () => {
    if (active >= concurrency) return;
    const fn = queue.shift();
    if (!fn) return;
    active += 1;
    fn();
  };

  const limit = <T>(task: () => Promise<T>): Promise<T> =>
    new Promise<T>((resolve, reject) => {
      queue.push(() => {
        let running: Promise<T>;
        try {
          running = task();
        } catch (err) {
          running = Promise.reject(err);
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

  return Object.assign(limit, {
    active: () => active,
    pending: () => queue.length
  });
};

export type ExclusiveGuard = <T>(critical: () => T | Promise<T>) => Promise<T>;

/**
 * A limiter of one: callers enter the critical section strictly one at a time.
 */
export const createExclusiveGuard = (): ExclusiveGuard => {
  const limit = createLimiter(1);
  return (critical) => limit(async () => critical());
};
