export class TaskNotStartedError extends Error {
  constructor(readonly reason?: unknown) {
    super("Task was not started: limiter signal aborted");
    this.name = "TaskNotStartedError";
    Object.setPrototypeOf(this, new.target.prototype);
  }
}

/**
 * Runs at most `concurrency` tasks at once. After `signal` aborts, queued tasks
 * reject with TaskNotStartedError instead of starting; running ones finish.
 *
 *   const limit = createLimiter(4, { signal });
 *   await Promise.allSettled(items.map((i) => limit(() => work(i))));
 */
export const createLimiter = (concurrency: number, opts: { signal?: AbortSignal } = {}) => {
  if (!Number.isInteger(concurrency) || concurrency < 1) {
    throw new Error("concurrency must be an integer >= 1");
  }

  let active = 0;
  const queue: Array<() => void> = [];

  const next = () => {
    if (active >= concurrency) return;
    const start = queue.shift();
    if (!start) return;
    active += 1;
    start();
  };

  return <T>(task: () => Promise<T>): Promise<T> =>
    new Promise<T>((resolve, reject) => {
      queue.push(() => {
        if (opts.signal?.aborted) {
          active -= 1;
          reject(new TaskNotStartedError(opts.signal.reason));
          next();
          return;
        }
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
};
