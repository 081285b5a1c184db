export type ConcurrencyLimiter = <T>(task: () => Promise<T>) => Promise<T>;

/**
 * Run at most `limit` tasks at once; the rest wait in FIFO order.
 * A finishing task hands its slot straight to the next waiter.
 */
export function createConcurrencyLimiter(limit: number): ConcurrencyLimiter {
  const max = Math.max(1, Math.floor(limit));
  let active = 0;
  const queue: Array<() => void> = [];

  const release = () => {
    const next = queue.shift();
    if (next) {
      next();
    } else {
      active -= 1;
    }
  };

  return async function runLimited<T>(task: () => Promise<T>): Promise<T> {
    if (active >= max) {
      await new Promise<void>((resolve) => queue.push(resolve));
    } else {
      active += 1;
    }
    try {
      return await task();
    } finally {
      release();
    }
  };
}
