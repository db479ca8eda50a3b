/**
 * Promise-chained lock: callers of `runExclusive` run one at a time, in call
 * order. A rejected task releases the lock like a resolved one.
 */
export interface Mutex {
  runExclusive<T>(task: () => Promise<T>): Promise<T>;
  isLocked(): boolean;
}

export function createMutex(): Mutex {
  let tail: Promise<void> = Promise.resolve();
  let pending = 0;

  return {
    runExclusive<T>(task: () => Promise<T>): Promise<T> {
      pending++;
      const run = tail.then(task);
      tail = run.then(
        () => {
          pending--;
        },
        () => {
          pending--;
        }
      );
      return run;
    },
    isLocked: () => pending > 0,
  };
}
