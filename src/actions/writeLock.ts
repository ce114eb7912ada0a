/**
 * In-process write lock.
 *
 * Every op passed to `run` executes alone, in submission order, and the next
 * one starts only after the previous promise settles. The ActionStore wraps
 * its whole read-modify-write cycle in one op, so two mutations can never
 * interleave and lose an update.
 */

type Task = () => Promise<void>;

export type WriteLock = {
  run<T>(op: () => Promise<T>): Promise<T>;
  idle(): Promise<void>;
};

export function createWriteLock(): WriteLock {
  const queue: Task[] = [];
  let draining = false;
  let waiters: Array<() => void> = [];

  async function drain() {
    if (draining) return;
    draining = true;
    while (queue.length > 0) {
      const task = queue.shift();
      if (task) await task();
    }
    draining = false;

    const done = waiters;
    waiters = [];
    for (const wake of done) wake();
  }

  function run<T>(op: () => Promise<T>): Promise<T> {
    return new Promise<T>((resolve, reject) => {
      queue.push(async () => {
        try {
          resolve(await op());
        } catch (err) {
          reject(err);
        }
      });
      // tasks settle their own promise, drain itself never rejects
      void drain();
    });
  }

  function idle(): Promise<void> {
    if (!draining && queue.length === 0) return Promise.resolve();
    return new Promise<void>((resolve) => {
      waiters.push(resolve);
    });
  }

  return { run, idle };
}
