import logger from './logger';

/**
 * Small in-process task queue with bounded concurrency.
 *
 * @module threads
 */

export type Job = () => Promise<void>;

export interface AsyncQueue {
  /** Enqueue a job; it starts on a later tick. */
  push(job: Job): void;
  /** Jobs waiting to start (running jobs excluded). */
  size(): number;
  /** Resolves once nothing is queued or running. */
  drain(): Promise<void>;
}

/**
 * Create a queue that runs at most `concurrency` jobs at a time, in the
 * order they were pushed. A job that rejects is logged as a warning and
 * does not stop the queue.
 *
 * @param concurrency - Maximum number of jobs running at once.
 */
export function createQueue(concurrency = 1): AsyncQueue {
  const pending: Job[] = [];
  let running = 0;
  let idleWaiters: Array<() => void> = [];

  function notifyIdle() {
    if (running !== 0 || pending.length !== 0) return;
    const waiters = idleWaiters;
    idleWaiters = [];
    for (const resolve of waiters) resolve();
  }

  async function runNext(): Promise<void> {
    if (running >= concurrency) return;
    const job = pending.shift();
    if (!job) return;
    running++;
    try {
      await job();
    } catch (e) {
      logger.warn('Queue job failed: ' + (e instanceof Error ? e.message : String(e)));
    } finally {
      running--;
      process.nextTick(() => {
        void runNext();
        notifyIdle();
      });
    }
  }

  return {
    push(job: Job) {
      pending.push(job);
      process.nextTick(() => void runNext());
    },

    size() {
      return pending.length;
    },

    async drain() {
      if (running === 0 && pending.length === 0) return;
      return new Promise<void>(resolve => {
        idleWaiters.push(resolve);
      });
    },
  };
}
