import type { Logger } from '../logger.js';

export type Task = () => void | Promise<void>;

/**
 * Cooperative FIFO task queue. Tasks run one at a time in submission order;
 * a task only starts after the previous one settled.
 * Bounded with load shedding: `schedule` returns false when full.
 */
export class TaskQueue {
  private readonly log: Logger;
  private readonly queue: Task[] = [];
  private readonly capacity: number;
  private running = false;
  private closed = false;
  private dropped = 0;
  private idleWaiters: Array<() => void> = [];

  constructor(log: Logger, capacity = 1024) {
    this.log = log;
    this.capacity = Math.max(1, capacity | 0);
  }

  schedule(task: Task): boolean {
    if (this.closed) return false;
    if (this.queue.length >= this.capacity) {
      this.dropped++;
      this.log.warn('queue.drop', { dropped: this.dropped, capacity: this.capacity });
      return false;
    }
    this.queue.push(task);
    if (!this.running) void this.run();
    return true;
  }

  private async run() {
    this.running = true;
    try {
      let task = this.queue.shift();
      while (task) {
        try {
          await task();
        } catch (err) {
          this.log.error('queue.task.error', { err: err instanceof Error ? err.message : String(err) });
        }
        task = this.queue.shift();
      }
    } finally {
      this.running = false;
      const waiters = this.idleWaiters;
      this.idleWaiters = [];
      for (const resolve of waiters) resolve();
    }
  }

  /** Resolves once every scheduled task has settled. */
  idle(): Promise<void> {
    if (!this.running && this.queue.length === 0) return Promise.resolve();
    return new Promise((resolve) => this.idleWaiters.push(resolve));
  }

  /** Discards queued tasks and refuses new ones. A task already running finishes. */
  close(): number {
    this.closed = true;
    const discarded = this.queue.length;
    this.queue.length = 0;
    return discarded;
  }
}
