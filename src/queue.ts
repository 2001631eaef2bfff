import pLimit, { type LimitFunction } from 'p-limit';

/**
 * Bounded pool of async workers draining a queue of tasks
 *
 * Tasks may push more tasks while running, {@link ConcurrentQueue.join} waits until the queue has fully drained.
 * Once {@link ConcurrentQueue.close} is called queued tasks are skipped and new tasks are refused.
 */
export class ConcurrentQueue {
  Q: LimitFunction;
  todo = new Map<number, Promise<unknown>>();
  taskCount = 0;
  closed = false;
  events: (() => void)[] = [];

  constructor(limit: number) {
    this.Q = pLimit(Math.max(1, limit));
  }

  /** Add a task to the queue, resolves `null` if the queue was closed before the task started */
  push<T>(cb: () => Promise<T>): Promise<T | null> {
    if (this.closed) return Promise.resolve(null);
    const taskId = this.taskCount++;
    const p = this.Q((): Promise<T | null> => (this.closed ? Promise.resolve(null) : cb())).finally(() => {
      this.todo.delete(taskId);
      if (this.todo.size === 0) this.emitEmpty();
    });
    this.todo.set(taskId, p);
    return p;
  }

  get size(): number {
    return this.todo.size;
  }

  close(): void {
    this.closed = true;
  }

  onEmpty(cb: () => void): void {
    this.events.push(cb);
  }
  private emitEmpty(): void {
    for (const evt of this.events) evt();
  }

  /** Wait for all tasks to finish */
  async join(): Promise<void> {
    while (this.todo.size > 0) await Promise.allSettled([...this.todo.values()]);
  }
}
