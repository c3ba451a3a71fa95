export interface QueueTask {
  name: string;
  run: () => Promise<void>;
}

export interface QueueOptions {
  maxDepth: number;
}

/** Rejection given to tasks removed by `clear()` before they ran. */
export class QueueClearedError extends Error {
  constructor(readonly taskName: string) {
    super('queue_cleared');
    this.name = 'QueueClearedError';
  }
}

type PendingTask = {
  task: QueueTask;
  resolve: () => void;
  reject: (err: unknown) => void;
};

/**
 * Runs tasks one at a time in enqueue order. Each `enqueue` promise settles
 * with the outcome of its own task.
 */
export class SerialQueue {
  private queue: PendingTask[] = [];
  private running = false;
  private idleWaiters: Array<() => void> = [];

  constructor(private readonly options: QueueOptions) {}

  enqueue(task: QueueTask): Promise<void> {
    return new Promise((resolve, reject) => {
      if (this.queue.length >= this.options.maxDepth) {
        reject(new Error('queue_full'));
        return;
      }
      this.queue.push({ task, resolve, reject });
      void this.process();
    });
  }

  /** Resolves once nothing is queued or running. */
  onIdle(): Promise<void> {
    if (!this.running && this.queue.length === 0) {
      return Promise.resolve();
    }
    return new Promise((resolve) => {
      this.idleWaiters.push(resolve);
    });
  }

  private async process() {
    if (this.running) return;
    this.running = true;

    while (this.queue.length) {
      const item = this.queue.shift();
      if (!item) continue;
      try {
        await item.task.run();
        item.resolve();
      } catch (err) {
        item.reject(err);
      }
    }

    this.running = false;
    const waiters = this.idleWaiters;
    this.idleWaiters = [];
    for (const resolve of waiters) {
      resolve();
    }
  }

  size() {
    return this.queue.length;
  }

  /** Drops every waiting task and returns their names. The running task is left to finish. */
  clear(): string[] {
    const pending = this.queue;
    this.queue = [];
    for (const item of pending) {
      item.reject(new QueueClearedError(item.task.name));
    }
    return pending.map((item) => item.task.name);
  }
}
