import { errorMessage } from "./errors.js";

export type TaskOutcome = { status: "completed" } | { status: "failed"; error: string };

/** Handle for a fire-and-forget task. `done` never rejects. */
export interface TaskHandle {
  id: string;
  name: string;
  done: Promise<TaskOutcome>;
}

export interface TaskQueue {
  enqueue(name: string, task: () => Promise<unknown>): TaskHandle;
}

export interface WorkerPoolOptions {
  concurrency?: number;
}

const DEFAULT_CONCURRENCY = 4;

/**
 * Bounded in-process task runner. At most `concurrency` tasks are in flight;
 * the rest wait in FIFO order.
 */
export class WorkerPool implements TaskQueue {
  readonly concurrency: number;
  private active = 0;
  private nextId = 0;
  private readonly waiting: Array<() => void> = [];
  private idleWaiters: Array<() => void> = [];

  constructor(options: WorkerPoolOptions = {}) {
    this.concurrency = Math.max(1, Math.floor(options.concurrency ?? DEFAULT_CONCURRENCY));
  }

  get activeCount(): number {
    return this.active;
  }

  get pendingCount(): number {
    return this.waiting.length;
  }

  run<T>(task: () => Promise<T>): Promise<T> {
    return new Promise<T>((resolve, reject) => {
      const start = () => {
        this.active += 1;
        void Promise.resolve()
          .then(task)
          .then(resolve, reject)
          .finally(() => {
            this.active -= 1;
            this.startNext();
          });
      };

      if (this.active < this.concurrency) {
        start();
      } else {
        this.waiting.push(start);
      }
    });
  }

  /** Runs `fn` over every item through the pool; results keep input order. */
  map<T, R>(items: readonly T[], fn: (item: T, index: number) => Promise<R>): Promise<R[]> {
    return Promise.all(items.map((item, index) => this.run(() => fn(item, index))));
  }

  enqueue(name: string, task: () => Promise<unknown>): TaskHandle {
    this.nextId += 1;
    const id = `task_${this.nextId}`;
    const done = this.run(task).then(
      (): TaskOutcome => {
        console.info(`[workers] ${name} (${id}) completed`);
        return { status: "completed" };
      },
      (err: unknown): TaskOutcome => {
        const error = errorMessage(err);
        console.error(`[workers] ${name} (${id}) failed: ${error}`);
        return { status: "failed", error };
      },
    );
    return { id, name, done };
  }

  /** Resolves once nothing is running or waiting. */
  onIdle(): Promise<void> {
    if (this.active === 0 && this.waiting.length === 0) {
      return Promise.resolve();
    }
    return new Promise<void>((resolve) => {
      this.idleWaiters.push(resolve);
    });
  }

  private startNext(): void {
    const start = this.waiting.shift();
    if (start) {
      start();
      return;
    }
    if (this.active === 0) {
      const waiters = this.idleWaiters;
      this.idleWaiters = [];
      for (const resolve of waiters) resolve();
    }
  }
}
