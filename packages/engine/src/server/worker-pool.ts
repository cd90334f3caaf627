export type Job = () => Promise<void>;

export interface WorkerPoolOptions {
  /** Jobs allowed to run at the same time. */
  size: number;
  /** Jobs allowed to wait for a free worker. */
  maxQueue: number;
  /** Receives errors thrown by jobs. The worker moves on to the next job. */
  onError?: (err: unknown) => void;
}

/**
 * Fixed number of workers pulling jobs from a bounded FIFO queue.
 *
 * Workers are async loops, not threads: each runs one job to completion,
 * then takes the next queued job, and exits when the queue is empty.
 * `submit` refuses work once the queue is full.
 */
export class WorkerPool {
  private readonly size: number;
  private readonly maxQueue: number;
  private readonly onError: (err: unknown) => void;
  private running = 0;
  private queue: Job[] = [];
  private idleWaiters: Array<() => void> = [];

  constructor(options: WorkerPoolOptions) {
    if (!Number.isInteger(options.size) || options.size < 1) {
      throw new RangeError(`Worker pool size must be >= 1, got ${options.size}`);
    }
    if (!Number.isInteger(options.maxQueue) || options.maxQueue < 0) {
      throw new RangeError(
        `Worker pool queue must be >= 0, got ${options.maxQueue}`,
      );
    }
    this.size = options.size;
    this.maxQueue = options.maxQueue;
    this.onError = options.onError ?? (() => {});
  }

  /** Jobs currently running. */
  get active(): number {
    return this.running;
  }

  /** Jobs waiting for a worker. */
  get pending(): number {
    return this.queue.length;
  }

  get capacity(): number {
    return this.size;
  }

  /** Returns false, without running the job, when the queue is full. */
  submit(job: Job): boolean {
    if (this.running < this.size) {
      this.running++;
      void this.work(job);
      return true;
    }

    if (this.queue.length >= this.maxQueue) {
      return false;
    }

    this.queue.push(job);
    return true;
  }

  /** Drop every queued job that has not started yet. */
  clear(): number {
    const dropped = this.queue.length;
    this.queue = [];
    this.notifyIfIdle();
    return dropped;
  }

  /** Resolves once no job is running or queued. */
  onIdle(): Promise<void> {
    if (this.running === 0 && this.queue.length === 0) {
      return Promise.resolve();
    }
    return new Promise((resolve) => {
      this.idleWaiters.push(resolve);
    });
  }

  private async work(first: Job): Promise<void> {
    let job: Job | undefined = first;
    while (job) {
      try {
        await job();
      } catch (err) {
        this.onError(err);
      }
      job = this.queue.shift();
    }
    this.running--;
    this.notifyIfIdle();
  }

  private notifyIfIdle(): void {
    if (this.running !== 0 || this.queue.length !== 0) return;
    const waiters = this.idleWaiters;
    this.idleWaiters = [];
    for (const waiter of waiters) {
      waiter();
    }
  }
}
