import { Logger } from "../lib/logger";
import { errorMessage } from "../lib/errors";

export type RunTask = () => Promise<void>;

interface QueuedTask {
  label: string;
  task: RunTask;
}

export interface RunQueueOptions {
  concurrency: number;
  logger: Logger;
}

/**
 * FIFO worker pool for import runs. `enqueue` only records the task; workers pick it up on a
 * later turn of the event loop, so the caller is never blocked by the run body.
 */
export class RunQueue {
  private readonly queued: QueuedTask[] = [];
  private running = 0;
  private drainScheduled = false;
  private idleWaiters: Array<() => void> = [];

  constructor(private readonly options: RunQueueOptions) {
    if (!Number.isInteger(options.concurrency) || options.concurrency < 1) {
      throw new Error(`Run queue concurrency must be a positive integer, got ${options.concurrency}`);
    }
  }

  get pending(): number {
    return this.queued.length;
  }

  get active(): number {
    return this.running;
  }

  enqueue(label: string, task: RunTask): void {
    this.queued.push({ label, task });
    this.scheduleDrain();
  }

  onIdle(): Promise<void> {
    if (this.isIdle()) return Promise.resolve();
    return new Promise((resolve) => {
      this.idleWaiters.push(resolve);
    });
  }

  private isIdle(): boolean {
    return this.queued.length === 0 && this.running === 0;
  }

  private scheduleDrain(): void {
    if (this.drainScheduled) return;
    this.drainScheduled = true;
    setImmediate(() => {
      this.drainScheduled = false;
      this.drain();
    });
  }

  private drain(): void {
    while (this.running < this.options.concurrency) {
      const next = this.queued.shift();
      if (!next) break;
      this.running += 1;
      void this.execute(next);
    }
    this.notifyIdle();
  }

  private async execute(item: QueuedTask): Promise<void> {
    try {
      await item.task();
    } catch (error) {
      this.options.logger.error({ task: item.label, err: errorMessage(error) }, "run.queue.task_failed");
    } finally {
      this.running -= 1;
      this.drain();
    }
  }

  private notifyIdle(): void {
    if (!this.isIdle()) return;
    const waiters = this.idleWaiters;
    this.idleWaiters = [];
    for (const resolve of waiters) resolve();
  }
}
