import { AppError } from "../../middleware/errors";
import { errorMessage, logError, logInfo } from "../../observability/logger";
import { runOutsideRequestContext } from "../../observability/requestContext";

export type JobRunner = {
  run(jobId: string): Promise<void>;
};

export type DispatcherSnapshot = {
  queuedJobIds: string[];
  activeJobIds: string[];
};

export class JobAlreadyQueuedError extends AppError {
  constructor(jobId: string) {
    super("job_already_queued", `Job ${jobId} is already queued or running.`, 409);
    this.name = "JobAlreadyQueuedError";
  }
}

export class DispatcherStoppedError extends AppError {
  constructor() {
    super("dispatcher_stopped", "Job dispatcher is shutting down.", 503);
    this.name = "DispatcherStoppedError";
  }
}

/**
 * Bounded FIFO worker pool. `submit` only enqueues; at most `concurrency`
 * runs are in flight, and an id is never queued or running twice at once.
 */
export class JobDispatcher {
  private readonly runner: JobRunner;
  private readonly concurrency: number;
  private readonly queue: string[] = [];
  private readonly active = new Map<string, Promise<void>>();
  private idleWaiters: Array<() => void> = [];
  private stopped = false;

  constructor(runner: JobRunner, options: { concurrency: number }) {
    if (!Number.isInteger(options.concurrency) || options.concurrency < 1) {
      throw new Error(`invalid_dispatcher_concurrency:${options.concurrency}`);
    }
    this.runner = runner;
    this.concurrency = options.concurrency;
  }

  submit(jobId: string): void {
    if (this.stopped) {
      throw new DispatcherStoppedError();
    }
    if (this.isTracked(jobId)) {
      throw new JobAlreadyQueuedError(jobId);
    }
    this.queue.push(jobId);
    logInfo("job_queued", { jobId, queueSize: this.queue.length, activeCount: this.active.size });
    this.pump();
  }

  /** Removes a job that has not started yet. */
  cancel(jobId: string): boolean {
    const index = this.queue.indexOf(jobId);
    if (index === -1) {
      return false;
    }
    this.queue.splice(index, 1);
    this.notifyIfIdle();
    return true;
  }

  isTracked(jobId: string): boolean {
    return this.active.has(jobId) || this.queue.includes(jobId);
  }

  isRunning(jobId: string): boolean {
    return this.active.has(jobId);
  }

  snapshot(): DispatcherSnapshot {
    return {
      queuedJobIds: [...this.queue],
      activeJobIds: [...this.active.keys()],
    };
  }

  /** Resolves once nothing is queued or running. */
  drain(): Promise<void> {
    if (this.isIdle()) {
      return Promise.resolve();
    }
    return new Promise((resolve) => {
      this.idleWaiters.push(resolve);
    });
  }

  /**
   * Stops accepting work and waits for running jobs. Queued jobs are dropped
   * from memory; their records stay `pending` for the next start.
   */
  async stop(): Promise<void> {
    this.stopped = true;
    const dropped = this.queue.splice(0, this.queue.length);
    if (dropped.length > 0) {
      logInfo("dispatcher_queue_dropped", { jobIds: dropped });
    }
    await Promise.all(this.active.values());
    this.notifyIfIdle();
  }

  private isIdle(): boolean {
    return this.queue.length === 0 && this.active.size === 0;
  }

  private pump(): void {
    while (!this.stopped && this.active.size < this.concurrency && this.queue.length > 0) {
      const jobId = this.queue.shift();
      if (jobId === undefined) {
        break;
      }
      this.start(jobId);
    }
  }

  private start(jobId: string): void {
    // Runs outlive the request that submitted them and must not log under its id.
    const execution = runOutsideRequestContext(() =>
      Promise.resolve()
        .then(() => this.runner.run(jobId))
        .catch((err: unknown) => {
          logError("job_run_rejected", { jobId, error: errorMessage(err) });
        })
        .finally(() => {
          this.active.delete(jobId);
          this.pump();
          this.notifyIfIdle();
        })
    );
    this.active.set(jobId, execution);
  }

  private notifyIfIdle(): void {
    if (!this.isIdle()) {
      return;
    }
    const waiters = this.idleWaiters;
    this.idleWaiters = [];
    waiters.forEach((resolve) => resolve());
  }
}
