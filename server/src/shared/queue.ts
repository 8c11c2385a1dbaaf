import { formatUnknownError } from "./errors.js";

export type BackgroundTask = {
  label: string;
  run: () => Promise<unknown>;
};

export type BackgroundQueueOptions = {
  concurrency: number;
  maxPending: number;
  onError?: (label: string, error: unknown) => void;
};

const logTaskError = (label: string, error: unknown) => {
  console.error(`Background task "${label}" failed:`, formatUnknownError(error));
};

/**
 * Bounded work queue for side effects that must not delay a reply:
 * lead capture, channel delivery and tenant webhook notifications.
 */
export class BackgroundQueue {
  private readonly pending: BackgroundTask[] = [];
  private readonly idleWaiters: Array<() => void> = [];
  private running = 0;
  private readonly concurrency: number;
  private readonly maxPending: number;
  private readonly onError: (label: string, error: unknown) => void;

  constructor(options: BackgroundQueueOptions) {
    this.concurrency = Math.max(1, options.concurrency);
    this.maxPending = Math.max(1, options.maxPending);
    this.onError = options.onError ?? logTaskError;
  }

  get size() {
    return this.pending.length;
  }

  get active() {
    return this.running;
  }

  /** Returns false when the backlog is full and the task was dropped. */
  enqueue(label: string, run: () => Promise<unknown>): boolean {
    if (this.pending.length >= this.maxPending) {
      console.warn(`Background queue full (${this.maxPending}), dropping "${label}".`);
      return false;
    }
    this.pending.push({ label, run });
    this.pump();
    return true;
  }

  /** Resolves once nothing is pending or running. */
  drain(): Promise<void> {
    if (this.running === 0 && this.pending.length === 0) return Promise.resolve();
    return new Promise((resolve) => {
      this.idleWaiters.push(resolve);
    });
  }

  private pump() {
    while (this.running < this.concurrency && this.pending.length > 0) {
      const task = this.pending.shift();
      if (!task) break;
      this.running += 1;
      void this.execute(task);
    }
  }

  private async execute(task: BackgroundTask) {
    try {
      await task.run();
    } catch (error) {
      try {
        this.onError(task.label, error);
      } catch (reportError) {
        logTaskError(task.label, reportError);
      }
    } finally {
      this.running -= 1;
      this.pump();
      if (this.running === 0 && this.pending.length === 0) {
        const waiters = this.idleWaiters.splice(0);
        waiters.forEach((resolve) => resolve());
      }
    }
  }
}
