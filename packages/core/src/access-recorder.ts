/**
 * Access Recorder
 *
 * Bounded in-process dispatch for access recording, kept off the redirect
 * response path.
 *
 * - At most `concurrency` tasks run at once; at most `maxPending` wait.
 * - A full queue drops the new task.
 * - Each task gets `timeoutMs`; a timed-out task is counted and not retried,
 *   but it holds its slot until it settles, so drain and close wait for it.
 * - Failures are logged and counted, never rethrown.
 *
 * Delivery is best-effort: tasks still queued when the process dies are lost.
 */

import type { Logger } from "@snaplink/logger";
import { TimeoutError, withTimeout } from "@snaplink/shared";

export type AccessTask = () => Promise<unknown>;

export interface AccessRecorderOptions {
  logger: Logger;
  /** Tasks running at once (default 8) */
  concurrency?: number;
  /** Tasks allowed to wait (default 10000) */
  maxPending?: number;
  /** Per-task timeout in ms (default 2000) */
  timeoutMs?: number;
}

export interface AccessRecorderStats {
  scheduled: number;
  completed: number;
  failed: number;
  timedOut: number;
  dropped: number;
  pending: number;
  active: number;
}

interface QueuedTask {
  label: string;
  task: AccessTask;
}

export class AccessRecorder {
  private readonly logger: Logger;
  private readonly concurrency: number;
  private readonly maxPending: number;
  private readonly timeoutMs: number;

  private readonly queue: QueuedTask[] = [];
  private active = 0;
  private closed = false;
  private idleWaiters: Array<() => void> = [];

  private counts = { scheduled: 0, completed: 0, failed: 0, timedOut: 0, dropped: 0 };

  constructor(options: AccessRecorderOptions) {
    this.logger = options.logger;
    this.concurrency = Math.max(1, options.concurrency ?? 8);
    this.maxPending = Math.max(0, options.maxPending ?? 10_000);
    this.timeoutMs = options.timeoutMs ?? 2000;
  }

  /**
   * Queue a task. Returns false when it was dropped.
   */
  schedule(label: string, task: AccessTask): boolean {
    if (this.closed) {
      this.counts.dropped++;
      this.logger.debug({ label }, "Access recorder closed, task dropped");
      return false;
    }
    if (this.queue.length >= this.maxPending) {
      this.counts.dropped++;
      this.logger.warn({ label, pending: this.queue.length }, "Access queue full, task dropped");
      return false;
    }

    this.queue.push({ label, task });
    this.counts.scheduled++;
    this.pump();
    return true;
  }

  /** Resolves once nothing is queued or running. */
  drain(): Promise<void> {
    if (this.isIdle()) return Promise.resolve();
    return new Promise((resolve) => {
      this.idleWaiters.push(resolve);
    });
  }

  /** Stop accepting tasks and wait for the ones already accepted. */
  async close(): Promise<void> {
    this.closed = true;
    await this.drain();
  }

  stats(): AccessRecorderStats {
    return { ...this.counts, pending: this.queue.length, active: this.active };
  }

  private isIdle(): boolean {
    return this.active === 0 && this.queue.length === 0;
  }

  private pump(): void {
    while (this.active < this.concurrency) {
      const next = this.queue.shift();
      if (!next) break;
      this.active++;
      this.run(next);
    }
  }

  private run({ label, task }: QueuedTask): void {
    const running = Promise.resolve().then(task);
    const outcome = withTimeout(running, this.timeoutMs, label)
      .then(() => {
        this.counts.completed++;
      })
      .catch((error: unknown) => {
        if (error instanceof TimeoutError) {
          this.counts.timedOut++;
          this.logger.warn({ label, timeoutMs: this.timeoutMs }, "Access task timed out, still holding its slot");
        } else {
          this.counts.failed++;
          this.logger.warn({ err: error, label }, "Access task failed");
        }
      });

    void Promise.allSettled([running, outcome]).then(() => {
      this.active--;
      this.pump();
      if (this.isIdle()) {
        const waiters = this.idleWaiters;
        this.idleWaiters = [];
        for (const resolve of waiters) resolve();
      }
    });
  }
}
