/**
 * Expiry Sweeper
 *
 * Periodically expires records nobody has visited since their expiry passed.
 * Access recording already expires a record on its first late visit; the
 * sweep covers the rest so listings and statistics show the right status.
 *
 * One sweep runs at a time. A tick that finds the previous sweep still
 * running is skipped.
 */

import type { Logger } from "@snaplink/logger";
import type { ExpirySweepResult, ShortUrlService } from "./service.js";

export interface ExpirySweeperOptions {
  service: Pick<ShortUrlService, "expireStale">;
  logger: Logger;
  /** Time between sweeps in ms (default 60000) */
  intervalMs?: number;
  /** Records expired per sweep at most (default 100) */
  batchSize?: number;
}

export class ExpirySweeper {
  private readonly service: Pick<ShortUrlService, "expireStale">;
  private readonly logger: Logger;
  private readonly intervalMs: number;
  private readonly batchSize: number;

  private timer: ReturnType<typeof setInterval> | null = null;
  private running: Promise<ExpirySweepResult | null> | null = null;

  constructor(options: ExpirySweeperOptions) {
    this.service = options.service;
    this.logger = options.logger;
    this.intervalMs = options.intervalMs ?? 60_000;
    this.batchSize = options.batchSize ?? 100;
  }

  start(): void {
    if (this.timer) return;
    this.timer = setInterval(() => {
      void this.sweep();
    }, this.intervalMs);
    this.timer.unref();
    this.logger.info({ intervalMs: this.intervalMs, batchSize: this.batchSize }, "Expiry sweeper started");
  }

  /**
   * Run one sweep now. Resolves to null when a sweep was already running.
   * Failures are logged, never rethrown.
   */
  async sweep(): Promise<ExpirySweepResult | null> {
    if (this.running) return null;

    this.running = this.service.expireStale(this.batchSize).catch((error: unknown) => {
      this.logger.error({ err: error }, "Expiry sweep failed");
      return null;
    });
    try {
      return await this.running;
    } finally {
      this.running = null;
    }
  }

  /** Stop the timer and wait for a sweep in progress. */
  async stop(): Promise<void> {
    if (this.timer) {
      clearInterval(this.timer);
      this.timer = null;
    }
    if (this.running) {
      await this.running;
    }
  }
}
