/**
 * Analytics Event Worker
 *
 * Consumes access events from the BullMQ queue and writes them to
 * `access_log` in batches.
 *
 * ┌─────────────┐     ┌─────────────┐     ┌─────────────┐
 * │   BullMQ    │────▶│   Worker    │────▶│  PostgreSQL │
 * │   Queue     │     │  (Batch)    │     │  access_log │
 * └─────────────┘     └─────────────┘     └─────────────┘
 *
 * Performance Tuning:
 * - batchSize: Higher = fewer DB calls, more memory
 * - batchTimeout: Lower = fresher data, more DB calls
 * - concurrency: Higher = more parallelism
 */

import { Worker, type Job } from "bullmq";
import type { Logger } from "@snaplink/logger";
import type { Queryable } from "@snaplink/db";
import {
  DEFAULT_WORKER_CONFIG,
  QUEUE_NAMES,
  type AccessEventPayload,
  type AccessLogRecord,
  type WorkerConfig,
} from "./types.js";

// =============================================================================
// Batch Accumulator
// =============================================================================

export interface BatchMetrics {
  pending: number;
  totalReceived: number;
  totalFlushed: number;
  msSinceLastFlush: number;
}

/**
 * Accumulates records until the batch size or the timeout is reached,
 * whichever comes first.
 */
export class BatchAccumulator<T> {
  private items: T[] = [];
  private flushTimer: ReturnType<typeof setTimeout> | null = null;

  private totalReceived = 0;
  private totalFlushed = 0;
  private lastFlushTime = Date.now();

  constructor(
    private readonly batchSize: number,
    private readonly batchTimeout: number,
    private readonly onFlush: (items: T[]) => Promise<void>,
    private readonly logger: Logger
  ) {}

  async add(item: T): Promise<void> {
    this.items.push(item);
    this.totalReceived++;

    if (this.items.length === 1) {
      this.startTimer();
    }

    if (this.items.length >= this.batchSize) {
      await this.flush();
    }
  }

  /**
   * Flush everything accumulated. On failure the items are put back and the
   * error is rethrown.
   */
  async flush(): Promise<void> {
    this.clearTimer();

    if (this.items.length === 0) return;

    const batch = this.items;
    this.items = [];

    try {
      await this.onFlush(batch);
      this.totalFlushed += batch.length;
      this.lastFlushTime = Date.now();
      this.logger.debug({ count: batch.length, total: this.totalFlushed }, "Batch flushed to database");
    } catch (error) {
      this.items = [...batch, ...this.items];
      throw error;
    }
  }

  getMetrics(): BatchMetrics {
    return {
      pending: this.items.length,
      totalReceived: this.totalReceived,
      totalFlushed: this.totalFlushed,
      msSinceLastFlush: Date.now() - this.lastFlushTime,
    };
  }

  private startTimer(): void {
    this.clearTimer();
    this.flushTimer = setTimeout(() => {
      this.flush().catch((error: unknown) => {
        this.logger.error({ err: error }, "Batch flush failed on timeout");
      });
    }, this.batchTimeout);
  }

  private clearTimer(): void {
    if (this.flushTimer) {
      clearTimeout(this.flushTimer);
      this.flushTimer = null;
    }
  }
}

// =============================================================================
// Database Operations
// =============================================================================

const ACCESS_LOG_COLUMNS = [
  "short_code",
  "occurred_at",
  "ip_hash",
  "user_agent",
  "referrer",
  "country",
  "region",
  "city",
  "device_type",
  "browser",
  "os",
] as const;

function recordValues(record: AccessLogRecord): unknown[] {
  return [
    record.shortCode,
    record.occurredAt,
    record.ipHash,
    record.userAgent,
    record.referrer,
    record.country,
    record.region,
    record.city,
    record.deviceType,
    record.browser,
    record.os,
  ];
}

/**
 * Multi-row INSERT for `records`.
 */
export function buildInsertStatement(records: AccessLogRecord[]): { text: string; values: unknown[] } {
  const width = ACCESS_LOG_COLUMNS.length;
  const tuples = records.map(
    (_, row) => `(${ACCESS_LOG_COLUMNS.map((__, col) => `$${row * width + col + 1}`).join(", ")})`
  );
  return {
    text: `INSERT INTO access_log (${ACCESS_LOG_COLUMNS.join(", ")}) VALUES ${tuples.join(", ")}`,
    values: records.flatMap(recordValues),
  };
}

/**
 * Batch insert, falling back to one INSERT per record when the batch fails so
 * a single bad row does not lose the rest.
 */
export async function insertAccessBatch(db: Queryable, records: AccessLogRecord[], logger: Logger): Promise<void> {
  if (records.length === 0) return;

  try {
    const { text, values } = buildInsertStatement(records);
    await db.query(text, values);
  } catch (error) {
    logger.error({ err: error, count: records.length }, "Batch insert failed");

    let successCount = 0;
    for (const record of records) {
      try {
        const { text, values } = buildInsertStatement([record]);
        await db.query(text, values);
        successCount++;
      } catch (individualError) {
        logger.warn({ err: individualError, shortCode: record.shortCode }, "Individual insert failed");
      }
    }

    logger.info({ successCount, total: records.length }, "Fallback individual inserts completed");
  }
}

export function toAccessLogRecord(payload: AccessEventPayload): AccessLogRecord {
  return {
    shortCode: payload.shortCode,
    occurredAt: new Date(payload.occurredAt),
    ipHash: payload.ipHash ?? null,
    userAgent: payload.userAgent ?? null,
    referrer: payload.referrer ?? null,
    country: payload.country ?? null,
    region: payload.region ?? null,
    city: payload.city ?? null,
    deviceType: payload.deviceType ?? null,
    browser: payload.browser ?? null,
    os: payload.os ?? null,
  };
}

// =============================================================================
// Worker
// =============================================================================

export interface AccessWorkerOptions {
  db: Queryable;
  logger: Logger;
  config?: Partial<WorkerConfig>;
}

/**
 * Queue consumer plus its batch. `process` is what the BullMQ worker calls
 * per job; `start` attaches it to the queue.
 */
export class AccessEventWorker {
  readonly config: WorkerConfig;
  private readonly logger: Logger;
  private readonly accumulator: BatchAccumulator<AccessLogRecord>;
  private worker: Worker<AccessEventPayload> | null = null;
  private shuttingDown = false;

  constructor(options: AccessWorkerOptions) {
    this.config = { ...DEFAULT_WORKER_CONFIG, ...options.config };
    this.logger = options.logger;
    this.accumulator = new BatchAccumulator<AccessLogRecord>(
      this.config.batchSize,
      this.config.batchTimeout,
      (records) => insertAccessBatch(options.db, records, this.logger),
      this.logger
    );
  }

  async process(payload: AccessEventPayload): Promise<void> {
    if (this.config.skipBots && payload.bot) {
      this.logger.debug({ eventId: payload.eventId }, "Skipping bot event");
      return;
    }
    await this.accumulator.add(toAccessLogRecord(payload));
  }

  start(): Worker<AccessEventPayload> {
    this.shuttingDown = false;
    const worker = new Worker<AccessEventPayload>(
      QUEUE_NAMES.ACCESS_EVENTS,
      async (job: Job<AccessEventPayload>) => {
        await this.process(job.data);
      },
      {
        connection: {
          url: this.config.redisUrl,
          maxRetriesPerRequest: null,
          enableReadyCheck: false,
        },
        concurrency: this.config.concurrency,
      }
    );

    worker.on("failed", (job: Job<AccessEventPayload> | undefined, error: Error) => {
      this.logger.error({ jobId: job?.id, err: error }, "Job failed");
    });
    worker.on("error", (error: Error) => {
      this.logger.error({ err: error }, "Worker error");
    });
    worker.on("stalled", (jobId: string) => {
      this.logger.warn({ jobId }, "Job stalled");
    });

    this.worker = worker;
    this.logger.info(
      { queueName: QUEUE_NAMES.ACCESS_EVENTS, batchSize: this.config.batchSize, concurrency: this.config.concurrency },
      "Analytics worker started"
    );
    return worker;
  }

  /**
   * Wait for in-flight jobs, then flush the pending batch.
   */
  async stop(): Promise<void> {
    this.shuttingDown = true;
    if (this.worker) {
      this.logger.info("Stopping analytics worker...");
      await this.worker.close();
      this.worker = null;
    }
    await this.accumulator.flush();
    this.logger.info("Analytics worker stopped");
  }

  getMetrics(): { isRunning: boolean; batch: BatchMetrics } {
    return { isRunning: this.isHealthy(), batch: this.accumulator.getMetrics() };
  }

  isHealthy(): boolean {
    return this.worker !== null && !this.shuttingDown;
  }
}
