/**
 * Access Event Producer
 *
 * The analytics sink for counted accesses: builds a compact payload and
 * pushes it to a BullMQ queue for the worker to batch into `access_log`.
 *
 * Called from the background access path, never from the redirect response.
 * A failed push throws TransientInfrastructureError; the caller logs it and
 * the access itself stays counted on the short URL.
 *
 * @see ./worker.ts for the consumer
 */

import { Queue, type JobsOptions } from "bullmq";
import { createHash } from "node:crypto";
import type { Logger } from "@snaplink/logger";
import { TransientInfrastructureError, type AccessRecord, type AccessSink } from "@snaplink/core";
import { detectBot } from "./bot-detection.js";
import { parseDevice } from "./device.js";
import { FIELD_LIMITS, QUEUE_NAMES, type AccessEventPayload } from "./types.js";

// =============================================================================
// Queue
// =============================================================================

/**
 * The part of a BullMQ queue the producer uses; tests inject a fake.
 */
export interface AccessQueue {
  add(name: string, data: AccessEventPayload, opts?: JobsOptions): Promise<unknown>;
  close(): Promise<void>;
}

/**
 * Create the access events queue
 */
export function createAccessQueue(redisUrl: string, logger: Logger): Queue<AccessEventPayload> {
  const queue = new Queue<AccessEventPayload>(QUEUE_NAMES.ACCESS_EVENTS, {
    connection: {
      url: redisUrl,
      maxRetriesPerRequest: null, // Required for BullMQ
      enableReadyCheck: false,
    },
    defaultJobOptions: {
      attempts: 1,
      removeOnComplete: {
        age: 3600,
        count: 10000,
      },
      removeOnFail: {
        age: 86400,
      },
    },
  });

  queue.on("error", (error) => {
    logger.error({ err: error }, "Access queue error");
  });

  return queue;
}

// =============================================================================
// Helper Functions
// =============================================================================

/**
 * Hash IP address for privacy. SHA256, truncated to 16 hex chars.
 * Unsalted, so the same IP always maps to the same hash.
 */
export function hashIpAddress(ip: string): string {
  return createHash("sha256").update(ip).digest("hex").slice(0, 16);
}

export function truncate(str: string | undefined, maxLength: number): string | undefined {
  if (!str) return undefined;
  return str.length > maxLength ? str.slice(0, maxLength) : str;
}

/**
 * Build the queue payload for one access. The payload carries the stored
 * event's ID.
 */
export function buildAccessPayload(access: AccessRecord): AccessEventPayload {
  const device = access.device ?? parseDevice(access.userAgent);
  const bot = device.type === "bot" || detectBot(access.userAgent).isBot;

  return {
    eventId: access.eventId,
    shortCode: access.shortCode,
    occurredAt: access.occurredAt.getTime(),
    ipHash: access.ipAddress ? hashIpAddress(access.ipAddress) : undefined,
    userAgent: truncate(access.userAgent, FIELD_LIMITS.USER_AGENT),
    referrer: truncate(access.referrer, FIELD_LIMITS.REFERRER),
    country: access.geo?.country,
    region: access.geo?.region,
    city: access.geo?.city,
    deviceType: device.type,
    browser: device.browser,
    os: device.os,
    bot,
  };
}

// =============================================================================
// Producer
// =============================================================================

export interface AccessEventProducerOptions {
  queue: AccessQueue;
  logger: Logger;
}

export class AccessEventProducer implements AccessSink {
  private readonly queue: AccessQueue;
  private readonly logger: Logger;

  constructor(options: AccessEventProducerOptions) {
    this.queue = options.queue;
    this.logger = options.logger;
  }

  /**
   * @throws TransientInfrastructureError when the queue rejects the job
   */
  async recordAccess(access: AccessRecord): Promise<void> {
    const payload = buildAccessPayload(access);

    try {
      // BullMQ ignores an add whose job ID it already holds, so a redelivered access is queued once
      await this.queue.add("access", payload, { jobId: payload.eventId });
    } catch (error) {
      throw new TransientInfrastructureError("queue", "Failed to enqueue access event", error);
    }

    this.logger.debug({ eventId: payload.eventId, shortCode: payload.shortCode, bot: payload.bot }, "Access event queued");
  }

  async close(): Promise<void> {
    await this.queue.close();
    this.logger.info("Access events queue closed");
  }
}
