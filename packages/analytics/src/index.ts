/**
 * @snaplink/analytics - Access analytics pipeline
 *
 * ┌─────────────┐     ┌─────────────┐     ┌─────────────┐
 * │  Short URL  │────▶│   BullMQ    │────▶│   Worker    │──▶ access_log
 * │  Service    │     │   Queue     │     │  (Batch)    │
 * └─────────────┘     └─────────────┘     └─────────────┘
 *
 * Usage:
 * ```ts
 * import { AccessEventProducer, createAccessQueue } from "@snaplink/analytics";
 *
 * const sink = new AccessEventProducer({ queue: createAccessQueue(redisUrl, logger), logger });
 * ```
 */

export type {
  AccessEventPayload,
  AccessLogRecord,
  BotDetectionResult,
  BotDetectionReason,
  WorkerConfig,
} from "./types.js";

export { DEFAULT_WORKER_CONFIG, FIELD_LIMITS, QUEUE_NAMES } from "./types.js";

export {
  AccessEventProducer,
  buildAccessPayload,
  createAccessQueue,
  hashIpAddress,
  truncate,
  type AccessEventProducerOptions,
  type AccessQueue,
} from "./producer.js";

export {
  AccessEventWorker,
  BatchAccumulator,
  buildInsertStatement,
  insertAccessBatch,
  toAccessLogRecord,
  type AccessWorkerOptions,
  type BatchMetrics,
} from "./worker.js";

export { detectBot, isKnownBot } from "./bot-detection.js";
export { parseDevice } from "./device.js";
