/**
 * @snaplink/analytics - Type Definitions
 *
 * Design Decisions:
 * - IPs are hashed before queuing; raw addresses never leave the redirect
 * - Timestamps travel as epoch ms for queue serialization
 * - Payloads stay small: one job per counted access
 */

import type { DeviceType } from "@snaplink/shared";

// =============================================================================
// Queue Event Types
// =============================================================================

/**
 * Access event payload pushed to the BullMQ queue.
 */
export interface AccessEventPayload {
  /** Event unique identifier, also the job ID */
  eventId: string;

  shortCode: string;

  /** Unix timestamp (ms) of the access */
  occurredAt: number;

  /** SHA256 of the IP address (first 16 hex chars) */
  ipHash?: string;

  /** User-Agent header (truncated to 512 chars) */
  userAgent?: string;

  /** Referer header (truncated to 2048 chars) */
  referrer?: string;

  /** ISO country code (e.g., "US", "DE") */
  country?: string;
  region?: string;
  city?: string;

  deviceType?: DeviceType;
  browser?: string;
  os?: string;

  bot: boolean;
}

/**
 * Row written to `access_log`.
 */
export interface AccessLogRecord {
  shortCode: string;
  occurredAt: Date;
  ipHash: string | null;
  userAgent: string | null;
  referrer: string | null;
  country: string | null;
  region: string | null;
  city: string | null;
  deviceType: DeviceType | null;
  browser: string | null;
  os: string | null;
}

// =============================================================================
// Bot Detection
// =============================================================================

export interface BotDetectionResult {
  isBot: boolean;
  reason?: BotDetectionReason;
  confidence: number; // 0-1
}

export type BotDetectionReason = "user_agent_pattern" | "missing_user_agent" | "suspicious_headers";

// =============================================================================
// Worker Types
// =============================================================================

export interface WorkerConfig {
  /** Redis connection URL */
  redisUrl: string;
  /** Events per database write */
  batchSize: number;
  /** Max ms an event waits before its batch is flushed */
  batchTimeout: number;
  /** Jobs processed in parallel */
  concurrency: number;
  /** Drop bot traffic instead of storing it */
  skipBots: boolean;
}

export const DEFAULT_WORKER_CONFIG: WorkerConfig = {
  redisUrl: "redis://localhost:6379",
  batchSize: 100,
  batchTimeout: 5000,
  concurrency: 10,
  skipBots: false,
};

export const QUEUE_NAMES = {
  ACCESS_EVENTS: "access-events",
} as const;

/** Field length caps applied before queuing */
export const FIELD_LIMITS = {
  USER_AGENT: 512,
  REFERRER: 2048,
} as const;
