/**
 * Collaborator contracts consumed by the core.
 *
 * Implementations live in @snaplink/db (PostgreSQL), @snaplink/cache (Redis),
 * @snaplink/analytics (BullMQ) and ./adapters/memory.ts (in-process).
 */

import type { AccessContext } from "@snaplink/shared";
import type { ShortUrlAggregate } from "./aggregate.js";
import type { ShortUrlRecord } from "./state.js";

// =============================================================================
// Durable store
// =============================================================================

export interface PageRequest {
  skip: number;
  take: number;
}

export interface ShortUrlPage {
  items: ShortUrlRecord[];
  /** Records the owner has in total, across all pages */
  total: number;
}

export interface ShortUrlRepository {
  /**
   * Rebuild the aggregate from its event log, or null for an unknown code.
   */
  getByShortCode(shortCode: string): Promise<ShortUrlAggregate | null>;

  /**
   * Read-model lookup for redirects: only Active records whose expiry (if
   * any) is after `now`.
   */
  findActiveByShortCode(shortCode: string, now: Date): Promise<ShortUrlRecord | null>;

  /**
   * Append the aggregate's uncommitted events and refresh its projection,
   * atomically. Marks the aggregate committed on success.
   *
   * @throws ConflictError "version_mismatch" when the stored version differs
   *   from `expectedVersion`, "short_code_taken" when a new record's code exists
   */
  save(aggregate: ShortUrlAggregate, expectedVersion: number): Promise<void>;

  existsByShortCode(shortCode: string): Promise<boolean>;

  /** An owner's records, newest first, in any status. */
  listByOwner(ownerId: string, page: PageRequest): Promise<ShortUrlPage>;

  /** Codes still Active whose expiry is at or before `now`, oldest expiry first. */
  findExpiredCodes(now: Date, limit: number): Promise<string[]>;

  ping(): Promise<boolean>;
}

// =============================================================================
// Cache
// =============================================================================

export type InvalidationReason =
  | "url_deleted"
  | "url_disabled"
  | "url_expired"
  | "security_action"
  | "admin_action";

export interface UrlCache {
  /** Cached destination, or null on a miss. */
  get(shortCode: string): Promise<string | null>;
  /** Refused for a short window after `invalidate`, so a late store hit cannot revive the entry. */
  set(shortCode: string, originalUrl: string, ttlSeconds: number): Promise<void>;
  /** Remove the entry and hold off writes; resolves once it is gone. */
  invalidate(shortCode: string, reason: InvalidationReason): Promise<void>;
  ping(): Promise<boolean>;
}

// =============================================================================
// Analytics sink
// =============================================================================

export interface AccessRecord extends AccessContext {
  shortCode: string;
  occurredAt: Date;
  /** ID of the stored ShortUrlAccessed event; the same on every redelivery */
  eventId: string;
}

/**
 * Receives every counted access. Delivery is best-effort.
 */
export interface AccessSink {
  recordAccess(access: AccessRecord): Promise<void>;
}

// =============================================================================
// Clock
// =============================================================================

export type Clock = () => Date;

export const systemClock: Clock = () => new Date();
