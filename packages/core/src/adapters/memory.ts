/**
 * In-process adapters
 *
 * Used by tests and by `STORAGE_DRIVER=memory` for local development without
 * PostgreSQL or Redis. Same contracts as the real adapters: versioned appends,
 * unique short codes, TTL-bounded cache entries.
 */

import { ShortUrlAggregate } from "../aggregate.js";
import { ConflictError } from "../errors.js";
import type { ShortUrlEvent } from "../events.js";
import { ShortUrlStatus } from "../events.js";
import type { InvalidationReason, PageRequest, ShortUrlPage, ShortUrlRepository, UrlCache } from "../ports.js";
import { isAccessibleAt, isExpiredAt, type ShortUrlRecord } from "../state.js";

// =============================================================================
// Repository
// =============================================================================

export class InMemoryShortUrlRepository implements ShortUrlRepository {
  private readonly streams = new Map<string, ShortUrlEvent[]>();
  private readonly idsByCode = new Map<string, string>();
  private readonly projections = new Map<string, ShortUrlRecord>();

  async getByShortCode(shortCode: string): Promise<ShortUrlAggregate | null> {
    const id = this.idsByCode.get(shortCode);
    const events = id === undefined ? undefined : this.streams.get(id);
    return events ? ShortUrlAggregate.fromEvents(events) : null;
  }

  async findActiveByShortCode(shortCode: string, now: Date): Promise<ShortUrlRecord | null> {
    const record = this.projections.get(shortCode);
    return record && isAccessibleAt(record, now) ? record : null;
  }

  async save(aggregate: ShortUrlAggregate, expectedVersion: number): Promise<void> {
    const events = aggregate.uncommittedEvents;
    if (events.length === 0) return;

    const stream = this.streams.get(aggregate.id) ?? [];
    const storedVersion = stream.length === 0 ? 0 : (stream[stream.length - 1]?.version ?? 0);
    if (storedVersion !== expectedVersion) {
      throw new ConflictError("version_mismatch", aggregate.shortCode);
    }

    if (expectedVersion === 0 && this.idsByCode.has(aggregate.shortCode)) {
      throw new ConflictError("short_code_taken", aggregate.shortCode);
    }

    this.streams.set(aggregate.id, [...stream, ...events]);
    this.idsByCode.set(aggregate.shortCode, aggregate.id);
    this.projections.set(aggregate.shortCode, aggregate.record);
    aggregate.markCommitted();
  }

  async existsByShortCode(shortCode: string): Promise<boolean> {
    return this.idsByCode.has(shortCode);
  }

  async listByOwner(ownerId: string, page: PageRequest): Promise<ShortUrlPage> {
    const owned = [...this.projections.values()]
      .filter((record) => record.createdBy === ownerId)
      .sort((a, b) => b.createdAt.getTime() - a.createdAt.getTime());
    return { items: owned.slice(page.skip, page.skip + page.take), total: owned.length };
  }

  async findExpiredCodes(now: Date, limit: number): Promise<string[]> {
    return [...this.projections.values()]
      .filter((record) => record.status === ShortUrlStatus.ACTIVE && isExpiredAt(record, now))
      .sort((a, b) => (a.expiresAt?.getTime() ?? 0) - (b.expiresAt?.getTime() ?? 0))
      .slice(0, limit)
      .map((record) => record.shortCode);
  }

  async ping(): Promise<boolean> {
    return true;
  }

  /** Stored events for a code, in version order. */
  eventsFor(shortCode: string): readonly ShortUrlEvent[] {
    const id = this.idsByCode.get(shortCode);
    return id === undefined ? [] : [...(this.streams.get(id) ?? [])];
  }
}

// =============================================================================
// Cache
// =============================================================================

interface CacheEntry {
  url: string;
  expiresAtMs: number;
}

export interface InvalidationRecord {
  shortCode: string;
  reason: InvalidationReason;
}

export class InMemoryUrlCache implements UrlCache {
  private readonly entries = new Map<string, CacheEntry>();
  /** Short code → ms until which writes are refused */
  private readonly tombstones = new Map<string, number>();
  private readonly log: InvalidationRecord[] = [];

  constructor(
    private readonly now: () => number = Date.now,
    private readonly tombstoneTtlSeconds = 60
  ) {}

  async get(shortCode: string): Promise<string | null> {
    const entry = this.entries.get(shortCode);
    if (!entry) return null;
    if (entry.expiresAtMs <= this.now()) {
      this.entries.delete(shortCode);
      return null;
    }
    return entry.url;
  }

  async set(shortCode: string, originalUrl: string, ttlSeconds: number): Promise<void> {
    const refusedUntil = this.tombstones.get(shortCode);
    if (refusedUntil !== undefined) {
      if (refusedUntil > this.now()) return;
      this.tombstones.delete(shortCode);
    }
    this.entries.set(shortCode, { url: originalUrl, expiresAtMs: this.now() + ttlSeconds * 1000 });
  }

  async invalidate(shortCode: string, reason: InvalidationReason): Promise<void> {
    this.entries.delete(shortCode);
    this.tombstones.set(shortCode, this.now() + this.tombstoneTtlSeconds * 1000);
    this.log.push({ shortCode, reason });
  }

  async ping(): Promise<boolean> {
    return true;
  }

  /** Invalidations seen so far, oldest first. */
  get invalidations(): readonly InvalidationRecord[] {
    return [...this.log];
  }
}
