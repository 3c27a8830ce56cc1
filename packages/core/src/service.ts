/**
 * Short URL Service
 *
 * Write-side operations: create, disable, delete, expire, record access, plus
 * the read queries the API needs. Every state change goes through the aggregate
 * and is saved with optimistic concurrency.
 *
 * Cache invalidation is awaited before an operation returns, so a disabled
 * or deleted URL is never served from cache afterwards.
 */

import type { Logger } from "@snaplink/logger";
import {
  SHORTCODE_CONFIG,
  isReservedWord,
  validateCustomAlias,
  type AccessContext,
  type CodeGenerator,
} from "@snaplink/shared";
import { ShortUrlAggregate, type AccessOutcome, type CreateShortUrlInput } from "./aggregate.js";
import { ConflictError, NotFoundError, ValidationError } from "./errors.js";
import { ShortUrlStatus, type DisableReason } from "./events.js";
import {
  systemClock,
  type AccessSink,
  type Clock,
  type InvalidationReason,
  type PageRequest,
  type ShortUrlPage,
  type ShortUrlRepository,
  type UrlCache,
} from "./ports.js";
import type { ShortUrlRecord } from "./state.js";

// =============================================================================
// Types
// =============================================================================

export const PAGE_LIMITS = {
  DEFAULT_TAKE: 20,
  MAX_TAKE: 100,
} as const;

export interface ShortUrlServiceOptions {
  repository: ShortUrlRepository;
  cache: UrlCache;
  generator: CodeGenerator;
  logger: Logger;
  /** Receives counted accesses; omitted means analytics is off */
  accessSink?: AccessSink;
  clock?: Clock;
  /** Attempts at a fresh generated code when the store reports it taken */
  maxCreateAttempts?: number;
  /** Attempts at a write when the stored version moved underneath us */
  maxWriteAttempts?: number;
}

export interface CreatedShortUrl {
  id: string;
  shortCode: string;
  originalUrl: string;
  createdAt: Date;
  expiresAt: Date | null;
  isCustomAlias: boolean;
}

export type AliasUnavailableReason = "invalid" | "reserved" | "taken";

export interface AliasAvailability {
  available: boolean;
  reason?: AliasUnavailableReason;
  message?: string;
}

export interface ShortUrlStatistics {
  shortCode: string;
  status: ShortUrlStatus;
  accessCount: number;
  lastAccessedAt: Date | null;
  createdAt: Date;
  expiresAt: Date | null;
}

export interface ExpirySweepResult {
  expired: string[];
  /** Codes whose transition could not be saved; the next sweep retries them */
  failed: string[];
}

/**
 * Result of one access-recording attempt. "inactive" and "unknown" mean no
 * event was written.
 */
export type RecordAccessResult = AccessOutcome | "inactive" | "unknown";

/**
 * Anything that can record an access; the resolver depends on this.
 */
export interface AccessHandler {
  recordAccess(shortCode: string, context: AccessContext, occurredAt?: Date): Promise<RecordAccessResult>;
}

function invalidationReasonFor(reason: DisableReason): InvalidationReason {
  switch (reason) {
    case "owner_deleted":
      return "url_deleted";
    case "admin_action":
      return "url_disabled";
    case "policy_violation":
    case "suspicious_activity":
    case "copyright":
    case "spam":
      return "security_action";
  }
}

function toCreated(record: ShortUrlRecord): CreatedShortUrl {
  return {
    id: record.id,
    shortCode: record.shortCode,
    originalUrl: record.originalUrl,
    createdAt: record.createdAt,
    expiresAt: record.expiresAt,
    isCustomAlias: record.isCustomAlias,
  };
}

// =============================================================================
// Service
// =============================================================================

export class ShortUrlService implements AccessHandler {
  private readonly repository: ShortUrlRepository;
  private readonly cache: UrlCache;
  private readonly generator: CodeGenerator;
  private readonly logger: Logger;
  private readonly accessSink: AccessSink | undefined;
  private readonly clock: Clock;
  private readonly maxCreateAttempts: number;
  private readonly maxWriteAttempts: number;

  constructor(options: ShortUrlServiceOptions) {
    this.repository = options.repository;
    this.cache = options.cache;
    this.generator = options.generator;
    this.logger = options.logger;
    this.accessSink = options.accessSink;
    this.clock = options.clock ?? systemClock;
    this.maxCreateAttempts = options.maxCreateAttempts ?? SHORTCODE_CONFIG.MAX_RETRIES;
    this.maxWriteAttempts = options.maxWriteAttempts ?? 3;
  }

  // ===========================================================================
  // Creation
  // ===========================================================================

  /**
   * Create a short URL.
   *
   * @throws ValidationError on bad input
   * @throws ConflictError when a custom alias is taken, or no generated code
   *   could be stored within the attempt budget
   */
  async createShortUrl(input: CreateShortUrlInput): Promise<CreatedShortUrl> {
    const now = this.clock();

    if (input.customAlias !== undefined) {
      const aggregate = ShortUrlAggregate.create(input, { now, generator: this.generator });
      if (await this.repository.existsByShortCode(aggregate.shortCode)) {
        throw new ConflictError("short_code_taken", aggregate.shortCode);
      }
      await this.repository.save(aggregate, aggregate.committedVersion);
      this.logger.info({ shortCode: aggregate.shortCode, ownerId: input.ownerId }, "Short URL created with custom alias");
      return toCreated(aggregate.record);
    }

    let lastCode = "";
    for (let attempt = 1; attempt <= this.maxCreateAttempts; attempt++) {
      const aggregate = ShortUrlAggregate.create(input, { now, generator: this.generator });
      lastCode = aggregate.shortCode;

      try {
        await this.repository.save(aggregate, aggregate.committedVersion);
      } catch (error) {
        if (error instanceof ConflictError && error.reason === "short_code_taken") {
          this.generator.reserve(aggregate.shortCode);
          this.logger.warn({ shortCode: aggregate.shortCode, attempt }, "Generated short code already taken, retrying");
          continue;
        }
        throw error;
      }

      this.logger.info({ shortCode: aggregate.shortCode, ownerId: input.ownerId }, "Short URL created");
      return toCreated(aggregate.record);
    }

    throw new ConflictError(
      "short_code_taken",
      lastCode,
      `Could not allocate a unique short code after ${this.maxCreateAttempts} attempts`
    );
  }

  /**
   * Whether a custom alias could be used right now.
   */
  async checkAvailability(alias: string): Promise<AliasAvailability> {
    if (isReservedWord(alias)) {
      return { available: false, reason: "reserved", message: "This alias is reserved" };
    }
    const validation = validateCustomAlias(alias);
    if (!validation.valid) {
      return { available: false, reason: "invalid", message: validation.error };
    }
    if (await this.repository.existsByShortCode(alias)) {
      return { available: false, reason: "taken", message: "This alias is already taken" };
    }
    return { available: true };
  }

  // ===========================================================================
  // Queries
  // ===========================================================================

  async getShortUrl(shortCode: string): Promise<ShortUrlRecord | null> {
    const aggregate = await this.repository.getByShortCode(shortCode);
    return aggregate ? aggregate.record : null;
  }

  /**
   * @throws NotFoundError for an unknown code
   */
  async getStatistics(shortCode: string): Promise<ShortUrlStatistics> {
    const record = await this.getShortUrl(shortCode);
    if (!record) {
      throw new NotFoundError(shortCode);
    }
    return {
      shortCode: record.shortCode,
      status: record.status,
      accessCount: record.accessCount,
      lastAccessedAt: record.lastAccessedAt,
      createdAt: record.createdAt,
      expiresAt: record.expiresAt,
    };
  }

  /**
   * An owner's short URLs, newest first.
   *
   * @throws ValidationError when `skip` is negative or `take` is outside 1..100
   */
  async listShortUrls(ownerId: string, page: Partial<PageRequest> = {}): Promise<ShortUrlPage> {
    const skip = page.skip ?? 0;
    const take = page.take ?? PAGE_LIMITS.DEFAULT_TAKE;
    const details: Record<string, string[]> = {};
    if (!Number.isInteger(skip) || skip < 0) {
      details.skip = ["skip must be a non-negative integer"];
    }
    if (!Number.isInteger(take) || take < 1 || take > PAGE_LIMITS.MAX_TAKE) {
      details.take = [`take must be an integer between 1 and ${PAGE_LIMITS.MAX_TAKE}`];
    }
    if (Object.keys(details).length > 0) {
      throw new ValidationError(details);
    }
    return this.repository.listByOwner(ownerId, { skip, take });
  }

  // ===========================================================================
  // Lifecycle
  // ===========================================================================

  /**
   * Disable a short URL and drop it from the cache. Disabling twice is a
   * no-op that still succeeds.
   *
   * @throws NotFoundError for an unknown code
   */
  async disableShortUrl(
    shortCode: string,
    reason: DisableReason,
    adminNotes?: string
  ): Promise<{ disabled: boolean }> {
    const now = this.clock();
    const changed = await this.mutate(shortCode, (aggregate) => aggregate.disable(reason, adminNotes, now));

    await this.cache.invalidate(shortCode, invalidationReasonFor(reason));
    this.logger.info({ shortCode, reason, changed }, "Short URL disabled");
    return { disabled: changed };
  }

  /**
   * Delete as a status transition: the record is disabled with reason
   * "owner_deleted" and its code stays reserved forever.
   *
   * @throws NotFoundError for an unknown code
   */
  async deleteShortUrl(shortCode: string): Promise<{ deleted: boolean }> {
    const { disabled } = await this.disableShortUrl(shortCode, "owner_deleted");
    return { deleted: disabled };
  }

  /**
   * Move up to `limit` Active records past their expiry to Expired and drop
   * them from the cache. A code that fails is logged and left for the next run.
   */
  async expireStale(limit = 100): Promise<ExpirySweepResult> {
    const now = this.clock();
    const result: ExpirySweepResult = { expired: [], failed: [] };

    for (const shortCode of await this.repository.findExpiredCodes(now, limit)) {
      try {
        const changed = await this.mutate(shortCode, (aggregate) => aggregate.expire(now));
        await this.cache.invalidate(shortCode, "url_expired");
        if (changed) result.expired.push(shortCode);
      } catch (error) {
        this.logger.warn({ err: error, shortCode }, "Expiry sweep could not expire short URL");
        result.failed.push(shortCode);
      }
    }

    if (result.expired.length > 0 || result.failed.length > 0) {
      this.logger.info({ expired: result.expired.length, failed: result.failed.length }, "Expiry sweep finished");
    }
    return result;
  }

  // ===========================================================================
  // Access recording
  // ===========================================================================

  /**
   * Apply one access to the aggregate and persist it. Runs in the background
   * after a redirect; expiry and disabled checks live in the aggregate.
   */
  async recordAccess(
    shortCode: string,
    context: AccessContext,
    occurredAt: Date = this.clock()
  ): Promise<RecordAccessResult> {
    for (let attempt = 1; ; attempt++) {
      const aggregate = await this.repository.getByShortCode(shortCode);
      if (!aggregate) {
        this.logger.debug({ shortCode }, "Access for unknown short code ignored");
        return "unknown";
      }

      if (aggregate.status !== ShortUrlStatus.ACTIVE) {
        await this.cache.invalidate(
          shortCode,
          aggregate.status === ShortUrlStatus.EXPIRED ? "url_expired" : "url_disabled"
        );
        return "inactive";
      }

      const outcome = aggregate.recordAccess(context, occurredAt);
      const raised = aggregate.uncommittedEvents;
      const eventId = raised[raised.length - 1]?.eventId;

      try {
        await this.repository.save(aggregate, aggregate.committedVersion);
      } catch (error) {
        if (this.isVersionConflict(error) && attempt < this.maxWriteAttempts) {
          this.logger.debug({ shortCode, attempt }, "Concurrent access write, reloading");
          continue;
        }
        throw error;
      }

      if (outcome === "expired") {
        await this.cache.invalidate(shortCode, "url_expired");
        this.logger.info({ shortCode }, "Short URL expired");
      } else {
        await this.forwardAccess(shortCode, context, occurredAt, eventId);
      }
      return outcome;
    }
  }

  // ===========================================================================
  // Internals
  // ===========================================================================

  private isVersionConflict(error: unknown): boolean {
    return error instanceof ConflictError && error.reason === "version_mismatch";
  }

  /**
   * Load, apply `action`, save; reload and re-apply on a version conflict.
   */
  private async mutate<T>(shortCode: string, action: (aggregate: ShortUrlAggregate) => T): Promise<T> {
    for (let attempt = 1; ; attempt++) {
      const aggregate = await this.repository.getByShortCode(shortCode);
      if (!aggregate) {
        throw new NotFoundError(shortCode);
      }

      const result = action(aggregate);
      if (aggregate.uncommittedEvents.length === 0) {
        return result;
      }

      try {
        await this.repository.save(aggregate, aggregate.committedVersion);
        return result;
      } catch (error) {
        if (this.isVersionConflict(error) && attempt < this.maxWriteAttempts) {
          this.logger.warn({ shortCode, attempt }, "Concurrent modification, retrying");
          continue;
        }
        throw error;
      }
    }
  }

  private async forwardAccess(
    shortCode: string,
    context: AccessContext,
    occurredAt: Date,
    eventId: string | undefined
  ): Promise<void> {
    if (!this.accessSink || eventId === undefined) return;
    try {
      await this.accessSink.recordAccess({ ...context, shortCode, occurredAt, eventId });
    } catch (error) {
      this.logger.error({ err: error, shortCode }, "Failed to forward access to analytics");
    }
  }
}
