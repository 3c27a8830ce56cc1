/**
 * Short URL Resolver - the redirect hot path
 *
 * Flow:
 * 1. Cache lookup (errors and timeouts count as a miss)
 * 2. On miss, durable store lookup for an Active, unexpired record
 * 3. On store hit, write the cache with a bounded TTL
 * 4. Schedule access recording in the background and return
 *
 * Expiry and disabled rules are enforced by the aggregate when the access is
 * recorded, not here.
 */

import type { Logger } from "@snaplink/logger";
import { TimeoutError, withTimeout, type AccessContext } from "@snaplink/shared";
import type { AccessRecorder } from "./access-recorder.js";
import { TransientInfrastructureError, isShortUrlError } from "./errors.js";
import { systemClock, type Clock, type ShortUrlRepository, type UrlCache } from "./ports.js";
import type { AccessHandler } from "./service.js";
import type { ShortUrlRecord } from "./state.js";

export type ResolveSource = "cache" | "store";

export type ResolveResult =
  | { found: true; originalUrl: string; source: ResolveSource }
  | { found: false };

export interface ShortUrlResolverOptions {
  repository: ShortUrlRepository;
  cache: UrlCache;
  accessHandler: AccessHandler;
  recorder: AccessRecorder;
  logger: Logger;
  clock?: Clock;
  /** Cache TTL for store hits (default 3600) */
  cacheTtlSeconds?: number;
  /** Bound on a cache read or write (default 50) */
  cacheTimeoutMs?: number;
  /** Bound on the store lookup (default 1000) */
  storeTimeoutMs?: number;
}

const NOT_FOUND: ResolveResult = { found: false };

export class ShortUrlResolver {
  private readonly repository: ShortUrlRepository;
  private readonly cache: UrlCache;
  private readonly accessHandler: AccessHandler;
  private readonly recorder: AccessRecorder;
  private readonly logger: Logger;
  private readonly clock: Clock;
  private readonly cacheTtlSeconds: number;
  private readonly cacheTimeoutMs: number;
  private readonly storeTimeoutMs: number;

  constructor(options: ShortUrlResolverOptions) {
    this.repository = options.repository;
    this.cache = options.cache;
    this.accessHandler = options.accessHandler;
    this.recorder = options.recorder;
    this.logger = options.logger;
    this.clock = options.clock ?? systemClock;
    this.cacheTtlSeconds = options.cacheTtlSeconds ?? 3600;
    this.cacheTimeoutMs = options.cacheTimeoutMs ?? 50;
    this.storeTimeoutMs = options.storeTimeoutMs ?? 1000;
  }

  /**
   * Resolve a short code to its destination.
   *
   * @throws TransientInfrastructureError when the store fails or times out on a
   *   cache miss
   */
  async resolve(shortCode: string, context: AccessContext = {}): Promise<ResolveResult> {
    const now = this.clock();

    const cached = await this.readCache(shortCode);
    if (cached !== null) {
      this.scheduleAccess(shortCode, context, now);
      return { found: true, originalUrl: cached, source: "cache" };
    }

    const record = await this.readStore(shortCode, now);
    if (!record) {
      return NOT_FOUND;
    }

    await this.writeCache(record, now);
    this.scheduleAccess(shortCode, context, now);
    return { found: true, originalUrl: record.originalUrl, source: "store" };
  }

  // ===========================================================================
  // Tiers
  // ===========================================================================

  private async readCache(shortCode: string): Promise<string | null> {
    try {
      return await withTimeout(this.cache.get(shortCode), this.cacheTimeoutMs, "cache get");
    } catch (error) {
      this.logger.warn({ err: error, shortCode }, "Cache read failed, falling through to store");
      return null;
    }
  }

  private async readStore(shortCode: string, now: Date): Promise<ShortUrlRecord | null> {
    try {
      return await withTimeout(
        this.repository.findActiveByShortCode(shortCode, now),
        this.storeTimeoutMs,
        "store lookup"
      );
    } catch (error) {
      if (isShortUrlError(error)) throw error;
      const message = error instanceof TimeoutError ? error.message : "Store lookup failed";
      throw new TransientInfrastructureError("store", message, error);
    }
  }

  /**
   * Cache a store hit. The TTL never outlives the record's expiry.
   */
  private async writeCache(record: ShortUrlRecord, now: Date): Promise<void> {
    let ttlSeconds = this.cacheTtlSeconds;
    if (record.expiresAt) {
      const remaining = Math.floor((record.expiresAt.getTime() - now.getTime()) / 1000);
      ttlSeconds = Math.min(ttlSeconds, remaining);
    }
    if (ttlSeconds <= 0) return;

    try {
      await withTimeout(
        this.cache.set(record.shortCode, record.originalUrl, ttlSeconds),
        this.cacheTimeoutMs,
        "cache set"
      );
    } catch (error) {
      this.logger.warn({ err: error, shortCode: record.shortCode }, "Cache write failed");
    }
  }

  private scheduleAccess(shortCode: string, context: AccessContext, occurredAt: Date): void {
    this.recorder.schedule(`access:${shortCode}`, () =>
      this.accessHandler.recordAccess(shortCode, context, occurredAt)
    );
  }
}
