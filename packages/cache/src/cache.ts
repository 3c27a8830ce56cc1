/**
 * Redis URL Cache
 *
 * Short code → destination URL, written on store hits by the resolver and
 * dropped on disable, delete and expiry.
 *
 * Key Schema:
 *   sl:v1:url:{shortCode} - Cached destination (JSON)
 *
 * Keys are versioned so a change to the cached shape can roll out without
 * reading old entries. Invalidation overwrites the entry with a short-lived
 * tombstone and writes use NX, so a resolver that read the store before a
 * disable cannot put the old destination back. TTLs carry ±8% jitter to spread mass expiry, but never
 * exceed the TTL the caller asked for, since callers cap it at the record's
 * own expiry.
 */

import type { Logger } from "@snaplink/logger";
import type { InvalidationReason, UrlCache } from "@snaplink/core";
import { createRedisClient, type RedisClientOptions, type RedisCommands } from "./client.js";

export const URL_KEY_PREFIX = "sl:v1:url:";

const TTL_JITTER_RATIO = 0.08;

/** Outlives any store read a resolver can have in flight when the entry is invalidated. */
export const DEFAULT_TOMBSTONE_TTL_SECONDS = 60;

export interface CachedUrl {
  url: string;
  /** Unix ms when cached */
  cachedAt: number;
}

/** Written in place of an entry on invalidation; reads treat it as a miss. */
export interface Tombstone {
  invalidated: string;
  at: number;
}

export interface RedisUrlCacheOptions {
  logger: Logger;
  tombstoneTtlSeconds?: number;
  /** Jitter source in [0, 1), defaults to Math.random */
  random?: () => number;
  now?: () => number;
}

export function urlKey(shortCode: string): string {
  return `${URL_KEY_PREFIX}${shortCode}`;
}

/**
 * Shrink `ttlSeconds` by up to 8% (and never below 1 second). Jitter only
 * ever shortens, so an entry cannot outlive the record it mirrors.
 */
export function jitterTtl(ttlSeconds: number, random: () => number = Math.random): number {
  const jitter = ttlSeconds * TTL_JITTER_RATIO * random();
  return Math.max(1, Math.floor(ttlSeconds - jitter));
}

function parseCachedUrl(raw: string): CachedUrl | Tombstone | null {
  try {
    const value: unknown = JSON.parse(raw);
    if (
      typeof value === "object" &&
      value !== null &&
      "invalidated" in value &&
      typeof value.invalidated === "string" &&
      "at" in value &&
      typeof value.at === "number"
    ) {
      return { invalidated: value.invalidated, at: value.at };
    }
    if (
      typeof value === "object" &&
      value !== null &&
      "url" in value &&
      typeof value.url === "string" &&
      "cachedAt" in value &&
      typeof value.cachedAt === "number"
    ) {
      return { url: value.url, cachedAt: value.cachedAt };
    }
  } catch {
    return null;
  }
  return null;
}

export class RedisUrlCache implements UrlCache {
  private readonly client: RedisCommands;
  private readonly logger: Logger;
  private readonly random: () => number;
  private readonly now: () => number;
  private readonly tombstoneTtlSeconds: number;

  constructor(client: RedisCommands, options: RedisUrlCacheOptions) {
    this.client = client;
    this.logger = options.logger;
    this.random = options.random ?? Math.random;
    this.now = options.now ?? Date.now;
    this.tombstoneTtlSeconds = options.tombstoneTtlSeconds ?? DEFAULT_TOMBSTONE_TTL_SECONDS;
  }

  async get(shortCode: string): Promise<string | null> {
    const raw = await this.client.get(urlKey(shortCode));
    if (raw === null) return null;

    const cached = parseCachedUrl(raw);
    if (!cached) {
      this.logger.warn({ shortCode }, "Discarding malformed cache entry");
      await this.client.del(urlKey(shortCode));
      return null;
    }
    if ("invalidated" in cached) return null;
    return cached.url;
  }

  async set(shortCode: string, originalUrl: string, ttlSeconds: number): Promise<void> {
    if (ttlSeconds <= 0) return;
    const value: CachedUrl = { url: originalUrl, cachedAt: this.now() };
    const written = await this.client.set(
      urlKey(shortCode),
      JSON.stringify(value),
      "EX",
      jitterTtl(ttlSeconds, this.random),
      "NX"
    );
    if (written === null) {
      this.logger.debug({ shortCode }, "Cache write skipped, key already present");
    }
  }

  async invalidate(shortCode: string, reason: InvalidationReason): Promise<void> {
    const tombstone: Tombstone = { invalidated: reason, at: this.now() };
    await this.client.setex(urlKey(shortCode), this.tombstoneTtlSeconds, JSON.stringify(tombstone));
    this.logger.info({ shortCode, reason }, "Cache entry invalidated");
  }

  async ping(): Promise<boolean> {
    try {
      return (await this.client.ping()) === "PONG";
    } catch (error) {
      this.logger.warn({ err: error }, "Redis ping failed");
      return false;
    }
  }

  async disconnect(): Promise<void> {
    await this.client.quit();
  }
}

/**
 * Create a RedisUrlCache backed by a fresh ioredis client.
 */
export function createRedisUrlCache(
  options: RedisClientOptions & { logger: Logger; tombstoneTtlSeconds?: number }
): RedisUrlCache {
  const client = createRedisClient(options);
  return new RedisUrlCache(client, { logger: options.logger, tombstoneTtlSeconds: options.tombstoneTtlSeconds });
}
