/**
 * Redis URL Cache Tests
 *
 * Runs against an in-memory stand-in for the Redis commands the cache uses.
 */

import { describe, it, expect, jest, beforeEach } from "@jest/globals";
import { createSilentLogger } from "@snaplink/logger";
import { RedisUrlCache, jitterTtl, urlKey, type RedisCommands } from "../src/index.js";

class FakeRedis implements RedisCommands {
  readonly store = new Map<string, { value: string; ttl: number }>();

  async get(key: string): Promise<string | null> {
    return this.store.get(key)?.value ?? null;
  }

  async set(key: string, value: string, _ex: "EX", seconds: number, _nx: "NX"): Promise<"OK" | null> {
    if (this.store.has(key)) return null;
    this.store.set(key, { value, ttl: seconds });
    return "OK";
  }

  async setex(key: string, seconds: number, value: string): Promise<string> {
    this.store.set(key, { value, ttl: seconds });
    return "OK";
  }

  async del(...keys: string[]): Promise<number> {
    let removed = 0;
    for (const key of keys) {
      if (this.store.delete(key)) removed++;
    }
    return removed;
  }

  async ping(): Promise<string> {
    return "PONG";
  }

  async quit(): Promise<string> {
    return "OK";
  }
}

describe("RedisUrlCache", () => {
  let redis: FakeRedis;
  let cache: RedisUrlCache;

  beforeEach(() => {
    redis = new FakeRedis();
    cache = new RedisUrlCache(redis, {
      logger: createSilentLogger(),
      random: () => 0,
      now: () => 1767225600000,
    });
  });

  it("should use a versioned key per short code", () => {
    expect(urlKey("abc123")).toBe("sl:v1:url:abc123");
  });

  it("should store the destination as JSON under the url key", async () => {
    await cache.set("abc123", "https://example.com", 3600);

    expect(redis.store.get("sl:v1:url:abc123")).toEqual({
      value: '{"url":"https://example.com","cachedAt":1767225600000}',
      ttl: 3600,
    });
    expect(await cache.get("abc123")).toBe("https://example.com");
  });

  it("should return null on a miss", async () => {
    expect(await cache.get("missing")).toBeNull();
  });

  it("should skip writes with no time left", async () => {
    await cache.set("abc123", "https://example.com", 0);

    expect(redis.store.size).toBe(0);
  });

  it("should discard malformed entries", async () => {
    redis.store.set("sl:v1:url:bad", { value: "not-json", ttl: 60 });

    expect(await cache.get("bad")).toBeNull();
    expect(redis.store.has("sl:v1:url:bad")).toBe(false);
  });

  it("should replace the entry with a tombstone on invalidation", async () => {
    await cache.set("abc123", "https://example.com", 3600);

    await cache.invalidate("abc123", "url_disabled");

    expect(redis.store.get("sl:v1:url:abc123")).toEqual({
      value: '{"invalidated":"url_disabled","at":1767225600000}',
      ttl: 60,
    });
    expect(await cache.get("abc123")).toBeNull();
  });

  it("should not let a late write overwrite an invalidation", async () => {
    await cache.invalidate("abc123", "admin_action");

    await cache.set("abc123", "https://example.com", 3600);

    expect(await cache.get("abc123")).toBeNull();
    expect(redis.store.get("sl:v1:url:abc123")?.value).toBe('{"invalidated":"admin_action","at":1767225600000}');
  });

  it("should honour a custom tombstone TTL", async () => {
    const shortLived = new RedisUrlCache(redis, { logger: createSilentLogger(), now: () => 0, tombstoneTtlSeconds: 5 });

    await shortLived.invalidate("abc123", "url_deleted");

    expect(redis.store.get("sl:v1:url:abc123")?.ttl).toBe(5);
  });

  it("should let read errors reach the caller", async () => {
    jest.spyOn(redis, "get").mockRejectedValueOnce(new Error("ECONNRESET"));

    await expect(cache.get("abc123")).rejects.toThrow("ECONNRESET");
  });

  it("should report ping failures as unhealthy", async () => {
    expect(await cache.ping()).toBe(true);

    jest.spyOn(redis, "ping").mockRejectedValueOnce(new Error("ECONNREFUSED"));

    expect(await cache.ping()).toBe(false);
  });
});

describe("jitterTtl", () => {
  it("should only ever shorten the TTL, by at most 8%", () => {
    expect(jitterTtl(3600, () => 0)).toBe(3600);
    expect(jitterTtl(3600, () => 0.5)).toBe(3456);
    expect(jitterTtl(3600, () => 0.999)).toBe(3312);
  });

  it("should never go below one second", () => {
    expect(jitterTtl(1, () => 0.99)).toBe(1);
  });
});
