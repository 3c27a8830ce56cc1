/**
 * ShortUrlResolver Tests
 * @see packages/core/src/resolver.ts
 */

import { describe, it, expect, jest, beforeEach, afterEach } from "@jest/globals";
import { createSilentLogger } from "@snaplink/logger";
import { SnowflakeCodeGenerator } from "@snaplink/shared";
import {
  AccessRecorder,
  InMemoryShortUrlRepository,
  InMemoryUrlCache,
  ShortUrlResolver,
  ShortUrlService,
  TransientInfrastructureError,
  type ShortUrlRecord,
} from "../src/index.js";
import { TestClock } from "./helpers.js";

const logger = createSilentLogger();

describe("ShortUrlResolver", () => {
  let clock: TestClock;
  let repository: InMemoryShortUrlRepository;
  let cache: InMemoryUrlCache;
  let service: ShortUrlService;
  let recorder: AccessRecorder;
  let resolver: ShortUrlResolver;

  function createResolver(storeTimeoutMs = 1000): ShortUrlResolver {
    return new ShortUrlResolver({
      repository,
      cache,
      accessHandler: service,
      recorder,
      logger,
      clock: clock.now,
      storeTimeoutMs,
    });
  }

  beforeEach(() => {
    clock = new TestClock();
    repository = new InMemoryShortUrlRepository();
    cache = new InMemoryUrlCache(clock.nowMs);
    service = new ShortUrlService({
      repository,
      cache,
      generator: new SnowflakeCodeGenerator({ machineId: 3, clock: clock.nowMs }),
      logger,
      clock: clock.now,
    });
    recorder = new AccessRecorder({ logger });
    resolver = createResolver();
  });

  afterEach(async () => {
    await recorder.close();
  });

  it("should serve the first lookup from the store and the second from cache", async () => {
    await service.createShortUrl({ originalUrl: "https://example.com", ownerId: "owner-1", customAlias: "abc123" });
    const storeLookup = jest.spyOn(repository, "findActiveByShortCode");

    expect(await resolver.resolve("abc123")).toEqual({
      found: true,
      originalUrl: "https://example.com",
      source: "store",
    });
    expect(await resolver.resolve("abc123")).toEqual({
      found: true,
      originalUrl: "https://example.com",
      source: "cache",
    });
    expect(storeLookup).toHaveBeenCalledTimes(1);
  });

  it("should record each redirect in the background", async () => {
    await service.createShortUrl({ originalUrl: "https://example.com", ownerId: "owner-1", customAlias: "counted" });

    await resolver.resolve("counted", { userAgent: "curl/8.0" });
    await resolver.resolve("counted", { userAgent: "curl/8.0" });
    await recorder.drain();

    expect((await service.getStatistics("counted")).accessCount).toBe(2);
  });

  it("should report unknown codes as not found", async () => {
    expect(await resolver.resolve("nothing")).toEqual({ found: false });
  });

  it("should report disabled codes as not found", async () => {
    await service.createShortUrl({ originalUrl: "https://example.com", ownerId: "owner-1", customAlias: "gone" });
    await resolver.resolve("gone");
    await service.disableShortUrl("gone", "spam");

    expect(await resolver.resolve("gone")).toEqual({ found: false });
  });

  it("should report expired codes as not found", async () => {
    await service.createShortUrl({
      originalUrl: "https://example.com",
      ownerId: "owner-1",
      customAlias: "brief",
      expiresAt: new Date(clock.nowMs() + 100),
    });
    clock.advance(200);

    expect(await resolver.resolve("brief")).toEqual({ found: false });
  });

  it("should fall through to the store when the cache fails", async () => {
    await service.createShortUrl({ originalUrl: "https://example.com", ownerId: "owner-1", customAlias: "fallback" });
    jest.spyOn(cache, "get").mockRejectedValueOnce(new Error("connection reset"));

    expect(await resolver.resolve("fallback")).toEqual({
      found: true,
      originalUrl: "https://example.com",
      source: "store",
    });
  });

  it("should surface a store timeout as a transient error", async () => {
    jest
      .spyOn(repository, "findActiveByShortCode")
      .mockReturnValueOnce(new Promise<ShortUrlRecord | null>(() => undefined));
    const slowResolver = createResolver(20);

    await expect(slowResolver.resolve("slow123")).rejects.toThrow(TransientInfrastructureError);
  });

  it("should surface store failures on a cache miss as transient", async () => {
    jest.spyOn(repository, "findActiveByShortCode").mockRejectedValueOnce(new Error("connection refused"));

    await expect(resolver.resolve("broken1")).rejects.toThrow(TransientInfrastructureError);
  });

  it("should cap the cache TTL at the time left before expiry", async () => {
    await service.createShortUrl({
      originalUrl: "https://example.com",
      ownerId: "owner-1",
      customAlias: "soon",
      expiresAt: new Date(clock.nowMs() + 90_000),
    });
    const cacheSet = jest.spyOn(cache, "set");

    await resolver.resolve("soon");

    expect(cacheSet).toHaveBeenCalledWith("soon", "https://example.com", 90);
  });

  it("should use the default TTL for records without expiry", async () => {
    await service.createShortUrl({ originalUrl: "https://example.com", ownerId: "owner-1", customAlias: "forever" });
    const cacheSet = jest.spyOn(cache, "set");

    await resolver.resolve("forever");

    expect(cacheSet).toHaveBeenCalledWith("forever", "https://example.com", 3600);
  });

  it("should expire a stale cache entry through the background access", async () => {
    await service.createShortUrl({
      originalUrl: "https://example.com",
      ownerId: "owner-1",
      customAlias: "stale",
      expiresAt: new Date(clock.nowMs() + 100),
    });
    await cache.set("stale", "https://example.com", 3600);
    clock.advance(200);

    expect(await resolver.resolve("stale")).toEqual({
      found: true,
      originalUrl: "https://example.com",
      source: "cache",
    });
    await recorder.drain();

    expect(cache.invalidations).toEqual([{ shortCode: "stale", reason: "url_expired" }]);
    expect(await resolver.resolve("stale")).toEqual({ found: false });
  });

  it("should not re-cache a destination disabled while its store read was in flight", async () => {
    await service.createShortUrl({ originalUrl: "https://example.com", ownerId: "owner-1", customAlias: "racing" });
    const snapshot = await repository.findActiveByShortCode("racing", clock.now());
    let release: () => void = () => undefined;
    const gate = new Promise<void>((resolve) => {
      release = resolve;
    });
    jest.spyOn(repository, "findActiveByShortCode").mockImplementationOnce(async () => {
      await gate;
      return snapshot;
    });

    const inFlight = resolver.resolve("racing");
    await service.disableShortUrl("racing", "admin_action");
    release();

    expect(await inFlight).toEqual({ found: true, originalUrl: "https://example.com", source: "store" });
    await recorder.drain();

    expect(await cache.get("racing")).toBeNull();
    expect(await resolver.resolve("racing")).toEqual({ found: false });
  });
});
