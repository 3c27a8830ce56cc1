/**
 * ShortUrlService Tests
 *
 * Runs against the in-memory adapters.
 * @see packages/core/src/service.ts
 */

import { describe, it, expect, jest, beforeEach } from "@jest/globals";
import { createSilentLogger } from "@snaplink/logger";
import { SnowflakeCodeGenerator, isBase62 } from "@snaplink/shared";
import {
  ShortUrlService,
  InMemoryShortUrlRepository,
  InMemoryUrlCache,
  ConflictError,
  NotFoundError,
  ValidationError,
  ShortUrlStatus,
  type AccessRecord,
} from "../src/index.js";
import { TestClock, scriptedGenerator } from "./helpers.js";

const logger = createSilentLogger();

describe("ShortUrlService", () => {
  let clock: TestClock;
  let repository: InMemoryShortUrlRepository;
  let cache: InMemoryUrlCache;

  beforeEach(() => {
    clock = new TestClock();
    repository = new InMemoryShortUrlRepository();
    cache = new InMemoryUrlCache(clock.nowMs);
  });

  function createService(overrides: Partial<ConstructorParameters<typeof ShortUrlService>[0]> = {}): ShortUrlService {
    return new ShortUrlService({
      repository,
      cache,
      generator: new SnowflakeCodeGenerator({ machineId: 1, clock: clock.nowMs }),
      logger,
      clock: clock.now,
      ...overrides,
    });
  }

  describe("createShortUrl", () => {
    it("should return the created record summary", async () => {
      const service = createService();
      const created = await service.createShortUrl({
        originalUrl: "https://example.com/page",
        ownerId: "owner-1",
        expiresAt: new Date("2026-02-01T00:00:00.000Z"),
      });

      expect(isBase62(created.shortCode)).toBe(true);
      expect(created.originalUrl).toBe("https://example.com/page");
      expect(created.createdAt).toEqual(clock.now());
      expect(created.expiresAt).toEqual(new Date("2026-02-01T00:00:00.000Z"));
      expect(created.isCustomAlias).toBe(false);
      expect(await repository.existsByShortCode(created.shortCode)).toBe(true);
    });

    it("should never hand out the same code across 1,000 concurrent creations", async () => {
      const service = createService();

      const results = await Promise.all(
        Array.from({ length: 1000 }, (_, i) =>
          service.createShortUrl({ originalUrl: `https://example.com/${i}`, ownerId: "owner-1" })
        )
      );

      const codes = new Set(results.map((r) => r.shortCode));
      expect(codes.size).toBe(1000);
      for (const code of codes) {
        expect(code).toMatch(/^[0-9A-Za-z]+$/);
      }
    });

    it("should not write the cache on creation", async () => {
      const service = createService();
      const created = await service.createShortUrl({ originalUrl: "https://example.com", ownerId: "owner-1" });

      expect(await cache.get(created.shortCode)).toBeNull();
    });

    it("should reject a custom alias that is already taken", async () => {
      const service = createService();
      await service.createShortUrl({ originalUrl: "https://example.com", ownerId: "owner-1", customAlias: "launch" });

      await expect(
        service.createShortUrl({ originalUrl: "https://example.org", ownerId: "owner-2", customAlias: "launch" })
      ).rejects.toThrow(ConflictError);
    });

    it("should surface validation errors before touching the store", async () => {
      const service = createService();
      const exists = jest.spyOn(repository, "existsByShortCode");

      await expect(
        service.createShortUrl({ originalUrl: "https://example.com", ownerId: "owner-1", customAlias: "ba--d" })
      ).rejects.toThrow(ValidationError);
      expect(exists).not.toHaveBeenCalled();
    });

    it("should regenerate when the store reports a generated code as taken", async () => {
      await createService().createShortUrl({
        originalUrl: "https://example.com",
        ownerId: "owner-1",
        customAlias: "taken1",
      });
      const generator = scriptedGenerator(["taken1", "fresh1"]);
      const service = createService({ generator });

      const created = await service.createShortUrl({ originalUrl: "https://example.org", ownerId: "owner-2" });

      expect(created.shortCode).toBe("fresh1");
      expect(generator.reserved).toEqual(["taken1"]);
    });

    it("should give up after the attempt budget", async () => {
      const seed = createService();
      for (const alias of ["dup1", "dup2"]) {
        await seed.createShortUrl({ originalUrl: "https://example.com", ownerId: "owner-1", customAlias: alias });
      }
      const service = createService({ generator: scriptedGenerator(["dup1", "dup2"]), maxCreateAttempts: 2 });

      await expect(
        service.createShortUrl({ originalUrl: "https://example.org", ownerId: "owner-2" })
      ).rejects.toThrow("Could not allocate a unique short code after 2 attempts");
    });
  });

  describe("checkAvailability", () => {
    it("should explain why an alias cannot be used", async () => {
      const service = createService();
      await service.createShortUrl({ originalUrl: "https://example.com", ownerId: "owner-1", customAlias: "promo" });

      expect(await service.checkAvailability("api")).toEqual({
        available: false,
        reason: "reserved",
        message: "This alias is reserved",
      });
      expect(await service.checkAvailability("ab")).toEqual({
        available: false,
        reason: "invalid",
        message: "Alias must be at least 3 characters",
      });
      expect(await service.checkAvailability("promo")).toEqual({
        available: false,
        reason: "taken",
        message: "This alias is already taken",
      });
      expect(await service.checkAvailability("promo-2")).toEqual({ available: true });
    });
  });

  describe("disableShortUrl", () => {
    it("should disable once and invalidate the cache every time", async () => {
      const service = createService();
      const { shortCode } = await service.createShortUrl({ originalUrl: "https://example.com", ownerId: "owner-1" });
      await cache.set(shortCode, "https://example.com", 3600);

      expect(await service.disableShortUrl(shortCode, "admin_action", "phishing report")).toEqual({ disabled: true });
      expect(await cache.get(shortCode)).toBeNull();
      expect(await service.disableShortUrl(shortCode, "admin_action")).toEqual({ disabled: false });

      const disabledEvents = repository.eventsFor(shortCode).filter((e) => e.type === "ShortUrlDisabled");
      expect(disabledEvents).toHaveLength(1);
      expect(cache.invalidations).toEqual([
        { shortCode, reason: "url_disabled" },
        { shortCode, reason: "url_disabled" },
      ]);
    });

    it("should use a security reason for policy actions", async () => {
      const service = createService();
      const { shortCode } = await service.createShortUrl({ originalUrl: "https://example.com", ownerId: "owner-1" });

      await service.disableShortUrl(shortCode, "suspicious_activity");

      expect(cache.invalidations).toEqual([{ shortCode, reason: "security_action" }]);
    });

    it("should reject an unknown code", async () => {
      await expect(createService().disableShortUrl("nope123", "spam")).rejects.toThrow(NotFoundError);
    });

    it("should retry after a concurrent write", async () => {
      const service = createService();
      const { shortCode } = await service.createShortUrl({ originalUrl: "https://example.com", ownerId: "owner-1" });
      const save = jest.spyOn(repository, "save");
      save.mockRejectedValueOnce(new ConflictError("version_mismatch", shortCode));

      expect(await service.disableShortUrl(shortCode, "spam")).toEqual({ disabled: true });
      expect(save).toHaveBeenCalledTimes(2);
    });
  });

  describe("deleteShortUrl", () => {
    it("should disable with owner_deleted and keep the code reserved", async () => {
      const service = createService();
      await service.createShortUrl({ originalUrl: "https://example.com", ownerId: "owner-1", customAlias: "old-link" });

      expect(await service.deleteShortUrl("old-link")).toEqual({ deleted: true });

      const record = await service.getShortUrl("old-link");
      expect(record?.status).toBe(ShortUrlStatus.DISABLED);
      expect(record?.disabledReason).toBe("owner_deleted");
      expect(cache.invalidations).toEqual([{ shortCode: "old-link", reason: "url_deleted" }]);
      await expect(
        service.createShortUrl({ originalUrl: "https://example.org", ownerId: "owner-2", customAlias: "old-link" })
      ).rejects.toThrow(ConflictError);
    });
  });

  describe("recordAccess", () => {
    it("should count accesses and forward them to the sink", async () => {
      const recordAccess = jest.fn<(access: AccessRecord) => Promise<void>>().mockResolvedValue(undefined);
      const service = createService({ accessSink: { recordAccess } });
      const { shortCode } = await service.createShortUrl({ originalUrl: "https://example.com", ownerId: "owner-1" });

      expect(await service.recordAccess(shortCode, { ipAddress: "203.0.113.5", userAgent: "curl/8.0" })).toBe("accessed");

      const stored = repository.eventsFor(shortCode)[1];
      expect(stored?.type).toBe("ShortUrlAccessed");
      expect(recordAccess).toHaveBeenCalledWith({
        shortCode,
        ipAddress: "203.0.113.5",
        userAgent: "curl/8.0",
        occurredAt: clock.now(),
        eventId: stored?.eventId,
      });
      expect((await service.getStatistics(shortCode)).accessCount).toBe(1);
    });

    it("should not fail when the sink fails", async () => {
      const recordAccess = jest.fn<(access: AccessRecord) => Promise<void>>().mockRejectedValue(new Error("queue down"));
      const service = createService({ accessSink: { recordAccess } });
      const { shortCode } = await service.createShortUrl({ originalUrl: "https://example.com", ownerId: "owner-1" });

      expect(await service.recordAccess(shortCode, {})).toBe("accessed");
    });

    it("should expire the record and invalidate the cache past expiresAt", async () => {
      const service = createService();
      const { shortCode } = await service.createShortUrl({
        originalUrl: "https://example.com",
        ownerId: "owner-1",
        expiresAt: new Date(clock.nowMs() + 100),
      });
      await cache.set(shortCode, "https://example.com", 3600);
      clock.advance(200);

      expect(await service.recordAccess(shortCode, {})).toBe("expired");

      const stats = await service.getStatistics(shortCode);
      expect(stats.status).toBe(ShortUrlStatus.EXPIRED);
      expect(stats.accessCount).toBe(0);
      expect(cache.invalidations).toEqual([{ shortCode, reason: "url_expired" }]);
      expect(await service.recordAccess(shortCode, {})).toBe("inactive");
    });

    it("should ignore unknown codes", async () => {
      expect(await createService().recordAccess("missing1", {})).toBe("unknown");
    });

    it("should reload and retry on a version conflict", async () => {
      const service = createService();
      const { shortCode } = await service.createShortUrl({ originalUrl: "https://example.com", ownerId: "owner-1" });
      jest.spyOn(repository, "save").mockRejectedValueOnce(new ConflictError("version_mismatch", shortCode));

      expect(await service.recordAccess(shortCode, {})).toBe("accessed");
      expect((await service.getStatistics(shortCode)).accessCount).toBe(1);
    });

    it("should keep every access when many run concurrently", async () => {
      const service = createService({ maxWriteAttempts: 20 });
      const { shortCode } = await service.createShortUrl({ originalUrl: "https://example.com", ownerId: "owner-1" });

      await Promise.all(Array.from({ length: 5 }, () => service.recordAccess(shortCode, {})));

      expect((await service.getStatistics(shortCode)).accessCount).toBe(5);
      expect(repository.eventsFor(shortCode).map((e) => e.version)).toEqual([1, 2, 3, 4, 5, 6]);
    });
  });

  describe("getStatistics", () => {
    it("should reject an unknown code", async () => {
      await expect(createService().getStatistics("missing1")).rejects.toThrow(NotFoundError);
    });
  });

  describe("listShortUrls", () => {
    async function seed(service: ShortUrlService): Promise<void> {
      for (const alias of ["alpha-1", "alpha-2", "alpha-3"]) {
        await service.createShortUrl({ originalUrl: `https://example.com/${alias}`, ownerId: "owner-1", customAlias: alias });
        clock.advance(1000);
      }
      await service.createShortUrl({ originalUrl: "https://example.com/other", ownerId: "owner-2", customAlias: "beta-1" });
    }

    it("should list only the owner's records, newest first", async () => {
      const service = createService();
      await seed(service);

      const page = await service.listShortUrls("owner-1");

      expect(page.total).toBe(3);
      expect(page.items.map((r) => r.shortCode)).toEqual(["alpha-3", "alpha-2", "alpha-1"]);
    });

    it("should apply skip and take", async () => {
      const service = createService();
      await seed(service);

      const page = await service.listShortUrls("owner-1", { skip: 1, take: 1 });

      expect(page.total).toBe(3);
      expect(page.items.map((r) => r.shortCode)).toEqual(["alpha-2"]);
    });

    it("should include disabled records", async () => {
      const service = createService();
      await seed(service);
      await service.deleteShortUrl("alpha-1");

      const page = await service.listShortUrls("owner-1");

      expect(page.items.find((r) => r.shortCode === "alpha-1")?.status).toBe(ShortUrlStatus.DISABLED);
    });

    it("should reject out-of-range paging", async () => {
      const service = createService();

      await expect(service.listShortUrls("owner-1", { take: 101 })).rejects.toThrow(ValidationError);
      await expect(service.listShortUrls("owner-1", { skip: -1, take: 0 })).rejects.toMatchObject({
        details: {
          skip: ["skip must be a non-negative integer"],
          take: ["take must be an integer between 1 and 100"],
        },
      });
    });
  });

  describe("expireStale", () => {
    async function seed(service: ShortUrlService): Promise<void> {
      await service.createShortUrl({
        originalUrl: "https://example.com/a",
        ownerId: "owner-1",
        customAlias: "short-lived",
        expiresAt: new Date(clock.nowMs() + 100),
      });
      await service.createShortUrl({
        originalUrl: "https://example.com/b",
        ownerId: "owner-1",
        customAlias: "long-lived",
        expiresAt: new Date(clock.nowMs() + 100_000),
      });
      await service.createShortUrl({ originalUrl: "https://example.com/c", ownerId: "owner-1", customAlias: "no-expiry" });
    }

    it("should expire passed records and drop them from the cache", async () => {
      const service = createService();
      await seed(service);
      await cache.set("short-lived", "https://example.com/a", 3600);
      clock.advance(200);

      expect(await service.expireStale()).toEqual({ expired: ["short-lived"], failed: [] });

      expect((await service.getStatistics("short-lived")).status).toBe(ShortUrlStatus.EXPIRED);
      expect((await service.getStatistics("long-lived")).status).toBe(ShortUrlStatus.ACTIVE);
      expect(repository.eventsFor("short-lived").map((e) => e.type)).toEqual(["ShortUrlCreated", "ShortUrlExpired"]);
      expect(cache.invalidations).toEqual([{ shortCode: "short-lived", reason: "url_expired" }]);
      expect(await cache.get("short-lived")).toBeNull();
    });

    it("should find nothing on a second run", async () => {
      const service = createService();
      await seed(service);
      clock.advance(200);
      await service.expireStale();

      expect(await service.expireStale()).toEqual({ expired: [], failed: [] });
    });

    it("should report codes it could not save and carry on", async () => {
      const service = createService();
      await seed(service);
      clock.advance(200_000);
      jest.spyOn(repository, "save").mockRejectedValueOnce(new Error("disk full"));

      expect(await service.expireStale()).toEqual({ expired: ["long-lived"], failed: ["short-lived"] });
    });
  });
});
