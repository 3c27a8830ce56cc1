/**
 * ShortUrl Aggregate Tests
 *
 * @see packages/core/src/aggregate.ts
 */

import { describe, it, expect } from "@jest/globals";
import {
  ShortUrlAggregate,
  ShortUrlStatus,
  ValidationError,
  NotFoundError,
  type CreateShortUrlInput,
} from "../src/index.js";
import { scriptedGenerator } from "./helpers.js";

const T0 = new Date("2026-01-01T00:00:00.000Z");

function at(offsetMs: number): Date {
  return new Date(T0.getTime() + offsetMs);
}

function createAggregate(overrides: Partial<CreateShortUrlInput> = {}): ShortUrlAggregate {
  return ShortUrlAggregate.create(
    { originalUrl: "https://example.com", ownerId: "owner-1", ...overrides },
    { now: T0, generator: scriptedGenerator(["gen0001"]) }
  );
}

describe("ShortUrlAggregate", () => {
  describe("create", () => {
    it("should emit ShortUrlCreated at version 1 with a generated code", () => {
      const aggregate = createAggregate();

      expect(aggregate.shortCode).toBe("gen0001");
      expect(aggregate.status).toBe(ShortUrlStatus.ACTIVE);
      expect(aggregate.version).toBe(1);
      expect(aggregate.committedVersion).toBe(0);
      expect(aggregate.record.accessCount).toBe(0);
      expect(aggregate.record.isCustomAlias).toBe(false);
      expect(aggregate.uncommittedEvents.map((e) => e.type)).toEqual(["ShortUrlCreated"]);
      expect(aggregate.uncommittedEvents[0]?.version).toBe(1);
    });

    it("should use a custom alias instead of generating", () => {
      const generator = scriptedGenerator([]);
      const aggregate = ShortUrlAggregate.create(
        { originalUrl: "https://example.com", ownerId: "owner-1", customAlias: "my-custom-link" },
        { now: T0, generator }
      );

      expect(aggregate.shortCode).toBe("my-custom-link");
      expect(aggregate.record.isCustomAlias).toBe(true);
    });

    it("should keep expiry and metadata", () => {
      const aggregate = createAggregate({ expiresAt: at(60_000), metadata: { source: "newsletter" } });

      expect(aggregate.record.expiresAt).toEqual(at(60_000));
      expect(aggregate.record.metadata).toEqual({ source: "newsletter" });
    });

    it("should report every invalid field at once", () => {
      let caught: unknown;
      try {
        createAggregate({
          originalUrl: "ftp://example.com",
          ownerId: " ",
          customAlias: "-bad",
          expiresAt: at(-1000),
        });
      } catch (error) {
        caught = error;
      }

      expect(caught).toBeInstanceOf(ValidationError);
      expect(caught instanceof ValidationError ? caught.details : null).toEqual({
        originalUrl: ["URL must use http or https"],
        ownerId: ["Owner is required"],
        customAlias: ["Alias cannot start or end with a hyphen"],
        expiresAt: ["Expiration date must be in the future"],
      });
    });

    it("should reject oversized metadata", () => {
      const metadata: Record<string, string> = {};
      for (let i = 0; i < 11; i++) metadata[`k${i}`] = "v";

      expect(() => createAggregate({ metadata })).toThrow(ValidationError);
    });
  });

  describe("recordAccess", () => {
    it("should count five sequential accesses and keep the last timestamp", () => {
      const aggregate = createAggregate();

      for (let i = 1; i <= 5; i++) {
        expect(aggregate.recordAccess({ ipAddress: "203.0.113.5" }, at(i * 1000))).toBe("accessed");
      }

      expect(aggregate.record.accessCount).toBe(5);
      expect(aggregate.record.lastAccessedAt).toEqual(at(5000));
      expect(aggregate.version).toBe(6);
    });

    it("should expire instead of counting an access past expiresAt", () => {
      const aggregate = createAggregate({ expiresAt: at(100) });

      expect(aggregate.recordAccess({}, at(200))).toBe("expired");

      expect(aggregate.status).toBe(ShortUrlStatus.EXPIRED);
      expect(aggregate.record.accessCount).toBe(0);
      expect(aggregate.record.lastAccessedAt).toBeNull();
      expect(aggregate.uncommittedEvents.map((e) => e.type)).toEqual(["ShortUrlCreated", "ShortUrlExpired"]);
    });

    it("should carry the access context on the event", () => {
      const aggregate = createAggregate();
      aggregate.recordAccess(
        {
          ipAddress: "203.0.113.5",
          userAgent: "Mozilla/5.0",
          referrer: "https://news.example.org/",
          geo: { country: "DE" },
          device: { type: "desktop", browser: "Firefox", os: "Linux" },
        },
        at(1000)
      );

      expect(aggregate.uncommittedEvents[1]).toMatchObject({
        type: "ShortUrlAccessed",
        version: 2,
        ipAddress: "203.0.113.5",
        userAgent: "Mozilla/5.0",
        referrer: "https://news.example.org/",
        geo: { country: "DE" },
        device: { type: "desktop", browser: "Firefox", os: "Linux" },
      });
    });

    it("should refuse access once disabled", () => {
      const aggregate = createAggregate();
      aggregate.disable("spam", undefined, at(10));

      expect(() => aggregate.recordAccess({}, at(20))).toThrow(NotFoundError);
      expect(aggregate.record.accessCount).toBe(0);
    });

    it("should refuse access once expired", () => {
      const aggregate = createAggregate({ expiresAt: at(100) });
      aggregate.recordAccess({}, at(200));

      let caught: unknown;
      try {
        aggregate.recordAccess({}, at(300));
      } catch (error) {
        caught = error;
      }
      expect(caught).toBeInstanceOf(NotFoundError);
      expect(caught instanceof NotFoundError ? caught.reason : null).toBe("inactive");
    });
  });

  describe("disable", () => {
    it("should emit exactly one ShortUrlDisabled when called twice", () => {
      const aggregate = createAggregate();

      expect(aggregate.disable("admin_action", "reported by support", at(10))).toBe(true);
      expect(aggregate.disable("admin_action", undefined, at(20))).toBe(false);

      const disabledEvents = aggregate.uncommittedEvents.filter((e) => e.type === "ShortUrlDisabled");
      expect(disabledEvents).toHaveLength(1);
      expect(disabledEvents[0]).toMatchObject({ reason: "admin_action", adminNotes: "reported by support" });
      expect(aggregate.record.disabledReason).toBe("admin_action");
      expect(aggregate.record.disabledAt).toEqual(at(10));
    });

    it("should not leave the Expired state", () => {
      const aggregate = createAggregate({ expiresAt: at(100) });
      aggregate.recordAccess({}, at(200));

      expect(aggregate.disable("spam", undefined, at(300))).toBe(false);
      expect(aggregate.status).toBe(ShortUrlStatus.EXPIRED);
    });
  });

  describe("expire", () => {
    it("should emit ShortUrlExpired once the expiry has passed", () => {
      const aggregate = createAggregate({ expiresAt: at(100) });

      expect(aggregate.expire(at(50))).toBe(false);
      expect(aggregate.expire(at(100))).toBe(true);
      expect(aggregate.expire(at(200))).toBe(false);

      expect(aggregate.uncommittedEvents.map((e) => e.type)).toEqual(["ShortUrlCreated", "ShortUrlExpired"]);
      expect(aggregate.status).toBe(ShortUrlStatus.EXPIRED);
    });

    it("should leave records without an expiry alone", () => {
      const aggregate = createAggregate();

      expect(aggregate.expire(at(10_000_000))).toBe(false);
      expect(aggregate.status).toBe(ShortUrlStatus.ACTIVE);
    });

    it("should not expire a disabled record", () => {
      const aggregate = createAggregate({ expiresAt: at(100) });
      aggregate.disable("spam", undefined, at(50));

      expect(aggregate.expire(at(200))).toBe(false);
      expect(aggregate.status).toBe(ShortUrlStatus.DISABLED);
    });
  });

  describe("fromEvents", () => {
    it("should rebuild the same state from the event stream", () => {
      const original = createAggregate({ metadata: { campaign: "spring" } });
      original.recordAccess({ ipAddress: "203.0.113.5" }, at(1000));
      original.recordAccess({ ipAddress: "203.0.113.6" }, at(2000));
      original.disable("copyright", undefined, at(3000));

      const rebuilt = ShortUrlAggregate.fromEvents([...original.uncommittedEvents].reverse());

      expect(rebuilt.record).toEqual(original.record);
      expect(rebuilt.committedVersion).toBe(4);
      expect(rebuilt.uncommittedEvents).toHaveLength(0);
    });

    it("should continue versions after a rebuild", () => {
      const original = createAggregate();
      const rebuilt = ShortUrlAggregate.fromEvents(original.uncommittedEvents);

      rebuilt.recordAccess({}, at(1000));

      expect(rebuilt.uncommittedEvents.map((e) => e.version)).toEqual([2]);
    });
  });

  describe("markCommitted", () => {
    it("should clear pending events and move the committed version", () => {
      const aggregate = createAggregate();
      aggregate.recordAccess({}, at(1000));
      aggregate.markCommitted();

      expect(aggregate.uncommittedEvents).toHaveLength(0);
      expect(aggregate.committedVersion).toBe(2);
    });
  });
});
