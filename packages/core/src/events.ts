/**
 * Domain events for the ShortUrl aggregate.
 *
 * Events are immutable and carry a per-aggregate version that starts at 1
 * and increases by exactly one per event.
 */

import type { DeviceInfo, GeoLocation } from "@snaplink/shared";

export enum ShortUrlStatus {
  /** Accepting redirects */
  ACTIVE = "active",
  /** Past its expiration date; discovered on first access */
  EXPIRED = "expired",
  /** Disabled by the owner or an administrator */
  DISABLED = "disabled",
  /** Held by policy; no in-scope operation sets it yet */
  SUSPENDED = "suspended",
}

export type DisableReason =
  | "admin_action"
  | "policy_violation"
  | "suspicious_activity"
  | "copyright"
  | "spam"
  | "owner_deleted";

export const DISABLE_REASONS: readonly DisableReason[] = [
  "admin_action",
  "policy_violation",
  "suspicious_activity",
  "copyright",
  "spam",
  "owner_deleted",
];

interface EventEnvelope {
  readonly aggregateId: string;
  readonly eventId: string;
  readonly version: number;
  readonly occurredAt: Date;
}

export interface ShortUrlCreated extends EventEnvelope {
  readonly type: "ShortUrlCreated";
  readonly shortCode: string;
  readonly originalUrl: string;
  readonly createdBy: string;
  readonly expiresAt: Date | null;
  readonly metadata: Readonly<Record<string, string>>;
  readonly isCustomAlias: boolean;
}

export interface ShortUrlAccessed extends EventEnvelope {
  readonly type: "ShortUrlAccessed";
  readonly ipAddress?: string;
  readonly userAgent?: string;
  readonly referrer?: string;
  readonly geo?: GeoLocation;
  readonly device?: DeviceInfo;
}

export interface ShortUrlExpired extends EventEnvelope {
  readonly type: "ShortUrlExpired";
  readonly expiredAt: Date;
}

export interface ShortUrlDisabled extends EventEnvelope {
  readonly type: "ShortUrlDisabled";
  readonly reason: DisableReason;
  readonly adminNotes?: string;
}

export type ShortUrlEvent = ShortUrlCreated | ShortUrlAccessed | ShortUrlExpired | ShortUrlDisabled;

export type ShortUrlEventType = ShortUrlEvent["type"];

export const SHORT_URL_EVENT_TYPES: readonly ShortUrlEventType[] = [
  "ShortUrlCreated",
  "ShortUrlAccessed",
  "ShortUrlExpired",
  "ShortUrlDisabled",
];
