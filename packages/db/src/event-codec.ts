/**
 * Event and projection row codecs
 *
 * Events are stored whole as JSONB; dates come back as ISO strings and are
 * revived here. Anything that does not parse is a corrupt stream and throws.
 */

import { z } from "zod";
import { ShortUrlStatus, type ShortUrlEvent, type ShortUrlRecord } from "@snaplink/core";

const disableReasonSchema = z.enum([
  "admin_action",
  "policy_violation",
  "suspicious_activity",
  "copyright",
  "spam",
  "owner_deleted",
]);

const envelope = {
  aggregateId: z.string(),
  eventId: z.string(),
  version: z.number().int().positive(),
  occurredAt: z.coerce.date(),
};

const geoSchema = z.object({
  country: z.string().optional(),
  region: z.string().optional(),
  city: z.string().optional(),
});

const deviceSchema = z.object({
  type: z.enum(["desktop", "mobile", "tablet", "bot", "unknown"]),
  browser: z.string().optional(),
  os: z.string().optional(),
});

export const shortUrlEventSchema: z.ZodType<ShortUrlEvent, z.ZodTypeDef, unknown> = z.discriminatedUnion("type", [
  z.object({
    ...envelope,
    type: z.literal("ShortUrlCreated"),
    shortCode: z.string(),
    originalUrl: z.string(),
    createdBy: z.string(),
    expiresAt: z.coerce.date().nullable(),
    metadata: z.record(z.string()),
    isCustomAlias: z.boolean(),
  }),
  z.object({
    ...envelope,
    type: z.literal("ShortUrlAccessed"),
    ipAddress: z.string().optional(),
    userAgent: z.string().optional(),
    referrer: z.string().optional(),
    geo: geoSchema.optional(),
    device: deviceSchema.optional(),
  }),
  z.object({
    ...envelope,
    type: z.literal("ShortUrlExpired"),
    expiredAt: z.coerce.date(),
  }),
  z.object({
    ...envelope,
    type: z.literal("ShortUrlDisabled"),
    reason: disableReasonSchema,
    adminNotes: z.string().optional(),
  }),
]);

export function decodeEvent(payload: unknown): ShortUrlEvent {
  return shortUrlEventSchema.parse(payload);
}

/**
 * JSON for the payload column. Dates serialize as ISO strings.
 */
export function encodeEvent(event: ShortUrlEvent): string {
  return JSON.stringify(event);
}

// =============================================================================
// Projection rows
// =============================================================================

const shortUrlRowSchema = z.object({
  id: z.string(),
  short_code: z.string(),
  original_url: z.string(),
  status: z.nativeEnum(ShortUrlStatus),
  created_at: z.coerce.date(),
  expires_at: z.coerce.date().nullable(),
  last_accessed_at: z.coerce.date().nullable(),
  // BIGINT arrives as a string from pg
  access_count: z.coerce.number().int().nonnegative(),
  created_by: z.string(),
  metadata: z.record(z.string()),
  is_custom_alias: z.boolean(),
  disabled_reason: disableReasonSchema.nullable(),
  disabled_at: z.coerce.date().nullable(),
  version: z.number().int().positive(),
});

export function decodeShortUrlRow(row: unknown): ShortUrlRecord {
  const r = shortUrlRowSchema.parse(row);
  return {
    id: r.id,
    shortCode: r.short_code,
    originalUrl: r.original_url,
    status: r.status,
    createdAt: r.created_at,
    expiresAt: r.expires_at,
    lastAccessedAt: r.last_accessed_at,
    accessCount: r.access_count,
    createdBy: r.created_by,
    metadata: r.metadata,
    isCustomAlias: r.is_custom_alias,
    disabledReason: r.disabled_reason,
    disabledAt: r.disabled_at,
    version: r.version,
  };
}

/**
 * Column values for an INSERT or UPDATE of `short_urls`, in column order.
 */
export const SHORT_URL_COLUMNS = [
  "id",
  "short_code",
  "original_url",
  "status",
  "created_at",
  "expires_at",
  "last_accessed_at",
  "access_count",
  "created_by",
  "metadata",
  "is_custom_alias",
  "disabled_reason",
  "disabled_at",
  "version",
] as const;

export function encodeShortUrlRow(record: ShortUrlRecord): unknown[] {
  return [
    record.id,
    record.shortCode,
    record.originalUrl,
    record.status,
    record.createdAt,
    record.expiresAt,
    record.lastAccessedAt,
    record.accessCount,
    record.createdBy,
    JSON.stringify(record.metadata),
    record.isCustomAlias,
    record.disabledReason,
    record.disabledAt,
    record.version,
  ];
}
