/**
 * Link Management Routes
 *
 * Endpoints:
 *   POST   /links                - Create a new short link
 *   GET    /links                - The caller's links, newest first (?skip=&take=)
 *   GET    /links/check          - Check alias availability
 *   GET    /links/:code          - Link details
 *   GET    /links/:code/stats    - Access statistics
 *   POST   /links/:code/disable  - Disable a link
 *   DELETE /links/:code          - Delete a link (its code stays reserved)
 *
 * Domain errors propagate to the app's error handler.
 */

import type { FastifyInstance, FastifyPluginAsync } from "fastify";
import { z } from "zod";
import {
  NotFoundError,
  PAGE_LIMITS,
  ValidationError,
  type ShortUrlRecord,
  type ShortUrlService,
} from "@snaplink/core";

// ============================================================================
// Request Schemas (Zod)
// ============================================================================

const createLinkSchema = z.object({
  originalUrl: z.string({ required_error: "URL is required" }),
  customAlias: z.string().optional(),
  expiresAt: z.coerce.date().nullable().optional(),
  metadata: z.record(z.string()).optional(),
});

const listLinksSchema = z.object({
  skip: z.coerce.number().int().min(0).default(0),
  take: z.coerce.number().int().min(1).max(PAGE_LIMITS.MAX_TAKE).default(PAGE_LIMITS.DEFAULT_TAKE),
});

const checkAliasSchema = z.object({
  alias: z.string({ required_error: "Alias is required" }).min(1, "Alias is required"),
});

const codeParamsSchema = z.object({
  code: z.string().min(1).max(50),
});

const disableLinkSchema = z.object({
  reason: z.enum(["admin_action", "policy_violation", "suspicious_activity", "copyright", "spam", "owner_deleted"]),
  adminNotes: z.string().max(1000).optional(),
});

/**
 * Owner header set by the upstream gateway
 */
export const OWNER_HEADER = "x-owner-id";
const ANONYMOUS_OWNER = "anonymous";

// ============================================================================
// Helpers
// ============================================================================

function parseInput<S extends z.ZodTypeAny>(schema: S, value: unknown): z.infer<S> {
  const result = schema.safeParse(value);
  if (!result.success) {
    const details: Record<string, string[]> = {};
    for (const issue of result.error.issues) {
      const field = issue.path.join(".") || "_";
      (details[field] ??= []).push(issue.message);
    }
    throw new ValidationError(details);
  }
  return result.data;
}

function ownerOf(headerValue: string | string[] | undefined): string {
  const value = Array.isArray(headerValue) ? headerValue[0] : headerValue;
  return value?.trim() || ANONYMOUS_OWNER;
}

function toLinkView(record: ShortUrlRecord, shortUrlBase: string) {
  return {
    id: record.id,
    shortCode: record.shortCode,
    shortUrl: `${shortUrlBase}/${record.shortCode}`,
    originalUrl: record.originalUrl,
    status: record.status,
    isCustomAlias: record.isCustomAlias,
    createdBy: record.createdBy,
    createdAt: record.createdAt,
    expiresAt: record.expiresAt,
    accessCount: record.accessCount,
    lastAccessedAt: record.lastAccessedAt,
    disabledReason: record.disabledReason,
    disabledAt: record.disabledAt,
    metadata: record.metadata,
  };
}

// ============================================================================
// Route Registration
// ============================================================================

export interface LinksRoutesOptions {
  service: ShortUrlService;
  /** Base for the `shortUrl` field, e.g. https://snap.example */
  shortUrlBase: string;
}

export function linksRoutes({ service, shortUrlBase }: LinksRoutesOptions): FastifyPluginAsync {
  return async (fastify: FastifyInstance) => {
    fastify.post("/links", async (request, reply) => {
      const body = parseInput(createLinkSchema, request.body ?? {});

      const created = await service.createShortUrl({
        originalUrl: body.originalUrl,
        ownerId: ownerOf(request.headers[OWNER_HEADER]),
        customAlias: body.customAlias,
        expiresAt: body.expiresAt ?? null,
        metadata: body.metadata,
      });

      return reply.status(201).send({
        success: true,
        data: { ...created, shortUrl: `${shortUrlBase}/${created.shortCode}` },
      });
    });

    fastify.get("/links", async (request) => {
      const { skip, take } = parseInput(listLinksSchema, request.query);
      const page = await service.listShortUrls(ownerOf(request.headers[OWNER_HEADER]), { skip, take });

      return {
        success: true,
        data: page.items.map((record) => toLinkView(record, shortUrlBase)),
        pagination: { skip, take, total: page.total },
      };
    });

    // Registered before /links/:code
    fastify.get("/links/check", async (request) => {
      const { alias } = parseInput(checkAliasSchema, request.query);
      const result = await service.checkAvailability(alias);

      return {
        success: true,
        data: {
          alias,
          available: result.available,
          reason: result.reason ?? null,
          message: result.message ?? null,
        },
      };
    });

    fastify.get("/links/:code", async (request) => {
      const { code } = parseInput(codeParamsSchema, request.params);
      const record = await service.getShortUrl(code);
      if (!record) {
        throw new NotFoundError(code);
      }
      return { success: true, data: toLinkView(record, shortUrlBase) };
    });

    fastify.get("/links/:code/stats", async (request) => {
      const { code } = parseInput(codeParamsSchema, request.params);
      return { success: true, data: await service.getStatistics(code) };
    });

    fastify.post("/links/:code/disable", async (request) => {
      const { code } = parseInput(codeParamsSchema, request.params);
      const { reason, adminNotes } = parseInput(disableLinkSchema, request.body ?? {});

      const result = await service.disableShortUrl(code, reason, adminNotes);
      request.log.info({ shortCode: code, reason, changed: result.disabled }, "Link disabled");
      return { success: true, data: result };
    });

    fastify.delete("/links/:code", async (request) => {
      const { code } = parseInput(codeParamsSchema, request.params);
      const result = await service.deleteShortUrl(code);
      request.log.info({ shortCode: code, changed: result.deleted }, "Link deleted");
      return { success: true, data: result };
    });
  };
}
