/**
 * Redirect Request Handler - the hot path
 *
 * Flow:
 * 1. Validate the short code format (rejects before any I/O)
 * 2. Resolve through the cache, then the store
 * 3. Return 302 with the destination, or 404
 *
 * Access recording is scheduled by the resolver and never delays the
 * response. A store failure on a cache miss is a 503, never a 404.
 */

import type { Context } from "hono";
import { isShortUrlError, TransientInfrastructureError, type ResolveResult } from "@snaplink/core";
import type { AccessContext } from "@snaplink/shared";
import { parseDevice } from "@snaplink/analytics";
import type { RedirectDeps } from "./types.js";

// =============================================================================
// Short Code Validation
// =============================================================================

/**
 * Generated codes are base62; custom aliases also allow hyphens.
 */
const SHORT_CODE_REGEX = /^[A-Za-z0-9-]{1,50}$/;

export function isValidShortCode(code: string): boolean {
  return SHORT_CODE_REGEX.test(code);
}

// =============================================================================
// Request Metadata
// =============================================================================

/**
 * Client IP from proxy headers, in priority order.
 */
export function getClientIP(ctx: Context): string | undefined {
  const cfConnecting = ctx.req.header("cf-connecting-ip");
  if (cfConnecting) return cfConnecting;

  const xForwardedFor = ctx.req.header("x-forwarded-for");
  if (xForwardedFor) {
    // First entry is the client
    const firstIP = xForwardedFor.split(",")[0]?.trim();
    if (firstIP) return firstIP;
  }

  return ctx.req.header("x-real-ip") || undefined;
}

export function buildAccessContext(ctx: Context): AccessContext {
  const userAgent = ctx.req.header("user-agent");
  const country = ctx.req.header("cf-ipcountry");
  const context: AccessContext = {
    ipAddress: getClientIP(ctx),
    userAgent,
    referrer: ctx.req.header("referer"),
    device: parseDevice(userAgent),
  };
  // Cloudflare sends XX for unknown and T1 for Tor
  if (country && country !== "XX" && country !== "T1") {
    context.geo = { country: country.toUpperCase() };
  }
  return context;
}

// =============================================================================
// Responses
// =============================================================================

const CACHE_CONTROL = {
  // Every hit must reach us: accesses are counted and a disabled code must
  // stop redirecting as soon as it is invalidated.
  REDIRECT: "private, no-cache",
  NOT_FOUND: "public, max-age=60",
  ERROR: "no-store",
} as const;

function redirectResponse(url: string, source: "cache" | "store", latencyMs: number): Response {
  return new Response(null, {
    status: 302,
    headers: {
      Location: url,
      "Cache-Control": CACHE_CONTROL.REDIRECT,
      "X-Content-Type-Options": "nosniff",
      "Referrer-Policy": "strict-origin-when-cross-origin",
      "Server-Timing": `total;dur=${latencyMs.toFixed(2)}, cache;desc="${source === "cache" ? "hit" : "miss"}"`,
    },
  });
}

function notFoundResponse(): Response {
  return new Response("Not Found", {
    status: 404,
    headers: {
      "Content-Type": "text/plain; charset=utf-8",
      "Cache-Control": CACHE_CONTROL.NOT_FOUND,
      "X-Content-Type-Options": "nosniff",
    },
  });
}

function unavailableResponse(): Response {
  return new Response("Service Temporarily Unavailable", {
    status: 503,
    headers: {
      "Content-Type": "text/plain; charset=utf-8",
      "Cache-Control": CACHE_CONTROL.ERROR,
      "Retry-After": "5",
    },
  });
}

// =============================================================================
// Main Handler
// =============================================================================

export function createRedirectHandler(deps: RedirectDeps): (ctx: Context) => Promise<Response> {
  const { resolver, metrics, logger } = deps;
  const slowRedirectMs = deps.slowRedirectMs ?? 50;

  return async (ctx) => {
    const start = performance.now();
    const shortCode = ctx.req.param("code");

    if (!shortCode || !isValidShortCode(shortCode)) {
      metrics.recordRedirect(404, false, performance.now() - start);
      return notFoundResponse();
    }

    let result: ResolveResult;
    try {
      result = await resolver.resolve(shortCode, buildAccessContext(ctx));
    } catch (error) {
      if (error instanceof TransientInfrastructureError) {
        metrics.recordRedirect(503, false, performance.now() - start);
        logger.warn({ err: error, shortCode, component: error.component }, "Redirect failed on infrastructure");
        return unavailableResponse();
      }
      if (!isShortUrlError(error)) {
        logger.error({ err: error, shortCode }, "Redirect failed");
      }
      throw error;
    }

    const latencyMs = performance.now() - start;

    if (!result.found) {
      metrics.recordRedirect(404, false, latencyMs);
      return notFoundResponse();
    }

    metrics.recordRedirect(302, result.source === "cache", latencyMs);
    if (latencyMs > slowRedirectMs) {
      logger.warn({ shortCode, latencyMs, source: result.source }, "Slow redirect");
    }
    return redirectResponse(result.originalUrl, result.source, latencyMs);
  };
}
