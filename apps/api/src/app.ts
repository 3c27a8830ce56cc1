/**
 * Fastify application factory
 *
 * Builds the API without listening, so tests can drive it with `inject`.
 */

import Fastify, { type FastifyInstance } from "fastify";
import cors from "@fastify/cors";
import helmet from "@fastify/helmet";
import rateLimit from "@fastify/rate-limit";
import type { Redis } from "ioredis";
import type { ShortUrlRepository, ShortUrlResolver, ShortUrlService, UrlCache } from "@snaplink/core";
import { mapError } from "./errors.js";
import { healthRoutes } from "./routes/health.js";
import { linksRoutes } from "./routes/links/index.js";
import { redirectRoutes } from "./routes/redirect.js";

export interface ApiDeps {
  service: ShortUrlService;
  repository: ShortUrlRepository;
  cache: UrlCache;
  /** Serves GET /:code when given; used with the memory storage driver */
  resolver?: ShortUrlResolver;
}

export interface BuildAppOptions {
  shortUrlBase: string;
  /** Request log level; false disables request logging */
  logLevel?: string | false;
  pretty?: boolean;
  corsOrigin?: string;
  /** Requests per minute per client IP; false disables the limiter */
  rateLimitMax?: number | false;
  /** Shares rate-limit counters across instances */
  redis?: Redis;
  /** Include messages of unexpected errors in 500 responses */
  exposeErrors?: boolean;
}

export async function buildApp(deps: ApiDeps, options: BuildAppOptions): Promise<FastifyInstance> {
  const { logLevel = "info" } = options;

  const fastify = Fastify({
    logger:
      logLevel === false
        ? false
        : {
            level: logLevel,
            transport: options.pretty ? { target: "pino-pretty", options: { colorize: true } } : undefined,
          },
    trustProxy: true,
    requestIdHeader: "x-request-id",
  });

  // ============================================================================
  // Error Handling
  // ============================================================================

  // Set before any register: child contexts keep the handler they were created with
  fastify.setErrorHandler((error, request, reply) => {
    const mapped = mapError(error, options.exposeErrors);
    if (mapped.statusCode >= 500) {
      request.log.error({ err: error }, "Request error");
    } else {
      request.log.debug({ err: error, statusCode: mapped.statusCode }, "Request rejected");
    }
    return reply.status(mapped.statusCode).send(mapped.body);
  });

  fastify.setNotFoundHandler((request, reply) => {
    return reply.status(404).send({ success: false, error: "Route not found", errorCode: "NOT_FOUND" });
  });

  // ============================================================================
  // Plugins
  // ============================================================================

  await fastify.register(helmet);
  await fastify.register(cors, { origin: options.corsOrigin ?? true });

  if (options.rateLimitMax !== false) {
    await fastify.register(rateLimit, {
      max: options.rateLimitMax ?? 100,
      timeWindow: "1 minute",
      redis: options.redis,
      keyGenerator: (request) => request.ip || "unknown",
      // A limiter outage must not take the API down
      skipOnError: true,
    });
  }

  // ============================================================================
  // Routes
  // ============================================================================

  await fastify.register(healthRoutes({ repository: deps.repository, cache: deps.cache }));
  await fastify.register(linksRoutes({ service: deps.service, shortUrlBase: options.shortUrlBase }));
  if (deps.resolver) {
    await fastify.register(redirectRoutes({ resolver: deps.resolver }));
  }

  return fastify;
}
