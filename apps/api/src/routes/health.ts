/**
 * Health Check Routes
 *
 * Liveness and readiness probes. The API cannot serve without the store;
 * a cache outage only degrades it.
 */

import type { FastifyBaseLogger, FastifyInstance, FastifyPluginAsync } from "fastify";
import type { ShortUrlRepository, UrlCache } from "@snaplink/core";
import type { ReadinessResponse } from "@snaplink/shared";
import { getDbMetrics } from "@snaplink/db";

export interface HealthRoutesOptions {
  repository: ShortUrlRepository;
  cache: UrlCache;
}

/**
 * A dependency ping that throws counts as down.
 */
export async function safePing(
  component: "store" | "cache",
  ping: () => Promise<boolean>,
  log: Pick<FastifyBaseLogger, "warn">
): Promise<boolean> {
  try {
    return await ping();
  } catch (error) {
    log.warn({ err: error, component }, "Health ping threw");
    return false;
  }
}

/**
 * Prometheus text for the database client counters
 */
export function renderDbMetrics(): string {
  const dbMetrics = getDbMetrics();
  const lines: string[] = [];

  lines.push("# HELP snaplink_api_db_queries_total Total database queries");
  lines.push("# TYPE snaplink_api_db_queries_total counter");
  lines.push(`snaplink_api_db_queries_total ${dbMetrics.totalQueries}`);

  lines.push("# HELP snaplink_api_db_slow_queries_total Slow database queries");
  lines.push("# TYPE snaplink_api_db_slow_queries_total counter");
  lines.push(`snaplink_api_db_slow_queries_total ${dbMetrics.slowQueries}`);

  lines.push("# HELP snaplink_api_db_errors_total Database errors");
  lines.push("# TYPE snaplink_api_db_errors_total counter");
  lines.push(`snaplink_api_db_errors_total ${dbMetrics.errors}`);

  lines.push("# HELP snaplink_api_db_avg_query_time_ms Average query time in ms");
  lines.push("# TYPE snaplink_api_db_avg_query_time_ms gauge");
  lines.push(`snaplink_api_db_avg_query_time_ms ${dbMetrics.avgQueryTimeMs.toFixed(2)}`);

  return lines.join("\n");
}

export function healthRoutes({ repository, cache }: HealthRoutesOptions): FastifyPluginAsync {
  return async (fastify: FastifyInstance) => {
    // Liveness probe - basic server health
    fastify.get("/health", async () => {
      return { status: "ok", timestamp: new Date().toISOString() };
    });

    // Readiness probe - checks dependencies
    fastify.get("/health/ready", async (request, reply) => {
      const [storeOk, cacheOk] = await Promise.all([
        safePing("store", () => repository.ping(), request.log),
        safePing("cache", () => cache.ping(), request.log),
      ]);

      const body: ReadinessResponse = {
        status: storeOk ? (cacheOk ? "ok" : "degraded") : "unhealthy",
        checks: {
          store: storeOk ? "ok" : "error",
          cache: cacheOk ? "ok" : "error",
        },
      };
      if (!storeOk) {
        request.log.warn({ checks: body.checks }, "Readiness check failed");
      }
      return reply.status(storeOk ? 200 : 503).send(body);
    });

    fastify.get("/metrics", async (request, reply) => {
      reply.header("Content-Type", "text/plain; version=0.0.4");
      return renderDbMetrics();
    });
  };
}
