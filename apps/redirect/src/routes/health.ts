/**
 * Health and metrics routes
 */

import { Hono } from "hono";
import type { ReadinessResponse } from "@snaplink/shared";
import type { RedirectDeps } from "../types.js";

export function healthRoutes(deps: RedirectDeps): Hono {
  const app = new Hono();

  // Liveness - no dependencies
  app.get("/health", (c) => c.json({ status: "ok" }));

  // Readiness - redirects need the store; without the cache they are slower
  // but still served, so a cache outage only degrades.
  app.get("/health/ready", async (c) => {
    const [storeOk, cacheOk] = await Promise.all([deps.repository.ping(), deps.cache.ping()]);

    const body: ReadinessResponse = {
      status: storeOk ? (cacheOk ? "ok" : "degraded") : "unhealthy",
      checks: {
        store: storeOk ? "ok" : "error",
        cache: cacheOk ? "ok" : "error",
      },
    };
    return c.json(body, storeOk ? 200 : 503);
  });

  app.get("/metrics", (c) => {
    c.header("Content-Type", "text/plain; version=0.0.4");
    return c.body(deps.metrics.render(deps.recorder.stats()));
  });

  return app;
}
