/**
 * Redirect HTTP application (Hono)
 */

import { Hono } from "hono";
import { createRedirectHandler } from "./handler.js";
import { healthRoutes } from "./routes/health.js";
import type { RedirectDeps } from "./types.js";

export function createApp(deps: RedirectDeps): Hono {
  const app = new Hono();

  // Health and metrics before the catch-all code route
  app.route("/", healthRoutes(deps));

  app.get("/", (c) => c.text("SnapLink Redirect Service", 200));
  app.get("/:code", createRedirectHandler(deps));

  app.notFound((c) => c.text("Not Found", 404));

  app.onError((err, c) => {
    deps.logger.error({ err, path: c.req.path }, "Unhandled error");
    return c.text("Internal Server Error", 500);
  });

  return app;
}
