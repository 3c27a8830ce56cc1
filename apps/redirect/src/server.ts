/**
 * HTTP Server Bootstrap
 *
 * Wires the storage adapters, the access pipeline and the Hono app, then
 * serves it on Node. `STORAGE_DRIVER=memory` runs without PostgreSQL or
 * Redis for local development.
 */

import { serve } from "@hono/node-server";
import { createLogger } from "@snaplink/logger";
import {
  AccessRecorder,
  InMemoryShortUrlRepository,
  InMemoryUrlCache,
  ShortUrlResolver,
  ShortUrlService,
  type AccessSink,
  type ShortUrlRepository,
  type UrlCache,
} from "@snaplink/core";
import { SnowflakeCodeGenerator } from "@snaplink/shared";
import { createDatabase, PgShortUrlRepository } from "@snaplink/db";
import { createRedisUrlCache } from "@snaplink/cache";
import { AccessEventProducer, createAccessQueue } from "@snaplink/analytics";
import { createApp } from "./app.js";
import { loadConfig, validateConfig } from "./config.js";
import { RedirectMetrics } from "./metrics.js";
import type { Config } from "./types.js";

const logger = createLogger("redirect");

interface Storage {
  repository: ShortUrlRepository;
  cache: UrlCache;
  close(): Promise<void>;
}

function createStorage(config: Config): Storage {
  if (config.storageDriver === "memory") {
    logger.warn("Using in-memory storage; data is lost on restart");
    return {
      repository: new InMemoryShortUrlRepository(),
      cache: new InMemoryUrlCache(),
      close: async () => {},
    };
  }

  if (!config.databaseUrl || !config.redisUrl) {
    throw new Error("DATABASE_URL and REDIS_URL are required for the postgres driver");
  }

  const db = createDatabase({
    connectionString: config.databaseUrl,
    logger,
    statementTimeoutMs: config.dbTimeoutMs,
  });
  const cache = createRedisUrlCache({
    url: config.redisUrl,
    connectTimeout: 1000,
    commandTimeout: config.redisTimeoutMs,
    maxRetries: 3,
    logger,
  });

  return {
    repository: new PgShortUrlRepository(db, { logger }),
    cache,
    close: async () => {
      await Promise.all([cache.disconnect(), db.end()]);
    },
  };
}

function createAccessSink(config: Config): AccessEventProducer | undefined {
  if (!config.analyticsEnabled || !config.redisUrl) return undefined;
  const producer = new AccessEventProducer({ queue: createAccessQueue(config.redisUrl, logger), logger });
  logger.info("Analytics producer initialized");
  return producer;
}

// =============================================================================
// Main Entry Point
// =============================================================================

export async function main(): Promise<void> {
  const config = loadConfig();
  validateConfig(config, logger);

  logger.info({ env: config.env, storageDriver: config.storageDriver }, "Initializing");

  const storage = createStorage(config);
  const producer = createAccessSink(config);
  const accessSink: AccessSink | undefined = producer;

  const service = new ShortUrlService({
    repository: storage.repository,
    cache: storage.cache,
    generator: new SnowflakeCodeGenerator({ machineId: config.machineId, epochMs: config.codeEpochMs }),
    logger,
    accessSink,
  });

  const recorder = new AccessRecorder({
    logger,
    concurrency: config.accessConcurrency,
    maxPending: config.accessMaxPending,
    timeoutMs: config.accessTimeoutMs,
  });

  const resolver = new ShortUrlResolver({
    repository: storage.repository,
    cache: storage.cache,
    accessHandler: service,
    recorder,
    logger,
    cacheTtlSeconds: config.cacheTtlSeconds,
    cacheTimeoutMs: config.redisTimeoutMs,
    storeTimeoutMs: config.dbTimeoutMs,
  });

  const app = createApp({
    resolver,
    repository: storage.repository,
    cache: storage.cache,
    recorder,
    metrics: new RedirectMetrics(),
    logger,
    slowRedirectMs: config.slowRedirectMs,
  });

  const server = serve({ fetch: app.fetch, port: config.port, hostname: config.host });
  logger.info({ host: config.host, port: config.port }, "Redirect service listening");

  let shuttingDown = false;
  async function shutdown(signal: string): Promise<void> {
    if (shuttingDown) return;
    shuttingDown = true;
    logger.info({ signal }, "Shutting down");

    try {
      await new Promise<void>((resolve, reject) => {
        server.close((err) => (err ? reject(err) : resolve()));
      });
      // Accepted access tasks finish before their dependencies go away
      await recorder.close();
      await producer?.close();
      await storage.close();
      logger.info({ access: recorder.stats() }, "Shutdown complete");
      process.exit(0);
    } catch (err) {
      logger.error({ err }, "Error during shutdown");
      process.exit(1);
    }
  }

  process.on("SIGTERM", () => void shutdown("SIGTERM"));
  process.on("SIGINT", () => void shutdown("SIGINT"));
  process.on("unhandledRejection", (reason) => {
    logger.error({ err: reason }, "Unhandled rejection");
  });
}
