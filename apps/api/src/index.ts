/**
 * SnapLink API Service
 *
 * Management API for short links.
 *
 * Endpoints:
 *   POST   /links                - Create a short link
 *   GET    /links                - The caller's links
 *   GET    /links/check          - Check alias availability
 *   GET    /links/:code          - Link details
 *   GET    /links/:code/stats    - Access statistics
 *   POST   /links/:code/disable  - Disable a link
 *   DELETE /links/:code          - Delete a link
 *   GET    /health, /health/ready, /metrics
 *   GET    /:code                - Redirect, memory storage driver only
 *
 * Also runs the periodic expiry sweep.
 */

import { createLogger } from "@snaplink/logger";
import {
  AccessRecorder,
  ExpirySweeper,
  InMemoryShortUrlRepository,
  InMemoryUrlCache,
  ShortUrlResolver,
  ShortUrlService,
  type ShortUrlRepository,
  type UrlCache,
} from "@snaplink/core";
import { SnowflakeCodeGenerator } from "@snaplink/shared";
import { checkDbConnection, createDatabase, PgShortUrlRepository, type Database } from "@snaplink/db";
import { createRedisClient, createRedisUrlCache, type RedisUrlCache } from "@snaplink/cache";
import { AccessEventProducer, createAccessQueue } from "@snaplink/analytics";
import { buildApp } from "./app.js";
import { loadConfig, validateConfig, type ApiConfig } from "./config.js";

const logger = createLogger("api");

interface Infrastructure {
  repository: ShortUrlRepository;
  cache: UrlCache;
  db?: Database;
  redisCache?: RedisUrlCache;
  /** Set for the memory driver, whose store no other process can read */
  inProcess: boolean;
}

async function connect(config: ApiConfig): Promise<Infrastructure> {
  if (config.STORAGE_DRIVER === "memory" || !config.DATABASE_URL || !config.REDIS_URL) {
    logger.warn("Using in-memory storage; data is lost on restart");
    return { repository: new InMemoryShortUrlRepository(), cache: new InMemoryUrlCache(), inProcess: true };
  }

  const db = createDatabase({
    connectionString: config.DATABASE_URL,
    logger,
    statementTimeoutMs: config.DB_TIMEOUT_MS,
  });
  if (!(await checkDbConnection(db, logger))) {
    await db.end();
    throw new Error("Database connection failed");
  }
  logger.info("Database connection verified");

  const redisCache = createRedisUrlCache({
    url: config.REDIS_URL,
    connectTimeout: 1000,
    commandTimeout: config.REDIS_TIMEOUT_MS,
    maxRetries: 3,
    logger,
  });

  return {
    repository: new PgShortUrlRepository(db, { logger }),
    cache: redisCache,
    db,
    redisCache,
    inProcess: false,
  };
}

async function start(): Promise<void> {
  const config = loadConfig();
  validateConfig(config, logger);

  const infra = await connect(config);

  const producer =
    config.ANALYTICS_ENABLED && config.REDIS_URL
      ? new AccessEventProducer({ queue: createAccessQueue(config.REDIS_URL, logger), logger })
      : undefined;

  const service = new ShortUrlService({
    repository: infra.repository,
    cache: infra.cache,
    generator: new SnowflakeCodeGenerator({ machineId: config.MACHINE_ID, epochMs: config.CODE_EPOCH }),
    logger,
    accessSink: producer,
  });

  // The redirect service has its own memory store, so serve redirects here
  const recorder = infra.inProcess ? new AccessRecorder({ logger }) : undefined;
  const resolver = recorder
    ? new ShortUrlResolver({ repository: infra.repository, cache: infra.cache, accessHandler: service, recorder, logger })
    : undefined;
  if (resolver) {
    logger.info("Memory storage: serving GET /:code from the API");
  }

  const sweeper =
    config.EXPIRY_SWEEP_INTERVAL_MS > 0
      ? new ExpirySweeper({
          service,
          logger,
          intervalMs: config.EXPIRY_SWEEP_INTERVAL_MS,
          batchSize: config.EXPIRY_SWEEP_BATCH,
        })
      : undefined;

  // Rate-limit counters shared across instances when Redis is available
  const rateLimitRedis = config.REDIS_URL
    ? createRedisClient({
        url: config.REDIS_URL,
        connectTimeout: 1000,
        commandTimeout: config.REDIS_TIMEOUT_MS,
        maxRetries: 1,
        logger,
      })
    : undefined;

  const app = await buildApp(
    { service, repository: infra.repository, cache: infra.cache, resolver },
    {
      shortUrlBase: config.SHORT_URL_BASE,
      logLevel: config.LOG_LEVEL,
      pretty: config.NODE_ENV === "development",
      corsOrigin: config.CORS_ORIGIN,
      rateLimitMax: config.RATE_LIMIT_MAX,
      redis: rateLimitRedis,
      exposeErrors: config.NODE_ENV !== "production",
    }
  );

  async function gracefulShutdown(signal: string): Promise<void> {
    logger.info({ signal }, "Received shutdown signal");
    try {
      await app.close();
      await sweeper?.stop();
      await recorder?.close();
      await producer?.close();
      await rateLimitRedis?.quit();
      await infra.redisCache?.disconnect();
      await infra.db?.end();
      logger.info("Clean shutdown complete");
      process.exit(0);
    } catch (err) {
      logger.error({ err }, "Error during shutdown");
      process.exit(1);
    }
  }

  process.on("SIGINT", () => void gracefulShutdown("SIGINT"));
  process.on("SIGTERM", () => void gracefulShutdown("SIGTERM"));

  await app.listen({ port: config.PORT, host: config.HOST });
  sweeper?.start();
  logger.info({ host: config.HOST, port: config.PORT }, "SnapLink API listening");
}

start().catch((err: unknown) => {
  logger.fatal({ err }, "Failed to start API");
  process.exit(1);
});
