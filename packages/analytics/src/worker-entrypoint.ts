/**
 * Analytics Worker Entrypoint
 *
 * Standalone process consuming access events from the queue.
 * Run with: npm run worker -w @snaplink/analytics
 *
 * Environment Variables:
 *   REDIS_URL - Redis connection URL (default: redis://localhost:6379)
 *   DATABASE_URL - PostgreSQL connection URL (required)
 *   BATCH_SIZE - Events per DB batch (default: 100)
 *   BATCH_TIMEOUT - Max ms before flush (default: 5000)
 *   CONCURRENCY - Parallel job processors (default: 10)
 *   SKIP_BOTS - Skip DB writes for bots (default: false)
 */

import { createLogger } from "@snaplink/logger";
import { createDatabase } from "@snaplink/db";
import { AccessEventWorker } from "./worker.js";

const logger = createLogger("analytics-worker");

async function main(): Promise<void> {
  const databaseUrl = process.env.DATABASE_URL;
  if (!databaseUrl) {
    throw new Error("DATABASE_URL is required");
  }

  const config = {
    redisUrl: process.env.REDIS_URL || "redis://localhost:6379",
    batchSize: parseInt(process.env.BATCH_SIZE || "100", 10),
    batchTimeout: parseInt(process.env.BATCH_TIMEOUT || "5000", 10),
    concurrency: parseInt(process.env.CONCURRENCY || "10", 10),
    skipBots: process.env.SKIP_BOTS === "true",
  };
  logger.info({ config: { ...config, redisUrl: undefined } }, "Starting analytics worker");

  const db = createDatabase({ connectionString: databaseUrl, logger });
  const worker = new AccessEventWorker({ db, logger, config });
  worker.start();

  async function shutdown(signal: string): Promise<void> {
    logger.info({ signal }, "Shutdown signal received");
    try {
      await worker.stop();
      await db.end();
      logger.info("Clean shutdown complete");
      process.exit(0);
    } catch (err) {
      logger.error({ err }, "Error during shutdown");
      process.exit(1);
    }
  }

  process.on("SIGINT", () => void shutdown("SIGINT"));
  process.on("SIGTERM", () => void shutdown("SIGTERM"));
}

main().catch((err: unknown) => {
  logger.fatal({ err }, "Analytics worker failed to start");
  process.exit(1);
});
