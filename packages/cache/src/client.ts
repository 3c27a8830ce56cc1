/**
 * Redis Client Factory
 *
 * Creates and configures Redis client instances using ioredis.
 */

import Redis from "ioredis";
import type { Logger } from "@snaplink/logger";

export interface RedisClientOptions {
  /** Redis connection URL */
  url: string;
  /** Connection timeout in ms (default: 5000) */
  connectTimeout?: number;
  /** Command timeout in ms (default: 1000) */
  commandTimeout?: number;
  /** Max retries per request (default: 3) */
  maxRetries?: number;
  /** Connection events are logged here when given */
  logger?: Logger;
}

/**
 * Minimal Redis surface the URL cache needs.
 * An ioredis client satisfies it; tests pass a fake.
 */
export interface RedisCommands {
  get(key: string): Promise<string | null>;
  /** SET key value EX seconds NX; null when the key already exists. */
  set(key: string, value: string, secondsToken: "EX", seconds: number, nx: "NX"): Promise<"OK" | null>;
  setex(key: string, seconds: number, value: string): Promise<unknown>;
  del(...keys: string[]): Promise<number>;
  ping(): Promise<string>;
  quit(): Promise<unknown>;
}

/**
 * Create a configured Redis client.
 */
export function createRedisClient(options: RedisClientOptions): Redis {
  const {
    url,
    connectTimeout = 5000,
    commandTimeout = 1000,
    maxRetries = 3,
    logger,
  } = options;

  const client = new Redis(url, {
    connectTimeout,
    commandTimeout,
    maxRetriesPerRequest: maxRetries,

    enableReadyCheck: true,
    enableOfflineQueue: false, // Fail fast when disconnected

    retryStrategy: (times) => {
      if (times > 5) return null;
      return Math.min(times * 100, 2000);
    },
  });

  if (logger) {
    client.on("connect", () => logger.info("Redis connected"));
    client.on("error", (err: Error) => logger.error({ err }, "Redis error"));
    client.on("close", () => logger.debug("Redis connection closed"));
  }

  return client;
}
