/**
 * Configuration Module
 *
 * Loads configuration from environment variables with simple parsing and
 * defaults. Fails fast on startup if required variables are missing.
 */

import type { Logger } from "@snaplink/logger";
import type { Config, StorageDriver } from "./types.js";

type Env = Record<string, string | undefined>;

// =============================================================================
// Environment Parsing Helpers
// =============================================================================

function required(env: Env, name: string): string {
  const value = env[name];
  if (!value) {
    throw new Error(`Missing required environment variable: ${name}`);
  }
  return value;
}

function optional(env: Env, name: string, defaultValue: string): string {
  return env[name] || defaultValue;
}

function optionalInt(env: Env, name: string, defaultValue: number): number {
  const value = env[name];
  if (!value) return defaultValue;
  const parsed = parseInt(value, 10);
  return isNaN(parsed) ? defaultValue : parsed;
}

function optionalIntOrUndefined(env: Env, name: string): number | undefined {
  const value = env[name];
  if (!value) return undefined;
  const parsed = parseInt(value, 10);
  return isNaN(parsed) ? undefined : parsed;
}

function parseStorageDriver(value: string): StorageDriver {
  if (value === "postgres" || value === "memory") return value;
  throw new Error(`STORAGE_DRIVER must be "postgres" or "memory", got "${value}"`);
}

// =============================================================================
// Configuration Loading
// =============================================================================

/**
 * Load configuration from `env`. Call once at startup.
 *
 * @throws Error if required variables are missing
 */
export function loadConfig(env: Env = process.env): Config {
  const storageDriver = parseStorageDriver(optional(env, "STORAGE_DRIVER", "postgres"));
  const needsInfra = storageDriver === "postgres";

  return {
    port: optionalInt(env, "PORT", 3002),
    host: optional(env, "HOST", "0.0.0.0"),
    env: optional(env, "NODE_ENV", "development"),

    storageDriver,

    databaseUrl: needsInfra ? required(env, "DATABASE_URL") : env.DATABASE_URL,
    dbTimeoutMs: optionalInt(env, "DB_TIMEOUT_MS", 1000),

    redisUrl: needsInfra ? required(env, "REDIS_URL") : env.REDIS_URL,
    redisTimeoutMs: optionalInt(env, "REDIS_TIMEOUT_MS", 50),

    cacheTtlSeconds: optionalInt(env, "CACHE_TTL_SECONDS", 3600),

    machineId: optionalIntOrUndefined(env, "MACHINE_ID"),
    codeEpochMs: optionalIntOrUndefined(env, "CODE_EPOCH"),

    accessConcurrency: optionalInt(env, "ACCESS_CONCURRENCY", 8),
    accessMaxPending: optionalInt(env, "ACCESS_MAX_PENDING", 10_000),
    accessTimeoutMs: optionalInt(env, "ACCESS_TIMEOUT_MS", 2000),

    analyticsEnabled: optional(env, "ANALYTICS_ENABLED", "false") === "true",

    slowRedirectMs: optionalInt(env, "SLOW_REDIRECT_MS", 50),
  };
}

/**
 * Log warnings for suboptimal settings.
 */
export function validateConfig(config: Config, logger: Logger): void {
  if (config.redisTimeoutMs > 100) {
    logger.warn({ redisTimeoutMs: config.redisTimeoutMs }, "REDIS_TIMEOUT_MS is high; consider <=50ms for low latency");
  }

  if (config.cacheTtlSeconds < 60) {
    logger.warn({ cacheTtlSeconds: config.cacheTtlSeconds }, "CACHE_TTL_SECONDS is short; this may cause high store load");
  }

  if (config.analyticsEnabled && config.storageDriver === "memory" && !config.redisUrl) {
    logger.warn("ANALYTICS_ENABLED needs REDIS_URL; analytics will stay off");
  }

  if (config.machineId !== undefined && (config.machineId < 0 || config.machineId > 1023)) {
    throw new Error(`MACHINE_ID must be between 0 and 1023, got ${config.machineId}`);
  }
}
