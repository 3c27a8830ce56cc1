/**
 * Redirect Service Types
 */

import type { Logger } from "@snaplink/logger";
import type { AccessRecorder, ShortUrlRepository, ShortUrlResolver, UrlCache } from "@snaplink/core";
import type { RedirectMetrics } from "./metrics.js";

export type StorageDriver = "postgres" | "memory";

/**
 * Service configuration, loaded from the environment at startup.
 */
export interface Config {
  port: number;
  host: string;
  env: string;

  storageDriver: StorageDriver;

  /** Required when storageDriver is "postgres" */
  databaseUrl: string | undefined;
  /** Bound on a store lookup during a redirect (ms) */
  dbTimeoutMs: number;

  /** Required when storageDriver is "postgres" */
  redisUrl: string | undefined;
  /** Bound on a cache read or write (ms) */
  redisTimeoutMs: number;

  cacheTtlSeconds: number;

  /** Snowflake machine ID; derived from the hostname when unset */
  machineId: number | undefined;
  codeEpochMs: number | undefined;

  accessConcurrency: number;
  accessMaxPending: number;
  accessTimeoutMs: number;

  analyticsEnabled: boolean;

  /** Redirects slower than this are logged (ms) */
  slowRedirectMs: number;
}

/**
 * Everything the HTTP layer needs; built by the server, or by tests.
 */
export interface RedirectDeps {
  resolver: ShortUrlResolver;
  repository: ShortUrlRepository;
  cache: UrlCache;
  recorder: AccessRecorder;
  metrics: RedirectMetrics;
  logger: Logger;
  /** Redirects slower than this are logged (default 50ms) */
  slowRedirectMs?: number;
}
