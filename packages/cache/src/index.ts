/**
 * Cache Package Exports
 *
 * Redis-backed implementation of the core UrlCache port.
 */

export {
  RedisUrlCache,
  createRedisUrlCache,
  jitterTtl,
  urlKey,
  URL_KEY_PREFIX,
  DEFAULT_TOMBSTONE_TTL_SECONDS,
  type CachedUrl,
  type Tombstone,
  type RedisUrlCacheOptions,
} from "./cache.js";
export { createRedisClient, type RedisClientOptions, type RedisCommands } from "./client.js";
