// Shared constants
export { RESERVED_WORDS, isReservedWord, getReservedWordCount } from "./reserved.js";

/**
 * Short Code Configuration Constants
 *
 * Single source of truth for code generation and custom alias rules.
 */
export const SHORTCODE_CONFIG = {
  /**
   * Base62 alphabet: 0-9A-Za-z
   * URL-safe, case-sensitive, 62 characters total.
   */
  ALPHABET: "0123456789ABCDEFGHIJKLMNOPQRSTUVWXYZabcdefghijklmnopqrstuvwxyz",

  /** Store-level retries when a generated code is already taken. */
  MAX_RETRIES: 5,

  /**
   * Custom alias constraints (user-provided short codes).
   */
  CUSTOM_ALIAS: {
    MIN_LENGTH: 3,
    MAX_LENGTH: 50,
    /** Letters, digits and hyphens only. */
    CHARSET: /^[A-Za-z0-9-]+$/,
  },
} as const;

/**
 * Snowflake layout: 42+ bits of milliseconds, 10 bits of machine id,
 * 12 bits of sequence.
 */
export const SNOWFLAKE_CONFIG = {
  /** 2024-01-01T00:00:00.000Z */
  DEFAULT_EPOCH_MS: 1704067200000,
  MACHINE_ID_BITS: 10,
  SEQUENCE_BITS: 12,
  /** Capacity of the in-process recent-codes set. */
  RECENT_CODES_CAPACITY: 16384,
} as const;

/**
 * URL Validation Constants
 */
export const URL_CONFIG = {
  /** Maximum URL length to store */
  MAX_LENGTH: 2048,

  /** Allowed protocols */
  ALLOWED_PROTOCOLS: ["http:", "https:"] as const,

  /** Blocked hostnames (private IP ranges are checked separately) */
  BLOCKED_HOSTS: ["localhost", "0.0.0.0", "[::1]", "::1"] as const,
} as const;

/**
 * Metadata bounds for a short URL.
 */
export const METADATA_CONFIG = {
  MAX_ENTRIES: 10,
  MAX_KEY_LENGTH: 100,
  MAX_VALUE_LENGTH: 500,
} as const;
