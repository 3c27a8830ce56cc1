/**
 * Input validation for short URL creation.
 *
 * Every validator returns a ValidationResult instead of throwing, so callers
 * can collect field errors before deciding how to surface them.
 */

import { isIP } from "node:net";
import { METADATA_CONFIG, SHORTCODE_CONFIG, URL_CONFIG, isReservedWord } from "../constants/index.js";

// =============================================================================
// TYPES
// =============================================================================

/**
 * Result of a validation operation
 */
export interface ValidationResult {
  /** Whether the input is valid */
  valid: boolean;
  /** Human-readable error message if invalid */
  error?: string;
}

const VALID: ValidationResult = { valid: true };

function invalid(error: string): ValidationResult {
  return { valid: false, error };
}

// =============================================================================
// SECTION 1: CUSTOM ALIAS
// =============================================================================

/**
 * Validate a user-provided custom alias.
 *
 * @example
 * ```ts
 * validateCustomAlias("my-custom-link") // { valid: true }
 * validateCustomAlias("ba--d")          // { valid: false, error: "..." }
 * ```
 */
export function validateCustomAlias(alias: string): ValidationResult {
  const { MIN_LENGTH, MAX_LENGTH, CHARSET } = SHORTCODE_CONFIG.CUSTOM_ALIAS;

  if (alias.length < MIN_LENGTH) {
    return invalid(`Alias must be at least ${MIN_LENGTH} characters`);
  }
  if (alias.length > MAX_LENGTH) {
    return invalid(`Alias must be at most ${MAX_LENGTH} characters`);
  }
  if (!CHARSET.test(alias)) {
    return invalid("Alias can only contain letters, numbers, and hyphens");
  }
  if (alias.startsWith("-") || alias.endsWith("-")) {
    return invalid("Alias cannot start or end with a hyphen");
  }
  if (alias.includes("--")) {
    return invalid("Alias cannot contain consecutive hyphens");
  }
  if (isReservedWord(alias)) {
    return invalid("This alias is reserved");
  }

  return VALID;
}

// =============================================================================
// SECTION 2: DESTINATION URL
// =============================================================================

function isPrivateIPv4(address: string): boolean {
  const octets = address.split(".").map(Number);
  const [a, b] = octets;
  if (a === undefined || b === undefined) return false;

  return (
    a === 0 ||
    a === 10 ||
    a === 127 ||
    (a === 169 && b === 254) ||
    (a === 172 && b >= 16 && b <= 31) ||
    (a === 192 && b === 168)
  );
}

function isPrivateIPv6(address: string): boolean {
  const normalized = address.toLowerCase();
  return (
    normalized === "::1" ||
    normalized === "::" ||
    normalized.startsWith("fc") ||
    normalized.startsWith("fd") ||
    normalized.startsWith("fe80:")
  );
}

/**
 * Whether a hostname points at the local machine or a private network.
 */
export function isPrivateHost(hostname: string): boolean {
  const host = hostname.replace(/^\[|\]$/g, "");
  const blocked: readonly string[] = URL_CONFIG.BLOCKED_HOSTS;
  if (blocked.includes(host.toLowerCase())) return true;

  switch (isIP(host)) {
    case 4:
      return isPrivateIPv4(host);
    case 6:
      return isPrivateIPv6(host);
    default:
      return false;
  }
}

/**
 * Validate a destination URL: absolute http(s), bounded length, public host.
 */
export function validateOriginalUrl(url: string): ValidationResult {
  if (url.length === 0) {
    return invalid("URL is required");
  }
  if (url.length > URL_CONFIG.MAX_LENGTH) {
    return invalid(`URL must be at most ${URL_CONFIG.MAX_LENGTH} characters`);
  }

  let parsed: URL;
  try {
    parsed = new URL(url);
  } catch {
    return invalid("URL must be absolute");
  }

  const protocols: readonly string[] = URL_CONFIG.ALLOWED_PROTOCOLS;
  if (!protocols.includes(parsed.protocol)) {
    return invalid("URL must use http or https");
  }
  if (isPrivateHost(parsed.hostname)) {
    return invalid("URL cannot point to a private or local address");
  }

  return VALID;
}

// =============================================================================
// SECTION 3: EXPIRY & METADATA
// =============================================================================

export function validateExpiry(expiresAt: Date, now: Date): ValidationResult {
  if (Number.isNaN(expiresAt.getTime())) {
    return invalid("Expiration date is not a valid date");
  }
  if (expiresAt.getTime() <= now.getTime()) {
    return invalid("Expiration date must be in the future");
  }
  return VALID;
}

export function validateMetadata(metadata: Readonly<Record<string, string>>): ValidationResult {
  const entries = Object.entries(metadata);
  const { MAX_ENTRIES, MAX_KEY_LENGTH, MAX_VALUE_LENGTH } = METADATA_CONFIG;

  if (entries.length > MAX_ENTRIES) {
    return invalid(`Metadata can have at most ${MAX_ENTRIES} entries`);
  }
  for (const [key, value] of entries) {
    if (key.length === 0 || key.length > MAX_KEY_LENGTH) {
      return invalid(`Metadata keys must be 1-${MAX_KEY_LENGTH} characters`);
    }
    if (value.length > MAX_VALUE_LENGTH) {
      return invalid(`Metadata value for "${key}" exceeds ${MAX_VALUE_LENGTH} characters`);
    }
  }
  return VALID;
}
